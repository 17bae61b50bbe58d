import type { Express } from "express";
import { z } from "zod";
import {
  classifyRequestSchema,
  classifyBatchRequestSchema,
  chatStreamRequestSchema,
  type ClassifyRequest,
  type ClassifyBatchRequest,
  type ChatStreamRequest,
} from "@shared/schema";
import type { Classifier } from "./classification";
import { streamReply } from "./conversation";
import type { TextGenerator } from "./llm/textGenerator";
import type { TenantDirectory } from "./registry";
import { BATCH_CONSTANTS } from "./config/constants";
import { validate } from "./middleware/validation";
import { ValidationError, errorMiddleware, handleRouteError } from "./utils/errorHandler";

export type RouteDeps = {
  tenants: TenantDirectory;
  classifier: Classifier;
  chatGenerator: TextGenerator;
};

const batchRequestSchema = classifyBatchRequestSchema.extend({
  items: z.array(z.string())
    .min(1, "items required")
    .max(BATCH_CONSTANTS.MAX_BATCH_SIZE, `at most ${BATCH_CONSTANTS.MAX_BATCH_SIZE} items per batch`),
});

/**
 * Blank inquiries are the one input the API rejects outright; everything
 * else gets a best-effort classification.
 */
function requireText(text: string, label = "text"): string {
  const trimmed = text.trim();
  if (!trimmed) {
    throw new ValidationError(label === "text" ? "Empty text" : `Empty text in ${label}`);
  }
  return trimmed;
}

export function registerRoutes(app: Express, deps: RouteDeps): void {
  app.get("/health", (_req, res) => {
    res.json({ status: "ok" });
  });

  app.get("/organizations", (_req, res) => {
    res.json({ organizations: deps.tenants.organizations() });
  });

  app.post("/classify", validate({ body: classifyRequestSchema }), async (req, res) => {
    try {
      const body: ClassifyRequest = req.body;
      const text = requireText(body.text);
      const result = await deps.classifier.classify(text, body.top_k, body.organization);
      res.json(result);
    } catch (error) {
      handleRouteError(res, error, "Classify");
    }
  });

  app.post("/classify/batch", validate({ body: batchRequestSchema }), async (req, res) => {
    try {
      const body: ClassifyBatchRequest = req.body;
      const items = body.items.map((item, index) => requireText(item, `items[${index}]`));
      const results = await deps.classifier.classifyBatch(items, body.top_k, body.organization);
      res.json({ results });
    } catch (error) {
      handleRouteError(res, error, "ClassifyBatch");
    }
  });

  app.post("/chat/stream", validate({ body: chatStreamRequestSchema }), async (req, res) => {
    try {
      const body: ChatStreamRequest = req.body;
      const tenant = deps.tenants.resolve(body.organization);

      let clientGone = false;
      res.on("close", () => {
        clientGone = true;
      });

      res.status(200);
      res.setHeader("Content-Type", "text/plain; charset=utf-8");
      res.setHeader("Cache-Control", "no-cache");

      for await (const fragment of streamReply(body.messages, tenant.registry, deps.chatGenerator)) {
        if (clientGone) {
          console.log(`[Chat] Client disconnected, stopping stream for "${tenant.organization}"`);
          break;
        }
        res.write(fragment);
      }
      res.end();
    } catch (error) {
      handleRouteError(res, error, "Chat");
    }
  });

  app.use((_req, res) => {
    res.status(404).json({ error: "Route not found" });
  });

  app.use(errorMiddleware);
}
