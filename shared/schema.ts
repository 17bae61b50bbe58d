import { z } from "zod";

export const DEFAULT_ORGANIZATION = "default";

// ============================================================================
// Classification results
// ============================================================================

export const classificationOptionSchema = z.object({
  category: z.string(),
  confidence: z.number().min(0).max(1),
  reasoning: z.string().nullable().optional(),
  description: z.string().nullable().optional(),
});

export const classificationResultSchema = z.object({
  best: classificationOptionSchema,
  alternatives: z.array(classificationOptionSchema),
  used_fallback: z.boolean(),
});

export type ClassificationOption = z.infer<typeof classificationOptionSchema>;
export type ClassificationResult = z.infer<typeof classificationResultSchema>;

// ============================================================================
// Request bodies
// ============================================================================

const topKSchema = z.number().int().min(1, "top_k must be at least 1").default(2);
// Blank and unknown organizations are not errors: they resolve to "default".
const organizationSchema = z.string()
  .default(DEFAULT_ORGANIZATION)
  .transform(organization => organization.trim() || DEFAULT_ORGANIZATION);

export const classifyRequestSchema = z.object({
  text: z.string({ required_error: "text is required" }),
  top_k: topKSchema,
  organization: organizationSchema,
});

export const classifyBatchRequestSchema = z.object({
  items: z.array(z.string()).min(1, "items required"),
  top_k: topKSchema,
  organization: organizationSchema,
});

export const chatMessageSchema = z.object({
  role: z.enum(["user", "assistant"]),
  content: z.string(),
});

export const chatStreamRequestSchema = z.object({
  messages: z.array(chatMessageSchema, { required_error: "messages required" }).min(1, "messages required"),
  organization: organizationSchema,
});

export type ClassifyRequest = z.infer<typeof classifyRequestSchema>;
export type ClassifyBatchRequest = z.infer<typeof classifyBatchRequestSchema>;
export type ChatMessage = z.infer<typeof chatMessageSchema>;
export type ChatStreamRequest = z.infer<typeof chatStreamRequestSchema>;
