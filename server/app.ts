import express, { type Express } from "express";
import { addSecurityHeaders, allowCrossOrigin } from "./middleware/security";
import { registerRoutes, type RouteDeps } from "./routes";

export type AppOptions = {
  corsOrigin: string;
};

export function createApp(deps: RouteDeps, options: AppOptions): Express {
  const app = express();

  app.disable("x-powered-by");
  app.use(addSecurityHeaders);
  app.use(allowCrossOrigin(options.corsOrigin));
  app.use(express.json());

  app.use((req, res, next) => {
    const start = Date.now();
    res.on("finish", () => {
      console.log(`[HTTP] ${req.method} ${req.path} ${res.statusCode} in ${Date.now() - start}ms`);
    });
    next();
  });

  registerRoutes(app, deps);
  return app;
}
