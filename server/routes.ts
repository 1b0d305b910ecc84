import type { Express, Request, Response, NextFunction } from "express";
import { logger } from "./logger";
import { createProtocolRouter, type ProtocolApiDeps } from "./protocol-api";

export function registerRoutes(app: Express, deps: ProtocolApiDeps): Express {
  app.use((req, _res, next) => {
    logger.debug(`${req.method} ${req.path}`, 'http');
    next();
  });

  app.get("/api/health", (_req: Request, res: Response) => {
    res.json({ status: "ok", device: deps.model.device.name, kStore: deps.store.filePath });
  });

  // Register PET protocol API routes
  app.use('/api/protocols', createProtocolRouter(deps));

  app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
    logger.error(`${req.method} ${req.path} failed: ${error instanceof Error ? error.stack ?? error.message : String(error)}`, 'http');
    res.status(500).json({ error: "Internal server error" });
  });

  return app;
}
