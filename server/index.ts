import "dotenv/config";
import express from "express";
import { createServer } from "http";
import { loadConfig } from "./config";
import { logger } from "./logger";
import { findAvailablePort } from "./port";
import { KFactorStore, PetPhysicsModel, SessionLog } from "./pet-protocol";
import { registerRoutes } from "./routes";

const config = loadConfig();

const app = express();
const server = createServer(app);

app.use(express.json({ limit: '1mb' }));

async function startServer() {
  const store = new KFactorStore(config.kStorePath);
  const initial = store.load();
  if (initial.status === 'parse-error') {
    logger.warn(`K store at ${store.filePath} could not be read; site medians are unavailable until it is fixed`, 'server');
  }

  registerRoutes(app, {
    model: new PetPhysicsModel(),
    store,
    sessionLog: new SessionLog(),
  });

  const port = await findAvailablePort(config.port);
  server.listen(port, "0.0.0.0", () => {
    logger.info(`PET protocol planner running on port ${port} (k store: ${store.filePath})`, 'server');
  });
}

startServer().catch((error: unknown) => {
  logger.error(error instanceof Error ? error.stack ?? error.message : String(error), 'server');
  process.exitCode = 1;
});
