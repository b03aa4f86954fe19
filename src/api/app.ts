import express from "express";
import type { Express } from "express";
import type { Logger } from "../logger.js";
import type { MemoryManager } from "../memory/short_memory.js";
import type { WellnessRouter } from "../wellness_router.js";
import { cors } from "./cors.js";
import { ErrorHandler } from "./error_handler.js";
import { setupRoutes } from "./routes/index.js";

export interface AppDeps {
  wellnessRouter: WellnessRouter;
  memory: MemoryManager;
  logger: Logger;
  corsOrigin?: string;
}

export function createApp({ wellnessRouter, memory, logger, corsOrigin = "*" }: AppDeps): Express {
  const app = express();
  app.disable("x-powered-by");
  app.use(cors(corsOrigin));
  app.use(express.json({ limit: "100kb" }));

  setupRoutes(app, wellnessRouter, memory);

  app.use(new ErrorHandler(logger.child("HTTP")).middleware());
  return app;
}
