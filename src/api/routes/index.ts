import type { Application, Request, Response } from "express";
import type { MemoryManager } from "../../memory/short_memory.js";
import { SERVICE_NAME, SERVICE_VERSION } from "../../version.js";
import type { WellnessRouter } from "../../wellness_router.js";
import { createDocsRoutes } from "./docs.js";
import { createHealthRoutes } from "./health.js";
import { createWellnessRoutes } from "./wellness.js";

const ENDPOINTS = {
  health: "/health",
  query: "/wellness/query (POST)",
  intents: "/wellness/intents",
  memory: "/wellness/memory/:userId",
  docs: "/docs"
};

export function setupRoutes(app: Application, wellnessRouter: WellnessRouter, memory: MemoryManager): void {
  app.use("/health", createHealthRoutes(wellnessRouter.agentCount));
  app.use("/wellness", createWellnessRoutes(wellnessRouter, memory));
  app.use("/docs", createDocsRoutes());

  app.get("/", (req: Request, res: Response) => {
    res.json({
      name: SERVICE_NAME,
      version: SERVICE_VERSION,
      status: "running",
      endpoints: ENDPOINTS,
      message: 'Ready! POST /wellness/query with {"user_id":"test","query":"I feel tired"}'
    });
  });

  app.use((req: Request, res: Response) => {
    res.status(404).json({
      error: "Not Found",
      message: `Route ${req.method} ${req.originalUrl} not found`,
      availableEndpoints: Object.values(ENDPOINTS),
      timestamp: new Date().toISOString()
    });
  });
}
