import { Router } from "express";
import type { Request, Response } from "express";
import { SERVICE_VERSION } from "../../version.js";

/**
 * Liveness probe. `agentsAvailable` is the number of specialist agents wired
 * into the router.
 */
export function createHealthRoutes(agentsAvailable: number): Router {
  const router = Router();

  router.get("/", (req: Request, res: Response): void => {
    res.json({
      status: "healthy",
      version: SERVICE_VERSION,
      agents_available: agentsAvailable,
      uptime: process.uptime(),
      timestamp: new Date().toISOString()
    });
  });

  return router;
}
