import { Router } from "express";
import type { NextFunction, Request, Response } from "express";
import { z } from "zod";
import { WELLNESS_INTENTS } from "../../agents/types.js";
import type { MemoryManager } from "../../memory/short_memory.js";
import type { WellnessResult, WellnessRouter } from "../../wellness_router.js";
import { HttpError } from "../http_error.js";

export const MAX_QUERY_LENGTH = 2000;

export const wellnessQuerySchema = z.object({
  user_id: z.string({ required_error: "user_id is required" }).trim().min(1, "user_id is required"),
  query: z
    .string({ required_error: "query is required" })
    .trim()
    .min(1, "query is required")
    .max(MAX_QUERY_LENGTH, `query must be at most ${MAX_QUERY_LENGTH} characters`),
  intent: z.enum(WELLNESS_INTENTS).optional()
});

/** Wire shape of a query response. */
export function toQueryResponse(result: WellnessResult) {
  return {
    user_id: result.userId,
    query: result.query,
    intent: result.intent,
    intent_source: result.intentSource,
    agent_responses: result.agentResponses.map((response) => ({
      agent_name: response.agentName,
      content: response.content,
      confidence: response.confidence,
      recommendations: response.recommendations
    })),
    synthesized_guidance: result.synthesizedGuidance,
    primary_recommendations: result.primaryRecommendations,
    agent_count: result.agentCount,
    disclaimer: result.disclaimer,
    requires_emergency: result.requiresEmergency,
    ...(result.warning ? { warning: result.warning } : {}),
    ...(result.safetyCategory ? { safety_category: result.safetyCategory } : {})
  };
}

export function createWellnessRoutes(wellnessRouter: WellnessRouter, memory: MemoryManager): Router {
  const router = Router();

  router.post("/query", async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const parsed = wellnessQuerySchema.safeParse(req.body ?? {});
      if (!parsed.success) {
        throw HttpError.badRequest(
          "Invalid request body",
          parsed.error.issues.map((issue) => ({ field: issue.path.join("."), message: issue.message }))
        );
      }
      const { user_id, query, intent } = parsed.data;
      const result = await wellnessRouter.route({ userId: user_id, query, intent });
      res.json(toQueryResponse(result));
    } catch (error) {
      next(error);
    }
  });

  router.get("/intents", (req: Request, res: Response): void => {
    res.json({ intents: [...WELLNESS_INTENTS] });
  });

  router.get("/memory/:userId", (req: Request, res: Response, next: NextFunction): void => {
    const { userId } = req.params;
    if (!memory.has(userId)) {
      next(HttpError.notFound(`No conversation memory for user ${userId}`));
      return;
    }
    res.json(memory.getMemoryStats(userId));
  });

  router.delete("/memory/:userId", (req: Request, res: Response): void => {
    memory.clearMemory(req.params.userId);
    res.sendStatus(204);
  });

  return router;
}
