import { FakeListChatModel } from "@langchain/core/utils/testing";
import { createDietAgent } from "../agents/diet_agent.js";
import { createFitnessAgent } from "../agents/fitness_agent.js";
import { createLifestyleAgent } from "../agents/lifestyle_agent.js";
import { OrchestratorAgent } from "../agents/orchestrator.js";
import { createSymptomAgent } from "../agents/symptom_agent.js";
import type { SpecialistIntent } from "../agents/types.js";
import { Logger, LogLevel } from "../logger.js";
import { MemoryManager } from "../memory/short_memory.js";
import { ResponseSynthesizer } from "../synthesizer.js";
import type { TraceConfigFactory } from "../tracing.js";
import { WellnessRouter } from "../wellness_router.js";

export type ModelRole = SpecialistIntent | "classifier";

export const SYMPTOM_REPLY =
  "Fatigue often follows short sleep.\n• Drink 8-10 glasses of water daily\n• Aim for 7-8 hours of sleep\n• Take a 10-minute walk after lunch";
export const LIFESTYLE_REPLY =
  "Your evenings look busy.\n- Keep a fixed bedtime every night\n- Put screens away an hour before bed";
export const DIET_REPLY = "Balanced meals keep energy steady.\n* Oats with berries for breakfast\n* Nuts and avocado as a snack";
export const FITNESS_REPLY = "Build the habit first.\n- Brisk walk for 20 minutes daily\n- Bodyweight squats, 3 sets of 10";

export function classifierReply(intent: string, confidence = 0.9): string {
  return JSON.stringify({ intent, confidence, reasoning: `Looks like a ${intent} question` });
}

export function silentLogger(): Logger {
  return new Logger("test", { level: LogLevel.SILENT, enableColor: false });
}

export function fakeModel(...responses: string[]): FakeListChatModel {
  return new FakeListChatModel({ responses });
}

export interface TestRig {
  router: WellnessRouter;
  memory: MemoryManager;
  models: Record<ModelRole, FakeListChatModel>;
}

/** Router wired to fake chat models; each role answers with its canned reply unless overridden. */
export function createTestRig(
  replies: Partial<Record<ModelRole, string[]>> = {},
  tracing?: TraceConfigFactory
): TestRig {
  const models: Record<ModelRole, FakeListChatModel> = {
    classifier: fakeModel(...(replies.classifier ?? [classifierReply("symptom")])),
    symptom: fakeModel(...(replies.symptom ?? [SYMPTOM_REPLY])),
    lifestyle: fakeModel(...(replies.lifestyle ?? [LIFESTYLE_REPLY])),
    diet: fakeModel(...(replies.diet ?? [DIET_REPLY])),
    fitness: fakeModel(...(replies.fitness ?? [FITNESS_REPLY]))
  };
  const logger = silentLogger();
  const memory = new MemoryManager();
  const router = new WellnessRouter({
    orchestrator: new OrchestratorAgent(models.classifier, logger),
    agents: {
      symptom: createSymptomAgent(() => models.symptom),
      lifestyle: createLifestyleAgent(() => models.lifestyle),
      diet: createDietAgent(() => models.diet),
      fitness: createFitnessAgent(() => models.fitness)
    },
    memory,
    synthesizer: new ResponseSynthesizer(),
    logger,
    tracing
  });
  return { router, memory, models };
}
