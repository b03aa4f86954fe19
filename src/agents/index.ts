import { createDietAgent } from "./diet_agent.js";
import { createFitnessAgent } from "./fitness_agent.js";
import { createLifestyleAgent } from "./lifestyle_agent.js";
import { createSymptomAgent } from "./symptom_agent.js";
import type { SpecialistIntent } from "./types.js";
import type { ChatModelFactory, WellnessAgent } from "./wellness_agent.js";

export type AgentMap = Record<SpecialistIntent, WellnessAgent>;

export function buildAgents(createLlm: ChatModelFactory): AgentMap {
  return {
    symptom: createSymptomAgent(createLlm),
    lifestyle: createLifestyleAgent(createLlm),
    diet: createDietAgent(createLlm),
    fitness: createFitnessAgent(createLlm)
  } satisfies AgentMap;
}
