export const WELLNESS_INTENTS = ["symptom", "lifestyle", "diet", "fitness", "general"] as const;

export type WellnessIntent = (typeof WELLNESS_INTENTS)[number];

export type SpecialistIntent = Exclude<WellnessIntent, "general">;

/** Order in which specialists are consulted for a general question. */
export const SPECIALIST_INTENTS: readonly SpecialistIntent[] = ["symptom", "lifestyle", "diet", "fitness"];

export type IntentSource = "request" | "model" | "keywords" | "safety";

export interface IntentClassification {
  intent: WellnessIntent;
  confidence: number;
  reasoning: string;
  source: IntentSource;
}

export interface AgentResponse {
  agentName: string;
  intent: SpecialistIntent;
  content: string;
  confidence: number;
  recommendations: string[];
}
