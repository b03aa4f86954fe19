import { WellnessAgent } from "./wellness_agent.js";
import type { ChatModelFactory } from "./wellness_agent.js";

export function createSymptomAgent(createLlm: ChatModelFactory): WellnessAgent {
  return new WellnessAgent(createLlm({ temperature: 0.3 }), {
    intent: "symptom",
    name: "Symptom Assessment",
    confidence: 0.85,
    minRecommendationLength: 0,
    systemPrompt:
      "You are a wellness symptom assessment specialist. Understand the user's reported symptoms, ask clarifying questions if needed, " +
      "provide general wellness suggestions and identify when professional medical advice is needed. NEVER diagnose medical conditions.\n\n" +
      "Format your response with:\n- Symptom summary\n- General wellness suggestions (3-5 items, one bullet each)\n- When to seek professional help\n\n" +
      'Always emphasize: "This is general wellness guidance, not medical advice."'
  });
}
