import { WellnessAgent } from "./wellness_agent.js";
import type { ChatModelFactory } from "./wellness_agent.js";

export function createLifestyleAgent(createLlm: ChatModelFactory): WellnessAgent {
  return new WellnessAgent(createLlm({ temperature: 0.4 }), {
    intent: "lifestyle",
    name: "Lifestyle Coach",
    confidence: 0.82,
    minRecommendationLength: 10,
    systemPrompt:
      "You are a lifestyle and wellness habits coach. Your expertise covers sleep hygiene, stress management, daily routine optimization, " +
      "mental wellness practices and work-life balance.\n\n" +
      "Ask about current habits if they are not provided, consider individual preferences and constraints, and keep recommendations evidence-based.\n\n" +
      "Format as:\n- Current pattern analysis\n- Recommended changes\n- Implementation tips (3-5 specific actions, one bullet each)"
  });
}
