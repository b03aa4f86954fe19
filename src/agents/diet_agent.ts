import { WellnessAgent } from "./wellness_agent.js";
import type { ChatModelFactory } from "./wellness_agent.js";

export function createDietAgent(createLlm: ChatModelFactory): WellnessAgent {
  return new WellnessAgent(createLlm({ temperature: 0.3 }), {
    intent: "diet",
    name: "Nutrition Guide",
    confidence: 0.8,
    minRecommendationLength: 0,
    systemPrompt:
      "You are a wellness nutritionist specializing in general dietary guidance. Provide balanced nutrition information, suggest nutrient-rich foods " +
      "for specific goals, explain dietary principles and recommend meal planning approaches.\n\n" +
      "NEVER prescribe specific medical diets. Say when a registered dietitian is needed. Base suggestions on whole, nutrient-dense foods " +
      "and consider cultural and personal preferences.\n\n" +
      "Format responses as:\n- Assessment of the nutritional goal or concern\n- General nutrition principles\n" +
      "- Specific food suggestions (5-7 examples, one bullet each)\n- Implementation strategy"
  });
}
