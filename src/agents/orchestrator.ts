import { ChatPromptTemplate } from "@langchain/core/prompts";
import type { BaseChatModel } from "@langchain/core/language_models/chat_models";
import type { RunnableConfig } from "@langchain/core/runnables";
import { StructuredOutputParser } from "langchain/output_parsers";
import { z } from "zod";
import type { Logger } from "../logger.js";
import { identifyIntent, scoreIntents } from "./intents.js";
import { extractText } from "./message_text.js";
import { WELLNESS_INTENTS } from "./types.js";
import type { IntentClassification, WellnessIntent } from "./types.js";

const schema = z.object({
  intent: z.enum(WELLNESS_INTENTS),
  confidence: z.number().min(0).max(1),
  reasoning: z.string()
});

export type OrchestratorResult = z.infer<typeof schema>;

const orchestratorParser = StructuredOutputParser.fromZodSchema(schema);

export class OrchestratorAgent {
  private readonly parser = orchestratorParser;
  private readonly prompt: ChatPromptTemplate;

  constructor(
    private readonly llm: BaseChatModel,
    private readonly logger: Logger
  ) {
    this.prompt = ChatPromptTemplate.fromMessages([
      [
        "system",
        "You are the intent classifier for a digital wellness assistant. Pick the single intent that best matches the user's question: " +
          "symptom (physical complaints, pain, feeling unwell), lifestyle (sleep, stress, routines, mood, work-life balance), " +
          "diet (food, meals, nutrition, weight), fitness (exercise, training, physical activity) or general (anything broader or spanning several areas)."
      ],
      [
        "human",
        "Conversation so far:\n{history}\n\nQuestion: {question}\n\nReturn JSON that follows: {format_instructions}"
      ]
    ]);
  }

  /**
   * Asks the model for the question's intent. Any model or parsing failure
   * falls back to keyword matching.
   */
  async classify(
    question: string,
    history = "No previous conversation.",
    config?: RunnableConfig
  ): Promise<IntentClassification> {
    try {
      const messages = await this.prompt.formatMessages({
        question,
        history,
        format_instructions: this.parser.getFormatInstructions()
      });
      const response = await this.llm.invoke(messages, config);
      const parsed = await this.parser.parse(extractText(response));
      return { ...parsed, source: "model" };
    } catch (error) {
      this.logger.warn("Intent classification failed, using keyword matching", {
        error: error instanceof Error ? error.message : String(error)
      });
      return OrchestratorAgent.classifyByKeywords(question);
    }
  }

  static classifyByKeywords(question: string): IntentClassification {
    const intent: WellnessIntent = identifyIntent(question);
    if (intent === "general") {
      return {
        intent,
        confidence: 0.5,
        reasoning: "No wellness keywords matched.",
        source: "keywords"
      };
    }
    const hits = scoreIntents(question)[intent];
    return {
      intent,
      confidence: Math.min(0.9, 0.5 + hits * 0.1),
      reasoning: `Matched ${hits} ${intent} keyword${hits === 1 ? "" : "s"}.`,
      source: "keywords"
    };
  }
}
