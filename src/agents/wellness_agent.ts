import type { RunnableConfig } from "@langchain/core/runnables";
import { ChatPromptTemplate } from "@langchain/core/prompts";
import type { BaseMessage } from "@langchain/core/messages";
import type { BaseChatModel } from "@langchain/core/language_models/chat_models";
import { extractText } from "./message_text.js";
import type { AgentResponse, SpecialistIntent } from "./types.js";

export const NO_HISTORY = "No previous conversation.";

const MAX_RECOMMENDATIONS = 5;
const BULLET_PREFIX = /^[•\-* ]+/;

/** Builds the chat model an agent talks to. */
export type ChatModelFactory = (options: { temperature: number }) => BaseChatModel;

export interface WellnessAgentOptions {
  intent: SpecialistIntent;
  name: string;
  systemPrompt: string;
  /** Fixed confidence reported with every answer from this agent. */
  confidence: number;
  /** Bullets this short or shorter are not treated as recommendations. */
  minRecommendationLength: number;
}

export class WellnessAgent {
  private readonly prompt: ChatPromptTemplate;

  constructor(
    private readonly llm: BaseChatModel,
    private readonly options: WellnessAgentOptions
  ) {
    this.prompt = ChatPromptTemplate.fromMessages([
      ["system", options.systemPrompt],
      ["system", "Previous conversation:\n{history}"],
      ["human", "{question}"]
    ]);
  }

  async buildMessages(question: string, history = NO_HISTORY): Promise<BaseMessage[]> {
    return this.prompt.formatMessages({ question, history });
  }

  async invoke(question: string, history = NO_HISTORY, config?: RunnableConfig): Promise<AgentResponse> {
    const messages = await this.buildMessages(question, history);
    const reply = await this.llm.invoke(messages, config);
    const content = extractText(reply);
    return {
      agentName: this.options.name,
      intent: this.options.intent,
      content,
      confidence: this.options.confidence,
      recommendations: extractRecommendations(content, this.options.minRecommendationLength)
    };
  }

  get intent(): SpecialistIntent {
    return this.options.intent;
  }

  get name(): string {
    return this.options.name;
  }
}

/**
 * Collects bulleted lines ("•", "-" or "*") from a reply, bullets stripped,
 * keeping at most five that are longer than `minLength`.
 */
export function extractRecommendations(content: string, minLength = 0): string[] {
  const recommendations: string[] = [];
  for (const rawLine of content.split("\n")) {
    const line = rawLine.trim();
    if (!line.startsWith("•") && !line.startsWith("-") && !line.startsWith("*")) {
      continue;
    }
    const recommendation = line.replace(BULLET_PREFIX, "");
    if (recommendation && recommendation.length > minLength) {
      recommendations.push(recommendation);
    }
  }
  return recommendations.slice(0, MAX_RECOMMENDATIONS);
}
