import type { AgentMap } from "./agents/index.js";
import type { OrchestratorAgent } from "./agents/orchestrator.js";
import { SPECIALIST_INTENTS } from "./agents/types.js";
import type { AgentResponse, IntentClassification, IntentSource, WellnessIntent } from "./agents/types.js";
import { NO_HISTORY } from "./agents/wellness_agent.js";
import type { WellnessAgent } from "./agents/wellness_agent.js";
import { preview } from "./logger.js";
import type { Logger } from "./logger.js";
import type { MemoryManager } from "./memory/short_memory.js";
import { assessSafety } from "./safety.js";
import type { SafetyCategory } from "./safety.js";
import { DISCLAIMER } from "./synthesizer.js";
import type { ResponseSynthesizer } from "./synthesizer.js";
import type { TraceConfigFactory } from "./tracing.js";

export const EMERGENCY_WARNING = "EMERGENCY REQUIRED";

export interface WellnessRequest {
  userId: string;
  query: string;
  /** Skips classification when supplied. */
  intent?: WellnessIntent;
}

export interface WellnessResult {
  userId: string;
  query: string;
  intent: WellnessIntent | "emergency";
  intentSource: IntentSource;
  agentResponses: AgentResponse[];
  synthesizedGuidance: string;
  primaryRecommendations: string[];
  agentCount: number;
  disclaimer: string;
  requiresEmergency: boolean;
  warning?: string;
  safetyCategory?: SafetyCategory;
}

export interface WellnessRouterDeps {
  orchestrator: OrchestratorAgent;
  agents: AgentMap;
  memory: MemoryManager;
  synthesizer: ResponseSynthesizer;
  logger: Logger;
  tracing?: TraceConfigFactory;
}

export class WellnessRouter {
  private readonly orchestrator: OrchestratorAgent;
  private readonly agents: AgentMap;
  private readonly memory: MemoryManager;
  private readonly synthesizer: ResponseSynthesizer;
  private readonly logger: Logger;
  private readonly tracing: TraceConfigFactory;

  constructor(deps: WellnessRouterDeps) {
    this.orchestrator = deps.orchestrator;
    this.agents = deps.agents;
    this.memory = deps.memory;
    this.synthesizer = deps.synthesizer;
    this.logger = deps.logger;
    this.tracing = deps.tracing ?? (() => undefined);
  }

  get agentCount(): number {
    return SPECIALIST_INTENTS.length;
  }

  async route(request: WellnessRequest): Promise<WellnessResult> {
    const { userId, query } = request;
    this.logger.info(`Processing query from ${userId}: ${preview(query)}`);

    const safety = assessSafety(query);
    if (safety.requiresEmergency) {
      this.logger.warn(`Emergency language detected for ${userId}`, {
        category: safety.category,
        matched: safety.matched
      });
      this.memory.addUserMessage(userId, query);
      this.memory.addAssistantMessage(userId, safety.message);
      return {
        userId,
        query,
        intent: "emergency",
        intentSource: "safety",
        agentResponses: [],
        synthesizedGuidance: safety.message,
        primaryRecommendations: [],
        agentCount: 0,
        disclaimer: DISCLAIMER,
        requiresEmergency: true,
        warning: EMERGENCY_WARNING,
        safetyCategory: safety.category
      };
    }

    const history = this.memory.getConversationContext(userId) || NO_HISTORY;
    const traceConfig = this.tracing(userId);
    const classification: IntentClassification = request.intent
      ? { intent: request.intent, confidence: 1, reasoning: "Intent supplied with the request.", source: "request" }
      : await this.orchestrator.classify(query, history, traceConfig);
    this.logger.debug(`Intent resolved to ${classification.intent}`, classification);

    const selected = this.selectAgents(classification.intent);
    const outcomes = await Promise.allSettled(selected.map((agent) => agent.invoke(query, history, traceConfig)));
    const responses: AgentResponse[] = [];
    outcomes.forEach((outcome, index) => {
      if (outcome.status === "fulfilled") {
        responses.push(outcome.value);
      } else {
        this.logger.error(`${selected[index].name} failed`, {
          error: outcome.reason instanceof Error ? outcome.reason.message : String(outcome.reason)
        });
      }
    });

    this.memory.addUserMessage(userId, query);
    const synthesis = this.synthesizer.synthesize(query, classification.intent, responses);
    this.memory.addAssistantMessage(userId, synthesis.guidance);

    return {
      userId,
      query,
      intent: classification.intent,
      intentSource: classification.source,
      agentResponses: synthesis.responses,
      synthesizedGuidance: synthesis.guidance,
      primaryRecommendations: synthesis.primaryRecommendations,
      agentCount: synthesis.responses.length,
      disclaimer: synthesis.disclaimer,
      requiresEmergency: false
    };
  }

  /** One specialist per intent; a general question goes to all of them. */
  selectAgents(intent: WellnessIntent): WellnessAgent[] {
    if (intent === "general") {
      return SPECIALIST_INTENTS.map((specialist) => this.agents[specialist]);
    }
    return [this.agents[intent]];
  }
}
