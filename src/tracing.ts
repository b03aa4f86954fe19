import type { RunnableConfig } from "@langchain/core/runnables";
import { CallbackHandler as LangfuseCallbackHandler } from "@langfuse/langchain";
import type { AppConfig } from "./config.js";
import type { Logger } from "./logger.js";

/** Produces the LangChain run config attached to every model call of one request. */
export type TraceConfigFactory = (userId: string) => RunnableConfig | undefined;

export function configureLangfuse(config: AppConfig, logger: Logger): TraceConfigFactory {
  if (!config.tracingEnabled) {
    logger.warn("Langfuse keys missing. Tracing disabled.");
    return () => undefined;
  }
  logger.info("Langfuse tracing enabled");
  return (userId) => ({
    callbacks: [
      new LangfuseCallbackHandler({
        userId,
        tags: ["wellness-router"],
        traceMetadata: {
          service: "digital-wellness-assistant",
          environment: config.environment
        }
      })
    ],
    metadata: { user_id: userId }
  });
}
