import { LangfuseSpanProcessor } from "@langfuse/otel";
import { NodeSDK } from "@opentelemetry/sdk-node";
import type { AppConfig } from "./config.js";
import type { Logger } from "./logger.js";

export type TelemetryShutdown = () => Promise<void>;

/**
 * Registers the OpenTelemetry span processor that exports the Langfuse
 * callback handler's spans. The processor reads the `LANGFUSE_*` keys from
 * the environment.
 */
export function startTelemetry(config: AppConfig, logger: Logger): TelemetryShutdown {
  if (!config.tracingEnabled) {
    return async () => {};
  }
  const sdk = new NodeSDK({
    spanProcessors: [new LangfuseSpanProcessor({ environment: config.environment })]
  });
  sdk.start();
  logger.debug("Langfuse span processor registered");
  return () => sdk.shutdown();
}
