import "dotenv/config";
import { fileURLToPath } from "url";
import { ChatOpenAI } from "@langchain/openai";
import { createApp } from "./api/app.js";
import { buildAgents } from "./agents/index.js";
import { OrchestratorAgent } from "./agents/orchestrator.js";
import type { ChatModelFactory } from "./agents/wellness_agent.js";
import { loadConfig } from "./config.js";
import type { AppConfig } from "./config.js";
import { Logger } from "./logger.js";
import { MemoryManager } from "./memory/short_memory.js";
import { ResponseSynthesizer } from "./synthesizer.js";
import { configureLangfuse } from "./tracing.js";
import { startTelemetry } from "./telemetry.js";
import { SERVICE_NAME } from "./version.js";
import { WellnessRouter } from "./wellness_router.js";

function chatModelFactory(config: AppConfig): ChatModelFactory {
  return ({ temperature }) =>
    new ChatOpenAI({
      temperature,
      model: config.llm.model,
      apiKey: config.llm.apiKey,
      configuration: {
        baseURL: config.llm.baseUrl
      }
    });
}

export function buildService(config: AppConfig, logger: Logger) {
  const createLlm = chatModelFactory(config);
  const memory = new MemoryManager({
    maxUsers: config.memory.maxUsers,
    maxMessages: config.memory.maxMessages
  });
  const wellnessRouter = new WellnessRouter({
    orchestrator: new OrchestratorAgent(createLlm({ temperature: 0 }), logger.child("Orchestrator")),
    agents: buildAgents(createLlm),
    memory,
    synthesizer: new ResponseSynthesizer(),
    logger: logger.child("WellnessRouter"),
    tracing: configureLangfuse(config, logger.child("Tracing"))
  });
  const app = createApp({ wellnessRouter, memory, logger, corsOrigin: config.server.corsOrigin });
  return { app, wellnessRouter, memory };
}

async function bootstrap(): Promise<void> {
  const config = loadConfig();
  const logger = new Logger("Bootstrap", { level: config.logLevel });
  const stopTelemetry = startTelemetry(config, logger.child("Telemetry"));
  const { app } = buildService(config, logger);

  const server = app.listen(config.server.port, config.server.host, () => {
    logger.info(`${SERVICE_NAME} listening on http://${config.server.host}:${config.server.port}`);
    logger.info(`Model ${config.llm.model} via ${config.llm.baseUrl}`);
    logger.info(`API docs at http://localhost:${config.server.port}/docs`);
  });

  const shutdown = (signal: NodeJS.Signals): void => {
    logger.info(`${signal} received, closing HTTP server`);
    server.close((error) => {
      if (error) {
        logger.error("Error while closing HTTP server", { error: error.message });
        process.exitCode = 1;
      }
      stopTelemetry()
        .catch((flushError: unknown) => {
          logger.error("Failed to flush traces", { error: String(flushError) });
          process.exitCode = 1;
        })
        .finally(() => process.exit());
    });
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
}

if (process.argv[1] === fileURLToPath(import.meta.url)) {
  bootstrap().catch((error) => {
    console.error("Failed to start the wellness service", error);
    process.exitCode = 1;
  });
}
