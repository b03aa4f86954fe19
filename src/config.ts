import { z } from "zod";
import { LogLevel, parseLogLevel } from "./logger.js";

const envSchema = z.object({
  OPENROUTER_API_KEY: z
    .string({ required_error: "OPENROUTER_API_KEY must be set." })
    .min(1, "OPENROUTER_API_KEY must be set."),
  OPENROUTER_BASE_URL: z.string().url().default("https://openrouter.ai/api/v1"),
  OPENROUTER_MODEL: z.string().min(1).default("gpt-4o-mini"),
  PORT: z.coerce.number().int().min(1).max(65535).default(8000),
  HOST: z.string().min(1).default("0.0.0.0"),
  LOG_LEVEL: z
    .string()
    .default("info")
    .refine((value) => parseLogLevel(value) !== undefined, "LOG_LEVEL must be one of debug, info, warn, error, silent."),
  CORS_ORIGIN: z.string().min(1).default("*"),
  MEMORY_MAX_USERS: z.coerce.number().int().positive().default(100),
  MEMORY_MAX_MESSAGES: z.coerce.number().int().positive().default(20),
  LANGFUSE_PUBLIC_KEY: z.string().optional(),
  LANGFUSE_SECRET_KEY: z.string().optional(),
  NODE_ENV: z.string().default("development")
});

export interface AppConfig {
  llm: {
    apiKey: string;
    baseUrl: string;
    model: string;
  };
  server: {
    host: string;
    port: number;
    corsOrigin: string;
  };
  memory: {
    maxUsers: number;
    maxMessages: number;
  };
  logLevel: LogLevel;
  tracingEnabled: boolean;
  environment: string;
}

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
  }
}

/**
 * Validates the environment. Empty strings count as unset so a blank line in
 * `.env` falls back to the default.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const present = Object.fromEntries(Object.entries(env).filter(([, value]) => value !== undefined && value !== ""));
  const result = envSchema.safeParse(present);
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((issue) => {
        const field = issue.path.join(".");
        return issue.message.startsWith(field) ? issue.message : `${field}: ${issue.message}`;
      })
    );
  }
  const parsed = result.data;
  return {
    llm: {
      apiKey: parsed.OPENROUTER_API_KEY,
      baseUrl: parsed.OPENROUTER_BASE_URL,
      model: parsed.OPENROUTER_MODEL
    },
    server: {
      host: parsed.HOST,
      port: parsed.PORT,
      corsOrigin: parsed.CORS_ORIGIN
    },
    memory: {
      maxUsers: parsed.MEMORY_MAX_USERS,
      maxMessages: parsed.MEMORY_MAX_MESSAGES
    },
    logLevel: parseLogLevel(parsed.LOG_LEVEL) ?? LogLevel.INFO,
    tracingEnabled: Boolean(parsed.LANGFUSE_PUBLIC_KEY && parsed.LANGFUSE_SECRET_KEY),
    environment: parsed.NODE_ENV
  };
}
