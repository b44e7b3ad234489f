import { z } from "zod";
import { DEFAULT_COMPRESSION_CONFIG, COMPRESSION_STRATEGIES, type CompressionStrategy } from "./compression/types";
import { ConfigurationError } from "./errors";
import { claudeConfig } from "./providers/anthropic";
import { huggingFaceConfig } from "./providers/huggingface";
import { openAIConfig } from "./providers/openai";
import { DEFAULT_TIMEOUTS, PROVIDER_TYPES, type ProviderConfig, type ProviderType, type TimeoutConfig } from "./types";

export interface GatewayConfig {
  port: number;
  corsOrigins: string[];
  bodyLimit: string;
  providers: ProviderConfig[]; // only those with an API key
  defaultProvider: ProviderType;
  sessions: {
    dataDir: string;
    saveDelayMs: number; // dirty sessions are written in one batch after this delay
  };
  scheduler: {
    dataDir: string;
    minIntervalSeconds: number;
  };
  compression: {
    autoCompress: boolean;
    strategy: CompressionStrategy;
  };
}

const DEFAULT_CORS_ORIGINS = ["http://localhost:5173", "http://localhost:3000", "http://127.0.0.1:5173"];

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value === undefined || value.trim() === "" ? undefined : value.trim()));

const positiveInt = (fallback: number) =>
  z
    .string()
    .optional()
    .transform((value) => (value === undefined || value.trim() === "" ? String(fallback) : value))
    .pipe(z.coerce.number().int().positive());

const envSchema = z.object({
  GATEWAY_PORT: positiveInt(8081),
  CORS_ORIGINS: optionalString,
  BODY_LIMIT: optionalString,

  ANTHROPIC_API_KEY: optionalString,
  ANTHROPIC_BASE_URL: optionalString,
  ANTHROPIC_API_VERSION: optionalString,
  ANTHROPIC_MODEL: optionalString,

  OPENAI_API_KEY: optionalString,
  OPENAI_BASE_URL: optionalString,
  OPENAI_ORGANIZATION: optionalString,
  OPENAI_PROJECT: optionalString,
  OPENAI_MODEL: optionalString,

  HUGGINGFACE_API_KEY: optionalString,
  HUGGINGFACE_BASE_URL: optionalString,
  HUGGINGFACE_MODEL: optionalString,

  PROVIDER_TIMEOUT_MS: positiveInt(DEFAULT_TIMEOUTS.requestTimeoutMs),

  DEFAULT_PROVIDER: z.enum(PROVIDER_TYPES).default("claude"),

  SESSIONS_DATA_DIR: optionalString,
  SESSION_SAVE_DELAY_MS: positiveInt(1000),

  SCHEDULER_DATA_DIR: optionalString,
  SCHEDULER_MIN_INTERVAL_SECONDS: positiveInt(10),

  AUTO_COMPRESS: z.enum(["true", "false"]).default("false"),
  COMPRESSION_STRATEGY: z.enum(COMPRESSION_STRATEGIES).default(DEFAULT_COMPRESSION_CONFIG.strategy),
});

/**
 * Reads gateway settings from an environment map (normally `process.env`).
 * @throws ConfigurationError naming every malformed variable.
 */
export function loadConfig(env: Record<string, string | undefined>): GatewayConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const names = [...new Set(parsed.error.issues.map((issue) => issue.path.join(".")))];
    throw new ConfigurationError(`Invalid environment variables: ${names.join(", ")}`);
  }
  const vars = parsed.data;

  const timeout: TimeoutConfig = { requestTimeoutMs: vars.PROVIDER_TIMEOUT_MS };

  const providers: ProviderConfig[] = [];
  if (vars.ANTHROPIC_API_KEY) {
    providers.push(
      claudeConfig(vars.ANTHROPIC_API_KEY, {
        baseUrl: vars.ANTHROPIC_BASE_URL,
        apiVersion: vars.ANTHROPIC_API_VERSION,
        defaultModel: vars.ANTHROPIC_MODEL,
        timeout,
      }),
    );
  }
  if (vars.OPENAI_API_KEY) {
    providers.push(
      openAIConfig(vars.OPENAI_API_KEY, {
        baseUrl: vars.OPENAI_BASE_URL,
        organization: vars.OPENAI_ORGANIZATION,
        projectId: vars.OPENAI_PROJECT,
        defaultModel: vars.OPENAI_MODEL,
        timeout,
      }),
    );
  }
  if (vars.HUGGINGFACE_API_KEY) {
    providers.push(
      huggingFaceConfig(vars.HUGGINGFACE_API_KEY, {
        baseUrl: vars.HUGGINGFACE_BASE_URL,
        defaultModel: vars.HUGGINGFACE_MODEL,
        timeout,
      }),
    );
  }

  return {
    port: vars.GATEWAY_PORT,
    corsOrigins: vars.CORS_ORIGINS
      ? vars.CORS_ORIGINS.split(",").map((origin) => origin.trim()).filter((origin) => origin.length > 0)
      : DEFAULT_CORS_ORIGINS,
    bodyLimit: vars.BODY_LIMIT ?? "5mb",
    providers,
    defaultProvider: vars.DEFAULT_PROVIDER,
    sessions: {
      dataDir: vars.SESSIONS_DATA_DIR ?? "data/sessions",
      saveDelayMs: vars.SESSION_SAVE_DELAY_MS,
    },
    scheduler: {
      dataDir: vars.SCHEDULER_DATA_DIR ?? "data/scheduled_tasks",
      minIntervalSeconds: vars.SCHEDULER_MIN_INTERVAL_SECONDS,
    },
    compression: {
      autoCompress: vars.AUTO_COMPRESS === "true",
      strategy: vars.COMPRESSION_STRATEGY,
    },
  };
}
