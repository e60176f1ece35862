/**
 * Shared Configuration
 *
 * Typed settings parsed once from environment variables at startup and
 * passed explicitly to the components that need them.
 */

import { z } from "zod";
import { ConfigError } from "../errors";

/** Treat blank variables as unset so defaults apply */
function env<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess((value) => (value === "" ? undefined : value), schema);
}

const envSchema = z.object({
  PORT: env(z.coerce.number().int().positive().default(3000)),
  CONFIDENCE_THRESHOLD: env(z.coerce.number().min(0).max(10).default(7)),
  CLASSIFICATION_TIMEOUT_MS: env(z.coerce.number().int().positive().default(30_000)),
  TOOL_TIMEOUT_MS: env(z.coerce.number().int().positive().default(30_000)),
  TOOL_REGISTRY_PATH: env(z.string().default("config/tools.yaml")),
  AWS_REGION: env(z.string().optional()),
  TOOL_BACKEND: env(z.enum(["http", "stub"]).default("http")),
  STUB_RESPONSES_PATH: env(z.string().default("data/stub-responses.json")),
  ASSISTANT_DOMAIN: env(z.string().default("healthcare insurance")),
  LOG_LEVEL: env(
    z.preprocess(
      (value) => (typeof value === "string" ? value.toLowerCase() : value),
      z.enum(["debug", "info", "warn", "error"]).default("info")
    )
  ),
  LOG_DIR: env(z.string().optional()),
  OPENROUTER_API_KEY: env(z.string().optional()),
  INTENT_MODEL: env(z.string().default("anthropic/claude-3.5-haiku")),
  LLM_MAX_RETRIES: env(z.coerce.number().int().min(0).default(2)),
  LLM_TEMPERATURE: env(z.coerce.number().min(0).max(1).default(0)),
});

export interface OrchestratorSettings {
  port: number;
  confidenceThreshold: number;
  classificationTimeoutMs: number;
  toolTimeoutMs: number;
  /** Local YAML path or s3://bucket/key */
  toolRegistryPath: string;
  /** Region for the S3 registry source; the SDK's default chain applies when unset */
  awsRegion?: string;
  toolBackend: "http" | "stub";
  stubResponsesPath: string;
  assistantDomain: string;
  logLevel: "debug" | "info" | "warn" | "error";
  logDir?: string;
  openRouterApiKey?: string;
  intentModel: string;
  llmMaxRetries: number;
  llmTemperature: number;
}

/**
 * Parse settings from an environment map (defaults to process.env)
 *
 * @throws ConfigError naming every invalid variable
 */
export function loadSettings(source: NodeJS.ProcessEnv = process.env): OrchestratorSettings {
  const parsed = envSchema.safeParse(source);

  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid configuration - ${problems}`);
  }

  const e = parsed.data;
  return {
    port: e.PORT,
    confidenceThreshold: e.CONFIDENCE_THRESHOLD,
    classificationTimeoutMs: e.CLASSIFICATION_TIMEOUT_MS,
    toolTimeoutMs: e.TOOL_TIMEOUT_MS,
    toolRegistryPath: e.TOOL_REGISTRY_PATH,
    awsRegion: e.AWS_REGION,
    toolBackend: e.TOOL_BACKEND,
    stubResponsesPath: e.STUB_RESPONSES_PATH,
    assistantDomain: e.ASSISTANT_DOMAIN,
    logLevel: e.LOG_LEVEL,
    logDir: e.LOG_DIR,
    openRouterApiKey: e.OPENROUTER_API_KEY,
    intentModel: e.INTENT_MODEL,
    llmMaxRetries: e.LLM_MAX_RETRIES,
    llmTemperature: e.LLM_TEMPERATURE,
  };
}
