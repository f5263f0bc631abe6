/**
 * Process configuration, parsed once at startup from the environment.
 * Exactly one model engine is active per process; there is no runtime switch.
 */

import { z } from "zod";

export type EngineName = "local" | "hosted";
export type HostedProvider = "openai" | "anthropic";

export interface CallLimits {
  /** Per-call bound; expiry counts as the engine being unavailable */
  timeoutMs: number;
  /** Total attempts for transient failures (timeouts, rate limits) */
  maxAttempts: number;
  retryBackoffMs: number;
  maxTokens: number;
}

export interface LocalEngineConfig {
  engine: "local";
  url: string;
  model: string;
  limits: CallLimits;
}

export interface HostedEngineConfig {
  engine: "hosted";
  provider: HostedProvider;
  model: string;
  apiKey: string | undefined;
  limits: CallLimits;
}

export type EngineConfig = LocalEngineConfig | HostedEngineConfig;

export interface AppConfig {
  engine: EngineConfig;
  databasePath: string;
  port: number;
  corsOrigin: string;
  /** .env file the environment was loaded from; null when there was none */
  envFile: string | null;
}

const DEFAULT_HOSTED_MODELS: Record<HostedProvider, string> = {
  openai: "gpt-4o-mini",
  anthropic: "claude-haiku-4-5-20251001",
};

const envSchema = z.object({
  LLM_ENGINE: z.enum(["local", "ollama", "hosted", "openai", "anthropic"]).default("local"),
  OLLAMA_URL: z.string().url().default("http://localhost:11434"),
  OLLAMA_MODEL: z.string().min(1).default("llama3.1:8b"),
  HOSTED_PROVIDER: z.enum(["openai", "anthropic"]).optional(),
  HOSTED_MODEL: z.string().min(1).optional(),
  OPENAI_API_KEY: z.string().optional(),
  ANTHROPIC_API_KEY: z.string().optional(),
  LLM_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),
  LLM_MAX_ATTEMPTS: z.coerce.number().int().min(1).max(5).default(2),
  LLM_RETRY_BACKOFF_MS: z.coerce.number().int().nonnegative().default(500),
  LLM_MAX_TOKENS: z.coerce.number().int().positive().default(2000),
  DATABASE_PATH: z.string().min(1).default("counteroffer.db"),
  PORT: z.coerce.number().int().positive().default(4000),
  CORS_ORIGIN: z.string().min(1).default("http://localhost:3000"),
});

type RawEnv = Record<string, string | undefined>;

// `KEY=` in a .env file means "unset", not "empty string"
function dropBlankValues(env: RawEnv): RawEnv {
  return Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== ""),
  );
}

function resolveHostedProvider(
  engine: z.infer<typeof envSchema>["LLM_ENGINE"],
  explicit: HostedProvider | undefined,
): HostedProvider {
  if (explicit) return explicit;
  return engine === "anthropic" ? "anthropic" : "openai";
}

export function loadConfig(
  env: RawEnv = process.env,
  envFile: string | null = null,
): AppConfig {
  const parsed = envSchema.safeParse(dropBlankValues(env));
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    const source = envFile ? ` (from ${envFile} and the process environment)` : "";
    throw new Error(`Invalid configuration${source}: ${issues}`);
  }
  const vars = parsed.data;

  const limits: CallLimits = {
    timeoutMs: vars.LLM_TIMEOUT_MS,
    maxAttempts: vars.LLM_MAX_ATTEMPTS,
    retryBackoffMs: vars.LLM_RETRY_BACKOFF_MS,
    maxTokens: vars.LLM_MAX_TOKENS,
  };

  let engine: EngineConfig;
  if (vars.LLM_ENGINE === "local" || vars.LLM_ENGINE === "ollama") {
    engine = {
      engine: "local",
      url: vars.OLLAMA_URL.replace(/\/+$/, ""),
      model: vars.OLLAMA_MODEL,
      limits,
    };
  } else {
    const provider = resolveHostedProvider(vars.LLM_ENGINE, vars.HOSTED_PROVIDER);
    engine = {
      engine: "hosted",
      provider,
      model: vars.HOSTED_MODEL ?? DEFAULT_HOSTED_MODELS[provider],
      apiKey: provider === "openai" ? vars.OPENAI_API_KEY : vars.ANTHROPIC_API_KEY,
      limits,
    };
  }

  return {
    engine,
    databasePath: vars.DATABASE_PATH,
    port: vars.PORT,
    corsOrigin: vars.CORS_ORIGIN,
    envFile,
  };
}
