import "dotenv/config";

export interface Config {
  geminiApiKey: string;
  geminiBaseUrl: string;
  defaultModel: string;
  thinkingModel: string;
  modelRequestTimeoutMs: number;
  rateLimit: {
    maxTokens: number;
    refillRate: number;
    maxRetries: number;
    backoffBaseMs: number;
    backoffMaxMs: number;
  };
  maxConcurrency: number;
  callTimeoutMs: number;
  turnTimeoutMs: number;
  port: number;
  host: string;
  logLevel: string;
}

type Env = Record<string, string | undefined>;

function requireEnv(env: Env, name: string): string {
  const value = env[name];
  if (!value) {
    throw new Error(`Missing required environment variable: ${name}`);
  }
  return value;
}

function positiveNumber(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") return fallback;
  const parsed = Number(raw);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new Error(`Invalid value for ${name}: ${raw} (expected a positive number)`);
  }
  return parsed;
}

function positiveInt(env: Env, name: string, fallback: number): number {
  const parsed = positiveNumber(env, name, fallback);
  if (!Number.isInteger(parsed)) {
    throw new Error(`Invalid value for ${name}: ${env[name]} (expected a positive integer)`);
  }
  return parsed;
}

function nonNegativeInt(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") return fallback;
  const parsed = Number(raw);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new Error(`Invalid value for ${name}: ${raw} (expected a non-negative integer)`);
  }
  return parsed;
}

export function loadConfig(env: Env = process.env): Config {
  return {
    geminiApiKey: requireEnv(env, "GEMINI_API_KEY"),
    geminiBaseUrl:
      env.GEMINI_BASE_URL || "https://generativelanguage.googleapis.com/v1beta",
    defaultModel: env.DEFAULT_MODEL || "gemini-1.5-flash",
    thinkingModel: env.THINKING_MODEL || "gemini-2.0-flash-thinking-exp",
    modelRequestTimeoutMs: positiveInt(env, "MODEL_REQUEST_TIMEOUT_MS", 60000),
    rateLimit: {
      maxTokens: positiveInt(env, "RATE_LIMIT_MAX_TOKENS", 15),
      refillRate: positiveNumber(env, "RATE_LIMIT_REFILL_RATE", 0.25),
      maxRetries: nonNegativeInt(env, "RATE_LIMIT_MAX_RETRIES", 5),
      backoffBaseMs: positiveInt(env, "BACKOFF_BASE_MS", 1000),
      backoffMaxMs: positiveInt(env, "BACKOFF_MAX_MS", 60000),
    },
    maxConcurrency: positiveInt(env, "MAX_CONCURRENCY", 4),
    callTimeoutMs: positiveInt(env, "CALL_TIMEOUT_MS", 90000),
    turnTimeoutMs: positiveInt(env, "TURN_TIMEOUT_MS", 300000),
    port: positiveInt(env, "PORT", 5000),
    host: env.HOST || "0.0.0.0",
    logLevel: env.LOG_LEVEL || "info",
  };
}
