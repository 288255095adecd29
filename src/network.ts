import type { Config } from "./config.js";
import { MODEL_TYPES } from "./agents/types.js";
import { Orchestrator } from "./agents/orchestrator.js";
import { GeminiClient } from "./model/gemini-client.js";
import type { ModelClient } from "./model/client.js";
import { modelEndpoint } from "./model/invoker.js";
import { RateLimiter } from "./utils/rate-limiter.js";

export interface Network {
  orchestrator: Orchestrator;
  rateLimiter: RateLimiter;
}

/** Wires the model client, rate limiter and orchestrator from config. */
export function createNetwork(config: Config, client?: ModelClient): Network {
  const { maxTokens, refillRate, maxRetries, backoffBaseMs, backoffMaxMs } = config.rateLimit;

  const rateLimiter = new RateLimiter({ backoffBaseMs, backoffMaxMs });
  for (const modelType of MODEL_TYPES) {
    rateLimiter.configureEndpoint(modelEndpoint(modelType), { maxTokens, refillRate, maxRetries });
  }

  const modelClient = client ?? new GeminiClient({
    apiKey: config.geminiApiKey,
    baseUrl: config.geminiBaseUrl,
    models: { normal: config.defaultModel, thinking: config.thinkingModel },
    timeoutMs: config.modelRequestTimeoutMs,
  });

  const orchestrator = new Orchestrator(modelClient, rateLimiter, {
    maxConcurrency: config.maxConcurrency,
    callTimeoutMs: config.callTimeoutMs,
    turnTimeoutMs: config.turnTimeoutMs,
  });

  return { orchestrator, rateLimiter };
}
