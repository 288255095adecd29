import type { ModelType } from "../agents/types.js";

/**
 * Outbound completion capability. Implementations fail with ModelTimeoutError,
 * ModelRateLimitedError or ModelProviderError and never retry on their own;
 * retry and backoff belong to the RateLimiter.
 */
export interface ModelClient {
  complete(prompt: string, modelType: ModelType): Promise<string>;
}
