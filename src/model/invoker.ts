import type { ModelType } from "../agents/types.js";
import type { ModelClient } from "./client.js";
import type { RateLimiter } from "../utils/rate-limiter.js";
import { logger } from "../utils/logger.js";

/** Rate-limiter endpoint name for calls made with a given model type. */
export function modelEndpoint(modelType: ModelType): string {
  return `gemini_api:${modelType}`;
}

export interface InvokeOptions {
  prompt: string;
  modelType: ModelType;
  client: ModelClient;
  rateLimiter: RateLimiter;
  /** Who is calling, for logs */
  label: string;
  /** Stops retries once the caller has given up on the call */
  signal?: AbortSignal;
}

/** One outbound completion under the endpoint's token bucket and retry policy. */
export async function invokeModel(opts: InvokeOptions): Promise<string> {
  const endpoint = modelEndpoint(opts.modelType);
  const start = Date.now();

  const text = await opts.rateLimiter.callWithLimit(
    endpoint,
    () => opts.client.complete(opts.prompt, opts.modelType),
    opts.signal,
  );

  logger.debug(
    { label: opts.label, endpoint, durationMs: Date.now() - start, responseLength: text.length },
    "Model call complete",
  );
  return text;
}
