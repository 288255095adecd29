import type { ModelClient } from "../model/client.js";
import { invokeModel } from "../model/invoker.js";
import type { RateLimiter } from "../utils/rate-limiter.js";
import { buildSynthesisPrompt, type SynthesisSection } from "./prompts.js";
import type { ModelType, WorkerOutput } from "./types.js";

/** What synthesis sees in place of a worker that produced nothing. */
export function failureMarker(error: string): string {
  return `[instance failed to respond: ${error}]`;
}

export function toSections(outputs: WorkerOutput[]): SynthesisSection[] {
  return outputs.map((o) => ({
    role: o.role,
    content: o.outcome.ok ? o.outcome.text : failureMarker(o.outcome.error),
  }));
}

/**
 * Fallback answer when the synthesis call fails: worker outputs joined in
 * order, failures kept as markers.
 */
export function concatenateOutputs(outputs: WorkerOutput[]): string {
  if (outputs.length === 0) {
    return "I wasn't able to put together an answer this time. Please try again.";
  }
  return toSections(outputs)
    .map((s) => `## ${s.role}\n${s.content}`)
    .join("\n\n");
}

export interface SynthesisRequest {
  userMessage: string;
  outputs: WorkerOutput[];
  taskContext: string | null;
  previousResponse: string | null;
}

export class SynthesisEngine {
  constructor(
    private client: ModelClient,
    private rateLimiter: RateLimiter,
    private modelType: ModelType = "normal",
  ) {}

  /** One model call; errors propagate so the caller can degrade. */
  synthesize(request: SynthesisRequest, signal?: AbortSignal): Promise<string> {
    return invokeModel({
      prompt: buildSynthesisPrompt({
        userMessage: request.userMessage,
        sections: toSections(request.outputs),
        taskContext: request.taskContext,
        previousResponse: request.previousResponse,
      }),
      modelType: this.modelType,
      client: this.client,
      rateLimiter: this.rateLimiter,
      label: "synthesis",
      signal,
    });
  }
}
