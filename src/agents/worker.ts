import type { ModelClient } from "../model/client.js";
import { invokeModel } from "../model/invoker.js";
import type { RateLimiter } from "../utils/rate-limiter.js";
import { buildWorkerPrompt } from "./prompts.js";
import type { Instance } from "./types.js";

export interface WorkerTask {
  instance: Instance;
  message: string;
  taskContext: string | null;
}

/** Runs one routed message on a worker instance with that instance's model type. */
export class WorkerAgent {
  constructor(
    private client: ModelClient,
    private rateLimiter: RateLimiter,
  ) {}

  execute(task: WorkerTask, signal?: AbortSignal): Promise<string> {
    return invokeModel({
      prompt: buildWorkerPrompt(task),
      modelType: task.instance.modelType,
      client: this.client,
      rateLimiter: this.rateLimiter,
      label: task.instance.id,
      signal,
    });
  }
}
