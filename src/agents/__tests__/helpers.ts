import type { ModelClient } from "../../model/client.js";
import { modelEndpoint } from "../../model/invoker.js";
import { RateLimiter } from "../../utils/rate-limiter.js";
import { MODEL_TYPES, type ModelType } from "../types.js";

export type CallKind = "mother" | "worker" | "synthesis";
export type Responder = (prompt: string) => Promise<string> | string;

export function classify(prompt: string): CallKind {
  if (prompt.startsWith("You are the Scrum Master")) return "mother";
  if (prompt.startsWith("You are writing the final answer")) return "synthesis";
  return "worker";
}

/** Role named in a worker prompt. */
export function roleOf(prompt: string): string {
  const match = /^You are the "([^"]+)" specialist/.exec(prompt);
  if (!match) throw new Error("not a worker prompt");
  return match[1];
}

/** In-process ModelClient that routes each call to a handler by prompt kind. */
export class ScriptedClient implements ModelClient {
  readonly calls: Array<{ kind: CallKind; prompt: string; modelType: ModelType }> = [];

  constructor(private handlers: Record<CallKind, Responder>) {}

  async complete(prompt: string, modelType: ModelType): Promise<string> {
    const kind = classify(prompt);
    this.calls.push({ kind, prompt, modelType });
    return this.handlers[kind](prompt);
  }

  promptsOf(kind: CallKind): string[] {
    return this.calls.filter((c) => c.kind === kind).map((c) => c.prompt);
  }
}

/** Replies with each script entry in turn; an Error entry is thrown. */
export function script(...replies: Array<string | Error>): Responder {
  const queue = [...replies];
  return () => {
    const next = queue.shift();
    if (next === undefined) throw new Error("script exhausted");
    if (next instanceof Error) throw next;
    return next;
  };
}

export function byRole(replies: Record<string, Responder>): Responder {
  return (prompt) => {
    const handler = replies[roleOf(prompt)];
    if (!handler) throw new Error(`no reply scripted for ${roleOf(prompt)}`);
    return handler(prompt);
  };
}

export function deferred<T>() {
  let resolve: (value: T) => void = () => {};
  let reject: (reason: unknown) => void = () => {};
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

export const delay = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

export const never = () => new Promise<string>(() => {});

/** A limiter that never throttles and never retries. */
export function makeLimiter(): RateLimiter {
  const limiter = new RateLimiter({ backoffBaseMs: 1, backoffMaxMs: 1 });
  for (const modelType of MODEL_TYPES) {
    limiter.configureEndpoint(modelEndpoint(modelType), { maxTokens: 1000, refillRate: 1000, maxRetries: 0 });
  }
  return limiter;
}
