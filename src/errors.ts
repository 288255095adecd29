import type { Instance, ParseFailureReason } from "./agents/types.js";

export class AgentNetworkError extends Error {
  constructor(
    readonly code: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

// ─── Model client ────────────────────────────────────────────────────────────

export class ModelTimeoutError extends AgentNetworkError {
  constructor(readonly timeoutMs: number, options?: { cause?: unknown }) {
    super("MODEL_TIMEOUT", `Model request timed out after ${timeoutMs}ms`, options);
  }
}

export class ModelRateLimitedError extends AgentNetworkError {
  constructor(detail: string, options?: { cause?: unknown }) {
    super("MODEL_RATE_LIMITED", `Rate limited by model provider: ${detail}`, options);
  }
}

export class ModelProviderError extends AgentNetworkError {
  constructor(
    message: string,
    readonly status?: number,
    options?: { cause?: unknown },
  ) {
    super("MODEL_PROVIDER_ERROR", message, options);
  }
}

// ─── Directives and registry ─────────────────────────────────────────────────

export class DirectiveParseError extends AgentNetworkError {
  constructor(readonly reason: ParseFailureReason, message: string) {
    super("DIRECTIVE_PARSE_ERROR", message);
  }
}

export class UnknownInstanceError extends AgentNetworkError {
  constructor(readonly instanceRef: string) {
    super("UNKNOWN_INSTANCE", `No instance matches "${instanceRef}"`);
  }
}

export class DuplicateRoleError extends AgentNetworkError {
  constructor(readonly existing: Instance) {
    super(
      "DUPLICATE_ROLE",
      `An active instance with role "${existing.role}" already exists (${existing.id})`,
    );
  }
}

// ─── Calls and turns ─────────────────────────────────────────────────────────

export class RateLimitExceededError extends AgentNetworkError {
  constructor(
    readonly endpoint: string,
    readonly attempts: number,
    readonly lastError: unknown,
  ) {
    super(
      "RATE_LIMIT_EXCEEDED",
      `Retries exhausted for ${endpoint} after ${attempts} attempts: ${describeError(lastError)}`,
      { cause: lastError },
    );
  }
}

export class CallTimeoutError extends AgentNetworkError {
  constructor(readonly label: string, readonly timeoutMs: number) {
    super("CALL_TIMEOUT", `${label} did not respond within ${timeoutMs}ms`);
  }
}

/** Abort reason for a call whose caller stopped waiting for it. */
export class CallDetachedError extends AgentNetworkError {
  constructor() {
    super("CALL_DETACHED", "Call abandoned by its caller");
  }
}

export class TurnTimeoutError extends AgentNetworkError {
  constructor(readonly timeoutMs: number) {
    super("TURN_TIMEOUT", `Turn exceeded its ${timeoutMs}ms deadline`);
  }
}

export class EmptyMessageError extends AgentNetworkError {
  constructor() {
    super("EMPTY_MESSAGE", "Message cannot be empty");
  }
}

export class TurnCancelledError extends AgentNetworkError {
  constructor() {
    super("TURN_CANCELLED", "Turn cancelled");
  }
}

export class TurnInProgressError extends AgentNetworkError {
  constructor() {
    super("TURN_IN_PROGRESS", "Still processing the previous message");
  }
}

export class MotherUnavailableError extends AgentNetworkError {
  constructor(cause: unknown) {
    super("MOTHER_UNAVAILABLE", `Planning agent unavailable: ${describeError(cause)}`, { cause });
  }
}

// ─── Classification ──────────────────────────────────────────────────────────

// Transport-level failures that surface as plain Errors (fetch, sockets, proxies)
const TRANSIENT_ERROR_PATTERNS = [
  "rate limit",
  "too many requests",
  "429",
  "timed out",
  "timeout",
  "ECONNRESET",
  "ECONNREFUSED",
  "socket hang up",
  "network error",
  "fetch failed",
  "overloaded",
  "503",
  "502",
];

const RETRYABLE_STATUSES = new Set([500, 502, 503, 504]);

export function isTransientError(err: unknown): boolean {
  if (err instanceof ModelRateLimitedError || err instanceof ModelTimeoutError) return true;
  if (err instanceof ModelProviderError) return err.status !== undefined && RETRYABLE_STATUSES.has(err.status);
  if (err instanceof AgentNetworkError) return false;
  const lower = describeError(err).toLowerCase();
  return TRANSIENT_ERROR_PATTERNS.some((p) => lower.includes(p.toLowerCase()));
}

export function isRateLimitError(err: unknown): boolean {
  if (err instanceof ModelRateLimitedError) return true;
  const lower = describeError(err).toLowerCase();
  return lower.includes("rate limit") || lower.includes("429") || lower.includes("too many requests");
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

export interface HttpError {
  statusCode: number;
  body: { error: string; status?: string };
}

/** Maps turn failures to user-visible responses. Internal details stay in the logs. */
export function toHttpError(err: unknown): HttpError {
  if (err instanceof MotherUnavailableError) {
    return {
      statusCode: 503,
      body: { error: "The system is initializing. Please try again shortly.", status: "initializing" },
    };
  }
  if (err instanceof TurnTimeoutError || err instanceof CallTimeoutError) {
    return {
      statusCode: 408,
      body: { error: "The request timed out. Try a simpler question.", status: "timeout" },
    };
  }
  if (err instanceof EmptyMessageError) {
    return {
      statusCode: 400,
      body: { error: "Message cannot be empty.", status: "invalid" },
    };
  }
  if (err instanceof TurnInProgressError) {
    return {
      statusCode: 409,
      body: { error: "Still processing your previous message.", status: "busy" },
    };
  }
  if (err instanceof TurnCancelledError) {
    return {
      statusCode: 499,
      body: { error: "The request was cancelled.", status: "cancelled" },
    };
  }
  return {
    statusCode: 500,
    body: { error: "Failed to process your message. Please try again.", status: "error" },
  };
}
