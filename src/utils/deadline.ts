import { CallDetachedError, CallTimeoutError, TurnCancelledError } from "../errors.js";

export interface SettleOptions {
  /** Omit for no per-call limit */
  timeoutMs?: number;
  label: string;
  signal?: AbortSignal;
}

function abortReason(signal: AbortSignal): unknown {
  return signal.reason instanceof Error ? signal.reason : new TurnCancelledError();
}

/**
 * Waits for `work` until it settles, `timeoutMs` passes or `signal` aborts.
 * On timeout or abort the work is detached, not cancelled: it keeps running
 * and whatever it produces later is dropped.
 */
export function settleWithin<T>(work: Promise<T>, opts: SettleOptions): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const { signal } = opts;
    if (signal?.aborted) {
      reject(abortReason(signal));
      return;
    }

    let timer: ReturnType<typeof setTimeout> | undefined;
    const cleanup = () => {
      if (timer !== undefined) clearTimeout(timer);
      signal?.removeEventListener("abort", onAbort);
    };
    const onAbort = () => {
      cleanup();
      if (signal) reject(abortReason(signal));
    };

    if (opts.timeoutMs !== undefined) {
      const timeoutMs = opts.timeoutMs;
      timer = setTimeout(() => {
        cleanup();
        reject(new CallTimeoutError(opts.label, timeoutMs));
      }, timeoutMs);
    }
    signal?.addEventListener("abort", onAbort, { once: true });

    work.then(
      (value) => {
        cleanup();
        resolve(value);
      },
      (err: unknown) => {
        cleanup();
        reject(err);
      },
    );
  });
}

export interface CallScope {
  signal: AbortSignal;
  /** Aborts the scope; call once the caller stops waiting, settled or not. */
  end(): void;
}

/**
 * Abort scope for one outbound call, aborted with `parent` when given.
 * Ending it keeps a detached call from starting further attempts.
 */
export function callScope(parent?: AbortSignal): CallScope {
  const controller = new AbortController();
  const onParentAbort = () => {
    if (parent) controller.abort(parent.reason);
  };

  if (parent?.aborted) {
    controller.abort(parent.reason);
  } else {
    parent?.addEventListener("abort", onParentAbort, { once: true });
  }

  return {
    signal: controller.signal,
    end: () => {
      parent?.removeEventListener("abort", onParentAbort);
      controller.abort(new CallDetachedError());
    },
  };
}
