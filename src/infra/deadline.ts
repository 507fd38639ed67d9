/**
 * Deadline and cancellation plumbing shared by the dispatcher and the tool
 * instances. A call owns one {@link CallSignal} combining the caller's signal
 * with its deadline; instances only ever see the resulting `AbortSignal`.
 */

/** Longest delay `setTimeout` honours; larger values fire after 1ms. */
export const MAX_TIMEOUT_MS = 2_147_483_647;

/**
 * Brings a timeout into the range timers accept. `Infinity` and `NaN` mean no
 * deadline.
 */
export function clampTimeoutMs(timeoutMs: number): number | null {
  if (Number.isNaN(timeoutMs) || timeoutMs === Number.POSITIVE_INFINITY) {
    return null;
  }
  return Math.min(MAX_TIMEOUT_MS, Math.max(1, Math.floor(timeoutMs)));
}

/** Why a call signal fired. */
export type AbortCause = "timeout" | "cancelled";

/** Reason attached to the signal when the deadline elapses. */
export class DeadlineExceededError extends Error {
  public readonly code = "E-DEADLINE";
  public readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super(`deadline of ${timeoutMs}ms exceeded`);
    this.name = "DeadlineExceededError";
    this.timeoutMs = timeoutMs;
  }
}

/** Reason attached to the signal when the caller cancels without a reason. */
export class CallCancelledError extends Error {
  public readonly code = "E-CANCELLED";

  constructor(reason?: unknown) {
    super(reason === undefined ? "call cancelled by caller" : `call cancelled by caller: ${String(reason)}`);
    this.name = "CallCancelledError";
  }
}

export interface CallSignalOptions {
  /** Milliseconds before the deadline fires (clamped); `null` disables it. */
  readonly timeoutMs: number | null;
  /** Caller-provided signal propagated into the call. */
  readonly parent?: AbortSignal;
  readonly now?: () => number;
}

/** Combined signal handed to one execution. */
export interface CallSignal {
  readonly signal: AbortSignal;
  /** Absolute deadline (epoch ms) or `null` when the call has none. */
  readonly deadline: number | null;
  /** Returns the reason the signal fired, or `null` while it is live. */
  cause(): AbortCause | null;
  /** Clears the timer and detaches from the parent signal. */
  dispose(): void;
}

/**
 * Creates the signal for one call. The timer is cleared by {@link CallSignal.dispose}
 * so finished calls never keep the event loop alive.
 */
export function createCallSignal(options: CallSignalOptions): CallSignal {
  const now = options.now ?? Date.now;
  const controller = new AbortController();
  const parent = options.parent;
  let cause: AbortCause | null = null;
  let timeoutHandle: ReturnType<typeof setTimeout> | null = null;

  const onParentAbort = (): void => {
    if (controller.signal.aborted) {
      return;
    }
    cause = "cancelled";
    const reason: unknown = parent?.reason;
    controller.abort(reason instanceof Error ? reason : new CallCancelledError(reason));
  };

  if (parent) {
    if (parent.aborted) {
      onParentAbort();
    } else {
      parent.addEventListener("abort", onParentAbort, { once: true });
    }
  }

  const timeoutMs = options.timeoutMs === null ? null : clampTimeoutMs(options.timeoutMs);
  const deadline = timeoutMs === null ? null : now() + timeoutMs;
  if (timeoutMs !== null && !controller.signal.aborted) {
    timeoutHandle = setTimeout(() => {
      timeoutHandle = null;
      if (!controller.signal.aborted) {
        cause = "timeout";
        controller.abort(new DeadlineExceededError(timeoutMs));
      }
    }, timeoutMs);
  }

  return {
    signal: controller.signal,
    deadline,
    cause: () => cause,
    dispose(): void {
      if (timeoutHandle !== null) {
        clearTimeout(timeoutHandle);
        timeoutHandle = null;
      }
      parent?.removeEventListener("abort", onParentAbort);
    },
  };
}

/**
 * Settles with {@link task} unless {@link signal} fires first, in which case it
 * rejects with the signal's reason. A rejection of the abandoned task is handed
 * to {@link onLateRejection} instead of surfacing as an unhandled rejection.
 */
export function raceWithSignal<T>(
  task: Promise<T>,
  signal: AbortSignal,
  onLateRejection: (error: unknown) => void,
): Promise<T> {
  if (signal.aborted) {
    task.catch(onLateRejection);
    return Promise.reject(toAbortError(signal));
  }

  return new Promise<T>((resolve, reject) => {
    let settled = false;
    const onAbort = (): void => {
      if (settled) {
        return;
      }
      settled = true;
      reject(toAbortError(signal));
    };
    signal.addEventListener("abort", onAbort, { once: true });

    task.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        if (!settled) {
          settled = true;
          resolve(value);
        }
      },
      (error: unknown) => {
        signal.removeEventListener("abort", onAbort);
        if (settled) {
          onLateRejection(error);
          return;
        }
        settled = true;
        reject(error);
      },
    );
  });
}

/** Returns the signal's reason as an error instance. */
export function toAbortError(signal: AbortSignal): Error {
  const reason: unknown = signal.reason;
  return reason instanceof Error ? reason : new CallCancelledError(reason);
}
