import { ToolExecutionError, type ExecutionErrorKind } from "../errors.js";
import { CallCancelledError, DeadlineExceededError, type AbortCause } from "../infra/deadline.js";
import { describeError } from "../types.js";

/**
 * Execution failure classification. The sub-kind decides both the `retriable`
 * flag returned to callers and whether the failure counts against the tool's
 * health (see {@link countsAgainstHealth}).
 */

/** Error codes raised by Node.js and undici for network-level failures. */
const NETWORK_ERROR_CODES = new Set([
  "ECONNRESET",
  "ECONNREFUSED",
  "ECONNABORTED",
  "ETIMEDOUT",
  "ENOTFOUND",
  "EAI_AGAIN",
  "EPIPE",
  "EHOSTUNREACH",
  "ENETUNREACH",
]);

export interface ClassificationContext {
  readonly tool: string;
  /** Why the call signal fired, if it did. */
  readonly abortCause: AbortCause | null;
  /** Effective deadline of the call, reported on timeouts. */
  readonly timeoutMs: number | null;
}

/** Outcome of mapping an HTTP status onto an execution sub-kind. */
export interface StatusClassification {
  readonly subKind: ExecutionErrorKind;
  readonly retriable: boolean;
}

/**
 * Maps an upstream HTTP status onto a sub-kind: authentication failures are
 * permanent, 408 is a timeout, 429 and 5xx are transient, any other 4xx is a
 * transient failure that retrying with the same request will not fix.
 */
export function classifyHttpStatus(status: number): StatusClassification {
  if (status === 401 || status === 403) {
    return { subKind: "permanent", retriable: false };
  }
  if (status === 408) {
    return { subKind: "timeout", retriable: true };
  }
  if (status === 429 || status >= 500) {
    return { subKind: "transient", retriable: true };
  }
  return { subKind: "transient", retriable: false };
}

function readStatus(error: unknown): number | null {
  if (typeof error !== "object" || error === null) {
    return null;
  }
  for (const key of ["status", "statusCode"]) {
    const value: unknown = Reflect.get(error, key);
    if (typeof value === "number" && Number.isInteger(value) && value >= 400 && value <= 599) {
      return value;
    }
  }
  return null;
}

function readCode(error: unknown): string | null {
  let current: unknown = error;
  // Undici wraps the socket error in `cause`; look one level down as well.
  for (let depth = 0; depth < 2 && typeof current === "object" && current !== null; depth += 1) {
    const code: unknown = Reflect.get(current, "code");
    if (typeof code === "string") {
      return code;
    }
    current = Reflect.get(current, "cause");
  }
  return null;
}

/** `AbortSignal.abort()` without a reason and most fetch clients reject with this name. */
function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === "AbortError";
}

function isNetworkCode(code: string | null): code is string {
  return code !== null && (NETWORK_ERROR_CODES.has(code) || code.startsWith("UND_ERR_"));
}

/** Converts anything an execution threw into a {@link ToolExecutionError}. */
export function classifyExecutionFailure(error: unknown, context: ClassificationContext): ToolExecutionError {
  if (error instanceof ToolExecutionError) {
    return error;
  }

  if (context.abortCause === "timeout" || error instanceof DeadlineExceededError) {
    const timeoutMs = error instanceof DeadlineExceededError ? error.timeoutMs : context.timeoutMs;
    return new ToolExecutionError(
      timeoutMs !== null
        ? `tool "${context.tool}" did not finish within ${timeoutMs}ms`
        : `tool "${context.tool}" did not finish before its deadline`,
      { subKind: "timeout", details: { tool: context.tool, timeoutMs }, cause: error },
    );
  }
  if (context.abortCause === "cancelled" || error instanceof CallCancelledError || isAbortError(error)) {
    return new ToolExecutionError(`call to tool "${context.tool}" was cancelled`, {
      subKind: "cancelled",
      retriable: true,
      details: { tool: context.tool },
      cause: error,
    });
  }

  const message = `tool "${context.tool}" failed: ${describeError(error)}`;
  const status = readStatus(error);
  if (status !== null) {
    const { subKind, retriable } = classifyHttpStatus(status);
    return new ToolExecutionError(message, { subKind, retriable, status, details: { tool: context.tool }, cause: error });
  }

  const code = readCode(error);
  if (isNetworkCode(code)) {
    return new ToolExecutionError(message, {
      subKind: "transient",
      details: { tool: context.tool, errorCode: code },
      cause: error,
    });
  }
  if (error instanceof Error && error.name === "TimeoutError") {
    return new ToolExecutionError(message, { subKind: "timeout", details: { tool: context.tool }, cause: error });
  }

  return new ToolExecutionError(message, { subKind: "permanent", details: { tool: context.tool }, cause: error });
}

/**
 * Health policy: permanent failures mark the tool unavailable right away;
 * timeouts and transient failures only do once {@link escalationThreshold}
 * consecutive ones were seen (0 disables escalation). Cancellations never count.
 */
export function countsAgainstHealth(
  subKind: ExecutionErrorKind,
  consecutiveFailures: number,
  escalationThreshold: number,
): boolean {
  switch (subKind) {
    case "permanent":
      return true;
    case "cancelled":
      return false;
    case "timeout":
    case "transient":
      return escalationThreshold > 0 && consecutiveFailures >= escalationThreshold;
  }
}
