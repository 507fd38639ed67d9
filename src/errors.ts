import {
  ERROR_CODES,
  describeError,
  normaliseErrorHint,
  normaliseErrorMessage,
  type ErrorCode,
} from "./types.js";

/** Top-level failure families surfaced by {@link Dispatcher.call}. */
export type ToolErrorKind = "not_found" | "validation" | "dependency" | "construction" | "execution";

/** Refinement of execution failures driving the health policy. */
export type ExecutionErrorKind = "timeout" | "transient" | "permanent" | "cancelled";

/** Serialisable error payload returned inside a failed call result. */
export interface ToolCallError {
  readonly kind: ToolErrorKind;
  readonly subKind?: ExecutionErrorKind;
  readonly code: ErrorCode;
  readonly message: string;
  readonly hint?: string;
  readonly nextSteps: readonly string[];
  readonly retriable: boolean;
  readonly details?: Record<string, unknown>;
}

/** Options shared by every {@link ToolEngineError} subclass. */
export interface ToolEngineErrorOptions {
  readonly code: ErrorCode;
  readonly hint?: string;
  readonly nextSteps?: readonly string[];
  readonly retriable?: boolean;
  readonly details?: Record<string, unknown>;
  readonly cause?: unknown;
}

/**
 * Base class for every failure a call can end with. Subclasses only pick the
 * kind and sensible defaults; the payload conversion lives here so transports
 * serialise errors identically.
 */
export abstract class ToolEngineError extends Error {
  public abstract readonly kind: ToolErrorKind;
  public readonly code: ErrorCode;
  public readonly hint?: string;
  public readonly nextSteps: readonly string[];
  public readonly retriable: boolean;
  public readonly details: Record<string, unknown>;

  protected constructor(message: string, options: ToolEngineErrorOptions) {
    super(normaliseErrorMessage(message), options.cause === undefined ? undefined : { cause: options.cause });
    this.code = options.code;
    this.hint = normaliseErrorHint(options.hint);
    this.nextSteps = [...(options.nextSteps ?? [])];
    this.retriable = options.retriable ?? false;
    this.details = { ...(options.details ?? {}) };
  }

  /** Sub-kind reported alongside execution errors. */
  public get subKind(): ExecutionErrorKind | undefined {
    return undefined;
  }

  /** Converts the error into the structured payload returned to callers. */
  public toCallError(): ToolCallError {
    const subKind = this.subKind;
    return {
      kind: this.kind,
      ...(subKind !== undefined ? { subKind } : {}),
      code: this.code,
      message: this.message,
      ...(this.hint !== undefined ? { hint: this.hint } : {}),
      nextSteps: [...this.nextSteps],
      retriable: this.retriable,
      ...(Object.keys(this.details).length > 0 ? { details: { ...this.details } } : {}),
    };
  }

  public toJSON(): ToolCallError {
    return this.toCallError();
  }
}

/** Raised when a call names a tool the catalog does not know. */
export class ToolNotFoundError extends ToolEngineError {
  public readonly kind = "not_found";

  constructor(name: string) {
    super(`tool "${name}" is not registered`, {
      code: ERROR_CODES.TOOL_NOT_FOUND,
      hint: "list the catalog to discover valid tool names",
      nextSteps: ["Check the tool name spelling", "List available tools with listTools()"],
      details: { tool: name },
    });
    this.name = "ToolNotFoundError";
  }
}

/** Reason attached to a single argument violation. */
export type ValidationViolationReason = "missing" | "type" | "enum" | "arguments";

/** One argument problem reported by the validator. */
export interface ValidationViolation {
  readonly parameter: string | null;
  readonly reason: ValidationViolationReason;
  readonly message: string;
  readonly expected?: string;
  readonly received?: string;
}

/** Raised when arguments do not satisfy the tool's parameter schema. */
export class ToolValidationError extends ToolEngineError {
  public readonly kind = "validation";
  public readonly violations: readonly ValidationViolation[];

  constructor(tool: string, violations: readonly ValidationViolation[]) {
    super(`invalid arguments for tool "${tool}": ${summariseViolations(violations)}`, {
      code: ERROR_CODES.TOOL_INVALID_ARGS,
      hint: "fix every listed parameter before retrying",
      nextSteps: [
        "Verify required parameters are provided",
        "Check parameter types and allowed values",
      ],
      details: { tool, violations: violations.map((violation) => ({ ...violation })) },
    });
    this.name = "ToolValidationError";
    this.violations = violations;
  }
}

function summariseViolations(violations: readonly ValidationViolation[]): string {
  const missing = violations
    .filter((violation) => violation.reason === "missing" && violation.parameter !== null)
    .map((violation) => violation.parameter);
  const others = violations.filter((violation) => violation.reason !== "missing").length;
  const parts: string[] = [];
  if (missing.length > 0) {
    parts.push(`missing required parameter(s) ${missing.join(", ")}`);
  }
  if (others > 0) {
    parts.push(`${others} invalid value(s)`);
  }
  return parts.length > 0 ? parts.join("; ") : "arguments rejected";
}

/** Options accepted by {@link ToolDependencyError}. */
export interface ToolDependencyErrorOptions {
  readonly cause?: unknown;
  readonly missingPackage?: string | null;
  readonly reason?: "unknown_type" | "resolver_failed";
  readonly nextSteps?: readonly string[];
}

/**
 * Raised when a tool type cannot be resolved on this machine (unknown type,
 * missing optional module, environment problem).
 */
export class ToolDependencyError extends ToolEngineError {
  public readonly kind = "dependency";
  public readonly type: string;
  public readonly missingPackage: string | null;

  constructor(type: string, options: ToolDependencyErrorOptions = {}) {
    const missingPackage = options.missingPackage ?? null;
    const reason = options.reason ?? "resolver_failed";
    const message =
      reason === "unknown_type"
        ? `tool type "${type}" has no registered factory`
        : `tool type "${type}" could not be loaded: ${describeError(options.cause)}`;
    const defaultSteps =
      missingPackage !== null
        ? [`Install the missing package: npm install ${missingPackage}`, "Reset the tool once the dependency is installed"]
        : reason === "unknown_type"
          ? ["Register a factory for this type during startup", "Check the type field of the catalog entry"]
          : ["Install missing dependencies", "Check environment variables required by the tool"];
    super(message, {
      code: ERROR_CODES.TOOL_DEPENDENCY,
      hint: missingPackage !== null ? `missing package ${missingPackage}` : undefined,
      nextSteps: options.nextSteps ?? defaultSteps,
      details: { type, reason, ...(missingPackage !== null ? { missingPackage } : {}) },
      cause: options.cause,
    });
    this.name = "ToolDependencyError";
    this.type = type;
    this.missingPackage = missingPackage;
  }
}

/** Raised when a factory ran but could not build an instance. */
export class ToolConstructionError extends ToolEngineError {
  public readonly kind = "construction";

  constructor(tool: string, type: string, cause: unknown, nextSteps?: readonly string[]) {
    super(`tool "${tool}" failed to initialise: ${describeError(cause)}`, {
      code: ERROR_CODES.TOOL_CONSTRUCTION,
      nextSteps: nextSteps ?? [
        "Review the tool settings in the catalog",
        "Check environment variables required by the tool",
      ],
      details: { tool, type },
      cause,
    });
    this.name = "ToolConstructionError";
  }
}

/** Options accepted by {@link ToolExecutionError}. */
export interface ToolExecutionErrorOptions {
  readonly subKind: ExecutionErrorKind;
  readonly status?: number;
  readonly retriable?: boolean;
  readonly hint?: string;
  readonly nextSteps?: readonly string[];
  readonly details?: Record<string, unknown>;
  readonly cause?: unknown;
}

const EXECUTION_CODES: Record<ExecutionErrorKind, ErrorCode> = {
  timeout: ERROR_CODES.TOOL_TIMEOUT,
  transient: ERROR_CODES.TOOL_TRANSIENT,
  permanent: ERROR_CODES.TOOL_PERMANENT,
  cancelled: ERROR_CODES.TOOL_CANCELLED,
};

const EXECUTION_NEXT_STEPS: Record<ExecutionErrorKind, readonly string[]> = {
  timeout: ["Retry with a longer timeout", "Check the upstream service latency"],
  transient: ["Retry the request", "Check the upstream service status"],
  permanent: ["Review the tool configuration and credentials", "Reset the tool once the problem is fixed"],
  cancelled: [],
};

/**
 * Raised (or produced by classification) when an instance ran but the
 * underlying operation failed. Tool implementations may throw it directly to
 * state the sub-kind explicitly.
 */
export class ToolExecutionError extends ToolEngineError {
  public readonly kind = "execution";
  public readonly executionKind: ExecutionErrorKind;
  public readonly status: number | null;

  constructor(message: string, options: ToolExecutionErrorOptions) {
    super(message, {
      code: EXECUTION_CODES[options.subKind],
      hint: options.hint,
      nextSteps: options.nextSteps ?? EXECUTION_NEXT_STEPS[options.subKind],
      retriable: options.retriable ?? (options.subKind === "timeout" || options.subKind === "transient"),
      details: { ...(options.details ?? {}), ...(options.status !== undefined ? { status: options.status } : {}) },
      cause: options.cause,
    });
    this.name = "ToolExecutionError";
    this.executionKind = options.subKind;
    this.status = options.status ?? null;
  }

  public override get subKind(): ExecutionErrorKind {
    return this.executionKind;
  }
}

/** Raised by {@link Catalog.load} when a name is redefined with another type. */
export class DuplicateToolNameError extends Error {
  public readonly code = ERROR_CODES.CATALOG_DUPLICATE;
  public readonly hint = "rename one of the tools or align their types";
  public readonly details: { name: string; existingType: string; incomingType: string };

  constructor(name: string, existingType: string, incomingType: string) {
    super(`tool "${name}" is already defined with type "${existingType}" (got "${incomingType}")`);
    this.name = "DuplicateToolNameError";
    this.details = { name, existingType, incomingType };
  }
}

/** Raised when a catalog source contains records that do not describe a tool. */
export class CatalogSourceError extends Error {
  public readonly code = ERROR_CODES.CATALOG_INVALID;
  public readonly details: { source: string; issues: readonly string[] };

  constructor(source: string, issues: readonly string[], cause?: unknown) {
    super(`invalid catalog source ${source}: ${issues.slice(0, 3).join("; ")}`, cause === undefined ? undefined : { cause });
    this.name = "CatalogSourceError";
    this.details = { source, issues: [...issues] };
  }
}

/** Raised when a type identifier is registered twice. */
export class TypeRegistrationError extends Error {
  public readonly code = ERROR_CODES.TYPE_DUPLICATE;

  constructor(type: string) {
    super(`tool type "${type}" is already registered`);
    this.name = "TypeRegistrationError";
  }
}
