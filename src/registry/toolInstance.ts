import type { ToolSpec } from "../catalog/toolSpec.js";
import type { StructuredLogger } from "../logger.js";

/** Everything an execution receives besides its arguments. */
export interface ExecuteContext {
  /** Fires on caller cancellation or when the deadline elapses. */
  readonly signal: AbortSignal;
  /** Absolute deadline (epoch ms), or `null` when the call has none. */
  readonly deadline: number | null;
  readonly spec: ToolSpec;
  readonly logger: StructuredLogger;
}

/**
 * Live tool object. Instances are owned by the instance cache; nothing else
 * constructs or disposes them.
 */
export interface ToolInstance {
  execute(args: Readonly<Record<string, unknown>>, context: ExecuteContext): Promise<unknown>;
  /** Returning `false` makes the engine serialise executions of this instance. */
  supportsConcurrentExecute?(): boolean;
  /** Releases resources when the instance is evicted. */
  dispose?(): void | Promise<void>;
}

/** What a factory receives when asked to build an instance. */
export interface FactoryContext {
  readonly logger: StructuredLogger;
  /** Environment the engine was configured with (credentials, endpoints). */
  readonly env: Readonly<Record<string, string | undefined>>;
}

/**
 * Builds an instance for one spec. Throwing (or rejecting) is reported as a
 * construction failure of that tool only.
 */
export type TypeFactory = (spec: ToolSpec, context: FactoryContext) => ToolInstance | Promise<ToolInstance>;

/** Loads a factory on first use, typically through a dynamic `import()`. */
export type LazyFactoryResolver = () => Promise<TypeFactory>;
