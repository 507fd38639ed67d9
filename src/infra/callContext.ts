import { AsyncLocalStorage } from "node:async_hooks";

/** Correlation data attached to everything that happens during one call. */
export interface CallContext {
  readonly callId: string;
  readonly tool: string;
  /** Position of the call inside a batch, when it belongs to one. */
  readonly batchIndex?: number;
}

/**
 * AsyncLocalStorage exposing the active call to downstream helpers (logger,
 * tool instances) without threading the identifiers through every signature.
 */
const storage = new AsyncLocalStorage<CallContext>();

/** Executes {@link callback} with {@link context} visible to nested awaits. */
export function runWithCallContext<T>(context: CallContext, callback: () => T): T {
  return storage.run(context, callback);
}

/** Retrieves the call context associated with the current async execution. */
export function getCallContext(): CallContext | undefined {
  return storage.getStore();
}
