import { randomUUID } from "node:crypto";

import { buildResultCacheKey, type ResultCache } from "../cache/resultCache.js";
import type { Catalog } from "../catalog/catalog.js";
import type { ToolSpec } from "../catalog/toolSpec.js";
import {
  ToolEngineError,
  ToolExecutionError,
  ToolNotFoundError,
  type ToolCallError,
} from "../errors.js";
import type { HealthTracker } from "../health/healthTracker.js";
import { runWithCallContext } from "../infra/callContext.js";
import { clampTimeoutMs, createCallSignal, raceWithSignal } from "../infra/deadline.js";
import { SerialQueue } from "../infra/serialQueue.js";
import { StructuredLogger } from "../logger.js";
import type { InstanceCache } from "../registry/instanceCache.js";
import type { ExecuteContext, ToolInstance } from "../registry/toolInstance.js";
import { describeError } from "../types.js";
import type { Validator } from "../validation/validator.js";
import { classifyExecutionFailure, countsAgainstHealth } from "./classification.js";

/** Per-call knobs. */
export interface CallOptions {
  /** Cancels the call when aborted. */
  readonly signal?: AbortSignal;
  /** Overrides the tool's deadline; `null` runs without one. */
  readonly timeoutMs?: number | null;
  /** Correlation identifier surfaced in logs; generated when omitted. */
  readonly callId?: string;
  /** Skips the result cache for this call. */
  readonly bypassCache?: boolean;
}

/** One entry of a batch. */
export interface CallRequest {
  readonly name: string;
  readonly arguments: unknown;
  readonly options?: CallOptions;
}

export interface CallSuccess {
  readonly ok: true;
  readonly tool: string;
  readonly value: unknown;
  readonly durationMs: number;
  /** Whether the value was served by the result cache. */
  readonly cached: boolean;
}

export interface CallFailure {
  readonly ok: false;
  readonly tool: string;
  readonly error: ToolCallError;
  readonly durationMs: number;
}

export type CallResult = CallSuccess | CallFailure;

/** Options applying to a whole batch; per-request options take precedence. */
export interface BatchOptions {
  readonly signal?: AbortSignal;
  readonly timeoutMs?: number | null;
  /** Maximum number of requests in flight (`0` = unbounded). */
  readonly maxConcurrency?: number;
}

export interface DispatcherOptions {
  readonly catalog: Catalog;
  readonly instances: InstanceCache;
  readonly health: HealthTracker;
  readonly validator: Validator;
  readonly resultCache: ResultCache;
  readonly logger?: StructuredLogger;
  readonly clock?: () => number;
  readonly defaultTimeoutMs: number;
  readonly transientEscalationThreshold?: number;
  readonly batchConcurrency?: number;
  readonly idFactory?: () => string;
}

/**
 * Public entry point for invocations: lookup, validation, instance resolution,
 * execution under a deadline and result normalisation. Every failure becomes
 * a {@link CallFailure}; the returned promise never rejects.
 */
export class Dispatcher {
  private readonly catalog: Catalog;
  private readonly instances: InstanceCache;
  private readonly health: HealthTracker;
  private readonly validator: Validator;
  private readonly resultCache: ResultCache;
  private readonly logger: StructuredLogger;
  private readonly clock: () => number;
  private readonly defaultTimeoutMs: number;
  private readonly escalationThreshold: number;
  private readonly batchConcurrency: number;
  private readonly idFactory: () => string;
  private readonly queues = new WeakMap<ToolInstance, SerialQueue>();
  /** Consecutive timeout/transient failures per tool, reset by any success. */
  private readonly consecutiveFailures = new Map<string, number>();

  constructor(options: DispatcherOptions) {
    this.catalog = options.catalog;
    this.instances = options.instances;
    this.health = options.health;
    this.validator = options.validator;
    this.resultCache = options.resultCache;
    this.logger = options.logger ?? new StructuredLogger({ silent: true });
    this.clock = options.clock ?? (() => Date.now());
    this.defaultTimeoutMs = options.defaultTimeoutMs;
    this.escalationThreshold = Math.max(0, options.transientEscalationThreshold ?? 0);
    this.batchConcurrency = Math.max(0, options.batchConcurrency ?? 0);
    this.idFactory = options.idFactory ?? randomUUID;
  }

  public call(name: string, args: unknown, options: CallOptions = {}): Promise<CallResult> {
    const callId = options.callId ?? this.idFactory();
    return runWithCallContext({ callId, tool: name }, () => this.dispatch(name, args, options));
  }

  /**
   * Runs every request independently and returns the results in input order.
   * A failing request never affects the others.
   */
  public async callBatch(requests: readonly CallRequest[], options: BatchOptions = {}): Promise<CallResult[]> {
    const batchId = this.idFactory();
    const limit = options.maxConcurrency ?? this.batchConcurrency;
    const workers = limit > 0 ? Math.min(limit, requests.length) : requests.length;
    const results = new Array<CallResult>(requests.length);
    const startedAt = this.clock();
    let next = 0;

    const worker = async (): Promise<void> => {
      while (next < requests.length) {
        const index = next;
        next += 1;
        const request = requests[index];
        const callOptions: CallOptions = {
          ...request.options,
          signal: request.options?.signal ?? options.signal,
          timeoutMs: request.options?.timeoutMs !== undefined ? request.options.timeoutMs : options.timeoutMs,
        };
        const callId = request.options?.callId ?? `${batchId}:${index}`;
        results[index] = await runWithCallContext({ callId, tool: request.name, batchIndex: index }, () =>
          this.dispatch(request.name, request.arguments, callOptions),
        );
      }
    };
    await Promise.all(Array.from({ length: workers }, worker));

    const failed = results.filter((result) => !result.ok).length;
    this.logger.info("tool_batch_completed", {
      batch_id: batchId,
      total: requests.length,
      failed,
      duration_ms: this.clock() - startedAt,
    });
    return results;
  }

  private async dispatch(name: string, args: unknown, options: CallOptions): Promise<CallResult> {
    const startedAt = this.clock();
    const spec = this.catalog.lookup(name);
    if (!spec) {
      return this.failure(name, new ToolNotFoundError(name), startedAt);
    }
    const parsed = this.validator.parse(spec.parameterSchema, args, name);
    if (!parsed.ok) {
      return this.failure(name, parsed.error, startedAt);
    }

    const timeoutMs = this.resolveTimeout(spec, options);
    const cacheKey = this.cacheKeyFor(spec, parsed.args, options);
    const callSignal = createCallSignal({ timeoutMs, parent: options.signal, now: this.clock });
    try {
      const instance = await this.instances.getOrCreate(name, callSignal.signal);

      let value: unknown;
      let cached = false;
      if (cacheKey !== null) {
        // Concurrent callers share one execution, so it runs under the cache's signal, not this caller's.
        const lookup = await this.resultCache.remember(
          cacheKey,
          (signal) => this.execute(spec, instance, parsed.args, signal, null),
          spec.cache?.ttlMs,
          { signal: callSignal.signal, onLateRejection: (error) => this.logLateRejection(name, error) },
        );
        value = lookup.value;
        cached = lookup.cached;
      } else {
        value = await this.execute(spec, instance, parsed.args, callSignal.signal, callSignal.deadline);
      }

      this.consecutiveFailures.delete(name);
      this.health.recordSuccess(name);
      const durationMs = this.clock() - startedAt;
      this.logger.info("tool_call_completed", { duration_ms: durationMs, cached });
      return { ok: true, tool: name, value, durationMs, cached };
    } catch (error) {
      // Dependency and construction failures were recorded by the instance cache.
      const failure =
        error instanceof ToolEngineError && !(error instanceof ToolExecutionError)
          ? error
          : classifyExecutionFailure(error, { tool: name, abortCause: callSignal.cause(), timeoutMs });
      if (failure instanceof ToolExecutionError) {
        this.applyHealthPolicy(name, failure);
      }
      return this.failure(name, failure, startedAt);
    } finally {
      callSignal.dispose();
    }
  }

  private execute(
    spec: ToolSpec,
    instance: ToolInstance,
    args: Readonly<Record<string, unknown>>,
    signal: AbortSignal,
    deadline: number | null,
  ): Promise<unknown> {
    const context: ExecuteContext = { signal, deadline, spec, logger: this.logger };
    const invoke = async (): Promise<unknown> => instance.execute(args, context);
    const serial = spec.concurrency === "serial" || instance.supportsConcurrentExecute?.() === false;
    const task = serial ? this.queueFor(instance).run(invoke, signal) : invoke();
    return raceWithSignal(task, signal, (error) => this.logLateRejection(spec.name, error));
  }

  /** Result-cache key of the call, or `null` when the call bypasses the cache. */
  private cacheKeyFor(spec: ToolSpec, args: Readonly<Record<string, unknown>>, options: CallOptions): string | null {
    if (spec.cache?.enabled !== true || !this.resultCache.enabled || options.bypassCache === true) {
      return null;
    }
    try {
      return buildResultCacheKey(spec.name, args);
    } catch (error) {
      this.logger.warn("tool_cache_key_failed", { tool: spec.name, error: describeError(error) });
      return null;
    }
  }

  private queueFor(instance: ToolInstance): SerialQueue {
    let queue = this.queues.get(instance);
    if (!queue) {
      queue = new SerialQueue();
      this.queues.set(instance, queue);
    }
    return queue;
  }

  /** First defined of call option, tool setting and engine default; `null` means no deadline. */
  private resolveTimeout(spec: ToolSpec, options: CallOptions): number | null {
    for (const candidate of [options.timeoutMs, spec.timeoutMs, this.defaultTimeoutMs]) {
      if (candidate === null) {
        return null;
      }
      if (candidate !== undefined && !Number.isNaN(candidate)) {
        return clampTimeoutMs(candidate);
      }
    }
    return null;
  }

  private applyHealthPolicy(name: string, failure: ToolExecutionError): void {
    const subKind = failure.executionKind;
    if (subKind === "cancelled") {
      return;
    }
    const consecutive = subKind === "permanent" ? 0 : (this.consecutiveFailures.get(name) ?? 0) + 1;
    if (subKind === "permanent") {
      this.consecutiveFailures.delete(name);
    } else {
      this.consecutiveFailures.set(name, consecutive);
    }
    if (countsAgainstHealth(subKind, consecutive, this.escalationThreshold)) {
      this.health.recordFailure(name, failure);
    }
  }

  private failure(name: string, error: ToolEngineError, startedAt: number): CallFailure {
    const durationMs = this.clock() - startedAt;
    const payload = error.toCallError();
    const event = { kind: payload.kind, sub_kind: payload.subKind, code: payload.code, duration_ms: durationMs };
    if (payload.subKind === "cancelled" || payload.kind === "not_found" || payload.kind === "validation") {
      this.logger.info("tool_call_failed", event);
    } else {
      this.logger.warn("tool_call_failed", { ...event, message: payload.message });
    }
    return { ok: false, tool: name, error: payload, durationMs };
  }

  private logLateRejection(tool: string, error: unknown): void {
    this.logger.debug("tool_late_rejection", { tool, error: describeError(error) });
  }
}
