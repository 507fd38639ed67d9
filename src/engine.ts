import process from "node:process";

import { canonicalise, ResultCache, type ResultCacheStats } from "./cache/resultCache.js";
import {
  Catalog,
  type CatalogFilter,
  type CatalogLoadMode,
  type CatalogLoadSummary,
  type CatalogSearchHit,
} from "./catalog/catalog.js";
import { readCatalogSources, type CatalogSourceFilter } from "./catalog/sources.js";
import type { ToolSpec } from "./catalog/toolSpec.js";
import { loadEngineConfig, loggerOptions, type EngineConfig } from "./config/engineConfig.js";
import {
  Dispatcher,
  type BatchOptions,
  type CallOptions,
  type CallRequest,
  type CallResult,
} from "./dispatch/dispatcher.js";
import { ToolEngineError, type ToolCallError } from "./errors.js";
import { HealthTracker, type HealthRecord } from "./health/healthTracker.js";
import { StructuredLogger } from "./logger.js";
import { InstanceCache } from "./registry/instanceCache.js";
import type { FactoryContext } from "./registry/toolInstance.js";
import { TypeRegistry } from "./registry/typeRegistry.js";
import { registerBuiltinTypes, type BuiltinTypeOptions } from "./tools/builtin/index.js";
import { describeError } from "./types.js";
import { Validator } from "./validation/validator.js";

/** Per-name outcome of {@link ToolEngine.warmup}. */
export type WarmupOutcome =
  | { readonly name: string; readonly ok: true }
  | { readonly name: string; readonly ok: false; readonly error: ToolCallError };

export interface ResetOptions {
  /** Also drops the health record instead of keeping the failure history. */
  readonly forgetHealth?: boolean;
}

export interface ToolEngineOptions {
  readonly config?: EngineConfig;
  readonly logger?: StructuredLogger;
  readonly clock?: () => number;
  /** Environment handed to factories; defaults to `process.env`. */
  readonly env?: FactoryContext["env"];
  /** Registers the built-in tool types unless `false`. */
  readonly builtins?: boolean | BuiltinTypeOptions;
  readonly idFactory?: () => string;
}

/**
 * Owns every component of the engine. Nothing is module-global: two engines
 * in the same process share no state.
 */
export class ToolEngine {
  public readonly config: EngineConfig;
  public readonly logger: StructuredLogger;
  public readonly catalog = new Catalog();
  public readonly types: TypeRegistry;
  public readonly healthTracker: HealthTracker;
  public readonly instances: InstanceCache;
  public readonly resultCache: ResultCache;
  public readonly dispatcher: Dispatcher;

  constructor(options: ToolEngineOptions = {}) {
    const env = options.env ?? process.env;
    this.config = options.config ?? loadEngineConfig(env);
    this.logger = options.logger ?? new StructuredLogger(loggerOptions(this.config.log));
    const clock = options.clock ?? (() => Date.now());

    this.types = new TypeRegistry({ logger: this.logger });
    this.healthTracker = new HealthTracker({
      logger: this.logger,
      clock,
      maxRecords: this.config.healthMaxRecords,
      isKnown: (name) => this.catalog.has(name),
    });
    this.instances = new InstanceCache({
      catalog: this.catalog,
      types: this.types,
      health: this.healthTracker,
      logger: this.logger,
      env,
    });
    this.resultCache = new ResultCache({
      maxEntries: this.config.resultCache.enabled ? this.config.resultCache.maxEntries : 0,
      defaultTtlMs: this.config.resultCache.defaultTtlMs,
      clock,
    });
    this.dispatcher = new Dispatcher({
      catalog: this.catalog,
      instances: this.instances,
      health: this.healthTracker,
      validator: new Validator(),
      resultCache: this.resultCache,
      logger: this.logger,
      clock,
      defaultTimeoutMs: this.config.defaultTimeoutMs,
      transientEscalationThreshold: this.config.transientEscalationThreshold,
      batchConcurrency: this.config.batchConcurrency,
      ...(options.idFactory ? { idFactory: options.idFactory } : {}),
    });

    const builtins = options.builtins ?? true;
    if (builtins !== false) {
      registerBuiltinTypes(this.types, builtins === true ? {} : builtins);
    }
  }

  /**
   * Loads {@link specs} into the catalog. Instances and cached results of
   * tools whose definition changed (or disappeared) are dropped.
   */
  public async loadCatalog(specs: readonly ToolSpec[], mode: CatalogLoadMode = "merge"): Promise<CatalogLoadSummary> {
    const previous = new Map(this.catalog.list().map((spec): [string, ToolSpec] => [spec.name, spec]));
    const summary = this.catalog.load(specs, mode);
    const stale = [...previous.entries()]
      .filter(([name, spec]) => !sameDefinition(spec, this.catalog.lookup(name)))
      .map(([name]) => name);
    for (const name of stale) {
      this.resultCache.invalidateTool(name);
      await this.instances.evict(name);
    }
    this.logger.info("catalog_loaded", { mode, ...summary, stale: stale.length });
    return summary;
  }

  /**
   * Reads the configured (or given) JSON sources and loads them in one batch.
   */
  public async loadCatalogSources(
    paths: readonly string[] = this.config.catalog.paths,
    filter: CatalogSourceFilter = this.config.catalog,
    mode: CatalogLoadMode = "merge",
  ): Promise<CatalogLoadSummary> {
    const specs = await readCatalogSources(paths, filter);
    return this.loadCatalog(specs, mode);
  }

  public call(name: string, args: unknown, options?: CallOptions): Promise<CallResult> {
    return this.dispatcher.call(name, args, options);
  }

  public callBatch(requests: readonly CallRequest[], options?: BatchOptions): Promise<CallResult[]> {
    return this.dispatcher.callBatch(requests, options);
  }

  public listTools(filter?: CatalogFilter): ToolSpec[] {
    return this.catalog.list(filter);
  }

  public findTools(query: string, limit?: number): CatalogSearchHit[] {
    return this.catalog.find(query, limit);
  }

  public health(name: string): HealthRecord | undefined {
    return this.healthTracker.status(name);
  }

  public unhealthy(): HealthRecord[] {
    return this.healthTracker.allUnhealthy();
  }

  public cacheStats(): ResultCacheStats {
    return this.resultCache.stats();
  }

  /**
   * Forces the next call of {@link name} to construct a fresh instance: the
   * current one is disposed and a failed lazy type is resolved again. Returns
   * `false` when the catalog does not know the tool.
   */
  public async reset(name: string, options: ResetOptions = {}): Promise<boolean> {
    const spec = this.catalog.lookup(name);
    if (!spec) {
      return false;
    }
    if (this.types.describe(spec.type) === "lazy-failed") {
      this.types.invalidate(spec.type);
    }
    this.resultCache.invalidateTool(name);
    await this.instances.evict(name);
    if (options.forgetHealth === true) {
      this.healthTracker.reset(name);
    }
    this.logger.info("tool_reset", { tool: name, forget_health: options.forgetHealth === true });
    return true;
  }

  /**
   * Constructs instances ahead of the first call. Failures are reported per
   * name (and recorded in health) without stopping the others.
   */
  public async warmup(names: readonly string[] = this.catalog.names()): Promise<WarmupOutcome[]> {
    return Promise.all(
      names.map(async (name): Promise<WarmupOutcome> => {
        try {
          await this.instances.getOrCreate(name);
          return { name, ok: true };
        } catch (error) {
          if (error instanceof ToolEngineError) {
            return { name, ok: false, error: error.toCallError() };
          }
          this.logger.error("tool_warmup_failed", { tool: name, error: describeError(error) });
          throw error;
        }
      }),
    );
  }

  /** Drops health records of tools that left the catalog. */
  public pruneHealth(): number {
    return this.healthTracker.prune(this.catalog.names());
  }

  /** Disposes every instance and flushes the log file. */
  public async dispose(): Promise<void> {
    await this.instances.clear();
    this.resultCache.clear();
    await this.logger.flush();
  }
}

function sameDefinition(left: ToolSpec, right: ToolSpec | undefined): boolean {
  if (!right) {
    return false;
  }
  return JSON.stringify(canonicalise(left, new WeakSet())) === JSON.stringify(canonicalise(right, new WeakSet()));
}

/** Builds an engine and, when sources are configured, loads the catalog. */
export async function createToolEngine(options: ToolEngineOptions = {}): Promise<ToolEngine> {
  const engine = new ToolEngine(options);
  if (engine.config.catalog.paths.length > 0) {
    await engine.loadCatalogSources();
  }
  return engine;
}
