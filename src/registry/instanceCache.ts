import type { Catalog } from "../catalog/catalog.js";
import type { ToolSpec } from "../catalog/toolSpec.js";
import {
  ToolConstructionError,
  ToolDependencyError,
  ToolEngineError,
  ToolNotFoundError,
} from "../errors.js";
import type { HealthTracker } from "../health/healthTracker.js";
import { toAbortError } from "../infra/deadline.js";
import { StructuredLogger } from "../logger.js";
import { describeError } from "../types.js";
import type { FactoryContext, ToolInstance } from "./toolInstance.js";
import type { TypeRegistry } from "./typeRegistry.js";

export interface InstanceCacheOptions {
  readonly catalog: Catalog;
  readonly types: TypeRegistry;
  readonly health: HealthTracker;
  readonly logger?: StructuredLogger;
  readonly env?: FactoryContext["env"];
}

/**
 * Per-name store of constructed tool instances. At most one construction runs
 * per name; concurrent callers await the same attempt and observe the same
 * outcome. Failed constructions leave nothing behind so the next call starts
 * over.
 *
 * Evicting a name bumps its generation: a construction that started under an
 * older generation discards its result and the callers waiting on it are
 * handed a fresh construction instead.
 */
export class InstanceCache {
  private readonly instances = new Map<string, ToolInstance>();
  private readonly inflight = new Map<string, Promise<ToolInstance>>();
  private readonly generations = new Map<string, number>();
  private readonly catalog: Catalog;
  private readonly types: TypeRegistry;
  private readonly health: HealthTracker;
  private readonly logger: StructuredLogger;
  private readonly env: FactoryContext["env"];

  constructor(options: InstanceCacheOptions) {
    this.catalog = options.catalog;
    this.types = options.types;
    this.health = options.health;
    this.logger = options.logger ?? new StructuredLogger({ silent: true });
    this.env = options.env ?? {};
  }

  public get size(): number {
    return this.instances.size;
  }

  /** Names with a live instance, sorted. */
  public names(): string[] {
    return [...this.instances.keys()].sort();
  }

  /** Cached instance without triggering construction. */
  public peek(name: string): ToolInstance | undefined {
    return this.instances.get(name);
  }

  /**
   * Returns the instance for {@link name}, constructing it on first use. A
   * caller whose {@link signal} fires stops waiting; the shared construction
   * continues for everyone else.
   */
  public getOrCreate(name: string, signal?: AbortSignal): Promise<ToolInstance> {
    const cached = this.instances.get(name);
    if (cached) {
      return Promise.resolve(cached);
    }
    if (signal?.aborted) {
      return Promise.reject(toAbortError(signal));
    }

    let attempt = this.inflight.get(name);
    if (!attempt) {
      const created: Promise<ToolInstance> = this.construct(name, this.generation(name)).finally(() => {
        if (this.inflight.get(name) === created) {
          this.inflight.delete(name);
        }
      });
      attempt = created;
      this.inflight.set(name, created);
    }
    return signal ? waitWithSignal(attempt, signal) : attempt;
  }

  /**
   * Drops the instance of {@link name} and disposes it. A construction still
   * in flight is superseded.
   */
  public async evict(name: string): Promise<boolean> {
    const superseded = this.inflight.delete(name);
    if (superseded) {
      this.generations.set(name, this.generation(name) + 1);
    }
    const instance = this.instances.get(name);
    if (!instance) {
      return superseded;
    }
    this.instances.delete(name);
    await this.disposeInstance(name, instance);
    return true;
  }

  /** Evicts every instance and supersedes every construction in flight. */
  public async clear(): Promise<void> {
    for (const name of this.inflight.keys()) {
      this.generations.set(name, this.generation(name) + 1);
    }
    this.inflight.clear();
    const entries = [...this.instances.entries()];
    this.instances.clear();
    await Promise.all(entries.map(([name, instance]) => this.disposeInstance(name, instance)));
  }

  private generation(name: string): number {
    return this.generations.get(name) ?? 0;
  }

  private async construct(name: string, generation: number): Promise<ToolInstance> {
    const spec = this.catalog.lookup(name);
    if (!spec) {
      throw new ToolNotFoundError(name);
    }

    const startedAt = Date.now();
    let instance: ToolInstance;
    try {
      instance = await this.build(spec);
    } catch (error) {
      const failure =
        error instanceof ToolEngineError ? error : new ToolConstructionError(name, spec.type, error);
      if (this.generation(name) !== generation) {
        this.logger.debug("tool_construction_superseded", { tool: name, type: spec.type, failed: true });
        return this.getOrCreate(name);
      }
      this.health.recordFailure(name, failure);
      this.logger.error(
        failure instanceof ToolDependencyError ? "tool_dependency_unavailable" : "tool_construction_failed",
        { tool: name, type: spec.type, code: failure.code, message: failure.message },
      );
      throw failure;
    }

    if (this.generation(name) !== generation) {
      this.logger.info("tool_construction_superseded", { tool: name, type: spec.type, failed: false });
      await this.disposeInstance(name, instance);
      return this.getOrCreate(name);
    }
    this.instances.set(name, instance);
    this.health.recordSuccess(name);
    this.logger.info("tool_constructed", { tool: name, type: spec.type, duration_ms: Date.now() - startedAt });
    return instance;
  }

  private async build(spec: ToolSpec): Promise<ToolInstance> {
    const factory = await this.types.resolve(spec.type);
    let instance: ToolInstance;
    try {
      instance = await factory(spec, { logger: this.logger, env: this.env });
    } catch (error) {
      throw error instanceof ToolEngineError ? error : new ToolConstructionError(spec.name, spec.type, error);
    }
    if (!instance || typeof instance.execute !== "function") {
      throw new ToolConstructionError(spec.name, spec.type, new TypeError("factory did not return an executable instance"));
    }
    return instance;
  }

  private async disposeInstance(name: string, instance: ToolInstance): Promise<void> {
    if (typeof instance.dispose !== "function") {
      return;
    }
    try {
      await instance.dispose();
    } catch (error) {
      this.logger.warn("tool_dispose_failed", { tool: name, error: describeError(error) });
    }
  }
}

/** Resolves with {@link attempt} unless {@link signal} fires first. */
function waitWithSignal<T>(attempt: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => {
      reject(toAbortError(signal));
    };
    signal.addEventListener("abort", onAbort, { once: true });
    attempt.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(error);
      },
    );
  });
}
