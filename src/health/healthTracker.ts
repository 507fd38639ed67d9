import type { ToolCallError, ToolEngineError } from "../errors.js";
import { StructuredLogger } from "../logger.js";
import { describeError } from "../types.js";

/** Availability and error history of one tool name. */
export interface HealthRecord {
  readonly name: string;
  readonly available: boolean;
  readonly lastError: ToolCallError | null;
  /** Epoch milliseconds of {@link lastError}. */
  readonly lastErrorAt: number | null;
  readonly errorCount: number;
  /** Set when the tool became available again after being unavailable. */
  readonly recoveredAt: number | null;
  readonly lastSuccessAt: number | null;
  readonly updatedAt: number;
}

export interface HealthTrackerOptions {
  readonly logger?: StructuredLogger;
  readonly clock?: () => number;
  /**
   * Soft bound on stored records. Records of names outside the catalog go
   * first, then the least recently updated available ones. Unavailable
   * records are never evicted, so the bound can be exceeded.
   */
  readonly maxRecords?: number;
  /** Whether {@link name} is still in the catalog; every name is by default. */
  readonly isKnown?: (name: string) => boolean;
}

const DEFAULT_MAX_RECORDS = 1_000;

type MutableHealthRecord = { -readonly [K in keyof HealthRecord]: HealthRecord[K] };

/**
 * Single source of truth for "is tool X usable right now". Recording is best
 * effort: every public method catches its own failures and logs them, so the
 * tracker can never break a call.
 */
export class HealthTracker {
  private readonly records = new Map<string, MutableHealthRecord>();
  private readonly logger: StructuredLogger;
  private readonly clock: () => number;
  private readonly maxRecords: number;
  private readonly isKnown: (name: string) => boolean;

  constructor(options: HealthTrackerOptions = {}) {
    this.logger = options.logger ?? new StructuredLogger({ silent: true });
    this.clock = options.clock ?? (() => Date.now());
    this.maxRecords = Math.max(1, options.maxRecords ?? DEFAULT_MAX_RECORDS);
    this.isKnown = options.isKnown ?? (() => true);
  }

  /** Number of tracked names. */
  public get size(): number {
    return this.records.size;
  }

  public recordSuccess(name: string): void {
    this.guard("success", name, () => {
      const now = this.clock();
      const record = this.records.get(name);
      if (!record) {
        this.insert({
          name,
          available: true,
          lastError: null,
          lastErrorAt: null,
          errorCount: 0,
          recoveredAt: null,
          lastSuccessAt: now,
          updatedAt: now,
        });
        return;
      }
      if (!record.available) {
        record.available = true;
        record.recoveredAt = now;
        this.logger.info("tool_recovered", { tool: name, error_count: record.errorCount });
      }
      record.lastSuccessAt = now;
      record.updatedAt = now;
    });
  }

  public recordFailure(name: string, error: ToolEngineError): void {
    this.guard("failure", name, () => {
      const now = this.clock();
      const payload = error.toCallError();
      const record = this.records.get(name);
      if (!record) {
        this.insert({
          name,
          available: false,
          lastError: payload,
          lastErrorAt: now,
          errorCount: 1,
          recoveredAt: null,
          lastSuccessAt: null,
          updatedAt: now,
        });
      } else {
        record.available = false;
        record.lastError = payload;
        record.lastErrorAt = now;
        record.errorCount += 1;
        record.updatedAt = now;
      }
      this.logger.warn("tool_marked_unavailable", { tool: name, kind: payload.kind, code: payload.code });
    });
  }

  /** Snapshot of the record, or `undefined` while the tool's health is unknown. */
  public status(name: string): HealthRecord | undefined {
    const record = this.records.get(name);
    return record ? snapshot(record) : undefined;
  }

  /** Every unavailable tool, sorted by name. */
  public allUnhealthy(): HealthRecord[] {
    return this.all().filter((record) => !record.available);
  }

  /** Every tracked record, sorted by name. */
  public all(): HealthRecord[] {
    return [...this.records.values()]
      .map(snapshot)
      .sort((left, right) => (left.name < right.name ? -1 : left.name > right.name ? 1 : 0));
  }

  /** Drops the record of {@link name}; its health becomes unknown again. */
  public reset(name: string): boolean {
    return this.records.delete(name);
  }

  /** Drops records whose name is not in {@link knownNames}. Returns how many went. */
  public prune(knownNames: Iterable<string>): number {
    const known = new Set(knownNames);
    let removed = 0;
    for (const name of [...this.records.keys()]) {
      if (!known.has(name)) {
        this.records.delete(name);
        removed += 1;
      }
    }
    if (removed > 0) {
      this.logger.debug("health_records_pruned", { removed });
    }
    return removed;
  }

  private insert(record: MutableHealthRecord): void {
    this.records.set(record.name, record);
    while (this.records.size > this.maxRecords) {
      const victim = this.evictionCandidate(record.name);
      if (!victim) {
        return;
      }
      this.records.delete(victim.name);
    }
  }

  private evictionCandidate(keep: string): MutableHealthRecord | undefined {
    let unknown: MutableHealthRecord | undefined;
    let available: MutableHealthRecord | undefined;
    for (const candidate of this.records.values()) {
      if (candidate.name === keep) {
        continue;
      }
      if (!this.isKnown(candidate.name)) {
        if (!unknown || candidate.updatedAt < unknown.updatedAt) {
          unknown = candidate;
        }
      } else if (candidate.available && (!available || candidate.updatedAt < available.updatedAt)) {
        available = candidate;
      }
    }
    return unknown ?? available;
  }

  private guard(operation: "success" | "failure", name: string, action: () => void): void {
    try {
      action();
    } catch (error) {
      this.logger.error("health_record_failed", { tool: name, operation, error: describeError(error) });
    }
  }
}

function snapshot(record: MutableHealthRecord): HealthRecord {
  return {
    ...record,
    lastError: record.lastError
      ? {
          ...record.lastError,
          nextSteps: [...record.lastError.nextSteps],
          ...(record.lastError.details ? { details: { ...record.lastError.details } } : {}),
        }
      : null,
  };
}
