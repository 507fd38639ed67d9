import type { ToolEngine } from "../engine.js";
import type { ToolCallError } from "../errors.js";

/** One unavailable tool as listed in the report. */
export interface UnhealthyToolEntry {
  readonly name: string;
  readonly type: string | null;
  readonly errorCount: number;
  readonly lastErrorAt: string | null;
  readonly error: ToolCallError | null;
}

/** Snapshot of the engine's state for operators. */
export interface HealthReport {
  readonly generatedAt: string;
  readonly catalogSize: number;
  /** Number of tools per category; uncategorised tools are counted under `""`. */
  readonly categories: Readonly<Record<string, number>>;
  readonly instances: number;
  readonly available: number;
  readonly unknown: number;
  readonly unhealthy: readonly UnhealthyToolEntry[];
}

export function buildHealthReport(engine: ToolEngine, now: () => number = Date.now): HealthReport {
  const specs = engine.listTools();
  const categories: Record<string, number> = {};
  let available = 0;
  let unknown = 0;
  for (const spec of specs) {
    const category = spec.category ?? "";
    categories[category] = (categories[category] ?? 0) + 1;
    const record = engine.health(spec.name);
    if (!record) {
      unknown += 1;
    } else if (record.available) {
      available += 1;
    }
  }

  const unhealthy = engine.unhealthy().map((record) => ({
    name: record.name,
    type: engine.catalog.lookup(record.name)?.type ?? null,
    errorCount: record.errorCount,
    lastErrorAt: record.lastErrorAt === null ? null : new Date(record.lastErrorAt).toISOString(),
    error: record.lastError,
  }));

  return {
    generatedAt: new Date(now()).toISOString(),
    catalogSize: specs.length,
    categories,
    instances: engine.instances.size,
    available,
    unknown,
    unhealthy,
  };
}

/** Renders the report as plain text lines, one block per unhealthy tool. */
export function renderHealthReport(report: HealthReport): string[] {
  const lines = [
    `tools: ${report.catalogSize} (available ${report.available}, unhealthy ${report.unhealthy.length}, unknown ${report.unknown})`,
    `instances: ${report.instances}`,
  ];
  const categories = Object.keys(report.categories).sort();
  if (categories.length > 0) {
    lines.push(
      `categories: ${categories.map((category) => `${category || "(none)"}=${report.categories[category]}`).join(", ")}`,
    );
  }
  for (const entry of report.unhealthy) {
    lines.push(`- ${entry.name}${entry.type ? ` [${entry.type}]` : ""}: ${entry.error?.message ?? "unavailable"} (errors: ${entry.errorCount})`);
    for (const step of entry.error?.nextSteps ?? []) {
      lines.push(`    next: ${step}`);
    }
  }
  return lines;
}
