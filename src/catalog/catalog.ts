import { DuplicateToolNameError } from "../errors.js";
import type { ToolSpec } from "./toolSpec.js";

/** How {@link Catalog.load} treats the entries already present. */
export type CatalogLoadMode = "merge" | "replace";

/** Criteria accepted by {@link Catalog.list}; every field narrows the result. */
export interface CatalogFilter {
  readonly type?: string;
  readonly category?: string;
  /** Glob (`*` and `?` wildcards, case-insensitive) or regular expression on the name. */
  readonly namePattern?: string | RegExp;
}

/** Outcome of a load, mostly for logging. */
export interface CatalogLoadSummary {
  readonly added: number;
  readonly updated: number;
  readonly total: number;
}

/** One keyword-search hit. */
export interface CatalogSearchHit {
  readonly spec: ToolSpec;
  readonly score: number;
}

/**
 * Name-indexed set of tool specifications. Loading happens at startup; reads
 * afterwards never mutate anything so the catalog needs no synchronisation.
 */
export class Catalog {
  private readonly specs = new Map<string, ToolSpec>();

  /** Number of tools currently known. */
  public get size(): number {
    return this.specs.size;
  }

  /**
   * Adds {@link specs} to the catalog. The whole batch is checked before any
   * entry is written, so a rejected load leaves the catalog untouched.
   */
  public load(specs: readonly ToolSpec[], mode: CatalogLoadMode = "merge"): CatalogLoadSummary {
    const staged = new Map<string, ToolSpec>();
    for (const spec of specs) {
      const previous = staged.get(spec.name) ?? (mode === "merge" ? this.specs.get(spec.name) : undefined);
      if (previous && previous.type !== spec.type) {
        throw new DuplicateToolNameError(spec.name, previous.type, spec.type);
      }
      staged.set(spec.name, freezeSpec(spec));
    }

    if (mode === "replace") {
      this.specs.clear();
    }

    let added = 0;
    let updated = 0;
    for (const [name, spec] of staged) {
      if (this.specs.has(name)) {
        updated += 1;
      } else {
        added += 1;
      }
      this.specs.set(name, spec);
    }
    return { added, updated, total: this.specs.size };
  }

  public lookup(name: string): ToolSpec | undefined {
    return this.specs.get(name);
  }

  public has(name: string): boolean {
    return this.specs.has(name);
  }

  /** Tool names in lexical order. */
  public names(): string[] {
    return [...this.specs.keys()].sort();
  }

  /** Distinct type identifiers referenced by the catalog. */
  public types(): string[] {
    return [...new Set([...this.specs.values()].map((spec) => spec.type))].sort();
  }

  /** Distinct categories referenced by the catalog. */
  public categories(): string[] {
    const categories = new Set<string>();
    for (const spec of this.specs.values()) {
      if (spec.category !== undefined) {
        categories.add(spec.category);
      }
    }
    return [...categories].sort();
  }

  /** Specs matching {@link filter}, sorted by name. */
  public list(filter: CatalogFilter = {}): ToolSpec[] {
    const matcher = filter.namePattern !== undefined ? compileNamePattern(filter.namePattern) : null;
    const result: ToolSpec[] = [];
    for (const spec of this.specs.values()) {
      if (filter.type !== undefined && spec.type !== filter.type) {
        continue;
      }
      if (filter.category !== undefined && spec.category !== filter.category) {
        continue;
      }
      if (matcher && !matcher.test(spec.name)) {
        continue;
      }
      result.push(spec);
    }
    return result.sort((left, right) => compareNames(left.name, right.name));
  }

  /**
   * Keyword search over names, descriptions and categories. Each query term
   * found in the name counts twice, elsewhere once; ties break on the name.
   */
  public find(query: string, limit = 10): CatalogSearchHit[] {
    const terms = tokenise(query);
    if (terms.length === 0 || limit <= 0) {
      return [];
    }
    const hits: CatalogSearchHit[] = [];
    for (const spec of this.specs.values()) {
      const nameTokens = new Set(tokenise(spec.name));
      const textTokens = new Set([...tokenise(spec.description), ...tokenise(spec.category ?? "")]);
      let score = 0;
      for (const term of terms) {
        if (nameTokens.has(term)) {
          score += 2;
        } else if (textTokens.has(term)) {
          score += 1;
        }
      }
      if (score > 0) {
        hits.push({ spec, score });
      }
    }
    hits.sort((left, right) => right.score - left.score || compareNames(left.spec.name, right.spec.name));
    return hits.slice(0, limit);
  }
}

function compareNames(left: string, right: string): number {
  if (left === right) {
    return 0;
  }
  return left < right ? -1 : 1;
}

function freezeSpec(spec: ToolSpec): ToolSpec {
  return Object.freeze({
    ...spec,
    parameterSchema: Object.freeze({
      properties: Object.freeze({ ...spec.parameterSchema.properties }),
      ...(spec.parameterSchema.required ? { required: Object.freeze([...spec.parameterSchema.required]) } : {}),
    }),
    settings: Object.freeze({ ...spec.settings }),
  });
}

/** Builds a case-insensitive matcher from a glob or returns the RegExp as-is. */
export function compileNamePattern(pattern: string | RegExp): RegExp {
  if (pattern instanceof RegExp) {
    return new RegExp(pattern.source, pattern.flags.replace("g", ""));
  }
  const escaped = pattern.replace(/[.+^${}()|[\]\\]/g, "\\$&").replace(/\*/g, ".*").replace(/\?/g, ".");
  return new RegExp(`^${escaped}$`, "i");
}

/** Splits text into lower-case word tokens, breaking snake, kebab and camel case. */
export function tokenise(text: string): string[] {
  return text
    .replace(/([a-z0-9])([A-Z])/g, "$1 $2")
    .toLowerCase()
    .split(/[^a-z0-9]+/)
    .filter((token) => token.length > 0);
}
