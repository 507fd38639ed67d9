import { ToolDependencyError, TypeRegistrationError } from "../errors.js";
import { StructuredLogger } from "../logger.js";
import { describeError } from "../types.js";
import type { LazyFactoryResolver, TypeFactory } from "./toolInstance.js";

/** Observable state of a registered type. */
export type TypeResolutionState = "eager" | "lazy-pending" | "lazy-resolving" | "lazy-resolved" | "lazy-failed";

type LazyState =
  | { readonly status: "pending" }
  | { readonly status: "resolving"; readonly promise: Promise<TypeFactory> }
  | { readonly status: "resolved"; readonly factory: TypeFactory }
  | { readonly status: "failed"; readonly error: ToolDependencyError };

type TypeEntry =
  | { readonly mode: "eager"; readonly factory: TypeFactory }
  | { readonly mode: "lazy"; readonly resolver: LazyFactoryResolver; state: LazyState; generation: number };

const LAZY_STATES: Record<LazyState["status"], TypeResolutionState> = {
  pending: "lazy-pending",
  resolving: "lazy-resolving",
  resolved: "lazy-resolved",
  failed: "lazy-failed",
};

const MODULE_NOT_FOUND_CODES = new Set(["ERR_MODULE_NOT_FOUND", "MODULE_NOT_FOUND"]);

/**
 * Extracts the package a failed `import()` was looking for. Relative and
 * absolute specifiers return `null` since they are not installable packages.
 */
export function extractMissingPackage(error: unknown): string | null {
  if (!(error instanceof Error)) {
    return null;
  }
  const code = "code" in error && typeof error.code === "string" ? error.code : null;
  const match = /Cannot find (?:package|module) ['"]([^'"]+)['"]/.exec(error.message);
  if (!match || (code !== null && !MODULE_NOT_FOUND_CODES.has(code))) {
    return null;
  }
  const specifier = match[1];
  if (specifier.startsWith(".") || specifier.startsWith("/") || specifier.startsWith("file:") || /^[A-Za-z]:[\\/]/.test(specifier)) {
    return null;
  }
  const segments = specifier.split("/");
  if (specifier.startsWith("@")) {
    return segments.length >= 2 ? `${segments[0]}/${segments[1]}` : specifier;
  }
  return segments[0];
}

export interface TypeRegistryOptions {
  readonly logger?: StructuredLogger;
}

/**
 * Maps type identifiers to factories. Lazy types defer loading their
 * implementation until a tool of that type is first constructed; the outcome
 * of that single resolution (factory or {@link ToolDependencyError}) is kept
 * until {@link invalidate} is called.
 */
export class TypeRegistry {
  private readonly entries = new Map<string, TypeEntry>();
  private readonly logger: StructuredLogger;

  constructor(options: TypeRegistryOptions = {}) {
    this.logger = options.logger ?? new StructuredLogger({ silent: true });
  }

  public registerEager(type: string, factory: TypeFactory): void {
    this.assertAvailable(type);
    this.entries.set(type, { mode: "eager", factory });
  }

  public registerLazy(type: string, resolver: LazyFactoryResolver): void {
    this.assertAvailable(type);
    this.entries.set(type, { mode: "lazy", resolver, state: { status: "pending" }, generation: 0 });
  }

  public has(type: string): boolean {
    return this.entries.has(type);
  }

  /** Registered type identifiers in lexical order. */
  public types(): string[] {
    return [...this.entries.keys()].sort();
  }

  public describe(type: string): TypeResolutionState | undefined {
    const entry = this.entries.get(type);
    if (!entry) {
      return undefined;
    }
    return entry.mode === "eager" ? "eager" : LAZY_STATES[entry.state.status];
  }

  /**
   * Returns the factory for {@link type}. Concurrent callers share one
   * resolution; failures reject with a {@link ToolDependencyError}.
   */
  public async resolve(type: string): Promise<TypeFactory> {
    const entry = this.entries.get(type);
    if (!entry) {
      throw new ToolDependencyError(type, { reason: "unknown_type" });
    }
    if (entry.mode === "eager") {
      return entry.factory;
    }

    switch (entry.state.status) {
      case "resolved":
        return entry.state.factory;
      case "failed":
        throw entry.state.error;
      case "resolving":
        return entry.state.promise;
      case "pending": {
        const promise = this.startResolution(type, entry);
        // A resolver that throws synchronously has already recorded its failure.
        if (entry.state.status === "pending") {
          entry.state = { status: "resolving", promise };
        }
        return promise;
      }
    }
  }

  /**
   * Forgets the outcome of a lazy resolution so the next {@link resolve} runs
   * the resolver again. Returns `false` for unknown or eager types.
   */
  public invalidate(type: string): boolean {
    const entry = this.entries.get(type);
    if (!entry || entry.mode === "eager") {
      return false;
    }
    entry.generation += 1;
    entry.state = { status: "pending" };
    return true;
  }

  private async startResolution(
    type: string,
    entry: Extract<TypeEntry, { mode: "lazy" }>,
  ): Promise<TypeFactory> {
    const generation = entry.generation;
    const startedAt = Date.now();
    try {
      const factory = await entry.resolver();
      if (typeof factory !== "function") {
        throw new TypeError(`resolver for "${type}" did not return a factory function`);
      }
      if (entry.generation === generation) {
        entry.state = { status: "resolved", factory };
      }
      this.logger.debug("tool_type_resolved", { type, duration_ms: Date.now() - startedAt });
      return factory;
    } catch (error) {
      const dependencyError =
        error instanceof ToolDependencyError
          ? error
          : new ToolDependencyError(type, { cause: error, missingPackage: extractMissingPackage(error) });
      if (entry.generation === generation) {
        entry.state = { status: "failed", error: dependencyError };
      }
      this.logger.warn("tool_type_resolution_failed", {
        type,
        error: describeError(error),
        missing_package: dependencyError.missingPackage,
      });
      throw dependencyError;
    }
  }

  private assertAvailable(type: string): void {
    if (this.entries.has(type)) {
      throw new TypeRegistrationError(type);
    }
  }
}
