import type { JsonObject, JsonPrimitive } from "../types.js";

/** Primitive kinds a parameter may declare. */
export type ParameterKind = "string" | "number" | "integer" | "boolean" | "object" | "array";

/** Declaration of one named argument. */
export interface ParameterSpec {
  /** Accepted kind(s). Omitted means any non-null value. */
  readonly kind?: ParameterKind | readonly ParameterKind[];
  readonly description?: string;
  /** Allowed values; compared with strict equality. */
  readonly enum?: readonly JsonPrimitive[];
  /** Alternative to listing the name in {@link ParameterSchema.required}. */
  readonly required?: boolean;
  /** Whether an explicit `null` satisfies the parameter. */
  readonly nullable?: boolean;
}

/**
 * Argument schema of a tool. Shaped after JSON Schema's `properties` and
 * `required` so catalog files convert without loss.
 */
export interface ParameterSchema {
  readonly properties: Readonly<Record<string, ParameterSpec>>;
  readonly required?: readonly string[];
}

/** Hints surfaced to protocol clients. */
export interface ToolAnnotations {
  readonly readOnlyHint: boolean;
  readonly destructiveHint: boolean;
}

export const DEFAULT_ANNOTATIONS: ToolAnnotations = Object.freeze({
  readOnlyHint: true,
  destructiveHint: false,
});

/** Whether the engine may run several executions of one instance at once. */
export type ToolConcurrency = "concurrent" | "serial";

/** Result-cache participation of a tool. */
export interface ToolCachePolicy {
  readonly enabled: boolean;
  readonly ttlMs?: number;
}

/** Static description of one tool. */
export interface ToolSpec {
  readonly name: string;
  readonly type: string;
  readonly description: string;
  readonly parameterSchema: ParameterSchema;
  /** Opaque configuration handed to the factory. */
  readonly settings: Readonly<JsonObject>;
  readonly category?: string;
  readonly annotations?: ToolAnnotations;
  readonly concurrency?: ToolConcurrency;
  readonly cache?: ToolCachePolicy;
  readonly timeoutMs?: number;
}

/** Input accepted by {@link defineTool}; everything but name and type is optional. */
export interface ToolSpecDraft {
  readonly name: string;
  readonly type: string;
  readonly description?: string;
  readonly parameterSchema?: Partial<ParameterSchema>;
  readonly settings?: JsonObject;
  readonly category?: string;
  readonly annotations?: Partial<ToolAnnotations>;
  readonly concurrency?: ToolConcurrency;
  readonly cache?: ToolCachePolicy;
  readonly timeoutMs?: number;
}

/** Fills the optional fields of a draft with their defaults. */
export function defineTool(draft: ToolSpecDraft): ToolSpec {
  return {
    name: draft.name,
    type: draft.type,
    description: draft.description ?? "",
    parameterSchema: {
      properties: { ...(draft.parameterSchema?.properties ?? {}) },
      ...(draft.parameterSchema?.required ? { required: [...draft.parameterSchema.required] } : {}),
    },
    settings: { ...(draft.settings ?? {}) },
    ...(draft.category !== undefined ? { category: draft.category } : {}),
    ...(draft.annotations !== undefined
      ? { annotations: { ...DEFAULT_ANNOTATIONS, ...draft.annotations } }
      : {}),
    ...(draft.concurrency !== undefined ? { concurrency: draft.concurrency } : {}),
    ...(draft.cache !== undefined ? { cache: { ...draft.cache } } : {}),
    ...(draft.timeoutMs !== undefined ? { timeoutMs: draft.timeoutMs } : {}),
  };
}

/** Names of every parameter the schema requires, in declaration order. */
export function requiredParameters(schema: ParameterSchema): string[] {
  const names = new Set<string>(schema.required ?? []);
  for (const [name, spec] of Object.entries(schema.properties)) {
    if (spec.required === true) {
      names.add(name);
    }
  }
  return [...names];
}

/** Normalises the `kind` field into a list (empty = any). */
export function parameterKinds(spec: ParameterSpec | undefined): readonly ParameterKind[] {
  if (!spec?.kind) {
    return [];
  }
  return typeof spec.kind === "string" ? [spec.kind] : spec.kind;
}

/** JSON Schema advertised to protocol clients for a tool's arguments. */
export type JsonObjectSchema = {
  type: "object";
  properties: Record<string, Record<string, unknown>>;
  required?: string[];
};

/** Converts a parameter schema into the JSON Schema object advertised to clients. */
export function toJsonSchema(schema: ParameterSchema): JsonObjectSchema {
  const properties: Record<string, Record<string, unknown>> = {};
  for (const [name, spec] of Object.entries(schema.properties)) {
    const kinds = parameterKinds(spec);
    const types: string[] = [...kinds];
    if (spec.nullable && types.length > 0) {
      types.push("null");
    }
    properties[name] = {
      ...(types.length === 1 ? { type: types[0] } : types.length > 1 ? { type: types } : {}),
      ...(spec.description ? { description: spec.description } : {}),
      ...(spec.enum ? { enum: [...spec.enum] } : {}),
    };
  }
  const required = requiredParameters(schema);
  return {
    type: "object",
    properties,
    ...(required.length > 0 ? { required } : {}),
  };
}

/** Annotations of a spec with defaults applied. */
export function resolveAnnotations(spec: ToolSpec): ToolAnnotations {
  return spec.annotations ?? DEFAULT_ANNOTATIONS;
}
