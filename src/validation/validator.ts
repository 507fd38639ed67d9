import { z } from "zod";

import {
  parameterKinds,
  requiredParameters,
  type ParameterKind,
  type ParameterSchema,
  type ParameterSpec,
} from "../catalog/toolSpec.js";
import { ToolValidationError, type ValidationViolation, type ValidationViolationReason } from "../errors.js";
import { isPlainObject } from "../types.js";

/**
 * Argument validation. Each parameter schema is compiled once into a zod object
 * schema (unknown keys pass through) and cached; issues are then translated
 * into {@link ValidationViolation}s so callers see every problem in one pass.
 */

const KIND_SCHEMAS: Record<ParameterKind, z.ZodTypeAny> = {
  string: z.string(),
  number: z.number(),
  integer: z.number().int(),
  boolean: z.boolean(),
  object: z.record(z.unknown()),
  array: z.array(z.unknown()),
};

function compileKinds(kinds: readonly ParameterKind[], required: boolean): z.ZodTypeAny {
  const [first, second, ...rest] = kinds.map((kind) => KIND_SCHEMAS[kind]);
  if (second) {
    return z.union([first, second, ...rest]);
  }
  if (first) {
    return first;
  }
  // No declared kind: any value except null.
  return z.unknown().superRefine((value, ctx) => {
    if (value === null || value === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "value must not be null",
        params: { reason: required ? "missing" : "type" },
      });
    }
  });
}

function compileParameter(spec: ParameterSpec | undefined, required: boolean): z.ZodTypeAny {
  let schema = compileKinds(parameterKinds(spec), required);
  const allowed = spec?.enum;
  if (allowed && allowed.length > 0) {
    schema = schema.superRefine((value, ctx) => {
      if (!allowed.some((candidate) => candidate === value)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `expected one of ${allowed.map((candidate) => JSON.stringify(candidate)).join(", ")}`,
          params: { reason: "enum" },
        });
      }
    });
  }
  if (spec?.nullable) {
    schema = schema.nullable();
  }
  return required ? schema : schema.optional();
}

const compiled = new WeakMap<ParameterSchema, z.ZodTypeAny>();

/** Returns the (cached) zod schema enforcing {@link schema}. */
export function compileParameterSchema(schema: ParameterSchema): z.ZodTypeAny {
  const cached = compiled.get(schema);
  if (cached) {
    return cached;
  }
  const required = new Set(requiredParameters(schema));
  const shape: Record<string, z.ZodTypeAny> = {};
  for (const [name, spec] of Object.entries(schema.properties)) {
    shape[name] = compileParameter(spec, required.has(name));
  }
  for (const name of required) {
    if (!(name in shape)) {
      shape[name] = compileParameter(undefined, true);
    }
  }
  const objectSchema = z.object(shape).passthrough();
  compiled.set(schema, objectSchema);
  return objectSchema;
}

/** Readable kind of a runtime value, used in violation messages. */
export function describeKind(value: unknown): string {
  if (value === null) {
    return "null";
  }
  if (value === undefined) {
    return "undefined";
  }
  if (Array.isArray(value)) {
    return "array";
  }
  return typeof value;
}

function describeExpected(spec: ParameterSpec | undefined): string | undefined {
  const kinds: string[] = [...parameterKinds(spec)];
  if (kinds.length === 0) {
    return undefined;
  }
  if (spec?.nullable) {
    kinds.push("null");
  }
  return kinds.join(" | ");
}

function issueReason(issue: z.ZodIssue, value: unknown, required: boolean): ValidationViolationReason {
  if (issue.code === z.ZodIssueCode.custom) {
    const reason: unknown = issue.params?.reason;
    return reason === "enum" || reason === "missing" ? reason : "type";
  }
  if (required && (value === undefined || value === null)) {
    return "missing";
  }
  return "type";
}

/**
 * Checks {@link args} against {@link schema} without coercing anything.
 * Returns every violation found, in declaration order.
 */
export function collectViolations(schema: ParameterSchema, args: unknown): ValidationViolation[] {
  if (!isPlainObject(args)) {
    return [
      {
        parameter: null,
        reason: "arguments",
        message: "arguments must be a JSON object",
        expected: "object",
        received: describeKind(args),
      },
    ];
  }

  const parsed = compileParameterSchema(schema).safeParse(args);
  if (parsed.success) {
    return [];
  }

  const required = new Set(requiredParameters(schema));
  const violations: ValidationViolation[] = [];
  const seen = new Set<string>();
  for (const issue of parsed.error.issues) {
    const head = issue.path[0];
    if (typeof head !== "string" || seen.has(head)) {
      continue;
    }
    seen.add(head);
    const value = args[head];
    const spec = schema.properties[head];
    const reason = issueReason(issue, value, required.has(head));
    const expected = describeExpected(spec);
    violations.push({
      parameter: head,
      reason,
      message:
        reason === "missing"
          ? `missing required parameter "${head}"`
          : reason === "enum"
            ? `parameter "${head}": ${issue.message}`
            : `parameter "${head}" expected ${expected ?? "a non-null value"}, received ${describeKind(value)}`,
      ...(expected !== undefined ? { expected } : {}),
      ...(reason !== "missing" ? { received: describeKind(value) } : {}),
    });
  }
  return violations;
}

/** Outcome of {@link Validator.parse}. */
export type ParsedArguments =
  | { readonly ok: true; readonly args: Readonly<Record<string, unknown>> }
  | { readonly ok: false; readonly error: ToolValidationError };

/** Stateless validator shared by the dispatcher. */
export class Validator {
  /** Returns `null` when {@link args} satisfy the schema of {@link tool}. */
  public validate(schema: ParameterSchema, args: unknown, tool = "tool"): ToolValidationError | null {
    const parsed = this.parse(schema, args, tool);
    return parsed.ok ? null : parsed.error;
  }

  /** Same check as {@link validate}, narrowing the arguments on success. */
  public parse(schema: ParameterSchema, args: unknown, tool = "tool"): ParsedArguments {
    const violations = collectViolations(schema, args);
    if (violations.length > 0 || !isPlainObject(args)) {
      return { ok: false, error: new ToolValidationError(tool, violations) };
    }
    return { ok: true, args };
  }
}
