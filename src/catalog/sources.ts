import { readdir, readFile, stat } from "node:fs/promises";
import path from "node:path";

import { z } from "zod";

import { CatalogSourceError } from "../errors.js";
import { MAX_TIMEOUT_MS } from "../infra/deadline.js";
import type { JsonObject, JsonValue } from "../types.js";
import {
  defineTool,
  type ParameterKind,
  type ParameterSpec,
  type ToolSpec,
} from "./toolSpec.js";

/**
 * JSON catalog sources. A source file holds either an array of tool records or
 * `{ "tools": [...] }`. Records follow the layout of hand-written tool
 * configuration files: a JSON-Schema `parameter` block plus any number of
 * tool-specific top-level keys, which end up in `settings`.
 */

const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(jsonValueSchema), z.record(jsonValueSchema)]),
);

const rawRecordSchema = z.record(jsonValueSchema);

const kindLiteralSchema = z.enum(["string", "number", "integer", "boolean", "object", "array", "null"]);

const parameterPropertySchema = z.object({
  type: z.union([kindLiteralSchema, z.array(kindLiteralSchema).min(1)]).optional(),
  description: z.string().optional(),
  enum: z.array(z.union([z.string(), z.number(), z.boolean(), z.null()])).optional(),
  required: z.boolean().optional(),
  nullable: z.boolean().optional(),
});

const parameterBlockSchema = z.object({
  type: z.literal("object").optional(),
  properties: z.record(parameterPropertySchema).default({}),
  required: z.array(z.string()).optional(),
});

const toolRecordSchema = z.object({
  name: z.string().trim().min(1),
  type: z.string().trim().min(1),
  description: z.string().default(""),
  parameter: parameterBlockSchema.optional(),
  parameterSchema: parameterBlockSchema.optional(),
  settings: z.record(jsonValueSchema).optional(),
  category: z.string().trim().min(1).optional(),
  annotations: z
    .object({ readOnlyHint: z.boolean().optional(), destructiveHint: z.boolean().optional() })
    .optional(),
  concurrency: z.enum(["concurrent", "serial"]).optional(),
  cache: z.object({ enabled: z.boolean(), ttlMs: z.number().int().positive().optional() }).optional(),
  timeoutMs: z.number().int().positive().max(MAX_TIMEOUT_MS).optional(),
});

const KNOWN_KEYS = new Set(Object.keys(toolRecordSchema.shape));

const sourceDocumentSchema = z.union([
  z.array(z.unknown()),
  z.object({ tools: z.array(z.unknown()) }).passthrough(),
]);

/** Filters applied after the records are read. */
export interface CatalogSourceFilter {
  readonly include?: readonly string[];
  readonly exclude?: readonly string[];
  readonly categories?: readonly string[];
}

/**
 * Converts the raw records of one source into tool specs. Every invalid record
 * is reported in a single {@link CatalogSourceError}.
 */
export function parseCatalogRecords(
  records: readonly unknown[],
  source: string,
  defaultCategory?: string,
): ToolSpec[] {
  const specs: ToolSpec[] = [];
  const issues: string[] = [];

  records.forEach((entry, index) => {
    const raw = rawRecordSchema.safeParse(entry);
    if (!raw.success) {
      issues.push(`#${index}: record must be a JSON object`);
      return;
    }
    const parsed = toolRecordSchema.safeParse(raw.data);
    if (!parsed.success) {
      for (const issue of parsed.error.issues) {
        issues.push(`#${index}${issue.path.length > 0 ? `.${issue.path.join(".")}` : ""}: ${issue.message}`);
      }
      return;
    }

    const record = parsed.data;
    const extras: JsonObject = {};
    for (const [key, value] of Object.entries(raw.data)) {
      if (!KNOWN_KEYS.has(key)) {
        extras[key] = value;
      }
    }
    const block = record.parameter ?? record.parameterSchema;
    const properties: Record<string, ParameterSpec> = {};
    for (const [name, property] of Object.entries(block?.properties ?? {})) {
      properties[name] = convertProperty(property);
    }
    const category = record.category ?? defaultCategory;

    specs.push(
      defineTool({
        name: record.name,
        type: record.type,
        description: record.description,
        parameterSchema: {
          properties,
          ...(block?.required ? { required: block.required } : {}),
        },
        settings: { ...extras, ...(record.settings ?? {}) },
        ...(category !== undefined ? { category } : {}),
        ...(record.annotations !== undefined ? { annotations: record.annotations } : {}),
        ...(record.concurrency !== undefined ? { concurrency: record.concurrency } : {}),
        ...(record.cache !== undefined ? { cache: record.cache } : {}),
        ...(record.timeoutMs !== undefined ? { timeoutMs: record.timeoutMs } : {}),
      }),
    );
  });

  if (issues.length > 0) {
    throw new CatalogSourceError(source, issues);
  }
  return specs;
}

function convertProperty(property: z.infer<typeof parameterPropertySchema>): ParameterSpec {
  const declared = property.type === undefined ? [] : Array.isArray(property.type) ? property.type : [property.type];
  const kinds = declared.filter((kind): kind is ParameterKind => kind !== "null");
  const nullable = property.nullable ?? declared.includes("null");
  return {
    ...(kinds.length === 1 ? { kind: kinds[0] } : kinds.length > 1 ? { kind: kinds } : {}),
    ...(property.description !== undefined ? { description: property.description } : {}),
    ...(property.enum !== undefined ? { enum: property.enum } : {}),
    ...(property.required !== undefined ? { required: property.required } : {}),
    ...(nullable ? { nullable: true } : {}),
  };
}

/** Reads one JSON source file. The file stem becomes the default category. */
export async function readCatalogFile(filePath: string): Promise<ToolSpec[]> {
  let document: unknown;
  try {
    document = JSON.parse(await readFile(filePath, "utf8"));
  } catch (error) {
    throw new CatalogSourceError(filePath, [error instanceof Error ? error.message : String(error)], error);
  }
  const parsed = sourceDocumentSchema.safeParse(document);
  if (!parsed.success) {
    throw new CatalogSourceError(filePath, ["expected an array of tools or an object with a tools array"]);
  }
  const records = Array.isArray(parsed.data) ? parsed.data : parsed.data.tools;
  return parseCatalogRecords(records, filePath, path.basename(filePath, path.extname(filePath)));
}

/**
 * Reads every source (files, or directories whose `*.json` entries are read in
 * lexical order) and applies {@link filter}.
 */
export async function readCatalogSources(
  paths: readonly string[],
  filter: CatalogSourceFilter = {},
): Promise<ToolSpec[]> {
  const specs: ToolSpec[] = [];
  for (const entry of paths) {
    const info = await stat(entry);
    if (info.isDirectory()) {
      const files = (await readdir(entry)).filter((file) => file.endsWith(".json")).sort();
      for (const file of files) {
        specs.push(...(await readCatalogFile(path.join(entry, file))));
      }
    } else {
      specs.push(...(await readCatalogFile(entry)));
    }
  }
  return filterCatalogSpecs(specs, filter);
}

/** Applies include/exclude lists and the category allow-list. */
export function filterCatalogSpecs(specs: readonly ToolSpec[], filter: CatalogSourceFilter): ToolSpec[] {
  const include = filter.include && filter.include.length > 0 ? new Set(filter.include) : null;
  const exclude = new Set(filter.exclude ?? []);
  const categories = filter.categories && filter.categories.length > 0 ? new Set(filter.categories) : null;
  return specs.filter((spec) => {
    if (include && !include.has(spec.name)) {
      return false;
    }
    if (exclude.has(spec.name)) {
      return false;
    }
    if (categories && (spec.category === undefined || !categories.has(spec.category))) {
      return false;
    }
    return true;
  });
}
