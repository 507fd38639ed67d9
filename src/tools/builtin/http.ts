import { z } from "zod";

import type { ToolSpec } from "../../catalog/toolSpec.js";
import { classifyHttpStatus } from "../../dispatch/classification.js";
import { ToolConstructionError, ToolExecutionError } from "../../errors.js";
import type { ExecuteContext, FactoryContext, ToolInstance, TypeFactory } from "../../registry/toolInstance.js";

/** Settings accepted by `http_json` tools. */
const httpSettingsSchema = z
  .object({
    /** Endpoint; `{param}` placeholders are filled from the call arguments. */
    url: z.string().url(),
    method: z.enum(["GET", "POST", "PUT", "PATCH", "DELETE"]).default("GET"),
    /** Header values may reference environment variables as `${NAME}`. */
    headers: z.record(z.string()).default({}),
    /** Fixed query parameters merged with the call arguments. */
    query: z.record(z.union([z.string(), z.number(), z.boolean()])).default({}),
  })
  .passthrough();

export type HttpToolSettings = z.infer<typeof httpSettingsSchema>;

const PLACEHOLDER_PATTERN = /\{([A-Za-z0-9_]+)\}/g;
const ENV_PATTERN = /\$\{([A-Za-z0-9_]+)\}/g;

/** Raised by {@link resolveHeaders}; lists every unset variable. */
export class MissingEnvironmentError extends Error {
  public readonly variables: readonly string[];

  constructor(variables: readonly string[]) {
    super(`missing environment variable(s) ${variables.join(", ")}`);
    this.name = "MissingEnvironmentError";
    this.variables = variables;
  }
}

/**
 * Expands `${NAME}` references in header values. Missing variables are
 * reported together so the construction error names all of them.
 */
export function resolveHeaders(
  headers: Readonly<Record<string, string>>,
  env: FactoryContext["env"],
): Record<string, string> {
  const missing = new Set<string>();
  const resolved: Record<string, string> = {};
  for (const [name, template] of Object.entries(headers)) {
    resolved[name] = template.replace(ENV_PATTERN, (_match, variable: string) => {
      const value = env[variable];
      if (value === undefined || value === "") {
        missing.add(variable);
        return "";
      }
      return value;
    });
  }
  if (missing.size > 0) {
    throw new MissingEnvironmentError([...missing].sort());
  }
  return resolved;
}

/**
 * Builds the request URL: placeholders consume their argument, GET-like
 * requests send the remaining arguments as query parameters.
 */
export function buildRequestUrl(
  settings: HttpToolSettings,
  args: Readonly<Record<string, unknown>>,
): { url: URL; remaining: Record<string, unknown> } {
  const remaining: Record<string, unknown> = { ...args };
  const expanded = settings.url.replace(PLACEHOLDER_PATTERN, (_match, name: string) => {
    const value = args[name];
    delete remaining[name];
    return value === undefined || value === null ? "" : encodeURIComponent(String(value));
  });
  const url = new URL(expanded);
  for (const [name, value] of Object.entries(settings.query)) {
    url.searchParams.set(name, String(value));
  }
  if (settings.method === "GET" || settings.method === "DELETE") {
    for (const [name, value] of Object.entries(remaining)) {
      if (value === undefined || value === null) {
        continue;
      }
      url.searchParams.set(name, typeof value === "object" ? JSON.stringify(value) : String(value));
    }
  }
  return { url, remaining };
}

class HttpJsonTool implements ToolInstance {
  constructor(
    private readonly spec: ToolSpec,
    private readonly settings: HttpToolSettings,
    private readonly headers: Record<string, string>,
    private readonly fetchImpl: typeof fetch,
  ) {}

  public async execute(args: Readonly<Record<string, unknown>>, context: ExecuteContext): Promise<unknown> {
    const { url, remaining } = buildRequestUrl(this.settings, args);
    const hasBody = this.settings.method !== "GET" && this.settings.method !== "DELETE";
    const response = await this.fetchImpl(url, {
      method: this.settings.method,
      headers: {
        accept: "application/json",
        ...(hasBody ? { "content-type": "application/json" } : {}),
        ...this.headers,
      },
      ...(hasBody ? { body: JSON.stringify(remaining) } : {}),
      signal: context.signal,
    });

    if (!response.ok) {
      const { subKind, retriable } = classifyHttpStatus(response.status);
      throw new ToolExecutionError(`${this.spec.name}: upstream responded with HTTP ${response.status}`, {
        subKind,
        retriable,
        status: response.status,
        hint: response.status === 401 || response.status === 403 ? "check the credentials configured for this tool" : undefined,
        details: { tool: this.spec.name, url: `${url.origin}${url.pathname}` },
      });
    }

    const text = await response.text();
    if (text.trim().length === 0) {
      return null;
    }
    try {
      const body: unknown = JSON.parse(text);
      return body;
    } catch (error) {
      throw new ToolExecutionError(`${this.spec.name}: upstream returned malformed JSON`, {
        subKind: "transient",
        retriable: false,
        status: response.status,
        details: { tool: this.spec.name },
        cause: error,
      });
    }
  }
}

/** Factory for `http_json` tools, bound to a `fetch` implementation. */
export function createHttpJsonFactory(fetchImpl: typeof fetch = fetch): TypeFactory {
  return (spec, context) => {
    const settings = httpSettingsSchema.parse(spec.settings);
    let headers: Record<string, string>;
    try {
      headers = resolveHeaders(settings.headers, context.env);
    } catch (error) {
      if (error instanceof MissingEnvironmentError) {
        throw new ToolConstructionError(
          spec.name,
          spec.type,
          error,
          error.variables.map((variable) => `Set environment variable ${variable}`),
        );
      }
      throw error;
    }
    return new HttpJsonTool(spec, settings, headers, fetchImpl);
  };
}
