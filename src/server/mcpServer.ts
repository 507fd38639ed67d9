import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  type CallToolResult,
  type Tool,
} from "@modelcontextprotocol/sdk/types.js";

import { resolveAnnotations, toJsonSchema, type ToolSpec } from "../catalog/toolSpec.js";
import type { CallResult } from "../dispatch/dispatcher.js";
import type { ToolEngine } from "../engine.js";
import { isPlainObject } from "../types.js";

export interface McpBindingOptions {
  readonly name?: string;
  readonly version?: string;
}

const DEFAULT_SERVER_NAME = "tool-engine";
const DEFAULT_SERVER_VERSION = "0.1.0";

/** Describes a catalog entry the way `tools/list` advertises it. */
export function describeTool(spec: ToolSpec): Tool {
  const annotations = resolveAnnotations(spec);
  return {
    name: spec.name,
    description: spec.description,
    inputSchema: toJsonSchema(spec.parameterSchema),
    annotations: {
      readOnlyHint: annotations.readOnlyHint,
      destructiveHint: annotations.destructiveHint,
    },
  };
}

/**
 * Converts a call result into the MCP payload. Failures keep the structured
 * error under `structuredContent.error` so clients can act on the kind and
 * next steps without parsing text.
 */
export function toToolResult(result: CallResult): CallToolResult {
  if (!result.ok) {
    return {
      isError: true,
      content: [{ type: "text", text: JSON.stringify({ error: result.error }) }],
      structuredContent: { tool: result.tool, error: { ...result.error } },
    };
  }
  const structured = isPlainObject(result.value) ? result.value : { result: result.value ?? null };
  return {
    content: [
      {
        type: "text",
        text: typeof result.value === "string" ? result.value : JSON.stringify(result.value ?? null),
      },
    ],
    structuredContent: structured,
  };
}

/**
 * Exposes an engine over MCP: `tools/list` reflects the catalog and
 * `tools/call` goes through the dispatcher with the request's abort signal.
 */
export function createMcpServer(engine: ToolEngine, options: McpBindingOptions = {}): Server {
  const server = new Server(
    { name: options.name ?? DEFAULT_SERVER_NAME, version: options.version ?? DEFAULT_SERVER_VERSION },
    { capabilities: { tools: {} } },
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: engine.listTools().map(describeTool),
  }));

  server.setRequestHandler(CallToolRequestSchema, async (request, extra) => {
    const result = await engine.call(request.params.name, request.params.arguments ?? {}, {
      signal: extra.signal,
    });
    return toToolResult(result);
  });

  return server;
}
