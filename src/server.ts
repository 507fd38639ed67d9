import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { pathToFileURL } from "node:url";
import process from "node:process";

import { loadEngineConfig, loggerOptions } from "./config/engineConfig.js";
import { buildHealthReport } from "./diagnostics/healthReport.js";
import { createToolEngine, type ToolEngine } from "./engine.js";
import { StructuredLogger } from "./logger.js";
import { createMcpServer } from "./server/mcpServer.js";
import { describeError } from "./types.js";

/**
 * Boots an engine from the environment and serves it over stdio. Logs go to
 * stderr since stdout carries the protocol.
 */
async function main(): Promise<void> {
  const config = loadEngineConfig();
  const logger = new StructuredLogger({ ...loggerOptions(config.log), stream: "stderr" });

  let engine: ToolEngine;
  try {
    engine = await createToolEngine({ config, logger });
  } catch (error) {
    logger.error("engine_start_failed", { message: describeError(error) });
    await logger.flush();
    process.exit(1);
  }

  const report = buildHealthReport(engine);
  logger.info("catalog_ready", { tools: report.catalogSize, categories: report.categories });

  const server = createMcpServer(engine);
  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.info("stdio_listening");

  const shutdown = async (signal: string): Promise<void> => {
    logger.warn("shutdown_signal", { signal });
    try {
      await server.close();
      await engine.dispose();
    } catch (error) {
      logger.error("shutdown_failed", { message: describeError(error) });
    }
    process.exit(0);
  };
  process.once("SIGINT", () => void shutdown("SIGINT"));
  process.once("SIGTERM", () => void shutdown("SIGTERM"));
}

const isMain = process.argv[1] ? pathToFileURL(process.argv[1]).href === import.meta.url : false;

if (isMain) {
  void main();
}
