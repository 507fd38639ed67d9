import { describe, it } from "mocha";
import { expect } from "chai";

import { defineTool } from "../../src/catalog/toolSpec.js";
import { loadEngineConfig } from "../../src/config/engineConfig.js";
import { buildHealthReport, renderHealthReport } from "../../src/diagnostics/healthReport.js";
import { ToolEngine } from "../../src/engine.js";
import { RecordingLogger } from "../helpers/recordingLogger.js";
import { ManualClock } from "../helpers/tools.js";

async function degradedEngine(): Promise<ToolEngine> {
  const clock = new ManualClock();
  const engine = new ToolEngine({ config: loadEngineConfig({}), logger: new RecordingLogger(), env: {}, clock: clock.now });
  engine.types.registerEager("broken", () => {
    throw new Error("missing API_TOKEN");
  });
  await engine.loadCatalog([
    defineTool({
      name: "echo",
      type: "echo",
      category: "debug",
      parameterSchema: { properties: { text: { kind: "string" } } },
    }),
    defineTool({ name: "broken", type: "broken" }),
    defineTool({ name: "forecast", type: "echo", category: "geo" }),
  ]);
  await engine.call("echo", { text: "ping" });
  await engine.call("broken", {});
  return engine;
}

describe("diagnostics/healthReport", () => {
  it("summarises availability, categories and unhealthy tools", async () => {
    const engine = await degradedEngine();

    const report = buildHealthReport(engine, () => 0);

    expect(report).to.deep.equal({
      generatedAt: "1970-01-01T00:00:00.000Z",
      catalogSize: 3,
      categories: { debug: 1, "": 1, geo: 1 },
      instances: 1,
      available: 1,
      unknown: 1,
      unhealthy: [
        {
          name: "broken",
          type: "broken",
          errorCount: 1,
          lastErrorAt: "1970-01-01T00:00:01.000Z",
          error: engine.health("broken")?.lastError,
        },
      ],
    });
  });

  it("renders one block per unhealthy tool with its next steps", async () => {
    const engine = await degradedEngine();

    expect(renderHealthReport(buildHealthReport(engine))).to.deep.equal([
      "tools: 3 (available 1, unhealthy 1, unknown 1)",
      "instances: 1",
      "categories: (none)=1, debug=1, geo=1",
      '- broken [broken]: tool "broken" failed to initialise: missing API_TOKEN (errors: 1)',
      "    next: Review the tool settings in the catalog",
      "    next: Check environment variables required by the tool",
    ]);
  });

  it("omits the category line for an empty catalog", () => {
    const engine = new ToolEngine({ config: loadEngineConfig({}), logger: new RecordingLogger(), env: {} });

    expect(renderHealthReport(buildHealthReport(engine))).to.deep.equal([
      "tools: 0 (available 0, unhealthy 0, unknown 0)",
      "instances: 0",
    ]);
  });
});
