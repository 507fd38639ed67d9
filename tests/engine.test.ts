import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";

import { describe, it } from "mocha";
import { expect } from "chai";
import sinon from "sinon";

import { defineTool } from "../src/catalog/toolSpec.js";
import { loadEngineConfig } from "../src/config/engineConfig.js";
import { createToolEngine, ToolEngine } from "../src/engine.js";
import { ToolExecutionError } from "../src/errors.js";
import type { TypeFactory } from "../src/registry/toolInstance.js";
import { RecordingLogger } from "./helpers/recordingLogger.js";
import { createDeferred, flushMicrotasks, instanceOf } from "./helpers/tools.js";

function engineWith(env: Record<string, string> = {}) {
  const logger = new RecordingLogger();
  const engine = new ToolEngine({ config: loadEngineConfig(env), logger, env });
  return { engine, logger };
}

const echoTool = defineTool({
  name: "echo",
  type: "echo",
  description: "Echo text back",
  parameterSchema: { properties: { text: { kind: "string" } }, required: ["text"] },
});

function moduleNotFound(specifier: string): Error {
  return Object.assign(new Error(`Cannot find package '${specifier}' imported from /srv/tools/geo.js`), {
    code: "ERR_MODULE_NOT_FOUND",
  });
}

describe("ToolEngine", () => {
  it("loads a catalog and answers calls with the built-in echo type", async () => {
    const { engine, logger } = engineWith();

    const summary = await engine.loadCatalog([echoTool]);
    const result = await engine.call("echo", { text: "hello" });

    expect(summary).to.deep.equal({ added: 1, updated: 0, total: 1 });
    expect(logger.find("catalog_loaded")?.payload).to.deep.equal({
      mode: "merge",
      added: 1,
      updated: 0,
      total: 1,
      stale: 0,
    });
    expect(result.ok && result.value).to.equal("hello");
    expect(engine.health("echo")?.available).to.equal(true);
  });

  it("keeps instances of unchanged tools and evicts the ones whose definition changed", async () => {
    const { engine, logger } = engineWith();
    const dispose = sinon.spy();
    const factory = sinon.spy<TypeFactory>(() => instanceOf(async () => "ok", { dispose }));
    engine.types.registerEager("stub", factory);
    const alpha = defineTool({ name: "alpha", type: "stub" });
    const beta = defineTool({ name: "beta", type: "stub", description: "v1" });
    await engine.loadCatalog([alpha, beta]);
    await engine.warmup();

    await engine.loadCatalog([alpha, { ...beta, description: "v2" }]);

    expect(engine.instances.names()).to.deep.equal(["alpha"]);
    expect(dispose.callCount).to.equal(1);
    expect(logger.entries.filter((entry) => entry.message === "catalog_loaded").map((entry) => entry.payload)).to.deep.equal([
      { mode: "merge", added: 2, updated: 0, total: 2, stale: 0 },
      { mode: "merge", added: 0, updated: 2, total: 2, stale: 1 },
    ]);

    await engine.call("beta", {});
    expect(factory.callCount).to.equal(3);
  });

  it("drops cached results of tools removed by a replace load", async () => {
    const { engine } = engineWith();
    engine.types.registerEager("stub", () => instanceOf(async () => ({ n: 1 })));
    await engine.loadCatalog([defineTool({ name: "cached", type: "stub", cache: { enabled: true } })]);
    await engine.call("cached", {});
    expect(engine.cacheStats().size).to.equal(1);

    await engine.loadCatalog([echoTool], "replace");

    expect(engine.cacheStats().size).to.equal(0);
    expect(engine.listTools().map((spec) => spec.name)).to.deep.equal(["echo"]);
  });

  it("resets a tool while keeping its failure history until it recovers", async () => {
    const { engine } = engineWith();
    const execute = sinon.stub<[], Promise<unknown>>();
    execute.onFirstCall().rejects(new ToolExecutionError("account suspended", { subKind: "permanent" }));
    execute.resolves("back");
    engine.types.registerEager("fragile", () => instanceOf(execute));
    await engine.loadCatalog([defineTool({ name: "fragile", type: "fragile" })]);

    await engine.call("fragile", {});
    expect(engine.unhealthy().map((record) => record.name)).to.deep.equal(["fragile"]);

    expect(await engine.reset("fragile")).to.equal(true);
    expect(engine.health("fragile")?.available).to.equal(false);
    expect(engine.instances.size).to.equal(0);

    const result = await engine.call("fragile", {});
    expect(result.ok).to.equal(true);
    const record = engine.health("fragile");
    expect(record?.available).to.equal(true);
    expect(record?.errorCount).to.equal(1);
    expect(record?.recoveredAt).to.be.a("number");

    expect(await engine.reset("fragile", { forgetHealth: true })).to.equal(true);
    expect(engine.health("fragile")).to.equal(undefined);
    expect(await engine.reset("unknown")).to.equal(false);
  });

  it("retries a lazy type that failed to load once the tool is reset", async () => {
    const { engine } = engineWith();
    const resolver = sinon.stub<[], Promise<TypeFactory>>();
    resolver.onFirstCall().rejects(moduleNotFound("geo-sdk"));
    resolver.onSecondCall().resolves(() => instanceOf(async () => "located"));
    engine.types.registerLazy("plugin", resolver);
    await engine.loadCatalog([defineTool({ name: "geo", type: "plugin" })]);

    const [failed] = await engine.warmup(["geo"]);
    expect(failed.ok).to.equal(false);
    if (!failed.ok) {
      expect(failed.error.kind).to.equal("dependency");
      expect(failed.error.details).to.deep.equal({ type: "plugin", reason: "resolver_failed", missingPackage: "geo-sdk" });
      expect(failed.error.nextSteps).to.deep.equal([
        "Install the missing package: npm install geo-sdk",
        "Reset the tool once the dependency is installed",
      ]);
    }

    await engine.reset("geo");
    expect(engine.types.describe("plugin")).to.equal("lazy-pending");

    expect(await engine.warmup(["geo"])).to.deep.equal([{ name: "geo", ok: true }]);
    expect(engine.health("geo")?.recoveredAt).to.be.a("number");
    const result = await engine.call("geo", {});
    expect(result.ok && result.value).to.equal("located");
  });

  it("reports unknown names during warmup without stopping the others", async () => {
    const { engine } = engineWith();
    await engine.loadCatalog([echoTool]);

    const outcomes = await engine.warmup(["echo", "ghost"]);

    expect(outcomes.map((outcome) => [outcome.name, outcome.ok ? "ok" : outcome.error.kind])).to.deep.equal([
      ["echo", "ok"],
      ["ghost", "not_found"],
    ]);
  });

  it("prunes health records of tools that left the catalog", async () => {
    const { engine } = engineWith();
    await engine.loadCatalog([echoTool, defineTool({ name: "second", type: "echo" })]);
    await engine.warmup();

    await engine.loadCatalog([echoTool], "replace");

    expect(engine.pruneHealth()).to.equal(1);
    expect(engine.healthTracker.all().map((record) => record.name)).to.deep.equal(["echo"]);
  });

  it("discards an instance whose construction was overtaken by a catalog change", async () => {
    const { engine, logger } = engineWith();
    const gate = createDeferred<void>();
    const built: unknown[] = [];
    const disposed: unknown[] = [];
    engine.types.registerEager("versioned", async (spec) => {
      const version = spec.settings.version;
      built.push(version);
      if (version === 1) {
        await gate.promise;
      }
      return instanceOf(async () => version, {
        dispose: () => {
          disposed.push(version);
        },
      });
    });
    await engine.loadCatalog([defineTool({ name: "pinned", type: "versioned", settings: { version: 1 } })]);

    const pending = engine.call("pinned", {});
    await flushMicrotasks();
    await engine.loadCatalog([defineTool({ name: "pinned", type: "versioned", settings: { version: 2 } })]);
    gate.resolve();
    const result = await pending;

    expect(result.ok && result.value).to.equal(2);
    expect(built).to.deep.equal([1, 2]);
    expect(disposed).to.deep.equal([1]);
    expect(engine.instances.names()).to.deep.equal(["pinned"]);
    expect(logger.find("tool_construction_superseded")?.payload).to.deep.equal({
      tool: "pinned",
      type: "versioned",
      failed: false,
    });
  });

  it("bounds health records without forgetting unavailable tools in the catalog", async () => {
    const { engine } = engineWith({ TOOL_ENGINE_HEALTH_MAX_RECORDS: "1" });
    engine.types.registerEager("fragile", () =>
      instanceOf(async () => {
        throw new ToolExecutionError("account suspended", { subKind: "permanent" });
      }),
    );
    await engine.loadCatalog([echoTool, defineTool({ name: "fragile", type: "fragile" })]);

    await engine.call("fragile", {});
    await engine.call("echo", { text: "hi" });
    expect(engine.unhealthy().map((record) => record.name)).to.deep.equal(["fragile"]);

    await engine.loadCatalog([echoTool, defineTool({ name: "second", type: "echo" })], "replace");
    await engine.call("second", { text: "again" });
    expect(engine.health("fragile")).to.equal(undefined);
    expect(engine.healthTracker.all().map((record) => record.name)).to.deep.equal(["second"]);
  });

  it("searches and filters the catalog", async () => {
    const { engine } = engineWith();
    await engine.loadCatalog([
      echoTool,
      defineTool({ name: "weather_lookup", type: "echo", description: "Current weather", category: "weather" }),
    ]);

    expect(engine.listTools({ category: "weather" }).map((spec) => spec.name)).to.deep.equal(["weather_lookup"]);
    expect(engine.findTools("weather").map((hit) => hit.spec.name)).to.deep.equal(["weather_lookup"]);
  });

  it("honours a disabled result cache", async () => {
    const { engine } = engineWith({ TOOL_ENGINE_RESULT_CACHE: "off" });
    engine.types.registerEager("stub", () => instanceOf(async () => 1));
    await engine.loadCatalog([defineTool({ name: "cached", type: "stub", cache: { enabled: true } })]);

    await engine.call("cached", {});
    const second = await engine.call("cached", {});

    expect(second.ok && second.cached).to.equal(false);
    expect(engine.resultCache.enabled).to.equal(false);
  });

  it("shares nothing between two engines", async () => {
    const first = engineWith().engine;
    const second = engineWith().engine;

    await first.loadCatalog([echoTool]);
    await first.call("echo", { text: "x" });

    expect(second.listTools()).to.deep.equal([]);
    expect(second.health("echo")).to.equal(undefined);
    const missing = await second.call("echo", { text: "x" });
    expect(!missing.ok && missing.error.kind).to.equal("not_found");
  });

  it("disposes every instance on shutdown", async () => {
    const { engine } = engineWith();
    const dispose = sinon.spy();
    engine.types.registerEager("stub", () => instanceOf(async () => null, { dispose }));
    await engine.loadCatalog([defineTool({ name: "a", type: "stub" }), defineTool({ name: "b", type: "stub" })]);
    await engine.warmup();

    await engine.dispose();

    expect(dispose.callCount).to.equal(2);
    expect(engine.instances.size).to.equal(0);
  });
});

describe("createToolEngine", () => {
  it("loads the configured catalog sources", async () => {
    const directory = await mkdtemp(path.join(tmpdir(), "tool-engine-"));
    try {
      const file = path.join(directory, "tools.json");
      await writeFile(
        file,
        JSON.stringify([
          { name: "echo", type: "echo", parameter: { properties: { text: { type: "string" } }, required: ["text"] } },
          { name: "hidden", type: "echo" },
        ]),
      );
      const env = { TOOL_ENGINE_CATALOG_PATHS: file, TOOL_ENGINE_EXCLUDE: "hidden" };

      const engine = await createToolEngine({ config: loadEngineConfig(env), logger: new RecordingLogger(), env });

      expect(engine.listTools().map((spec) => [spec.name, spec.category])).to.deep.equal([["echo", "tools"]]);
      const result = await engine.call("echo", { text: "from file" });
      expect(result.ok && result.value).to.equal("from file");
    } finally {
      await rm(directory, { recursive: true, force: true });
    }
  });
});
