import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";

import { afterEach, beforeEach, describe, it } from "mocha";
import { expect } from "chai";

import {
  filterCatalogSpecs,
  parseCatalogRecords,
  readCatalogFile,
  readCatalogSources,
} from "../../src/catalog/sources.js";
import { defineTool } from "../../src/catalog/toolSpec.js";
import { CatalogSourceError } from "../../src/errors.js";

describe("catalog/sources", () => {
  let workspace: string;

  beforeEach(async () => {
    workspace = await mkdtemp(path.join(tmpdir(), "tool-engine-catalog-"));
  });

  afterEach(async () => {
    await rm(workspace, { recursive: true, force: true });
  });

  it("converts JSON-Schema parameter blocks and moves unknown keys into settings", () => {
    const [spec] = parseCatalogRecords(
      [
        {
          name: "search_docs",
          type: "http_json",
          description: "Search the documentation",
          url: "https://docs.invalid/search",
          parameter: {
            type: "object",
            properties: {
              query: { type: "string", description: "Search terms" },
              limit: { type: ["integer", "null"] },
              sort: { type: "string", enum: ["asc", "desc"] },
            },
            required: ["query"],
          },
        },
      ],
      "inline",
    );

    expect(spec.settings).to.deep.equal({ url: "https://docs.invalid/search" });
    expect(spec.parameterSchema).to.deep.equal({
      properties: {
        query: { kind: "string", description: "Search terms" },
        limit: { kind: "integer", nullable: true },
        sort: { kind: "string", enum: ["asc", "desc"] },
      },
      required: ["query"],
    });
    expect(spec.category).to.equal(undefined);
  });

  it("lets explicit settings override top-level extras", () => {
    const [spec] = parseCatalogRecords(
      [{ name: "a", type: "echo", mode: "extra", settings: { mode: "explicit", depth: 2 } }],
      "inline",
      "misc",
    );

    expect(spec.settings).to.deep.equal({ mode: "explicit", depth: 2 });
    expect(spec.category).to.equal("misc");
  });

  it("reports every invalid record in one error", () => {
    let caught: unknown;
    try {
      parseCatalogRecords([42, { type: "echo" }, { name: "ok", type: "echo" }], "broken.json");
    } catch (error) {
      caught = error;
    }

    expect(caught).to.be.instanceOf(CatalogSourceError);
    if (caught instanceof CatalogSourceError) {
      expect(caught.details.issues).to.deep.equal(["#0: record must be a JSON object", "#1.name: Required"]);
      expect(caught.code).to.equal("E-CATALOG-INVALID");
    }
  });

  it("rejects timeouts beyond the timer range", () => {
    let caught: unknown;
    try {
      parseCatalogRecords([{ name: "slow", type: "echo", timeoutMs: 2 ** 31 }], "slow.json");
    } catch (error) {
      caught = error;
    }

    expect(caught).to.be.instanceOf(CatalogSourceError);
    if (caught instanceof CatalogSourceError) {
      expect(caught.details.issues).to.have.length(1);
      expect(caught.details.issues[0]).to.match(/^#0\.timeoutMs: /);
    }
    expect(parseCatalogRecords([{ name: "slow", type: "echo", timeoutMs: 2_147_483_647 }], "slow.json")[0]?.timeoutMs).to.equal(
      2_147_483_647,
    );
  });

  it("uses the file stem as the default category", async () => {
    const file = path.join(workspace, "weather.json");
    await writeFile(
      file,
      JSON.stringify({ tools: [{ name: "forecast", type: "echo" }, { name: "alerts", type: "echo", category: "ops" }] }),
    );

    const specs = await readCatalogFile(file);

    expect(specs.map((spec) => [spec.name, spec.category])).to.deep.equal([
      ["forecast", "weather"],
      ["alerts", "ops"],
    ]);
  });

  it("rejects malformed JSON with the file path in the error", async () => {
    const file = path.join(workspace, "bad.json");
    await writeFile(file, "{ not json");

    let caught: unknown;
    try {
      await readCatalogFile(file);
    } catch (error) {
      caught = error;
    }

    expect(caught).to.be.instanceOf(CatalogSourceError);
    if (caught instanceof CatalogSourceError) {
      expect(caught.details.source).to.equal(file);
    }
  });

  it("reads the JSON files of a directory in lexical order and applies filters", async () => {
    await writeFile(path.join(workspace, "b.json"), JSON.stringify([{ name: "beta", type: "echo" }]));
    await writeFile(
      path.join(workspace, "a.json"),
      JSON.stringify([
        { name: "alpha", type: "echo" },
        { name: "skipped", type: "echo" },
      ]),
    );
    await writeFile(path.join(workspace, "notes.txt"), "ignored");

    const all = await readCatalogSources([workspace]);
    expect(all.map((spec) => spec.name)).to.deep.equal(["alpha", "skipped", "beta"]);

    const filtered = await readCatalogSources([workspace], { exclude: ["skipped"], categories: ["a"] });
    expect(filtered.map((spec) => spec.name)).to.deep.equal(["alpha"]);
  });

  it("applies include lists before exclusions", () => {
    const specs = [
      defineTool({ name: "one", type: "echo" }),
      defineTool({ name: "two", type: "echo" }),
      defineTool({ name: "three", type: "echo" }),
    ];

    const filtered = filterCatalogSpecs(specs, { include: ["one", "two"], exclude: ["two"] });

    expect(filtered.map((spec) => spec.name)).to.deep.equal(["one"]);
    expect(filterCatalogSpecs(specs, { include: [] })).to.have.length(3);
  });
});
