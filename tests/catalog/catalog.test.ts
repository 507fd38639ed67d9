import { describe, it } from "mocha";
import { expect } from "chai";

import { Catalog, compileNamePattern, tokenise } from "../../src/catalog/catalog.js";
import { defineTool } from "../../src/catalog/toolSpec.js";
import { DuplicateToolNameError } from "../../src/errors.js";

const weather = defineTool({
  name: "weather_lookup",
  type: "http_json",
  description: "Current weather for a city",
  category: "weather",
});
const citySearch = defineTool({
  name: "city_search",
  type: "http_json",
  description: "Find a city by name",
  category: "geo",
});
const echo = defineTool({ name: "echo", type: "echo", description: "Echo text back", category: "debug" });

describe("catalog/Catalog", () => {
  it("loads specs and reports added and updated entries", () => {
    const catalog = new Catalog();

    expect(catalog.load([weather, echo])).to.deep.equal({ added: 2, updated: 0, total: 2 });
    expect(catalog.load([{ ...echo, description: "Echo v2" }])).to.deep.equal({ added: 0, updated: 1, total: 2 });
    expect(catalog.lookup("echo")?.description).to.equal("Echo v2");
  });

  it("treats reloading the same batch as idempotent", () => {
    const catalog = new Catalog();
    catalog.load([weather, citySearch, echo]);
    catalog.load([weather, citySearch, echo]);

    expect(catalog.names()).to.deep.equal(["city_search", "echo", "weather_lookup"]);
    expect(catalog.size).to.equal(3);
  });

  it("rejects a name redefined with another type and leaves the catalog untouched", () => {
    const catalog = new Catalog();
    catalog.load([echo]);

    const extra = defineTool({ name: "extra", type: "echo" });
    const conflicting = defineTool({ name: "echo", type: "http_json" });

    expect(() => catalog.load([extra, conflicting])).to.throw(DuplicateToolNameError, /already defined with type "echo"/);
    expect(catalog.names()).to.deep.equal(["echo"]);
    expect(catalog.lookup("echo")?.type).to.equal("echo");
  });

  it("rejects type collisions inside a single batch even in replace mode", () => {
    const catalog = new Catalog();
    catalog.load([weather]);

    let caught: unknown;
    try {
      catalog.load([defineTool({ name: "x", type: "a" }), defineTool({ name: "x", type: "b" })], "replace");
    } catch (error) {
      caught = error;
    }

    expect(caught).to.be.instanceOf(DuplicateToolNameError);
    if (caught instanceof DuplicateToolNameError) {
      expect(caught.code).to.equal("E-CATALOG-DUPLICATE");
      expect(caught.details).to.deep.equal({ name: "x", existingType: "a", incomingType: "b" });
    }
    expect(catalog.names()).to.deep.equal(["weather_lookup"]);
  });

  it("replaces the whole catalog in replace mode", () => {
    const catalog = new Catalog();
    catalog.load([weather, echo]);

    const summary = catalog.load([defineTool({ name: "echo", type: "other" })], "replace");

    expect(summary).to.deep.equal({ added: 1, updated: 0, total: 1 });
    expect(catalog.lookup("echo")?.type).to.equal("other");
    expect(catalog.has("weather_lookup")).to.equal(false);
  });

  it("freezes stored specs", () => {
    const catalog = new Catalog();
    catalog.load([echo]);

    const stored = catalog.lookup("echo");
    expect(Object.isFrozen(stored)).to.equal(true);
    expect(Object.isFrozen(stored?.settings)).to.equal(true);
  });

  it("filters by type, category and name pattern", () => {
    const catalog = new Catalog();
    catalog.load([weather, citySearch, echo]);

    expect(catalog.list({ type: "http_json" }).map((spec) => spec.name)).to.deep.equal([
      "city_search",
      "weather_lookup",
    ]);
    expect(catalog.list({ category: "geo" }).map((spec) => spec.name)).to.deep.equal(["city_search"]);
    expect(catalog.list({ namePattern: "*_LOOKUP" }).map((spec) => spec.name)).to.deep.equal(["weather_lookup"]);
    expect(catalog.list({ namePattern: /^c/, type: "http_json" }).map((spec) => spec.name)).to.deep.equal([
      "city_search",
    ]);
    expect(catalog.list({ type: "echo", category: "geo" })).to.deep.equal([]);
  });

  it("lists distinct types and categories", () => {
    const catalog = new Catalog();
    catalog.load([weather, citySearch, echo, defineTool({ name: "bare", type: "echo" })]);

    expect(catalog.types()).to.deep.equal(["echo", "http_json"]);
    expect(catalog.categories()).to.deep.equal(["debug", "geo", "weather"]);
  });

  it("ranks keyword matches on the name above matches in the description", () => {
    const catalog = new Catalog();
    catalog.load([weather, citySearch, echo]);

    const hits = catalog.find("city weather");

    expect(hits.map((hit) => [hit.spec.name, hit.score])).to.deep.equal([
      ["weather_lookup", 3],
      ["city_search", 2],
    ]);
    expect(catalog.find("city weather", 1).map((hit) => hit.spec.name)).to.deep.equal(["weather_lookup"]);
    expect(catalog.find("   ")).to.deep.equal([]);
  });
});

describe("catalog/helpers", () => {
  it("splits snake, kebab and camel case into tokens", () => {
    expect(tokenise("getUserProfile-v2")).to.deep.equal(["get", "user", "profile", "v2"]);
    expect(tokenise("weather_lookup")).to.deep.equal(["weather", "lookup"]);
  });

  it("compiles globs into anchored case-insensitive patterns", () => {
    const pattern = compileNamePattern("get_?.v*");

    expect(pattern.test("GET_a.v2")).to.equal(true);
    expect(pattern.test("get_ab.v2")).to.equal(false);
    expect(pattern.test("get_aXv2")).to.equal(false);
  });
});
