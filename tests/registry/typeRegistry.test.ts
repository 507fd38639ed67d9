import { describe, it } from "mocha";
import { expect } from "chai";
import sinon from "sinon";

import { ToolDependencyError, TypeRegistrationError } from "../../src/errors.js";
import type { TypeFactory } from "../../src/registry/toolInstance.js";
import { extractMissingPackage, TypeRegistry } from "../../src/registry/typeRegistry.js";
import { RecordingLogger } from "../helpers/recordingLogger.js";
import { createDeferred, instanceOf } from "../helpers/tools.js";

const factory: TypeFactory = () => instanceOf(async () => "ok");

function moduleNotFound(specifier: string): Error {
  return Object.assign(new Error(`Cannot find package '${specifier}' imported from /srv/app/tool.js`), {
    code: "ERR_MODULE_NOT_FOUND",
  });
}

describe("registry/TypeRegistry", () => {
  it("returns eager factories directly", async () => {
    const registry = new TypeRegistry();
    registry.registerEager("echo", factory);

    expect(await registry.resolve("echo")).to.equal(factory);
    expect(registry.describe("echo")).to.equal("eager");
    expect(registry.types()).to.deep.equal(["echo"]);
  });

  it("refuses to register a type twice", () => {
    const registry = new TypeRegistry();
    registry.registerEager("echo", factory);

    expect(() => registry.registerLazy("echo", async () => factory)).to.throw(TypeRegistrationError);
  });

  it("reports unknown types as dependency errors", async () => {
    const registry = new TypeRegistry();

    let caught: unknown;
    try {
      await registry.resolve("missing");
    } catch (error) {
      caught = error;
    }

    expect(caught).to.be.instanceOf(ToolDependencyError);
    if (caught instanceof ToolDependencyError) {
      expect(caught.message).to.equal('tool type "missing" has no registered factory');
      expect(caught.details).to.deep.equal({ type: "missing", reason: "unknown_type" });
    }
  });

  it("runs a lazy resolver once for concurrent callers", async () => {
    const registry = new TypeRegistry();
    const gate = createDeferred<TypeFactory>();
    const resolver = sinon.spy(() => gate.promise);
    registry.registerLazy("slow", resolver);

    const first = registry.resolve("slow");
    const second = registry.resolve("slow");
    expect(registry.describe("slow")).to.equal("lazy-resolving");

    gate.resolve(factory);
    expect(await first).to.equal(factory);
    expect(await second).to.equal(factory);
    expect(await registry.resolve("slow")).to.equal(factory);
    expect(resolver.callCount).to.equal(1);
    expect(registry.describe("slow")).to.equal("lazy-resolved");
  });

  it("remembers a failed resolution with the missing package until invalidated", async () => {
    const logger = new RecordingLogger();
    const registry = new TypeRegistry({ logger });
    const resolver = sinon.stub<[], Promise<TypeFactory>>();
    resolver.onFirstCall().rejects(moduleNotFound("@acme/geo-sdk/client"));
    resolver.onSecondCall().resolves(factory);
    registry.registerLazy("geo", resolver);

    const errors: unknown[] = [];
    for (let attempt = 0; attempt < 2; attempt += 1) {
      try {
        await registry.resolve("geo");
      } catch (error) {
        errors.push(error);
      }
    }

    expect(errors).to.have.length(2);
    expect(errors[0]).to.equal(errors[1]);
    const [failure] = errors;
    expect(failure).to.be.instanceOf(ToolDependencyError);
    if (failure instanceof ToolDependencyError) {
      expect(failure.missingPackage).to.equal("@acme/geo-sdk");
      expect(failure.toCallError().nextSteps[0]).to.equal("Install the missing package: npm install @acme/geo-sdk");
    }
    expect(registry.describe("geo")).to.equal("lazy-failed");
    expect(resolver.callCount).to.equal(1);
    expect(logger.find("tool_type_resolution_failed")?.level).to.equal("warn");

    expect(registry.invalidate("geo")).to.equal(true);
    expect(await registry.resolve("geo")).to.equal(factory);
    expect(resolver.callCount).to.equal(2);
  });

  it("does not invalidate eager or unknown types", () => {
    const registry = new TypeRegistry();
    registry.registerEager("echo", factory);

    expect(registry.invalidate("echo")).to.equal(false);
    expect(registry.invalidate("nope")).to.equal(false);
  });

  it("rejects resolvers that return something other than a function", async () => {
    const registry = new TypeRegistry();
    registry.registerLazy("odd", async () => Promise.resolve(Object.create(null)));

    let caught: unknown;
    try {
      await registry.resolve("odd");
    } catch (error) {
      caught = error;
    }

    expect(caught).to.be.instanceOf(ToolDependencyError);
    if (caught instanceof ToolDependencyError) {
      expect(caught.message).to.equal(
        'tool type "odd" could not be loaded: resolver for "odd" did not return a factory function',
      );
      expect(caught.missingPackage).to.equal(null);
    }
  });
});

describe("registry/extractMissingPackage", () => {
  it("keeps the scope of scoped packages and drops sub-paths", () => {
    expect(extractMissingPackage(moduleNotFound("@acme/geo-sdk/client"))).to.equal("@acme/geo-sdk");
    expect(extractMissingPackage(moduleNotFound("left-pad/index.js"))).to.equal("left-pad");
  });

  it("ignores relative specifiers and unrelated errors", () => {
    expect(extractMissingPackage(moduleNotFound("./local.js"))).to.equal(null);
    expect(extractMissingPackage(new Error("boom"))).to.equal(null);
    expect(extractMissingPackage("Cannot find module 'x'")).to.equal(null);
  });

  it("accepts CommonJS style messages without a code", () => {
    expect(extractMissingPackage(new Error("Cannot find module 'yaml'"))).to.equal("yaml");
  });
});
