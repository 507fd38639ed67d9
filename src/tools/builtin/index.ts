import type { TypeRegistry } from "../../registry/typeRegistry.js";
import { ECHO_TYPE, echoFactory } from "./echo.js";

export { ECHO_TYPE, echoFactory } from "./echo.js";

/** Type identifier of the lazily loaded HTTP tool type. */
export const HTTP_JSON_TYPE = "http_json";

export interface BuiltinTypeOptions {
  /** `fetch` used by `http_json` tools. Tests inject a stub. */
  readonly fetchImpl?: typeof fetch;
}

/**
 * Registers the tool types shipped with the engine. `http_json` is lazy so
 * catalogs that never use it do not load its module.
 */
export function registerBuiltinTypes(types: TypeRegistry, options: BuiltinTypeOptions = {}): void {
  types.registerEager(ECHO_TYPE, echoFactory);
  types.registerLazy(HTTP_JSON_TYPE, async () => {
    const { createHttpJsonFactory } = await import("./http.js");
    return createHttpJsonFactory(options.fetchImpl ?? fetch);
  });
}
