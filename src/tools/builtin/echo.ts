import type { ToolSpec } from "../../catalog/toolSpec.js";
import type { ExecuteContext, ToolInstance, TypeFactory } from "../../registry/toolInstance.js";

/** Type identifier of {@link echoFactory}. */
export const ECHO_TYPE = "echo";

/**
 * Returns its `text` argument unchanged. Used for smoke tests of a deployment
 * and as the reference implementation of a tool type.
 */
class EchoTool implements ToolInstance {
  constructor(private readonly spec: ToolSpec) {}

  public async execute(args: Readonly<Record<string, unknown>>, context: ExecuteContext): Promise<unknown> {
    context.logger.debug("echo_executed", { tool: this.spec.name });
    return args.text;
  }
}

export const echoFactory: TypeFactory = (spec) => new EchoTool(spec);
