import type { FunctionToolDefinition, ToolErrorPayload, ToolResultPayload } from "@agentdeck/types";
import { createSilentLogger, errorMessage, type Logger } from "@agentdeck/core";
import { ToolArgumentsError, type RegisteredTool } from "./tool.js";

export interface ToolDispatchRegistryOptions {
  logger?: Logger;
}

/**
 * Maps tool-call names to local handlers.
 *
 * `dispatch` is total: unknown names, unparseable or invalid arguments and
 * handler failures all come back as a `ToolErrorPayload`, so a paused run can
 * always be resumed with an output.
 */
export class ToolDispatchRegistry {
  private readonly tools = new Map<string, RegisteredTool>();
  private readonly logger: Logger;

  constructor(options: ToolDispatchRegistryOptions = {}) {
    this.logger = (options.logger ?? createSilentLogger()).child({ component: "tools" });
  }

  register(...tools: RegisteredTool[]): this {
    for (const tool of tools) {
      if (this.tools.has(tool.name)) {
        throw new Error(`Tool "${tool.name}" is already registered`);
      }
      this.tools.set(tool.name, tool);
    }
    return this;
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  names(): string[] {
    return [...this.tools.keys()];
  }

  /** Declarations for agent creation, optionally restricted to `names`. */
  definitions(names?: ReadonlyArray<string>): FunctionToolDefinition[] {
    const selected = names ?? this.names();
    return selected.map((name) => {
      const tool = this.tools.get(name);
      if (!tool) throw new Error(`Tool "${name}" is not registered`);
      return tool.definition;
    });
  }

  async dispatch(name: string, argumentsJson: string): Promise<ToolResultPayload> {
    const tool = this.tools.get(name);
    if (!tool) {
      this.logger.warn({ tool: name }, "unknown tool requested");
      return toolError(`Unknown function: ${name}`);
    }

    const args = parseArguments(argumentsJson);
    if (!args.ok) {
      this.logger.warn({ tool: name, details: args.details }, "tool arguments are not a JSON object");
      return toolError("Invalid argument format", args.details);
    }

    try {
      const result = await tool.invoke(args.value);
      this.logger.debug({ tool: name }, "tool executed");
      return result;
    } catch (err) {
      if (err instanceof ToolArgumentsError) {
        this.logger.warn({ tool: name, details: err.details }, "tool arguments rejected");
        return toolError("Invalid arguments", err.details);
      }
      this.logger.error({ tool: name, err }, "tool execution failed");
      return toolError("Tool execution failed", errorMessage(err));
    }
  }
}

export function toolError(error: string, details?: string): ToolErrorPayload {
  return details === undefined ? { error } : { error, details };
}

export function isToolError(payload: ToolResultPayload): payload is ToolErrorPayload {
  return typeof payload.error === "string";
}

/**
 * Serialize a payload for submission. Never throws: a payload that cannot be
 * serialized is replaced by an error payload.
 */
export function serializePayload(payload: ToolResultPayload): string {
  try {
    return JSON.stringify(payload);
  } catch (err) {
    return JSON.stringify(toolError("Tool result is not serializable", errorMessage(err)));
  }
}

type ParsedArguments =
  | { ok: true; value: Record<string, unknown> }
  | { ok: false; details: string };

function parseArguments(argumentsJson: string): ParsedArguments {
  // Parameterless functions arrive with an empty document.
  if (argumentsJson.trim() === "") return { ok: true, value: {} };

  let value: unknown;
  try {
    value = JSON.parse(argumentsJson);
  } catch (err) {
    return { ok: false, details: errorMessage(err) };
  }
  if (!isRecord(value)) {
    return { ok: false, details: "Arguments must be a JSON object" };
  }
  return { ok: true, value };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
