import type { z } from "zod";
import type {
  FunctionToolDefinition,
  ToolParameterSchema,
  ToolResultPayload,
} from "@agentdeck/types";

/**
 * A locally executed function tool.
 *
 * `parameters` is what the service sees; `schema` is what we enforce on
 * the arguments it sends back.
 */
export interface ToolHandler<TArgs> {
  readonly name: string;
  readonly description: string;
  readonly parameters: ToolParameterSchema;
  readonly schema: z.ZodType<TArgs, z.ZodTypeDef, unknown>;
  execute(args: TArgs): ToolResultPayload | Promise<ToolResultPayload>;
}

/** A handler with its argument type erased, as stored by the registry. */
export interface RegisteredTool {
  readonly name: string;
  readonly definition: FunctionToolDefinition;
  /** Validate then execute. May throw; the registry converts throws to payloads. */
  invoke(rawArgs: unknown): Promise<ToolResultPayload>;
}

export class ToolArgumentsError extends Error {
  constructor(readonly details: string) {
    super(details);
    this.name = "ToolArgumentsError";
  }
}

export function defineTool<TArgs>(handler: ToolHandler<TArgs>): RegisteredTool {
  return {
    name: handler.name,
    definition: {
      type: "function",
      function: {
        name: handler.name,
        description: handler.description,
        parameters: handler.parameters,
      },
    },
    async invoke(rawArgs: unknown): Promise<ToolResultPayload> {
      const parsed = handler.schema.safeParse(rawArgs);
      if (!parsed.success) {
        throw new ToolArgumentsError(
          parsed.error.issues
            .map((issue) => `${issue.path.join(".") || "(arguments)"}: ${issue.message}`)
            .join("; ")
        );
      }
      return handler.execute(parsed.data);
    },
  };
}
