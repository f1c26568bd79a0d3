/**
 * JSON-Schema-like parameter declaration. Handed to the service at agent
 * creation time and not interpreted locally.
 */
export interface ToolParameterSchema {
  readonly type: "object";
  readonly properties: Readonly<Record<string, ToolParameterProperty>>;
  readonly required?: ReadonlyArray<string>;
}

export interface ToolParameterProperty {
  readonly type: "string" | "number" | "integer" | "boolean";
  readonly description?: string;
  readonly enum?: ReadonlyArray<string>;
}

export interface FunctionToolDefinition {
  readonly type: "function";
  readonly function: {
    readonly name: string;
    readonly description: string;
    readonly parameters: ToolParameterSchema;
  };
}

/** Tools declared on an agent. Built-in tools run inside the service. */
export type ToolDefinition =
  | FunctionToolDefinition
  | { readonly type: "code_interpreter" }
  | { readonly type: "file_search" }
  | { readonly type: "azure_ai_search" };

/** Success payloads are handler-specific; failures share this shape. */
export type ToolErrorPayload = {
  readonly error: string;
  readonly details?: string;
};

export type ToolResultPayload = Readonly<Record<string, unknown>>;
