import type { AgentId, Timestamp, VectorStoreId } from "./foundational.js";
import type { ToolDefinition } from "./tool.js";

/** Resources the service attaches to built-in tools. */
export interface ToolResources {
  readonly fileSearch?: { readonly vectorStoreIds: ReadonlyArray<VectorStoreId> };
  readonly azureAiSearch?: {
    readonly connectionId: string;
    readonly indexName: string;
    readonly topK?: number;
    readonly queryType?: "simple" | "semantic" | "vector";
  };
}

/** Strict JSON-schema response format for structured output. */
export interface JsonSchemaResponseFormat {
  readonly type: "json_schema";
  readonly jsonSchema: {
    readonly name: string;
    readonly strict?: boolean;
    readonly schema: Readonly<Record<string, unknown>>;
  };
}

/**
 * Everything needed to create an agent configuration on the service:
 * model, persona instructions and declared tools.
 */
export interface AgentDefinition {
  readonly model: string;
  readonly name: string;
  readonly instructions: string;
  readonly tools?: ReadonlyArray<ToolDefinition>;
  readonly toolResources?: ToolResources;
  readonly responseFormat?: JsonSchemaResponseFormat;
}

/** An agent configuration as held by the service. */
export interface AgentConfig extends AgentDefinition {
  readonly id: AgentId;
  readonly createdAt: Timestamp;
}
