import type { ToolDefinition } from "@agentdeck/types";

/** Built-in tools run inside the service and never reach the dispatcher. */
export const codeInterpreterTool: ToolDefinition = { type: "code_interpreter" };
export const fileSearchTool: ToolDefinition = { type: "file_search" };
export const azureAiSearchTool: ToolDefinition = { type: "azure_ai_search" };
