import type { Logger } from "@agentdeck/core";
import { ToolDispatchRegistry } from "./registry.js";
import { weatherTool } from "./tools/weather.js";
import { stockTool } from "./tools/stock.js";
import { knowledgeBaseTool } from "./tools/knowledge-base.js";
import { calculatorTool } from "./tools/calculator.js";
import { databaseTool } from "./tools/database.js";

export { ToolDispatchRegistry, toolError, isToolError, serializePayload } from "./registry.js";
export type { ToolDispatchRegistryOptions } from "./registry.js";
export { defineTool, ToolArgumentsError } from "./tool.js";
export type { ToolHandler, RegisteredTool } from "./tool.js";
export { codeInterpreterTool, fileSearchTool, azureAiSearchTool } from "./builtin.js";
export { seededRandom, roundTo } from "./seeded-random.js";
export { weatherTool, readWeather, formatWeather, WeatherArgsSchema } from "./tools/weather.js";
export type { WeatherReading } from "./tools/weather.js";
export { stockTool, quoteStock, formatQuote, StockArgsSchema, REFERENCE_PRICES } from "./tools/stock.js";
export type { StockQuote } from "./tools/stock.js";
export {
  knowledgeBaseTool,
  searchKnowledgeBase,
  KnowledgeBaseArgsSchema,
  KNOWLEDGE_BASE,
} from "./tools/knowledge-base.js";
export type { KnowledgeBaseEntry, KnowledgeBaseResult } from "./tools/knowledge-base.js";
export { calculatorTool, calculate, evaluateExpression, CalculateArgsSchema } from "./tools/calculator.js";
export { databaseTool, lookupRecord, DatabaseArgsSchema } from "./tools/database.js";

/** A registry holding every simulated business tool. */
export function createDefaultRegistry(logger?: Logger): ToolDispatchRegistry {
  return new ToolDispatchRegistry({ logger }).register(
    weatherTool,
    stockTool,
    knowledgeBaseTool,
    calculatorTool,
    databaseTool
  );
}
