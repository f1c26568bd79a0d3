import type { UseCase } from "../use-case.js";
import { basicConversation } from "./basic-conversation.js";
import { codeInterpreter } from "./code-interpreter.js";
import { functionCalling } from "./function-calling.js";
import { knowledgeBase } from "./knowledge-base.js";
import { multiTool } from "./multi-tool.js";
import { azureSearchRag } from "./azure-search-rag.js";
import { multiAgent } from "./multi-agent.js";
import { fileSearch } from "./file-search.js";
import { streaming } from "./streaming.js";
import { imageVision } from "./image-vision.js";
import { conversationMemory } from "./conversation-memory.js";
import { guardrails } from "./guardrails.js";
import { eventDriven } from "./event-driven.js";
import { structuredOutput } from "./structured-output.js";
import { errorHandling } from "./error-handling.js";

/** Menu order. Numbers shown in the menu are 1-based positions here. */
export const USE_CASES: ReadonlyArray<UseCase> = [
  basicConversation,
  codeInterpreter,
  functionCalling,
  knowledgeBase,
  multiTool,
  azureSearchRag,
  multiAgent,
  fileSearch,
  streaming,
  imageVision,
  conversationMemory,
  guardrails,
  eventDriven,
  structuredOutput,
  errorHandling,
];
