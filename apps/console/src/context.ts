import type { AgentService, ConversationStore, ToolCall, ToolResultPayload } from "@agentdeck/types";
import { requireEndpoint, type AgentDeckConfig, type Logger } from "@agentdeck/core";
import { SQLiteConversationStore } from "@agentdeck/persistence";
import {
  MockAgentService,
  RestAgentService,
  TurnExecutor,
  realSleep,
  type Sleep,
} from "@agentdeck/runtime";
import { createDefaultRegistry, type ToolDispatchRegistry } from "@agentdeck/tools";
import { formatToolCall } from "./render.js";

export interface Output {
  line(text?: string): void;
  /** Text without a line break, for replies printed as they stream in. */
  write(text: string): void;
}

export interface Input {
  /** Resolves to undefined once input is exhausted. */
  ask(prompt: string): Promise<string | undefined>;
}

/** Everything a use case needs, built once per process. */
export interface DemoContext {
  readonly config: AgentDeckConfig;
  readonly logger: Logger;
  readonly service: AgentService;
  readonly tools: ToolDispatchRegistry;
  readonly executor: TurnExecutor;
  readonly store: ConversationStore;
  readonly out: Output;
  readonly input: Input;
  readonly sleep: Sleep;
}

export interface ContextOptions {
  config: AgentDeckConfig;
  logger: Logger;
  offline: boolean;
  out: Output;
  input: Input;
  service?: AgentService;
  store?: ConversationStore;
  sleep?: Sleep;
  now?: () => number;
}

export const consoleOutput: Output = {
  line: (text = "") => console.log(text),
  write: (text) => {
    process.stdout.write(text);
  },
};

export function createContext(opts: ContextOptions): DemoContext {
  const { config, logger, out } = opts;
  const sleep = opts.sleep ?? realSleep;
  const service = opts.service ?? createService(config, logger, opts.offline);
  const tools = createDefaultRegistry(logger);

  const executor = new TurnExecutor({
    service,
    tools,
    logger,
    pollIntervalMs: config.turn.pollIntervalMs,
    timeoutMs: config.turn.timeoutMs,
    maxToolRounds: config.turn.maxToolRounds,
    sleep,
    now: opts.now,
    observer: {
      onToolCall: (call: ToolCall, result: ToolResultPayload) => out.line(formatToolCall(call, result)),
    },
  });

  return {
    config,
    logger,
    service,
    tools,
    executor,
    store: opts.store ?? new SQLiteConversationStore(config.storage.path),
    out,
    input: opts.input,
    sleep,
  };
}

function createService(config: AgentDeckConfig, logger: Logger, offline: boolean): AgentService {
  if (offline) return new MockAgentService();
  return new RestAgentService({
    endpoint: requireEndpoint(config),
    apiVersion: config.service.apiVersion,
    accessToken: config.service.accessToken,
    logger,
  });
}
