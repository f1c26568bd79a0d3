import { createSilentLogger, parseConfig, type AgentDeckConfig } from "@agentdeck/core";
import { SQLiteConversationStore } from "@agentdeck/persistence";
import { MockAgentService } from "@agentdeck/runtime";
import { createContext, type DemoContext, type Input, type Output } from "./context.js";

/**
 * Output that records every line. Multi-line writes stay one entry; partial
 * writes are kept in `writes` and joined into the line that ends them.
 */
export class CapturedOutput implements Output {
  readonly lines: string[] = [];
  readonly writes: string[] = [];
  private pending = "";

  line(text = ""): void {
    this.lines.push(this.pending + text);
    this.pending = "";
  }

  write(text: string): void {
    this.writes.push(text);
    this.pending += text;
  }
}

/** Input that answers from a fixed script, then reports end of input. */
export class ScriptedInput implements Input {
  readonly prompts: string[] = [];
  private readonly answers: string[];

  constructor(answers: ReadonlyArray<string> = []) {
    this.answers = [...answers];
  }

  feed(...answers: string[]): this {
    this.answers.push(...answers);
    return this;
  }

  async ask(prompt: string): Promise<string | undefined> {
    this.prompts.push(prompt);
    return this.answers.shift();
  }
}

export interface Harness {
  ctx: DemoContext;
  service: MockAgentService;
  store: SQLiteConversationStore;
  out: CapturedOutput;
  input: ScriptedInput;
  slept: number[];
}

/**
 * A context wired to the mock service, an in-memory store and a fake clock.
 * Retry delays still run on real timers, so they are kept short.
 */
export function createHarness(overrides: Record<string, unknown> = {}): Harness {
  let t = 0;
  const slept: number[] = [];
  const config: AgentDeckConfig = parseConfig({ storage: { path: ":memory:" }, retry: { baseDelayMs: 5 }, ...overrides });
  const service = new MockAgentService();
  const store = new SQLiteConversationStore(":memory:");
  const out = new CapturedOutput();
  const input = new ScriptedInput();

  const ctx = createContext({
    config,
    logger: createSilentLogger(),
    offline: true,
    out,
    input,
    service,
    store,
    now: () => t,
    sleep: async (ms) => {
      slept.push(ms);
      t += ms;
    },
  });
  return { ctx, service, store, out, input, slept };
}
