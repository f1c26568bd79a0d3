import { createInterface, type Interface } from "node:readline/promises";
import type { DemoContext, Input } from "./context.js";
import { resolveUseCase, runAll, runUseCase, type UseCase } from "./use-case.js";

const QUIT = new Set(["q", "quit", "exit", "0"]);

export function printUseCases(ctx: Pick<DemoContext, "out">, useCases: ReadonlyArray<UseCase>): void {
  useCases.forEach((useCase, i) => {
    const tag = useCase.interactive ? " (interactive)" : "";
    ctx.out.line(`  ${String(i + 1).padStart(2)}. ${useCase.title}${tag}  [${useCase.id}]`);
  });
}

/** Interactive menu; returns when the user quits or input ends. */
export async function runMenu(ctx: DemoContext, useCases: ReadonlyArray<UseCase>): Promise<void> {
  for (;;) {
    ctx.out.line("Use cases:");
    printUseCases(ctx, useCases);
    ctx.out.line("  all. Run every non-interactive use case");
    ctx.out.line("    q. Quit");

    const answer = await ctx.input.ask("Choose a use case: ");
    const choice = answer?.trim().toLowerCase();
    if (choice === undefined || QUIT.has(choice)) {
      ctx.out.line("Goodbye!");
      return;
    }
    if (choice === "") continue;

    if (choice === "all") {
      await runAll(ctx, useCases);
      continue;
    }

    const useCase = resolveUseCase(useCases, choice);
    if (!useCase) {
      ctx.out.line(`Unknown choice '${choice}'.`);
      continue;
    }
    await runUseCase(ctx, useCase);
  }
}

/**
 * Line input over a readline interface. Lines are pulled one at a time so
 * piped input works and end of input resolves to undefined.
 */
export class ReadlineInput implements Input {
  private readonly lines: AsyncIterator<string>;

  constructor(
    private readonly rl: Interface,
    private readonly write: (text: string) => void
  ) {
    this.lines = rl[Symbol.asyncIterator]();
  }

  static fromProcess(): ReadlineInput {
    const rl = createInterface({ input: process.stdin, terminal: false });
    return new ReadlineInput(rl, (text) => process.stdout.write(text));
  }

  async ask(prompt: string): Promise<string | undefined> {
    this.write(prompt);
    const next = await this.lines.next();
    return next.done ? undefined : next.value;
  }

  close(): void {
    this.rl.close();
  }
}
