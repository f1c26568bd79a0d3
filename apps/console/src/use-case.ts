import { errorMessage } from "@agentdeck/core";
import type { DemoContext } from "./context.js";
import { banner } from "./render.js";

export interface UseCase {
  /** Stable name used on the command line. */
  readonly id: string;
  readonly title: string;
  readonly summary: string;
  /** Reads from the prompt; skipped by `all`. */
  readonly interactive?: boolean;
  run(ctx: DemoContext): Promise<void>;
}

/**
 * Run one use case, reporting instead of throwing so the menu keeps going.
 * Returns whether it finished without an error.
 */
export async function runUseCase(ctx: DemoContext, useCase: UseCase): Promise<boolean> {
  ctx.out.line(banner(useCase.title));
  ctx.out.line(useCase.summary);
  ctx.out.line();
  try {
    await useCase.run(ctx);
    return true;
  } catch (err) {
    ctx.logger.error({ err, useCase: useCase.id }, "use case failed");
    ctx.out.line(`❌ ${useCase.title} failed: ${errorMessage(err)}`);
    return false;
  } finally {
    ctx.out.line();
  }
}

/** Run every non-interactive use case in order. */
export async function runAll(ctx: DemoContext, useCases: ReadonlyArray<UseCase>): Promise<number> {
  const batch = useCases.filter((useCase) => !useCase.interactive);
  let passed = 0;
  for (const useCase of batch) {
    if (await runUseCase(ctx, useCase)) passed++;
  }
  ctx.out.line(`Completed ${passed} of ${batch.length} use cases.`);
  return passed;
}

/** Resolve a menu choice: a 1-based number or a use-case id. */
export function resolveUseCase(
  useCases: ReadonlyArray<UseCase>,
  choice: string
): UseCase | undefined {
  const trimmed = choice.trim().toLowerCase();
  if (/^\d+$/.test(trimmed)) return useCases[Number(trimmed) - 1];
  return useCases.find((useCase) => useCase.id === trimmed);
}
