#!/usr/bin/env node
import { Command } from "commander";
import {
  DEFAULT_CONFIG_PATH,
  createLogger,
  errorMessage,
  loadConfig,
} from "@agentdeck/core";
import { SQLiteConversationStore } from "@agentdeck/persistence";
import { consoleOutput, createContext } from "./context.js";
import { ReadlineInput, printUseCases, runMenu } from "./menu.js";
import { resolveUseCase, runAll, runUseCase } from "./use-case.js";
import { USE_CASES } from "./use-cases/index.js";

interface CliOptions {
  config: string;
  offline: boolean;
  list: boolean;
}

const program: Command = new Command();

program
  .name("agentdeck")
  .description("Run persistent-agent use cases against the remote agent service")
  .argument("[use-case]", "use case id or number, or 'all'")
  .option("-c, --config <path>", "configuration file", DEFAULT_CONFIG_PATH)
  .option("--offline", "use the in-process mock service instead of the remote one", false)
  .option("--list", "list the use cases and exit", false)
  .action(async (choice: string | undefined, options: CliOptions) => {
    if (options.list) {
      printUseCases({ out: consoleOutput }, USE_CASES);
      return;
    }

    // ─── Configuration ──────────────────────────────────────────────────────

    const config = await loadConfig(options.config);
    const logger = createLogger({ level: config.logging.level });

    // ─── Initialize Components ──────────────────────────────────────────────

    const store = new SQLiteConversationStore(config.storage.path);
    const input = ReadlineInput.fromProcess();

    try {
      const ctx = createContext({
        config,
        logger,
        offline: options.offline,
        out: consoleOutput,
        input,
        store,
      });
      console.log(`🤖 agentdeck (${options.offline ? "offline mock service" : config.service.endpoint})`);
      console.log();

      // ─── Run ──────────────────────────────────────────────────────────────

      if (choice === undefined) {
        await runMenu(ctx, USE_CASES);
      } else if (choice.trim().toLowerCase() === "all") {
        const passed = await runAll(ctx, USE_CASES);
        if (passed < USE_CASES.filter((useCase) => !useCase.interactive).length) process.exitCode = 1;
      } else {
        const useCase = resolveUseCase(USE_CASES, choice);
        if (!useCase) program.error(`Unknown use case '${choice}'. Run with --list to see them.`);
        if (!(await runUseCase(ctx, useCase))) process.exitCode = 1;
      }
    } finally {
      input.close();
      store.close();
    }
  });

try {
  await program.parseAsync(process.argv);
} catch (err) {
  console.error(`❌ ${errorMessage(err)}`);
  process.exitCode = 1;
}
