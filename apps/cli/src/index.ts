/**
 * Shortbox Console
 *
 * Interactive, line-oriented front end over an in-process link store.
 * Logs go to the logger at `warn` unless LOG_LEVEL says otherwise, so they
 * do not drown the prompt.
 */

import { createInterface } from "node:readline";
import { createLogger, resolveLogLevel } from "@shortbox/logger";
import { createLinkStore, loadStoreConfig, validateStoreConfig } from "@shortbox/store";
import { CommandShell, createConsoleEcho } from "./commands.js";
import { formatDuration, formatSweepSummary } from "./format.js";
import { createSystemViewer } from "./viewer.js";

const logger = createLogger("cli", { level: resolveLogLevel(process.env.LOG_LEVEL, "warn") });

async function main(): Promise<void> {
  const config = loadStoreConfig();
  validateStoreConfig(config, logger);

  const print = (line: string): void => {
    process.stdout.write(`${line}\n`);
  };

  const store = createLinkStore({
    config,
    logger,
    echo: createConsoleEcho(print),
    onSweep: (evicted) => print(formatSweepSummary(evicted)),
  });
  const shell = new CommandShell(store, { viewer: createSystemViewer(), output: print });

  const rl = createInterface({ input: process.stdin, output: process.stdout, prompt: "> " });

  process.stdout.write("Shortbox console. Type 'help' for the list of commands.\n");
  process.stdout.write(
    `Link TTL: ${formatDuration(config.linkTtlSeconds)} (override with LINK_TTL_SECONDS)\n`
  );

  try {
    rl.prompt();
    for await (const line of rl) {
      const outcome = await shell.execute(line);
      if (outcome === "exit") break;
      rl.prompt();
    }
  } finally {
    rl.close();
    store.shutdown();
  }
}

main().catch((err: unknown) => {
  logger.fatal({ err }, "Console crashed");
  process.exitCode = 1;
});
