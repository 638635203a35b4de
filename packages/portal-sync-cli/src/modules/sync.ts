import { Command } from "commander";
import chalk from "chalk";
import type { CommandDeps } from "../lib/engine.js";
import { createTransferTask } from "../lib/transfer-task.js";
import { createRoundScheduler, type RunSummary } from "../lib/scheduler.js";
import { createRoundReporter, formatSummaryTable } from "../lib/progress.js";
import { maybeOutputJson, toSyncResultJson } from "../lib/json-output.js";
import { createProcessSignalHandler } from "../lib/adapters/process-signals.js";
import { realDelay } from "../lib/adapters/real-timers.js";
import {
  addTransferOptions,
  obtainManifest,
  openEngine,
  type TransferCommandOptions,
} from "./crawl.js";

export interface SyncOptions extends TransferCommandOptions {
  rescan?: boolean;
}

/**
 * Authenticate, obtain the manifest and download it in rounds.
 * Ctrl+C stops new transfers; partial files stay for the next run.
 */
export async function runSync(
  destination: string | undefined,
  options: SyncOptions,
  deps: CommandDeps = {}
): Promise<RunSummary> {
  const { config, engine } = await openEngine(destination, options, deps);
  const { transport, logger } = engine;

  const controller = new AbortController();
  const signals = deps.signalHandler ?? createProcessSignalHandler();
  signals.onInterrupt(() => {
    logger.warn("Interrupted, stopping after in-flight chunks (press Ctrl+C again to force)");
    controller.abort();
  });

  try {
    const { items, fromCache } = await obtainManifest(config, engine, {
      rescan: options.rescan,
      signal: controller.signal,
      promptService: deps.promptService,
    });

    const reporter = createRoundReporter();
    const task = createTransferTask({ transport, logger, onProgress: reporter.onProgress });
    const scheduler = createRoundScheduler({
      task,
      concurrency: config.transfer.concurrency,
      roundCooldownMs: config.transfer.roundCooldownMs,
      maxRounds: config.transfer.maxRounds,
      logger,
      delay: deps.delay ?? realDelay,
      hooks: reporter.hooks,
    });

    const summary = await scheduler.run(items, { signal: controller.signal });
    reporter.stop();

    const json = toSyncResultJson(summary, {
      path: config.manifestPath,
      items: items.length,
      fromCache,
    });
    if (!maybeOutputJson(json)) {
      console.log(formatSummaryTable(summary));
      if (summary.cancelled) {
        console.log(chalk.yellow("Cancelled. Run again to resume the remaining files."));
      } else if (summary.remaining.length > 0) {
        console.log(chalk.red(`${summary.remaining.length} files could not be transferred.`));
      } else {
        console.log(chalk.green(`All files are in ${config.destinationDir}`));
      }
    }

    if (summary.remaining.length > 0 && !summary.cancelled) {
      process.exitCode = 1;
    }
    return summary;
  } finally {
    signals.removeAll();
    transport.close();
  }
}

export function registerSyncCommands(program: Command, deps: CommandDeps = {}): void {
  addTransferOptions(
    program
      .command("sync")
      .description("Mirror the portal's file tree into a local directory")
      .argument("[destination]", "Local directory (default from config)")
      .option("--rescan", "Crawl the portal again even if a manifest cache exists")
  ).action(async (destination: string | undefined, options: SyncOptions) => {
    await runSync(destination, options, deps);
  });
}
