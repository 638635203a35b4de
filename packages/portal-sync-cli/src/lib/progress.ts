/**
 * Progress output that respects quiet/JSON mode.
 */

import ora, { type Ora } from "ora";
import chalk from "chalk";
import CliTable3 from "cli-table3";
import { isQuietMode, isJsonMode } from "./cli-context.js";
import type { SchedulerHooks, RunSummary } from "./scheduler.js";
import { workItemKey, type WorkItem } from "./manifest.js";

export interface Spinner {
  start(text?: string): Spinner;
  stop(): Spinner;
  succeed(text?: string): Spinner;
  fail(text?: string): Spinner;
  warn(text?: string): Spinner;
  text: string;
  isSpinning: boolean;
}

/**
 * No-op spinner for quiet/JSON mode.
 */
class SilentSpinner implements Spinner {
  text = "";
  isSpinning = false;

  start(_text?: string): Spinner {
    return this;
  }

  stop(): Spinner {
    return this;
  }

  succeed(_text?: string): Spinner {
    return this;
  }

  fail(_text?: string): Spinner {
    return this;
  }

  warn(_text?: string): Spinner {
    return this;
  }
}

/**
 * Wrapper around ora.
 */
class OraSpinner implements Spinner {
  private ora: Ora;

  constructor(text?: string) {
    this.ora = ora(text);
  }

  get text(): string {
    return this.ora.text;
  }

  set text(value: string) {
    this.ora.text = value;
  }

  get isSpinning(): boolean {
    return this.ora.isSpinning;
  }

  start(text?: string): Spinner {
    this.ora.start(text);
    return this;
  }

  stop(): Spinner {
    this.ora.stop();
    return this;
  }

  succeed(text?: string): Spinner {
    this.ora.succeed(text);
    return this;
  }

  fail(text?: string): Spinner {
    this.ora.fail(text);
    return this;
  }

  warn(text?: string): Spinner {
    this.ora.warn(text);
    return this;
  }
}

/**
 * Create a spinner that respects quiet/JSON mode.
 */
export function createSpinner(text?: string): Spinner {
  if (isQuietMode() || isJsonMode()) {
    return new SilentSpinner();
  }
  return new OraSpinner(text);
}

// ---------------------------------------------------------------------------
// Round progress
// ---------------------------------------------------------------------------

export function formatBytes(bytes: number): string {
  const units = ["B", "KiB", "MiB", "GiB", "TiB"];
  let value = bytes;
  let unit = 0;
  while (value >= 1024 && unit < units.length - 1) {
    value /= 1024;
    unit++;
  }
  return unit === 0 ? `${value} ${units[0]}` : `${value.toFixed(1)} ${units[unit]}`;
}

export interface RoundReporter {
  hooks: SchedulerHooks;
  /** Pass to the transfer task to count bytes */
  onProgress(item: WorkItem, bytes: number): void;
  stop(): void;
}

/**
 * One spinner line per round: finished items, failures and bytes so far.
 */
export function createRoundReporter(spinner: Spinner = createSpinner()): RoundReporter {
  let round = 0;
  let total = 0;
  let done = 0;
  let failed = 0;
  let bytes = 0;

  function render(): void {
    spinner.text = `Round ${round}: ${done}/${total} done, ${failed} failed, ${formatBytes(bytes)}`;
  }

  return {
    hooks: {
      onRoundStart(roundNumber, items) {
        round = roundNumber;
        total = items.length;
        done = 0;
        failed = 0;
        render();
        spinner.start();
      },
      onOutcome(_item, outcome) {
        if (outcome.status === "failed") failed++;
        else done++;
        render();
      },
      onRoundEnd(roundNumber, failedItems) {
        const text = `Round ${roundNumber}: ${total - failedItems.length}/${total} done`;
        if (failedItems.length === 0) {
          spinner.succeed(text);
        } else {
          spinner.warn(`${text}, ${failedItems.length} to retry`);
        }
      },
    },
    onProgress(_item, chunkBytes) {
      bytes += chunkBytes;
      if (spinner.isSpinning) render();
    },
    stop() {
      if (spinner.isSpinning) spinner.stop();
    },
  };
}

/**
 * Render the end-of-run summary as a table.
 */
export function formatSummaryTable(summary: RunSummary): string {
  const table = new CliTable3({
    head: [chalk.cyan("Rounds"), chalk.cyan("Completed"), chalk.cyan("Skipped"), chalk.cyan("Remaining")],
  });
  table.push([summary.rounds, summary.completed, summary.skipped, summary.remaining.length]);

  const lines = [table.toString()];
  if (summary.remaining.length > 0) {
    const remaining = new CliTable3({
      head: [chalk.cyan("Not transferred"), chalk.cyan("Failures")],
    });
    for (const item of summary.remaining) {
      remaining.push([item.destinationPath, summary.failureCounts[workItemKey(item)] ?? 0]);
    }
    lines.push(remaining.toString());
  }
  return lines.join("\n");
}
