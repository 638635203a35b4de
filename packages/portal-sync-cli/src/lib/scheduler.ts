import type { Logger } from "./logger.js";
import type { DelayFn } from "./ports/timer.js";
import type { TransferTask, TransferOutcome } from "./transfer-task.js";
import { dedupeWorkItems, workItemKey, type WorkItem } from "./manifest.js";
import { realDelay } from "./adapters/real-timers.js";
import { abortableDelay } from "./abortable-delay.js";
import { invalidSetting } from "./errors/catalog.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface SchedulerHooks {
  onRoundStart?(round: number, items: readonly WorkItem[]): void;
  onOutcome?(item: WorkItem, outcome: TransferOutcome, round: number): void;
  onRoundEnd?(round: number, failed: readonly WorkItem[]): void;
}

export interface SchedulerOptions {
  task: Pick<TransferTask, "attempt">;
  /** Worker pool size per round */
  concurrency: number;
  /** Pause between rounds */
  roundCooldownMs: number;
  /** Stop after this many rounds; 0 means no limit */
  maxRounds: number;
  logger: Logger;
  delay?: DelayFn;
  hooks?: SchedulerHooks;
}

export interface RunOptions {
  signal?: AbortSignal;
}

export interface RunSummary {
  rounds: number;
  completed: number;
  skipped: number;
  /** Items without a successful outcome when the run ended */
  remaining: WorkItem[];
  /** Failed outcomes per item key, cancellations excluded */
  failureCounts: Record<string, number>;
  cancelled: boolean;
}

export interface RoundScheduler {
  run(manifest: readonly WorkItem[], options?: RunOptions): Promise<RunSummary>;
}

// ---------------------------------------------------------------------------
// Implementation
// ---------------------------------------------------------------------------

function isCancelled(outcome: TransferOutcome): boolean {
  return outcome.status === "failed" && outcome.error.code === "TRANSFER_CANCELLED";
}

/**
 * Run a manifest to completion in rounds.
 *
 * Each round hands its items to a fixed pool of workers. Items that fail
 * are collected and become the next round, after a cooldown. Outcomes of
 * sibling items never affect each other.
 */
export function createRoundScheduler(options: SchedulerOptions): RoundScheduler {
  const { task, concurrency, roundCooldownMs, maxRounds, hooks = {}, delay = realDelay } = options;
  const logger = options.logger.child({ component: "scheduler" });
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw invalidSetting("transfer.concurrency", `expected at least one worker, got ${concurrency}`);
  }

  async function run(
    manifest: readonly WorkItem[],
    runOptions: RunOptions = {}
  ): Promise<RunSummary> {
    const { signal } = runOptions;
    const { items, removed } = dedupeWorkItems(manifest);
    if (removed > 0) {
      logger.info("Dropped duplicate manifest entries", { removed });
    }

    const failureCounts: Record<string, number> = {};
    let completed = 0;
    let skipped = 0;
    let round = 0;
    let pending: WorkItem[] = items;

    async function runRound(roundItems: WorkItem[]): Promise<WorkItem[]> {
      const outcomes = new Array<TransferOutcome | undefined>(roundItems.length);
      let next = 0;

      async function worker(): Promise<void> {
        while (!signal?.aborted) {
          const index = next++;
          if (index >= roundItems.length) return;

          const item = roundItems[index];
          const outcome = await task.attempt(item, signal);
          outcomes[index] = outcome;

          if (outcome.status === "completed") completed++;
          else if (outcome.status === "skipped") skipped++;
          else if (!isCancelled(outcome)) {
            const key = workItemKey(item);
            failureCounts[key] = (failureCounts[key] ?? 0) + 1;
          }

          hooks.onOutcome?.(item, outcome, round);
        }
      }

      const workers = Math.min(concurrency, roundItems.length);
      await Promise.all(Array.from({ length: workers }, () => worker()));

      return roundItems.filter((_, index) => {
        const outcome = outcomes[index];
        return outcome === undefined || outcome.status === "failed";
      });
    }

    while (pending.length > 0 && !signal?.aborted) {
      if (maxRounds > 0 && round >= maxRounds) {
        logger.warn("Round limit reached", { maxRounds, remaining: pending.length });
        break;
      }
      if (round > 0) {
        logger.info("Cooling down before the next round", {
          ms: roundCooldownMs,
          failed: pending.length,
        });
        await abortableDelay(delay, roundCooldownMs, signal);
        if (signal?.aborted) break;
      }

      round++;
      logger.info("Round started", { round, items: pending.length });
      hooks.onRoundStart?.(round, pending);

      pending = await runRound(pending);

      logger.info("Round finished", { round, failed: pending.length });
      hooks.onRoundEnd?.(round, pending);
    }

    const cancelled = signal?.aborted === true && pending.length > 0;
    if (cancelled) {
      logger.warn("Run cancelled", { remaining: pending.length });
    }

    return { rounds: round, completed, skipped, remaining: pending, failureCounts, cancelled };
  }

  return { run };
}
