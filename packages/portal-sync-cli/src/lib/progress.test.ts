import { describe, it, expect, afterEach } from "vitest";
import {
  createRoundReporter,
  createSpinner,
  formatBytes,
  formatSummaryTable,
  type Spinner,
} from "./progress.js";
import { initContext, resetContext } from "./cli-context.js";
import { workItemKey } from "./manifest.js";
import { transferCancelled } from "./errors/catalog.js";

class RecordingSpinner implements Spinner {
  text = "";
  isSpinning = false;
  readonly events: string[] = [];

  start(): Spinner {
    this.isSpinning = true;
    this.events.push(`start ${this.text}`);
    return this;
  }

  stop(): Spinner {
    this.isSpinning = false;
    this.events.push("stop");
    return this;
  }

  succeed(text?: string): Spinner {
    this.isSpinning = false;
    this.events.push(`succeed ${text}`);
    return this;
  }

  fail(text?: string): Spinner {
    this.isSpinning = false;
    this.events.push(`fail ${text}`);
    return this;
  }

  warn(text?: string): Spinner {
    this.isSpinning = false;
    this.events.push(`warn ${text}`);
    return this;
  }
}

const plain = (text: string) => text.replace(/\u001b\[[0-9;]*m/g, "");

const A = { sourceLocator: "https://data.example.org/files/a.tif", destinationPath: "out/a.tif" };
const B = { sourceLocator: "https://data.example.org/files/b.tif", destinationPath: "out/b.tif" };

describe("formatBytes", () => {
  it.each([
    [0, "0 B"],
    [1023, "1023 B"],
    [1536, "1.5 KiB"],
    [5 * 1024 * 1024, "5.0 MiB"],
  ])("formats %i as %s", (bytes, expected) => {
    expect(formatBytes(bytes)).toBe(expected);
  });
});

describe("createSpinner", () => {
  afterEach(() => {
    resetContext();
  });

  it("is silent in JSON mode", () => {
    initContext(["node", "portal-sync", "--json"], {});

    const spinner = createSpinner("working").start();

    expect(spinner.isSpinning).toBe(false);
  });
});

describe("createRoundReporter", () => {
  it("tracks outcomes and bytes within a round", () => {
    const spinner = new RecordingSpinner();
    const reporter = createRoundReporter(spinner);
    const cancelled = transferCancelled();

    reporter.hooks.onRoundStart?.(1, [A, B]);
    reporter.onProgress(A, 2048);
    reporter.hooks.onOutcome?.(A, { status: "completed", bytesWritten: 2048, totalBytes: 2048 }, 1);
    reporter.hooks.onOutcome?.(B, { status: "failed", reason: cancelled.message, error: cancelled }, 1);

    expect(spinner.text).toBe("Round 1: 1/2 done, 1 failed, 2.0 KiB");

    reporter.hooks.onRoundEnd?.(1, [B]);

    expect(spinner.events).toEqual([
      "start Round 1: 0/2 done, 0 failed, 0 B",
      "warn Round 1: 1/2 done, 1 to retry",
    ]);
  });

  it("marks a clean round as succeeded", () => {
    const spinner = new RecordingSpinner();
    const reporter = createRoundReporter(spinner);

    reporter.hooks.onRoundStart?.(2, [B]);
    reporter.hooks.onOutcome?.(B, { status: "skipped", reason: "already-complete" }, 2);
    reporter.hooks.onRoundEnd?.(2, []);
    reporter.stop();

    expect(spinner.events).toEqual([
      "start Round 2: 0/1 done, 0 failed, 0 B",
      "succeed Round 2: 1/1 done",
    ]);
  });
});

describe("formatSummaryTable", () => {
  it("lists remaining items with their failure counts", () => {
    const output = plain(formatSummaryTable({
      rounds: 3,
      completed: 1,
      skipped: 0,
      remaining: [B],
      failureCounts: { [workItemKey(B)]: 3 },
      cancelled: false,
    }));

    expect(output).toMatch(/│ 3\s+│ 1\s+│ 0\s+│ 1\s+│/);
    expect(output).toMatch(/│ out\/b\.tif\s+│ 3\s+│/);
  });

  it("omits the remaining table when everything transferred", () => {
    const output = formatSummaryTable({
      rounds: 1,
      completed: 2,
      skipped: 0,
      remaining: [],
      failureCounts: {},
      cancelled: false,
    });

    expect(output).not.toContain("Not transferred");
  });
});
