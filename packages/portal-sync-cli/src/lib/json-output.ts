/**
 * JSON output utilities for machine-readable CLI output.
 */

import { isJsonMode } from "./cli-context.js";
import type { RunSummary } from "./scheduler.js";
import { workItemKey } from "./manifest.js";

// ============================================================================
// Base Types
// ============================================================================

export interface JsonSuccess<T> {
  success: true;
  data: T;
  meta?: {
    duration?: number;
    version?: string;
  };
}

// ============================================================================
// Command-Specific Schemas
// ============================================================================

export interface SyncResultJson {
  manifest: {
    path: string;
    items: number;
    fromCache: boolean;
  };
  summary: {
    rounds: number;
    completed: number;
    skipped: number;
    cancelled: boolean;
  };
  remaining: Array<{
    sourceLocator: string;
    destinationPath: string;
    failures: number;
  }>;
}

export interface CrawlResultJson {
  manifestPath: string;
  items: number;
  duplicatesRemoved: number;
}

export interface AuthVerifyJson {
  authenticated: boolean;
  method?: "bearer" | "session";
  portal: string;
}

// ============================================================================
// Output Functions
// ============================================================================

/**
 * Output a successful JSON result to stdout.
 */
export function outputSuccess<T>(data: T, meta?: JsonSuccess<T>["meta"]): void {
  const result: JsonSuccess<T> = {
    success: true,
    data,
    ...(meta && { meta }),
  };
  console.log(JSON.stringify(result, null, 2));
}

/**
 * Conditionally output JSON or return false for human output.
 */
export function maybeOutputJson<T>(data: T, meta?: JsonSuccess<T>["meta"]): boolean {
  if (isJsonMode()) {
    outputSuccess(data, meta);
    return true;
  }
  return false;
}

export function toSyncResultJson(
  summary: RunSummary,
  manifest: SyncResultJson["manifest"]
): SyncResultJson {
  return {
    manifest,
    summary: {
      rounds: summary.rounds,
      completed: summary.completed,
      skipped: summary.skipped,
      cancelled: summary.cancelled,
    },
    remaining: summary.remaining.map((item) => ({
      sourceLocator: item.sourceLocator,
      destinationPath: item.destinationPath,
      failures: summary.failureCounts[workItemKey(item)] ?? 0,
    })),
  };
}
