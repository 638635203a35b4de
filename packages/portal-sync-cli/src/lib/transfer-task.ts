import { mkdir, open, rm, stat } from "fs/promises";
import { dirname } from "path";
import type { Logger } from "./logger.js";
import type { AuthenticatedTransport, TransportResponse } from "./transport.js";
import type { WorkItem } from "./manifest.js";
import { SyncError, errorMessage } from "./errors/types.js";
import {
  httpStatus,
  integrityMismatch,
  transferCancelled,
  unknownError,
} from "./errors/catalog.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type TransferOutcome =
  | { status: "completed"; bytesWritten: number; totalBytes: number }
  | { status: "skipped"; reason: "already-complete" }
  | { status: "failed"; reason: string; error: SyncError };

export type SuccessfulOutcome = Exclude<TransferOutcome, { status: "failed" }>;

export interface TransferTaskOptions {
  transport: Pick<AuthenticatedTransport, "request">;
  logger: Logger;
  /** Called after every chunk written */
  onProgress?: (item: WorkItem, bytes: number) => void;
}

export interface TransferTask {
  /** Download one item, resuming a partial file; rejects with a SyncError */
  fetch(item: WorkItem, signal?: AbortSignal): Promise<SuccessfulOutcome>;
  /** Same as fetch, with every error turned into a failed outcome */
  attempt(item: WorkItem, signal?: AbortSignal): Promise<TransferOutcome>;
}

const RANGE_NOT_SATISFIABLE = 416;
const PARTIAL_CONTENT = 206;

// ---------------------------------------------------------------------------
// Header helpers
// ---------------------------------------------------------------------------

function parseLength(value: string | null): number | undefined {
  if (value === null || !/^\d+$/.test(value.trim())) return undefined;
  return Number.parseInt(value, 10);
}

/** Total from `Content-Range: bytes 100-199/1000` */
function contentRangeTotal(value: string | null): number | undefined {
  const match = value?.match(/\/(\d+)\s*$/);
  return match ? Number.parseInt(match[1], 10) : undefined;
}

async function localSize(path: string): Promise<number | undefined> {
  try {
    return (await stat(path)).size;
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return undefined;
    }
    throw error;
  }
}

// ---------------------------------------------------------------------------
// Implementation
// ---------------------------------------------------------------------------

/**
 * Resumable downloads with size verification.
 *
 * An existing destination file is treated as a prefix of the remote
 * object and continued with a Range request. The local file is discarded
 * and fetched again (once per call) when the server proves it wrong.
 */
export function createTransferTask(options: TransferTaskOptions): TransferTask {
  const { transport, onProgress } = options;
  const logger = options.logger.child({ component: "transfer" });

  async function remoteSize(url: string, signal?: AbortSignal): Promise<number | undefined> {
    const response = await transport.request("HEAD", url, { signal });
    response.discard();
    return parseLength(response.headers.get("content-length"));
  }

  async function writeBody(
    item: WorkItem,
    response: TransportResponse,
    append: boolean,
    signal?: AbortSignal
  ): Promise<number> {
    const handle = await open(item.destinationPath, append ? "a" : "w");
    let written = 0;
    try {
      for await (const chunk of response.body()) {
        if (signal?.aborted) throw transferCancelled();
        await handle.write(chunk);
        written += chunk.length;
        onProgress?.(item, chunk.length);
      }
    } finally {
      await handle.close();
    }
    return written;
  }

  async function fetch(item: WorkItem, signal?: AbortSignal): Promise<SuccessfulOutcome> {
    const { sourceLocator: url, destinationPath: path } = item;
    await mkdir(dirname(path), { recursive: true });

    let restarted = false;

    while (true) {
      const existing = await localSize(path);
      const offset = existing ?? 0;
      const headers: Record<string, string> =
        existing === undefined ? {} : { Range: `bytes=${existing}-` };

      const response = await transport.request("GET", url, {
        headers,
        acceptStatuses: [RANGE_NOT_SATISFIABLE],
        signal,
      });

      if (response.status === RANGE_NOT_SATISFIABLE) {
        response.discard();
        const total = await remoteSize(url, signal);

        if (total === undefined) {
          throw httpStatus(url, response.status, response.statusText);
        }
        if (offset === total) {
          logger.debug("Already complete", { path, bytes: total });
          return { status: "skipped", reason: "already-complete" };
        }
        if (restarted) {
          throw integrityMismatch(path, total, offset);
        }

        logger.warn(
          offset > total
            ? "Local file is larger than the remote object, downloading again"
            : "Server rejected the resume offset, downloading again",
          { path, localBytes: offset, remoteBytes: total }
        );
        await rm(path, { force: true });
        restarted = true;
        continue;
      }

      const contentLength = parseLength(response.headers.get("content-length"));
      let total: number | undefined;
      let append: boolean;

      if (response.status === PARTIAL_CONTENT) {
        total = contentLength !== undefined
          ? contentLength + offset
          : contentRangeTotal(response.headers.get("content-range"));
        append = true;
      } else {
        if (offset > 0) {
          logger.warn("Server ignored the range request, discarding local bytes", {
            path,
            localBytes: offset,
          });
        }
        total = contentLength;
        append = false;
      }

      const startAt = append ? offset : 0;
      if (total !== undefined && total > 0 && startAt >= total) {
        response.discard();
        return { status: "skipped", reason: "already-complete" };
      }

      const bytesWritten = await writeBody(item, response, append, signal);
      const onDisk = (await localSize(path)) ?? 0;

      if (total !== undefined && onDisk !== total) {
        if (onDisk > total) {
          await rm(path, { force: true });
        }
        throw integrityMismatch(path, total, onDisk);
      }

      logger.debug("Transfer complete", { path, bytesWritten, totalBytes: onDisk });
      return { status: "completed", bytesWritten, totalBytes: onDisk };
    }
  }

  async function attempt(item: WorkItem, signal?: AbortSignal): Promise<TransferOutcome> {
    try {
      return await fetch(item, signal);
    } catch (error) {
      const syncError = unknownError(error);
      if (syncError.code !== "TRANSFER_CANCELLED") {
        logger.warn("Transfer failed", {
          url: item.sourceLocator,
          code: syncError.code,
          error: errorMessage(syncError),
        });
      }
      return { status: "failed", reason: syncError.message, error: syncError };
    }
  }

  return { fetch, attempt };
}
