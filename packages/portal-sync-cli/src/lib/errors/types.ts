/**
 * Error codes for every failure the sync engine can surface.
 * Each code belongs to exactly one {@link ErrorKind}.
 */
export type ErrorCode =
  // Transport errors (retried inside the transport, bounded)
  | "NETWORK_ERROR"
  | "NETWORK_TIMEOUT"
  | "SERVER_ERROR"
  | "TRANSPORT_EXHAUSTED"
  // Authorization errors (trigger re-authentication)
  | "AUTH_REJECTED"
  | "AUTH_SESSION_EXPIRED"
  // Authentication failure (both login strategies exhausted)
  | "AUTH_FAILED"
  // Integrity errors
  | "INTEGRITY_MISMATCH"
  // Per-item transfer errors
  | "HTTP_STATUS"
  | "TRANSFER_FAILED"
  | "TRANSFER_CANCELLED"
  // Usage errors
  | "CONFIG_INVALID"
  | "CREDENTIALS_MISSING"
  | "MANIFEST_INVALID"
  | "UNKNOWN_ERROR";

export type ErrorKind =
  | "transport"
  | "authorization"
  | "authentication"
  | "integrity"
  | "transfer"
  | "usage";

const KIND_BY_CODE: Record<ErrorCode, ErrorKind> = {
  NETWORK_ERROR: "transport",
  NETWORK_TIMEOUT: "transport",
  SERVER_ERROR: "transport",
  TRANSPORT_EXHAUSTED: "transport",
  AUTH_REJECTED: "authorization",
  AUTH_SESSION_EXPIRED: "authorization",
  AUTH_FAILED: "authentication",
  INTEGRITY_MISMATCH: "integrity",
  HTTP_STATUS: "transfer",
  TRANSFER_FAILED: "transfer",
  TRANSFER_CANCELLED: "transfer",
  CONFIG_INVALID: "usage",
  CREDENTIALS_MISSING: "usage",
  MANIFEST_INVALID: "usage",
  UNKNOWN_ERROR: "usage",
};

/**
 * Error raised anywhere in the engine, with context for rendering.
 */
export class SyncError extends Error {
  readonly code: ErrorCode;
  readonly kind: ErrorKind;
  readonly suggestion?: string;
  readonly details?: string;
  /** HTTP status that produced the error, when there was one */
  readonly status?: number;

  constructor(
    code: ErrorCode,
    message: string,
    options?: {
      suggestion?: string;
      details?: string;
      status?: number;
      cause?: unknown;
    }
  ) {
    super(message, { cause: options?.cause });
    this.name = "SyncError";
    this.code = code;
    this.kind = KIND_BY_CODE[code];
    this.suggestion = options?.suggestion;
    this.details = options?.details;
    this.status = options?.status;
  }
}

export function isSyncError(error: unknown): error is SyncError {
  return error instanceof SyncError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
