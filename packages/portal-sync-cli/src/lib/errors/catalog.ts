import { SyncError, errorMessage, isSyncError } from "./types.js";

/**
 * Error catalog - factory functions for each failure the engine reports.
 */

// ============================================================================
// Transport Errors
// ============================================================================

export function networkError(url: string, cause: unknown): SyncError {
  return new SyncError("NETWORK_ERROR", `Connection to ${hostOf(url)} failed`, {
    details: errorMessage(cause),
    cause,
  });
}

const TIMEOUT_PHASES = {
  connect: "Connect",
  read: "Read",
  login: "Login request",
} as const;

export function networkTimeout(
  url: string,
  phase: keyof typeof TIMEOUT_PHASES,
  timeoutMs: number
): SyncError {
  return new SyncError("NETWORK_TIMEOUT", `${TIMEOUT_PHASES[phase]} timeout after ${timeoutMs}ms`, {
    details: url,
  });
}

export function serverError(url: string, status: number, statusText: string): SyncError {
  return new SyncError("SERVER_ERROR", `Server error (${status} ${statusText})`, {
    details: url,
    status,
  });
}

export function transportExhausted(url: string, attempts: number, cause: unknown): SyncError {
  return new SyncError("TRANSPORT_EXHAUSTED", `Gave up after ${attempts} attempts`, {
    details: `${url}: ${errorMessage(cause)}`,
    cause,
  });
}

// ============================================================================
// Authorization / Authentication
// ============================================================================

export function authorizationRejected(url: string, status: number): SyncError {
  return new SyncError("AUTH_REJECTED", `Portal refused the request (${status})`, {
    details: url,
    status,
  });
}

export function sessionExpired(url: string, finalUrl: string): SyncError {
  return new SyncError("AUTH_SESSION_EXPIRED", "Session expired (redirected to login)", {
    details: `${url} -> ${finalUrl}`,
  });
}

export function authenticationFailed(details?: string): SyncError {
  return new SyncError("AUTH_FAILED", "Could not log in to the portal", {
    suggestion: "Check your username and password, then try again",
    details,
  });
}

// ============================================================================
// Transfer Errors
// ============================================================================

export function integrityMismatch(path: string, expected: number, actual: number): SyncError {
  return new SyncError(
    "INTEGRITY_MISMATCH",
    `Size mismatch for ${path}: expected ${expected} bytes, have ${actual}`
  );
}

export function httpStatus(url: string, status: number, statusText: string): SyncError {
  return new SyncError("HTTP_STATUS", `Request failed (${status} ${statusText})`, {
    details: url,
    status,
  });
}

export function transferFailed(url: string, cause: unknown): SyncError {
  return new SyncError("TRANSFER_FAILED", errorMessage(cause), {
    details: url,
    cause,
  });
}

export function transferCancelled(): SyncError {
  return new SyncError("TRANSFER_CANCELLED", "Transfer cancelled");
}

// ============================================================================
// Usage Errors
// ============================================================================

export function invalidConfig(source: string, issues: string[]): SyncError {
  const details = issues.length > 1
    ? issues.map((i) => `• ${i}`).join("\n")
    : issues[0];
  return new SyncError("CONFIG_INVALID", `Configuration in ${source} has errors`, {
    suggestion: "Fix the issues below and try again",
    details,
  });
}

export function invalidSetting(name: string, reason: string): SyncError {
  return new SyncError("CONFIG_INVALID", `Invalid ${name}`, {
    suggestion: "Check the value on the command line or in your config file",
    details: reason,
  });
}

export function missingPortalSetting(name: string): SyncError {
  return new SyncError("CONFIG_INVALID", `Missing portal.${name}`, {
    suggestion: `Set portal.${name} in your config file`,
    details: "Run `portal-sync config init` to create one",
  });
}

export function credentialsMissing(): SyncError {
  return new SyncError("CREDENTIALS_MISSING", "No portal credentials supplied", {
    suggestion: "Set PORTAL_SYNC_USERNAME and PORTAL_SYNC_PASSWORD, or run interactively",
  });
}

export function manifestInvalid(path: string, details: string): SyncError {
  return new SyncError("MANIFEST_INVALID", `Manifest ${path} is not valid`, {
    suggestion: "Delete it or run with --rescan to rebuild it",
    details,
  });
}

export function unknownError(error: unknown): SyncError {
  if (isSyncError(error)) return error;
  return new SyncError("UNKNOWN_ERROR", errorMessage(error), { cause: error });
}

// ============================================================================
// HTTP Status Mapping
// ============================================================================

/**
 * Classify a non-success response the transport will not hand back.
 * 401/403/503 mean the session is unusable; other 5xx are transient.
 */
export function fromHttpStatus(url: string, status: number, statusText: string): SyncError {
  switch (status) {
    case 401:
    case 403:
    case 503:
      return authorizationRejected(url, status);
    default:
      if (status >= 500) {
        return serverError(url, status, statusText);
      }
      return httpStatus(url, status, statusText);
  }
}

function hostOf(url: string): string {
  try {
    return new URL(url).host;
  } catch {
    return url;
  }
}
