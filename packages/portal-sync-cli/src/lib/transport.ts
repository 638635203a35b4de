import type { Logger } from "./logger.js";
import type { TimerService, DelayFn, RandomFn } from "./ports/timer.js";
import type { HttpResponse } from "./ports/http.js";
import type { Authenticator } from "./auth/authenticator.js";
import { authorizationHeaders, type AuthContext } from "./auth/context.js";
import { realTimerService, realDelay, mathRandom } from "./adapters/real-timers.js";
import { createMutex } from "./lock.js";
import { abortableDelay } from "./abortable-delay.js";
import { toBuffer } from "./http-body.js";
import { SyncError, errorMessage, isSyncError } from "./errors/types.js";
import {
  authenticationFailed,
  fromHttpStatus,
  networkError,
  networkTimeout,
  sessionExpired,
  transferCancelled,
  transportExhausted,
} from "./errors/catalog.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface TransportOptions {
  authenticator: Authenticator;
  /** Responses whose final URL starts with this are login redirects */
  realmUrl: string;
  connectTimeoutMs: number;
  readTimeoutMs: number;
  maxAttempts: number;
  retryBaseDelayMs: number;
  retryJitterMs: number;
  logger: Logger;
  timers?: TimerService;
  delay?: DelayFn;
  random?: RandomFn;
}

export interface RequestOptions {
  headers?: Record<string, string>;
  body?: string;
  /** Non-2xx statuses handed back to the caller instead of failing */
  acceptStatuses?: readonly number[];
  signal?: AbortSignal;
}

/**
 * A response whose body is read under the idle read timeout.
 * Callers must either consume `body()`/`text()` or call `discard()`.
 */
export interface TransportResponse {
  readonly status: number;
  readonly statusText: string;
  readonly url: string;
  readonly headers: HttpResponse["headers"];
  body(): AsyncGenerator<Buffer>;
  text(): Promise<string>;
  /** Abort the underlying request and release its connection */
  discard(): void;
}

export interface AuthenticatedTransport {
  /** Authenticate for the first time; rejects with AUTH_FAILED */
  start(): Promise<void>;
  request(method: string, url: string, options?: RequestOptions): Promise<TransportResponse>;
  /** Replace the current context unless another caller just did */
  reestablish(): Promise<boolean>;
  /** Number of contexts installed so far */
  generation(): number;
  close(): void;
}

interface ContextSlot {
  readonly context: AuthContext | undefined;
  readonly generation: number;
  /** Failed logins since the context was installed */
  readonly failedLogins: number;
}

type Classification =
  | { action: "return" }
  | { action: "reauthenticate"; error: SyncError }
  | { action: "retry"; error: SyncError }
  | { action: "fail"; error: SyncError };

const REAUTH_STATUSES = new Set([401, 403, 503]);

// ---------------------------------------------------------------------------
// Implementation
// ---------------------------------------------------------------------------

/**
 * Send requests under a shared authenticated context, recovering from
 * expired sessions, flaky networks and transient server errors.
 *
 * The context is swapped by a single assignment while holding the
 * replacement lock. Concurrent callers that saw the same stale slot queue
 * on the lock; only the first one logs in again, and the rest take its
 * result whether the login worked or not.
 */
export function createAuthenticatedTransport(options: TransportOptions): AuthenticatedTransport {
  const {
    authenticator,
    realmUrl,
    connectTimeoutMs,
    readTimeoutMs,
    maxAttempts,
    retryBaseDelayMs,
    retryJitterMs,
    timers = realTimerService,
    delay = realDelay,
    random = mathRandom,
  } = options;
  const logger = options.logger.child({ component: "transport" });

  const replacementLock = createMutex();
  const sessions = new Set<AuthContext["session"]>();
  let slot: ContextSlot = { context: undefined, generation: 0, failedLogins: 0 };

  // -------------------------------------------------------------------------
  // Context replacement
  // -------------------------------------------------------------------------

  function refresh(observed: ContextSlot): Promise<boolean> {
    return replacementLock.runExclusive(async () => {
      if (slot !== observed) {
        logger.debug("Login already attempted by another request", {
          observed: observed.generation,
          current: slot.generation,
        });
        return slot.generation !== observed.generation;
      }

      const context = await authenticator.establish();
      if (!context) {
        slot = { ...slot, failedLogins: slot.failedLogins + 1 };
        logger.warn("Re-authentication failed, keeping the current context", {
          failedLogins: slot.failedLogins,
        });
        return false;
      }

      sessions.add(context.session);
      slot = { context, generation: slot.generation + 1, failedLogins: 0 };
      logger.info("Authenticated context installed", { generation: slot.generation });
      return true;
    });
  }

  // -------------------------------------------------------------------------
  // Sending
  // -------------------------------------------------------------------------

  async function send(
    context: AuthContext,
    method: string,
    url: string,
    requestOptions: RequestOptions
  ): Promise<TransportResponse> {
    const { signal } = requestOptions;
    const controller = new AbortController();
    const forwardAbort = () => controller.abort();
    signal?.addEventListener("abort", forwardAbort, { once: true });
    const release = () => signal?.removeEventListener("abort", forwardAbort);

    let connectTimedOut = false;
    const connectTimer = timers.setTimeout(() => {
      connectTimedOut = true;
      controller.abort();
    }, connectTimeoutMs);

    let response: HttpResponse;
    try {
      response = await context.session.fetch(url, {
        method,
        headers: { ...requestOptions.headers, ...authorizationHeaders(context) },
        body: requestOptions.body,
        signal: controller.signal,
      });
    } catch (error) {
      release();
      if (connectTimedOut) throw networkTimeout(url, "connect", connectTimeoutMs);
      if (signal?.aborted) throw transferCancelled();
      throw networkError(url, error);
    } finally {
      timers.clearTimeout(connectTimer);
    }

    return wrapResponse(response, url, controller, signal, release);
  }

  function wrapResponse(
    response: HttpResponse,
    url: string,
    controller: AbortController,
    signal: AbortSignal | undefined,
    release: () => void
  ): TransportResponse {
    let finished = false;

    function finish(): void {
      if (finished) return;
      finished = true;
      controller.abort();
      release();
    }

    function nextChunk(
      iterator: AsyncIterator<Uint8Array | string>
    ): Promise<IteratorResult<Uint8Array | string>> {
      return new Promise((resolve, reject) => {
        const idleTimer = timers.setTimeout(() => {
          controller.abort();
          reject(networkTimeout(url, "read", readTimeoutMs));
        }, readTimeoutMs);

        iterator.next().then(
          (result) => {
            timers.clearTimeout(idleTimer);
            resolve(result);
          },
          (error: unknown) => {
            timers.clearTimeout(idleTimer);
            reject(signal?.aborted ? transferCancelled() : networkError(url, error));
          }
        );
      });
    }

    async function* body(): AsyncGenerator<Buffer> {
      if (!response.body) {
        finish();
        return;
      }
      const iterator = response.body[Symbol.asyncIterator]();
      try {
        while (true) {
          const next = await nextChunk(iterator);
          if (next.done) return;
          yield toBuffer(next.value);
        }
      } finally {
        finish();
      }
    }

    return {
      status: response.status,
      statusText: response.statusText,
      url: response.url,
      headers: response.headers,
      body,
      async text() {
        const chunks: Buffer[] = [];
        for await (const chunk of body()) {
          chunks.push(chunk);
        }
        return Buffer.concat(chunks).toString("utf-8");
      },
      discard: finish,
    };
  }

  function classify(
    response: TransportResponse,
    url: string,
    acceptStatuses: readonly number[]
  ): Classification {
    if (response.url.startsWith(realmUrl)) {
      return { action: "reauthenticate", error: sessionExpired(url, response.url) };
    }
    const { status } = response;
    if ((status >= 200 && status < 300) || acceptStatuses.includes(status)) {
      return { action: "return" };
    }
    const error = fromHttpStatus(url, status, response.statusText);
    if (REAUTH_STATUSES.has(status)) {
      return { action: "reauthenticate", error };
    }
    if (status >= 500) {
      return { action: "retry", error };
    }
    return { action: "fail", error };
  }

  // -------------------------------------------------------------------------
  // Public API
  // -------------------------------------------------------------------------

  async function request(
    method: string,
    url: string,
    requestOptions: RequestOptions = {}
  ): Promise<TransportResponse> {
    const { signal, acceptStatuses = [] } = requestOptions;
    let lastError: unknown;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      if (signal?.aborted) throw transferCancelled();

      const observed = slot;
      let reauthenticate = true;

      if (!observed.context) {
        lastError = authenticationFailed("No authenticated context yet");
      } else {
        try {
          const response = await send(observed.context, method, url, requestOptions);
          const verdict = classify(response, url, acceptStatuses);

          if (verdict.action === "return") {
            return response;
          }
          response.discard();
          if (verdict.action === "fail") {
            throw verdict.error;
          }
          lastError = verdict.error;
          reauthenticate = verdict.action === "reauthenticate";
        } catch (error) {
          if (isSyncError(error) && (error.code === "TRANSFER_CANCELLED" || error.code === "HTTP_STATUS")) {
            throw error;
          }
          lastError = error;
        }
      }

      logger.warn("Request attempt failed", {
        method,
        url,
        attempt,
        maxAttempts,
        error: errorMessage(lastError),
      });

      if (reauthenticate) {
        await refresh(observed);
      }
      if (attempt < maxAttempts) {
        if (signal?.aborted) throw transferCancelled();
        await abortableDelay(delay, retryBaseDelayMs * attempt + random() * retryJitterMs, signal);
      }
    }

    throw transportExhausted(url, maxAttempts, lastError);
  }

  async function start(): Promise<void> {
    const ok = await refresh(slot);
    if (!ok) {
      throw authenticationFailed();
    }
  }

  function close(): void {
    for (const session of sessions) {
      session.close();
    }
    sessions.clear();
  }

  return {
    start,
    request,
    reestablish: () => refresh(slot),
    generation: () => slot.generation,
    close,
  };
}
