/**
 * The slice of a fetch Response the engine reads.
 * node-fetch responses satisfy it; tests build plain objects.
 */
export interface HttpResponse {
  readonly status: number;
  readonly statusText: string;
  /** Final URL after redirects */
  readonly url: string;
  readonly headers: { get(name: string): string | null };
  readonly body: AsyncIterable<Uint8Array | string> | null;
}

export interface HttpRequestInit {
  method: string;
  headers?: Record<string, string>;
  body?: string;
  signal?: AbortSignal;
}

/**
 * One cookie jar bound to one connection pool.
 * Redirects are always followed and cookies stored at every hop.
 */
export interface HttpSession {
  fetch(url: string, init: HttpRequestInit): Promise<HttpResponse>;
  /** Release pooled connections */
  close(): void;
}

export interface HttpSessionFactory {
  create(): HttpSession;
}
