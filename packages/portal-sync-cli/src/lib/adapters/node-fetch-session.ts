import fetch from "node-fetch";
import makeFetchCookie from "fetch-cookie";
import { CookieJar } from "tough-cookie";
import { Agent as HttpAgent } from "http";
import { Agent as HttpsAgent } from "https";
import type { HttpSession, HttpSessionFactory } from "../ports/http.js";

export interface NodeFetchSessionOptions {
  userAgent?: string;
  /** Upper bound on pooled sockets per host */
  maxSockets?: number;
}

const DEFAULT_USER_AGENT = "portal-sync";

/**
 * Sessions backed by node-fetch, with a tough-cookie jar wired in through
 * fetch-cookie and a dedicated keep-alive agent pair per session.
 */
export function createNodeFetchSessionFactory(
  options: NodeFetchSessionOptions = {}
): HttpSessionFactory {
  const userAgent = options.userAgent ?? DEFAULT_USER_AGENT;

  return {
    create(): HttpSession {
      const jar = new CookieJar();
      const fetchWithCookies = makeFetchCookie(fetch, jar);
      const httpAgent = new HttpAgent({ keepAlive: true, maxSockets: options.maxSockets });
      const httpsAgent = new HttpsAgent({ keepAlive: true, maxSockets: options.maxSockets });

      return {
        async fetch(url, init) {
          return fetchWithCookies(url, {
            method: init.method,
            headers: { "User-Agent": userAgent, ...init.headers },
            body: init.body,
            redirect: "follow",
            // Bytes on disk must match Content-Length and Range offsets
            compress: false,
            signal: init.signal,
            agent: (parsed: URL) => (parsed.protocol === "http:" ? httpAgent : httpsAgent),
          });
        },
        close() {
          httpAgent.destroy();
          httpsAgent.destroy();
        },
      };
    },
  };
}
