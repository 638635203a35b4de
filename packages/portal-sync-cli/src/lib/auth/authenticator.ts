import { randomUUID } from "crypto";
import type { HttpRequestInit, HttpSession, HttpSessionFactory } from "../ports/http.js";
import type { Clock } from "../ports/clock.js";
import type { TimerService } from "../ports/timer.js";
import { realTimerService } from "../adapters/real-timers.js";
import type { Logger } from "../logger.js";
import type { PortalEndpoints } from "../config.js";
import { errorMessage } from "../errors/types.js";
import { networkTimeout } from "../errors/catalog.js";
import { readText } from "../http-body.js";
import { parseLoginForm, findLoginError } from "./login-form.js";
import {
  createAuthContext,
  authorizationHeaders,
  type AuthContext,
  type Credentials,
} from "./context.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface Authenticator {
  /**
   * Build a fresh authenticated context on a new session.
   * Resolves false when every strategy failed; never rejects.
   */
  establish(): Promise<AuthContext | false>;
}

export interface AuthenticatorDeps {
  endpoints: PortalEndpoints;
  credentials: Credentials;
  sessionFactory: HttpSessionFactory;
  clock: Clock;
  logger: Logger;
  /** Deadline for each login request, response body included */
  requestTimeoutMs: number;
  timers?: TimerService;
  /** Source of the authorization request's `state` value */
  generateState?: () => string;
}

type StepResult = { ok: true; bearerToken?: string } | { ok: false };

interface Page {
  status: number;
  /** Final URL after redirects */
  url: string;
  text: string;
}

const FORM_CONTENT_TYPE = "application/x-www-form-urlencoded";

// ---------------------------------------------------------------------------
// Implementation
// ---------------------------------------------------------------------------

/**
 * Log in against the portal's OpenID Connect realm.
 *
 * Strategy order:
 *  1. password grant at the token endpoint (bearer token)
 *  2. login form simulation for public clients (session cookies)
 *  3. verification GET of the protected base URL
 */
export function createAuthenticator(deps: AuthenticatorDeps): Authenticator {
  const { endpoints, credentials, sessionFactory, clock, requestTimeoutMs } = deps;
  const timers = deps.timers ?? realTimerService;
  const logger = deps.logger.child({ component: "auth" });
  const generateState = deps.generateState ?? randomUUID;

  /**
   * Fetch and read a whole page, aborting once `requestTimeoutMs` passes.
   */
  async function fetchPage(
    session: HttpSession,
    url: string,
    init: Omit<HttpRequestInit, "signal">
  ): Promise<Page> {
    const controller = new AbortController();
    let timedOut = false;
    const timer = timers.setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, requestTimeoutMs);

    try {
      const res = await session.fetch(url, { ...init, signal: controller.signal });
      const text = await readText(res.body);
      return { status: res.status, url: res.url, text };
    } catch (error) {
      if (timedOut) {
        throw networkTimeout(url, "login", requestTimeoutMs);
      }
      throw error;
    } finally {
      timers.clearTimeout(timer);
    }
  }

  async function passwordGrant(session: HttpSession): Promise<StepResult> {
    const form = new URLSearchParams({
      client_id: endpoints.clientId,
      username: credentials.username,
      password: credentials.password,
      grant_type: "password",
    });
    if (endpoints.clientSecret) {
      form.set("client_secret", endpoints.clientSecret);
    }

    try {
      const res = await fetchPage(session, endpoints.tokenUrl, {
        method: "POST",
        headers: { "Content-Type": FORM_CONTENT_TYPE },
        body: form.toString(),
      });

      if (res.status !== 200) {
        logger.warn("Password grant rejected", { status: res.status });
        return { ok: false };
      }

      const token = accessTokenOf(res.text);
      if (!token) {
        logger.warn("Token endpoint answered without an access token");
        return { ok: false };
      }

      logger.debug("Password grant succeeded");
      return { ok: true, bearerToken: token };
    } catch (error) {
      logger.warn("Password grant failed", { error: errorMessage(error) });
      return { ok: false };
    }
  }

  async function formLogin(session: HttpSession): Promise<StepResult> {
    const authUrl = new URL(endpoints.authorizationUrl);
    authUrl.searchParams.set("response_type", "code");
    authUrl.searchParams.set("client_id", endpoints.clientId);
    authUrl.searchParams.set("redirect_uri", endpoints.redirectUri);
    authUrl.searchParams.set("scope", endpoints.scope);
    authUrl.searchParams.set("state", generateState());

    try {
      const page = await fetchPage(session, authUrl.toString(), { method: "GET" });
      const form = parseLoginForm(page.text, page.url);

      if (!form) {
        logger.debug("No login form shown; session may already be signed in");
        return { ok: true };
      }

      const body = new URLSearchParams({
        ...form.hiddenFields,
        username: credentials.username,
        password: credentials.password,
        credentialId: "",
      });
      const result = await fetchPage(session, form.action, {
        method: "POST",
        headers: { "Content-Type": FORM_CONTENT_TYPE },
        body: body.toString(),
      });

      const loginError = findLoginError(result.text);
      if (loginError) {
        logger.warn("Login form rejected the credentials", { reason: loginError });
        return { ok: false };
      }

      return { ok: true };
    } catch (error) {
      logger.warn("Login form flow failed", { error: errorMessage(error) });
      return { ok: false };
    }
  }

  async function verify(context: AuthContext): Promise<boolean> {
    try {
      const res = await fetchPage(context.session, endpoints.baseUrl, {
        method: "GET",
        headers: authorizationHeaders(context),
      });

      if (res.status !== 200 || res.url.startsWith(endpoints.realmUrl)) {
        logger.warn("Portal did not accept the new session", {
          status: res.status,
          finalUrl: res.url,
        });
        return false;
      }
      return true;
    } catch (error) {
      logger.warn("Verification request failed", { error: errorMessage(error) });
      return false;
    }
  }

  async function establish(): Promise<AuthContext | false> {
    const session = sessionFactory.create();

    let step = await passwordGrant(session);
    if (!step.ok && !endpoints.clientSecret) {
      logger.info("Falling back to the login form");
      step = await formLogin(session);
    }

    if (step.ok) {
      const context = createAuthContext(session, clock.now(), step.bearerToken);
      if (await verify(context)) {
        logger.info("Authenticated", { bearer: context.bearerToken !== undefined });
        return context;
      }
    }

    session.close();
    logger.error("Authentication failed");
    return false;
  }

  return { establish };
}

function accessTokenOf(text: string): string | undefined {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return undefined;
  }
  if (typeof parsed === "object" && parsed !== null && "access_token" in parsed) {
    const token = parsed.access_token;
    return typeof token === "string" && token.length > 0 ? token : undefined;
  }
  return undefined;
}
