import type { HttpSession } from "../ports/http.js";

/**
 * Everything a request needs to be accepted by the portal.
 * Never mutated; the transport replaces it wholesale.
 */
export interface AuthContext {
  readonly session: HttpSession;
  /** Present when the password grant succeeded */
  readonly bearerToken?: string;
  /** Epoch milliseconds */
  readonly establishedAt: number;
}

export interface Credentials {
  readonly username: string;
  readonly password: string;
}

export function createAuthContext(
  session: HttpSession,
  establishedAt: number,
  bearerToken?: string
): AuthContext {
  return Object.freeze({ session, bearerToken, establishedAt });
}

/**
 * Headers that carry the context's identity beyond the cookie jar.
 */
export function authorizationHeaders(context: AuthContext): Record<string, string> {
  return context.bearerToken ? { Authorization: `Bearer ${context.bearerToken}` } : {};
}
