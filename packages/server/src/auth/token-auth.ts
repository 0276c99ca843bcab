/**
 * onAuth hook for HTTP requests and WebSocket upgrades: reads the token from
 * the query string or an Authorization header and decodes it.
 */

import type { IncomingMessage } from "node:http";
import type { UserInfo } from "../protocol.js";
import { decodeAccessToken } from "./decode-token.js";
import type { AuthOptions } from "./decode-token.js";

const BEARER = /^Bearer\s+/i;

function defaultTokenFromRequest(req: IncomingMessage): string | null {
  const url = new URL(req.url ?? "/", "http://localhost");
  const fromQuery =
    url.searchParams.get("token") ?? url.searchParams.get("access_token");
  if (fromQuery) return fromQuery;
  const auth = req.headers.authorization;
  if (typeof auth === "string" && BEARER.test(auth)) {
    return auth.replace(BEARER, "").trim() || null;
  }
  return null;
}

export interface CreateTokenAuthOptions {
  /** Custom token extraction. Default: `token` / `access_token` query, then Bearer header. */
  tokenFromRequest?: (req: IncomingMessage) => string | null;
}

export type AuthHook = (request: IncomingMessage) => Promise<UserInfo | null>;

/** Resolves to null when the request carries no usable token. */
export function createTokenAuth(
  authOptions: AuthOptions = {},
  options: CreateTokenAuthOptions = {}
): AuthHook {
  const tokenFromRequest = options.tokenFromRequest ?? defaultTokenFromRequest;

  return async (request: IncomingMessage): Promise<UserInfo | null> => {
    const token = tokenFromRequest(request);
    if (!token) return null;
    const decoded = await decodeAccessToken(token, authOptions);
    if (!decoded) return null;
    return { userId: decoded.sub, username: decoded.username };
  };
}
