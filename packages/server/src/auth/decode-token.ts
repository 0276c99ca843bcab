/**
 * Decode and optionally verify identity tokens (JWT) issued by an external
 * auth service. With a shared secret the HS256 signature and expiry are
 * checked; without one the payload is only decoded.
 */

import { decodeJwt, jwtVerify, type JWTPayload } from "jose";

export interface DecodedToken {
  sub: string;
  /** Display name used for matchmaking. */
  username: string;
  iss?: string;
}

export interface AuthOptions {
  /** HS256 shared secret. When omitted, tokens are decoded without verification. */
  secret?: string;
  /** Expected issuer (iss claim), checked only when verifying. */
  issuer?: string;
}

function claim(payload: JWTPayload, key: string): string | undefined {
  const value = payload[key];
  return typeof value === "string" && value.trim() !== "" ? value.trim() : undefined;
}

function normalizePayload(payload: JWTPayload): DecodedToken | null {
  const sub = claim(payload, "sub");
  const username =
    claim(payload, "username") ?? claim(payload, "preferred_username") ?? sub;
  if (!sub || !username) return null;
  return { sub, username, iss: claim(payload, "iss") };
}

/**
 * Returns the token's subject and username, or null when the token is
 * malformed, fails verification, or carries no subject.
 */
export async function decodeAccessToken(
  token: string,
  options: AuthOptions = {}
): Promise<DecodedToken | null> {
  if (!token) return null;
  try {
    if (!options.secret) {
      return normalizePayload(decodeJwt(token));
    }
    const key = new TextEncoder().encode(options.secret);
    const { payload } = await jwtVerify(token, key, {
      algorithms: ["HS256"],
      issuer: options.issuer,
    });
    return normalizePayload(payload);
  } catch {
    return null;
  }
}
