/**
 * Identity token handling for the HTTP API and WebSocket upgrades.
 */

export {
  decodeAccessToken,
  type DecodedToken,
  type AuthOptions,
} from "./decode-token.js";
export {
  createTokenAuth,
  type AuthHook,
  type CreateTokenAuthOptions,
} from "./token-auth.js";
