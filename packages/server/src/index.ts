/**
 * @pairtalk/server - anonymous 1:1 chat matchmaking for Node.js.
 * Exports the engine, the HTTP/WebSocket transport and the protocol types.
 */

// Server API
export {
  createServer,
  createWebSocketServer,
  createWebSocketHandler,
  type ChatServer,
  type ServerOptions,
  type UpgradeHandler,
  type WebSocketServerOptions,
} from "./server.js";
export {
  createHttpHandler,
  HttpError,
  type HttpHandler,
  type HttpHandlerOptions,
} from "./http-handler.js";

// Matchmaking engine
export * from "./matchmaking/index.js";

// Auth
export {
  createTokenAuth,
  decodeAccessToken,
  type AuthHook,
  type AuthOptions,
  type CreateTokenAuthOptions,
  type DecodedToken,
} from "./auth/index.js";

// Config and logging
export { loadConfig, ConfigError, type ServerConfig } from "./config.js";
export {
  createLogger,
  createSilentLogger,
  type Logger,
  type LoggerOptions,
  type LogFormat,
} from "./logger.js";

// Protocol (for client compatibility and typing)
export type {
  UserInfo,
  ClientMessage,
  SendChatPayload,
  ServerMessage,
  ChatMessagePayload,
  SystemEvent,
  SystemPayload,
  ErrorCode,
  ErrorPayload,
  StartChatResponse,
  QueueStatusResponse,
  HealthResponse,
  RoomView,
  ApiErrorResponse,
} from "./protocol.js";
export {
  MSG_SEND_CHAT,
  MSG_CHAT_MESSAGE,
  MSG_SYSTEM,
  MSG_ERROR,
  MAX_CHAT_TEXT_LENGTH,
  CLOSE_BAD_REQUEST,
  CLOSE_UNAUTHORIZED,
  CLOSE_ROOM_FULL,
  CLOSE_ROOM_NOT_FOUND,
  CLOSE_REPLACED,
  CLOSE_ROOM_CLOSED,
  CLOSE_INTERNAL,
} from "./protocol.js";
