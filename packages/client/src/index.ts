/**
 * @pairtalk/client - browser client for the pairtalk matchmaking server.
 */

export { createChatClient, ChatClientError } from "./client.js";
export type {
  ChatClient,
  ChatClientConfig,
  ChatClientState,
  ChatEntry,
  ChatPhase,
  FetchLike,
} from "./client.js";

export type {
  ClientMessage,
  SendChatPayload,
  ServerMessage,
  ChatMessagePayload,
  SystemEvent,
  SystemPayload,
  ErrorPayload,
  StartChatResponse,
  QueueStatusResponse,
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
