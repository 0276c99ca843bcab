/**
 * Wire protocol types for @pairtalk/client.
 * Must stay in sync with @pairtalk/server protocol (same message types and payload shapes).
 */

// ----- Client → Server message types -----

export const MSG_SEND_CHAT = "send_chat";

export const MAX_CHAT_TEXT_LENGTH = 2000;

export interface SendChatPayload {
  message: string;
}

export type ClientMessage = { type: typeof MSG_SEND_CHAT; payload: SendChatPayload };

// ----- Server → Client message types -----

export const MSG_CHAT_MESSAGE = "chat_message";
export const MSG_SYSTEM = "system";
export const MSG_ERROR = "error";

export interface ChatMessagePayload {
  roomCode: string;
  from: string;
  text: string;
  timestamp: number;
}

export type SystemEvent = "joined" | "left";

export interface SystemPayload {
  roomCode: string;
  event: SystemEvent;
  username: string;
  text: string;
  timestamp: number;
}

export interface ErrorPayload {
  code: string;
  message: string;
}

export type ServerMessage =
  | { type: typeof MSG_CHAT_MESSAGE; payload: ChatMessagePayload }
  | { type: typeof MSG_SYSTEM; payload: SystemPayload }
  | { type: typeof MSG_ERROR; payload: ErrorPayload };

// ----- WebSocket close codes -----

export const CLOSE_BAD_REQUEST = 4400;
export const CLOSE_UNAUTHORIZED = 4401;
export const CLOSE_ROOM_FULL = 4403;
export const CLOSE_ROOM_NOT_FOUND = 4404;
export const CLOSE_REPLACED = 4409;
export const CLOSE_ROOM_CLOSED = 4410;
export const CLOSE_INTERNAL = 4500;

// ----- HTTP API -----

export type StartChatResponse =
  | { status: "room_assigned"; room: string; message: string }
  | { status: "queued"; position: number; message: string };

export interface QueueStatusResponse {
  in_queue: boolean;
  position: number;
  queue_size: number;
}

export interface ApiErrorResponse {
  error: string;
  code: string;
  timestamp: number;
}
