/**
 * In-memory matchmaking engine: rooms, wait queue, background sweeps.
 */

export {
  ChatMatchmaker,
  STATUS_QUEUED,
  STATUS_ROOM_ASSIGNED,
  type ChatMatchmakerOptions,
  type RoomReapedListener,
  type StartChatResult,
} from "./matchmaker.js";
export { ROOM_CAPACITY, type RoomSnapshot } from "./chat-room.js";
export {
  ROOM_CODE_ALPHABET,
  ROOM_CODE_LENGTH,
  ROOM_CODE_PATTERN,
  createRoomCodeGenerator,
  type RoomCodeGenerator,
} from "./room-code.js";
export {
  MatchmakingError,
  RoomCodeExhaustedError,
  RoomFullError,
  RoomNotFoundError,
  isMatchmakingError,
  type MatchmakingErrorCode,
} from "./errors.js";
export { ReadWriteLock, type Release } from "./rw-lock.js";
