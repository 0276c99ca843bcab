/**
 * Errors surfaced by the matchmaking engine.
 */

export type MatchmakingErrorCode =
  | "ROOM_NOT_FOUND"
  | "ROOM_FULL"
  | "ROOM_CODE_EXHAUSTED";

export class MatchmakingError extends Error {
  readonly code: MatchmakingErrorCode;

  constructor(code: MatchmakingErrorCode, message: string) {
    super(message);
    this.name = "MatchmakingError";
    this.code = code;
  }
}

/** The room code does not match a live room (stale link). */
export class RoomNotFoundError extends MatchmakingError {
  readonly roomCode: string;

  constructor(roomCode: string) {
    super("ROOM_NOT_FOUND", `Room ${roomCode} not found`);
    this.name = "RoomNotFoundError";
    this.roomCode = roomCode;
  }
}

/** The room already holds two other members. */
export class RoomFullError extends MatchmakingError {
  readonly roomCode: string;

  constructor(roomCode: string) {
    super("ROOM_FULL", `Room ${roomCode} is full`);
    this.name = "RoomFullError";
    this.roomCode = roomCode;
  }
}

/**
 * No free code found within the retry budget. Only happens with a
 * misconfigured code space, so callers should treat it as fatal.
 */
export class RoomCodeExhaustedError extends MatchmakingError {
  constructor(attempts: number) {
    super(
      "ROOM_CODE_EXHAUSTED",
      `Failed to generate a unique room code after ${attempts} attempts`
    );
    this.name = "RoomCodeExhaustedError";
  }
}

export function isMatchmakingError(err: unknown): err is MatchmakingError {
  return err instanceof MatchmakingError;
}
