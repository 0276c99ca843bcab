/**
 * Room code generation: 8 characters from the RFC 4648 base32 alphabet.
 */

import { customAlphabet } from "nanoid";

export const ROOM_CODE_ALPHABET = "ABCDEFGHIJKLMNOPQRSTUVWXYZ234567";
export const ROOM_CODE_LENGTH = 8;
export const ROOM_CODE_PATTERN = /^[A-Z2-7]{8}$/;

/** Produces a candidate code. Uniqueness is checked by the registry. */
export type RoomCodeGenerator = () => string;

export function createRoomCodeGenerator(
  alphabet: string = ROOM_CODE_ALPHABET,
  length: number = ROOM_CODE_LENGTH
): RoomCodeGenerator {
  return customAlphabet(alphabet, length);
}
