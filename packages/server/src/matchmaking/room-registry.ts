/**
 * Registry of live rooms (code -> room), bounded by maxRooms.
 * Not synchronized on its own; the matchmaker guards it with a lock.
 */

import { ChatRoom } from "./chat-room.js";
import { RoomCodeExhaustedError } from "./errors.js";
import { createRoomCodeGenerator, type RoomCodeGenerator } from "./room-code.js";

const DEFAULT_MAX_CODE_ATTEMPTS = 32;

export interface RoomRegistryOptions {
  maxRooms: number;
  now: () => number;
  generateCode?: RoomCodeGenerator;
  /** Collisions tolerated before giving up (default 32). */
  maxCodeAttempts?: number;
}

export class RoomRegistry {
  private readonly rooms = new Map<string, ChatRoom>();
  private readonly maxRooms: number;
  private readonly now: () => number;
  private readonly generateCode: RoomCodeGenerator;
  private readonly maxCodeAttempts: number;

  constructor(options: RoomRegistryOptions) {
    this.maxRooms = options.maxRooms;
    this.now = options.now;
    this.generateCode = options.generateCode ?? createRoomCodeGenerator();
    this.maxCodeAttempts = options.maxCodeAttempts ?? DEFAULT_MAX_CODE_ATTEMPTS;
  }

  get size(): number {
    return this.rooms.size;
  }

  hasCapacity(): boolean {
    return this.rooms.size < this.maxRooms;
  }

  get(code: string): ChatRoom | undefined {
    return this.rooms.get(code);
  }

  values(): IterableIterator<ChatRoom> {
    return this.rooms.values();
  }

  /** Creates a one-member room, or returns undefined when at capacity. */
  createRoom(initialUser: string): ChatRoom | undefined {
    if (!this.hasCapacity()) return undefined;
    const code = this.uniqueCode();
    const room = new ChatRoom(code, initialUser, this.now());
    this.rooms.set(code, room);
    return room;
  }

  /** Any room with exactly one member. Iteration order is not part of the contract. */
  findWaitingRoom(): ChatRoom | undefined {
    for (const room of this.rooms.values()) {
      if (room.isWaiting()) return room;
    }
    return undefined;
  }

  findRoomContaining(username: string): ChatRoom | undefined {
    for (const room of this.rooms.values()) {
      if (room.hasMember(username)) return room;
    }
    return undefined;
  }

  addMember(room: ChatRoom, username: string): boolean {
    return room.addMember(username, this.now());
  }

  /**
   * Removes the member; a room left empty is deleted in the same step.
   * Returns true when the room was deleted.
   */
  removeMember(room: ChatRoom, username: string): boolean {
    room.removeMember(username, this.now());
    if (room.isEmpty()) {
      this.rooms.delete(room.code);
      return true;
    }
    return false;
  }

  delete(code: string): boolean {
    return this.rooms.delete(code);
  }

  /** One-member rooms whose last membership change is at least maxIdleMs old. */
  findLonelyRooms(maxIdleMs: number): ChatRoom[] {
    const now = this.now();
    const lonely: ChatRoom[] = [];
    for (const room of this.rooms.values()) {
      if (room.isWaiting() && now - room.updatedAt >= maxIdleMs) {
        lonely.push(room);
      }
    }
    return lonely;
  }

  private uniqueCode(): string {
    for (let attempt = 0; attempt < this.maxCodeAttempts; attempt++) {
      const code = this.generateCode();
      if (!this.rooms.has(code)) return code;
    }
    throw new RoomCodeExhaustedError(this.maxCodeAttempts);
  }
}
