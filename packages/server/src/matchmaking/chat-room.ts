/**
 * A two-person chat room as tracked by the registry.
 */

export const ROOM_CAPACITY = 2;

/** Read-only copy of a room handed to callers outside the engine. */
export interface RoomSnapshot {
  code: string;
  members: string[];
  createdAt: number;
  updatedAt: number;
}

export class ChatRoom {
  readonly code: string;
  readonly createdAt: number;
  private _updatedAt: number;
  private readonly _members: string[];

  constructor(code: string, firstMember: string, now: number) {
    this.code = code;
    this.createdAt = now;
    this._updatedAt = now;
    this._members = [firstMember];
  }

  get updatedAt(): number {
    return this._updatedAt;
  }

  get memberCount(): number {
    return this._members.length;
  }

  get members(): readonly string[] {
    return this._members;
  }

  hasMember(username: string): boolean {
    return this._members.includes(username);
  }

  isFull(): boolean {
    return this._members.length >= ROOM_CAPACITY;
  }

  /** Exactly one member: the only kind of room offered to a new user. */
  isWaiting(): boolean {
    return this._members.length === 1;
  }

  isEmpty(): boolean {
    return this._members.length === 0;
  }

  /** Returns false when already a member or the room is full. */
  addMember(username: string, now: number): boolean {
    if (this.hasMember(username) || this.isFull()) return false;
    this._members.push(username);
    this._updatedAt = now;
    return true;
  }

  removeMember(username: string, now: number): boolean {
    const idx = this._members.indexOf(username);
    if (idx === -1) return false;
    this._members.splice(idx, 1);
    this._updatedAt = now;
    return true;
  }

  snapshot(): RoomSnapshot {
    return {
      code: this.code,
      members: [...this._members],
      createdAt: this.createdAt,
      updatedAt: this._updatedAt,
    };
  }
}
