/**
 * A single room's live connections: one per username, system notices on
 * join and leave, and chat relay. Nothing sent through a channel is stored.
 */

import type { ServerMessage, SystemEvent } from "./protocol.js";
import { CLOSE_REPLACED, MSG_CHAT_MESSAGE, MSG_SYSTEM } from "./protocol.js";

/** Handle the channel uses to reach a connection. */
export interface ChannelMember {
  connectionId: string;
  username: string;
  send(msg: ServerMessage): void;
  close(code: number, reason: string): void;
}

export interface ChannelOptions {
  roomCode: string;
  now?: () => number;
}

export class Channel {
  readonly roomCode: string;
  private readonly now: () => number;
  private readonly members = new Map<string, ChannelMember>();

  constructor(options: ChannelOptions) {
    this.roomCode = options.roomCode;
    this.now = options.now ?? Date.now;
  }

  get connectionCount(): number {
    return this.members.size;
  }

  /**
   * Registers the connection and announces the user to the room. A previous
   * connection for the same username is closed with 4409 and returned.
   */
  join(member: ChannelMember): ChannelMember | undefined {
    const previous = this.members.get(member.username);
    this.members.set(member.username, member);
    if (previous && previous.connectionId !== member.connectionId) {
      previous.close(CLOSE_REPLACED, "Replaced");
    }
    this.announce("joined", member.username);
    return previous;
  }

  hasUser(username: string): boolean {
    return this.members.has(username);
  }

  /** True when this connection is the user's current one. */
  isCurrent(username: string, connectionId: string): boolean {
    return this.members.get(username)?.connectionId === connectionId;
  }

  /**
   * Removes the connection if it is still current and tells the room.
   * Returns false for a connection that was already replaced.
   */
  leave(username: string, connectionId: string): boolean {
    if (!this.isCurrent(username, connectionId)) return false;
    this.members.delete(username);
    this.announce("left", username);
    return true;
  }

  /** Relays chat text to everyone in the room, sender included. */
  sendChat(from: string, text: string): void {
    this.broadcast({
      type: MSG_CHAT_MESSAGE,
      payload: { roomCode: this.roomCode, from, text, timestamp: this.now() },
    });
  }

  closeAll(code: number, reason: string): void {
    const members = [...this.members.values()];
    this.members.clear();
    for (const member of members) {
      member.close(code, reason);
    }
  }

  private announce(event: SystemEvent, username: string): void {
    this.broadcast({
      type: MSG_SYSTEM,
      payload: {
        roomCode: this.roomCode,
        event,
        username,
        text: `${username} ${event} the chat`,
        timestamp: this.now(),
      },
    });
  }

  private broadcast(msg: ServerMessage): void {
    for (const member of this.members.values()) {
      member.send(msg);
    }
  }
}
