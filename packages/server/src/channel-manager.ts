/**
 * Channels by room code: get-or-create on join, dropped once empty.
 */

import { Channel } from "./channel.js";

export interface ChannelManagerOptions {
  now?: () => number;
}

export class ChannelManager {
  private readonly options: ChannelManagerOptions;
  private readonly channels = new Map<string, Channel>();

  constructor(options: ChannelManagerOptions = {}) {
    this.options = options;
  }

  getOrCreate(roomCode: string): Channel {
    let channel = this.channels.get(roomCode);
    if (!channel) {
      channel = new Channel({ roomCode, now: this.options.now });
      this.channels.set(roomCode, channel);
    }
    return channel;
  }

  get(roomCode: string): Channel | undefined {
    return this.channels.get(roomCode);
  }

  removeIfEmpty(roomCode: string): void {
    const channel = this.channels.get(roomCode);
    if (channel && channel.connectionCount === 0) {
      this.channels.delete(roomCode);
    }
  }

  /** Closes every connection in the channel and forgets it. */
  close(roomCode: string, code: number, reason: string): void {
    const channel = this.channels.get(roomCode);
    if (!channel) return;
    this.channels.delete(roomCode);
    channel.closeAll(code, reason);
  }
}
