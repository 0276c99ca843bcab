/**
 * Wraps one WebSocket in a room: validates inbound frames, relays chat to
 * the channel, and releases the room slot on close.
 */

import type { RawData } from "ws";
import type { Logger } from "./logger.js";
import type { ChatMatchmaker } from "./matchmaking/index.js";
import type { Channel, ChannelMember } from "./channel.js";
import type { ChannelManager } from "./channel-manager.js";
import type { ErrorCode, ServerMessage } from "./protocol.js";
import { MAX_CHAT_TEXT_LENGTH, MSG_ERROR, clientMessageSchema } from "./protocol.js";

const OPEN = 1;

/** The part of a ws WebSocket a connection relies on. */
export interface ConnectionSocket {
  readonly readyState: number;
  send(data: string): void;
  close(code?: number, reason?: string): void;
  on(event: "message", listener: (data: RawData, isBinary: boolean) => void): unknown;
  on(event: "close", listener: (code: number, reason: Buffer) => void): unknown;
}

export interface ConnectionOptions {
  connectionId: string;
  username: string;
  roomCode: string;
  channels: ChannelManager;
  matchmaker: Pick<ChatMatchmaker, "leaveRoom">;
  logger: Logger;
}

function rawToString(data: RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString("utf8");
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString("utf8");
  return data.toString("utf8");
}

export class Connection {
  readonly connectionId: string;
  readonly username: string;
  readonly roomCode: string;
  private readonly ws: ConnectionSocket;
  private readonly channels: ChannelManager;
  private readonly channel: Channel;
  private readonly matchmaker: Pick<ChatMatchmaker, "leaveRoom">;
  private readonly logger: Logger;
  private closed = false;

  constructor(ws: ConnectionSocket, options: ConnectionOptions) {
    this.ws = ws;
    this.connectionId = options.connectionId;
    this.username = options.username;
    this.roomCode = options.roomCode;
    this.channels = options.channels;
    this.matchmaker = options.matchmaker;
    this.logger = options.logger.child({
      connectionId: this.connectionId,
      room: this.roomCode,
      username: this.username,
    });

    this.ws.on("message", (data) => this.handleMessage(data));
    this.ws.on("close", (code) => this.handleClose(code));

    this.channel = this.channels.getOrCreate(this.roomCode);
    this.channel.join(this.handle());
  }

  private handle(): ChannelMember {
    return {
      connectionId: this.connectionId,
      username: this.username,
      send: (msg) => this.send(msg),
      close: (code, reason) => this.ws.close(code, reason),
    };
  }

  private send(msg: ServerMessage): void {
    if (this.ws.readyState !== OPEN) return;
    this.ws.send(JSON.stringify(msg));
  }

  private sendError(code: ErrorCode, message: string): void {
    this.send({ type: MSG_ERROR, payload: { code, message } });
  }

  private handleMessage(data: RawData): void {
    if (this.closed) return;
    let msg: unknown;
    try {
      msg = JSON.parse(rawToString(data));
    } catch {
      this.sendError("INVALID_JSON", "Invalid JSON");
      return;
    }
    const parsed = clientMessageSchema.safeParse(msg);
    if (!parsed.success) {
      this.sendError("INVALID_MESSAGE", "Unknown or invalid message type");
      return;
    }
    const text = parsed.data.payload.message.trim();
    if (text.length === 0) return;
    if (text.length > MAX_CHAT_TEXT_LENGTH) {
      this.sendError(
        "MESSAGE_TOO_LONG",
        `Message exceeds ${MAX_CHAT_TEXT_LENGTH} characters`
      );
      return;
    }
    this.channel.sendChat(this.username, text);
  }

  private handleClose(code: number): void {
    if (this.closed) return;
    this.closed = true;
    const wasCurrent = this.channel.leave(this.username, this.connectionId);
    this.channels.removeIfEmpty(this.roomCode);
    this.logger.info({ code, wasCurrent }, "connection closed");
    if (!wasCurrent) return;
    this.matchmaker.leaveRoom(this.roomCode, this.username).catch((err: unknown) => {
      this.logger.error({ err }, "failed to release room slot");
    });
  }
}
