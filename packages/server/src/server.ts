/**
 * createServer, createWebSocketServer, createWebSocketHandler.
 */

import * as http from "node:http";
import type { Duplex } from "node:stream";
import { randomUUID } from "node:crypto";
import { WebSocketServer, WebSocket, type RawData } from "ws";
import type { AuthHook } from "./auth/index.js";
import { ChannelManager } from "./channel-manager.js";
import { Connection } from "./connection.js";
import { createHttpHandler } from "./http-handler.js";
import { createSilentLogger, type Logger } from "./logger.js";
import {
  RoomFullError,
  RoomNotFoundError,
  type ChatMatchmaker,
} from "./matchmaking/index.js";
import {
  CLOSE_BAD_REQUEST,
  CLOSE_INTERNAL,
  CLOSE_ROOM_CLOSED,
  CLOSE_ROOM_FULL,
  CLOSE_ROOM_NOT_FOUND,
  CLOSE_UNAUTHORIZED,
} from "./protocol.js";

const DEFAULT_PATH = "/ws/chat";
const DEFAULT_MAX_PAYLOAD_BYTES = 8192;
const DEFAULT_PING_INTERVAL_MS = 30000;
const DEFAULT_PORT = 8080;

export interface WebSocketServerOptions {
  matchmaker: ChatMatchmaker;
  /** WebSocket upgrade path (default: "/ws/chat"). */
  path?: string;
  /** Resolves the caller's identity from the upgrade request. */
  onAuth?: AuthHook;
  /** Close with 4401 when onAuth finds no identity (default: true when onAuth is set). */
  authRequired?: boolean;
  /** Largest inbound frame in bytes (default: 8192). */
  maxPayload?: number;
  /** Heartbeat period; a socket that misses a pong is terminated (default: 30000). */
  pingIntervalMs?: number;
  logger?: Logger;
  now?: () => number;
}

export interface ServerOptions extends WebSocketServerOptions {
  /** Port for standalone server (default: 8080). */
  port?: number;
  host?: string;
  /** Allowed CORS origins for the HTTP API (default: ["*"]). */
  corsAllowedOrigins?: string[];
}

export type ChatServer = http.Server & { ws: WebSocketServer };

export type UpgradeHandler = (
  request: http.IncomingMessage,
  socket: Duplex,
  head: Buffer
) => void;

interface Relay {
  wss: WebSocketServer;
  handleUpgrade: UpgradeHandler;
}

function closeCodeFor(err: unknown): [number, string] {
  if (err instanceof RoomNotFoundError) return [CLOSE_ROOM_NOT_FOUND, "Room not found"];
  if (err instanceof RoomFullError) return [CLOSE_ROOM_FULL, "Room is full"];
  return [CLOSE_INTERNAL, "Internal error"];
}

function startHeartbeat(wss: WebSocketServer, intervalMs: number, logger: Logger): void {
  const alive = new WeakMap<WebSocket, boolean>();
  wss.on("connection", (ws: WebSocket) => {
    alive.set(ws, true);
    ws.on("pong", () => alive.set(ws, true));
  });
  const timer = setInterval(() => {
    for (const ws of wss.clients) {
      if (alive.get(ws) === false) {
        logger.warn("terminating unresponsive socket");
        ws.terminate();
        continue;
      }
      alive.set(ws, false);
      ws.ping();
    }
  }, intervalMs);
  timer.unref();
  wss.on("close", () => clearInterval(timer));
}

function createRelay(options: WebSocketServerOptions): Relay {
  const { matchmaker } = options;
  const path = options.path ?? DEFAULT_PATH;
  const authRequired = options.authRequired ?? options.onAuth !== undefined;
  const logger = (options.logger ?? createSilentLogger()).child({ component: "ws" });
  const channels = new ChannelManager({ now: options.now });
  const wss = new WebSocketServer({
    noServer: true,
    maxPayload: options.maxPayload ?? DEFAULT_MAX_PAYLOAD_BYTES,
  });

  startHeartbeat(wss, options.pingIntervalMs ?? DEFAULT_PING_INTERVAL_MS, logger);

  const unsubscribe = matchmaker.onRoomReaped((room) => {
    channels.close(room.code, CLOSE_ROOM_CLOSED, "Room closed");
  });
  wss.on("close", unsubscribe);

  async function resolveUsername(
    request: http.IncomingMessage,
    url: URL
  ): Promise<string | null | undefined> {
    const fromQuery = url.searchParams.get("username")?.trim() || undefined;
    if (!options.onAuth) return fromQuery;
    const user = await options.onAuth(request);
    if (!user) return authRequired ? null : fromQuery;
    return user.username ?? fromQuery;
  }

  async function admit(ws: WebSocket, request: http.IncomingMessage, url: URL): Promise<void> {
    // Frames that arrive before the connection is wired up are replayed to it.
    const early: Array<[RawData, boolean]> = [];
    const buffer = (data: RawData, isBinary: boolean): void => {
      early.push([data, isBinary]);
    };
    ws.on("message", buffer);
    ws.on("error", (err) => logger.warn({ err }, "websocket error"));

    let username: string | null | undefined;
    try {
      username = await resolveUsername(request, url);
    } catch (err) {
      logger.warn({ err }, "auth hook failed");
      ws.close(CLOSE_INTERNAL, "Auth error");
      return;
    }
    if (username === null) {
      logger.warn("unauthorized websocket upgrade");
      ws.close(CLOSE_UNAUTHORIZED, "Unauthorized");
      return;
    }
    const roomCode = url.searchParams.get("room")?.trim();
    if (!roomCode || !username) {
      ws.close(CLOSE_BAD_REQUEST, "Missing room or username");
      return;
    }

    try {
      await matchmaker.joinRoom(roomCode, username);
    } catch (err) {
      const [code, reason] = closeCodeFor(err);
      if (code === CLOSE_INTERNAL) logger.error({ err, room: roomCode }, "join failed");
      else logger.warn({ room: roomCode, username, reason }, "join rejected");
      ws.close(code, reason);
      return;
    }

    if (ws.readyState !== WebSocket.OPEN) {
      // Client left while the join was in flight; keep the slot if another tab holds it.
      if (!channels.get(roomCode)?.hasUser(username)) {
        await matchmaker.leaveRoom(roomCode, username);
      }
      return;
    }

    new Connection(ws, {
      connectionId: randomUUID(),
      username,
      roomCode,
      channels,
      matchmaker,
      logger,
    });
    logger.info({ room: roomCode, username }, "websocket connected");

    ws.off("message", buffer);
    for (const [data, isBinary] of early) {
      ws.emit("message", data, isBinary);
    }
  }

  const handleUpgrade: UpgradeHandler = (request, socket, head) => {
    const url = new URL(request.url ?? "/", "http://localhost");
    if (url.pathname !== path) return;

    wss.handleUpgrade(request, socket, head, (ws: WebSocket) => {
      wss.emit("connection", ws, request);
      admit(ws, request, url).catch((err: unknown) => {
        logger.error({ err }, "websocket admission failed");
        ws.close(CLOSE_INTERNAL, "Internal error");
      });
    });
  };

  return { wss, handleUpgrade };
}

/**
 * Returns the raw upgrade handler. Attach to your HTTP server with
 * server.on('upgrade', handler).
 */
export function createWebSocketHandler(options: WebSocketServerOptions): UpgradeHandler {
  return createRelay(options).handleUpgrade;
}

/**
 * Attaches WebSocket upgrade handling to an existing Node HTTP server.
 * Returns the WebSocketServer instance (e.g. for closing later).
 */
export function createWebSocketServer(
  server: http.Server,
  options: WebSocketServerOptions
): WebSocketServer {
  const { wss, handleUpgrade } = createRelay(options);
  server.on("upgrade", handleUpgrade);
  return wss;
}

/**
 * Creates an HTTP server with the matchmaking API and WebSocket relay, and
 * starts listening. Returns the server with its WebSocketServer as server.ws.
 */
export function createServer(options: ServerOptions): ChatServer {
  const port = options.port ?? DEFAULT_PORT;
  let wss: WebSocketServer | undefined;
  const handler = createHttpHandler({
    matchmaker: options.matchmaker,
    logger: options.logger ?? createSilentLogger(),
    onAuth: options.onAuth,
    authRequired: options.authRequired,
    corsAllowedOrigins: options.corsAllowedOrigins,
    activeConnections: () => wss?.clients.size ?? 0,
    now: options.now,
  });
  const server = http.createServer(handler);
  wss = createWebSocketServer(server, options);
  const chatServer = Object.assign(server, { ws: wss });
  if (options.host) chatServer.listen(port, options.host);
  else chatServer.listen(port);
  return chatServer;
}
