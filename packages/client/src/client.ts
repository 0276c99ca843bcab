/**
 * Browser client for @pairtalk/server.
 * Asks the HTTP API for a partner, waits in the queue if needed, then relays chat
 * over the WebSocket and notifies subscribers of every state change.
 */

import type {
  ClientMessage,
  ErrorPayload,
  QueueStatusResponse,
  ServerMessage,
  StartChatResponse,
  SystemEvent,
} from "./protocol.js";
import {
  CLOSE_BAD_REQUEST,
  CLOSE_INTERNAL,
  CLOSE_REPLACED,
  CLOSE_ROOM_CLOSED,
  CLOSE_ROOM_FULL,
  CLOSE_ROOM_NOT_FOUND,
  CLOSE_UNAUTHORIZED,
  MAX_CHAT_TEXT_LENGTH,
  MSG_CHAT_MESSAGE,
  MSG_ERROR,
  MSG_SEND_CHAT,
  MSG_SYSTEM,
} from "./protocol.js";

export type ChatPhase = "idle" | "starting" | "queued" | "connecting" | "chatting" | "closed";

export type ChatEntry =
  | { kind: "chat"; roomCode: string; from: string; text: string; timestamp: number }
  | {
      kind: "system";
      roomCode: string;
      event: SystemEvent;
      username: string;
      text: string;
      timestamp: number;
    };

export interface ChatClientState {
  phase: ChatPhase;
  roomCode: string | null;
  /** 1-based queue position while queued. */
  queuePosition: number | null;
  queueSize: number | null;
  /** Chat and system messages in arrival order. */
  messages: ChatEntry[];
  lastError: ErrorPayload | null;
}

/** The part of fetch the client relies on. */
export type FetchLike = (
  url: string,
  init: { method: string; headers: Record<string, string> }
) => Promise<Pick<Response, "ok" | "status" | "json">>;

export interface ChatClientConfig {
  /** HTTP API origin (e.g. https://chat.example.com). */
  baseUrl: string;
  /** WebSocket endpoint. Default: baseUrl with ws(s): scheme and path /ws/chat. */
  wsUrl?: string;
  username: string;
  /** Token sent as a Bearer header to the API and as access_token to the WebSocket. */
  getAuthToken?: () => string | null | Promise<string | null>;
  /** Queue status poll period in ms (default 3000). */
  queuePollIntervalMs?: number;
  /** fetch implementation (default: global fetch). */
  fetch?: FetchLike;
}

export interface ChatClient {
  /** Requests a partner; resolves once the client is queued, connecting or failed. */
  startChat(): Promise<void>;
  /** Sends trimmed text; returns false when nothing was sent. */
  sendMessage(text: string): boolean;
  /** Closes the socket and stops polling. */
  leave(): void;
  getState(): ChatClientState;
  subscribe(listener: (state: ChatClientState) => void): () => void;
}

export class ChatClientError extends Error {
  readonly code: string;

  constructor(code: string, message: string) {
    super(message);
    this.name = "ChatClientError";
    this.code = code;
  }
}

const DEFAULT_QUEUE_POLL_INTERVAL_MS = 3000;
const DEFAULT_WS_PATH = "/ws/chat";

const CLOSE_CODE_NAMES: Record<number, string> = {
  [CLOSE_BAD_REQUEST]: "BAD_REQUEST",
  [CLOSE_UNAUTHORIZED]: "UNAUTHORIZED",
  [CLOSE_ROOM_FULL]: "ROOM_FULL",
  [CLOSE_ROOM_NOT_FOUND]: "ROOM_NOT_FOUND",
  [CLOSE_REPLACED]: "REPLACED",
  [CLOSE_ROOM_CLOSED]: "ROOM_CLOSED",
  [CLOSE_INTERNAL]: "SERVER_ERROR",
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

function readServerMessage(raw: unknown): ServerMessage | null {
  if (!isRecord(raw) || !isRecord(raw.payload)) return null;
  const p = raw.payload;
  switch (raw.type) {
    case MSG_CHAT_MESSAGE:
      if (
        typeof p.roomCode === "string" &&
        typeof p.from === "string" &&
        typeof p.text === "string" &&
        typeof p.timestamp === "number"
      ) {
        return {
          type: MSG_CHAT_MESSAGE,
          payload: { roomCode: p.roomCode, from: p.from, text: p.text, timestamp: p.timestamp },
        };
      }
      return null;
    case MSG_SYSTEM:
      if (
        typeof p.roomCode === "string" &&
        (p.event === "joined" || p.event === "left") &&
        typeof p.username === "string" &&
        typeof p.text === "string" &&
        typeof p.timestamp === "number"
      ) {
        return {
          type: MSG_SYSTEM,
          payload: {
            roomCode: p.roomCode,
            event: p.event,
            username: p.username,
            text: p.text,
            timestamp: p.timestamp,
          },
        };
      }
      return null;
    case MSG_ERROR:
      if (typeof p.code === "string" && typeof p.message === "string") {
        return { type: MSG_ERROR, payload: { code: p.code, message: p.message } };
      }
      return null;
    default:
      return null;
  }
}

function readStartChat(body: unknown): StartChatResponse {
  if (isRecord(body) && typeof body.message === "string") {
    if (body.status === "room_assigned" && typeof body.room === "string") {
      return { status: "room_assigned", room: body.room, message: body.message };
    }
    if (body.status === "queued" && typeof body.position === "number") {
      return { status: "queued", position: body.position, message: body.message };
    }
  }
  throw new ChatClientError("INVALID_RESPONSE", "Unexpected start chat response");
}

function readQueueStatus(body: unknown): QueueStatusResponse {
  if (
    isRecord(body) &&
    typeof body.in_queue === "boolean" &&
    typeof body.position === "number" &&
    typeof body.queue_size === "number"
  ) {
    return { in_queue: body.in_queue, position: body.position, queue_size: body.queue_size };
  }
  throw new ChatClientError("INVALID_RESPONSE", "Unexpected queue status response");
}

function defaultWsUrl(baseUrl: string): string {
  const url = new URL(DEFAULT_WS_PATH, baseUrl);
  url.protocol = url.protocol === "https:" ? "wss:" : "ws:";
  return url.toString();
}

function toErrorPayload(err: unknown): ErrorPayload {
  if (err instanceof ChatClientError) return { code: err.code, message: err.message };
  return {
    code: "NETWORK_ERROR",
    message: err instanceof Error ? err.message : String(err),
  };
}

export function createChatClient(config: ChatClientConfig): ChatClient {
  const {
    baseUrl,
    username,
    getAuthToken,
    queuePollIntervalMs = DEFAULT_QUEUE_POLL_INTERVAL_MS,
  } = config;
  const wsUrl = config.wsUrl ?? defaultWsUrl(baseUrl);
  const fetchImpl: FetchLike = config.fetch ?? fetch;

  let ws: WebSocket | null = null;
  let pollTimeoutId: ReturnType<typeof setTimeout> | null = null;
  // Bumped by startChat and leave; async work from an older session is dropped.
  let session = 0;

  const state: ChatClientState = {
    phase: "idle",
    roomCode: null,
    queuePosition: null,
    queueSize: null,
    messages: [],
    lastError: null,
  };

  const listeners = new Set<(s: ChatClientState) => void>();

  function snapshot(): ChatClientState {
    return {
      phase: state.phase,
      roomCode: state.roomCode,
      queuePosition: state.queuePosition,
      queueSize: state.queueSize,
      messages: [...state.messages],
      lastError: state.lastError ? { ...state.lastError } : null,
    };
  }

  function emit() {
    const s = snapshot();
    listeners.forEach((cb) => cb(s));
  }

  function fail(err: unknown) {
    state.lastError = toErrorPayload(err);
    state.phase = "closed";
    state.queuePosition = null;
    state.queueSize = null;
    emit();
  }

  function clearPoll() {
    if (pollTimeoutId !== null) {
      clearTimeout(pollTimeoutId);
      pollTimeoutId = null;
    }
  }

  async function resolveToken(): Promise<string | null> {
    if (!getAuthToken) return null;
    try {
      return await getAuthToken();
    } catch (e) {
      throw new ChatClientError("AUTH_ERROR", e instanceof Error ? e.message : String(e));
    }
  }

  async function request(method: "GET" | "POST", path: string): Promise<unknown> {
    const url = new URL(path, baseUrl);
    url.searchParams.set("username", username);
    const headers: Record<string, string> = { Accept: "application/json" };
    const token = await resolveToken();
    if (token) headers.Authorization = `Bearer ${token}`;

    const res = await fetchImpl(url.toString(), { method, headers });
    const body: unknown = await res.json().catch(() => null);
    if (!res.ok) {
      if (isRecord(body) && typeof body.code === "string" && typeof body.error === "string") {
        throw new ChatClientError(body.code, body.error);
      }
      throw new ChatClientError(`HTTP_${res.status}`, `Request failed with status ${res.status}`);
    }
    return body;
  }

  function handleMessage(data: string) {
    let raw: unknown;
    try {
      raw = JSON.parse(data);
    } catch {
      state.lastError = { code: "INVALID_JSON", message: "Invalid JSON from server" };
      emit();
      return;
    }
    const msg = readServerMessage(raw);
    if (!msg) {
      state.lastError = { code: "UNKNOWN_MESSAGE", message: "Unknown message type" };
      emit();
      return;
    }
    switch (msg.type) {
      case MSG_CHAT_MESSAGE:
        state.messages = [...state.messages, { kind: "chat", ...msg.payload }];
        break;
      case MSG_SYSTEM:
        state.messages = [...state.messages, { kind: "system", ...msg.payload }];
        break;
      case MSG_ERROR:
        state.lastError = msg.payload;
        break;
    }
    emit();
  }

  async function connect(roomCode: string, mySession: number) {
    state.phase = "connecting";
    state.roomCode = roomCode;
    state.queuePosition = null;
    state.queueSize = null;
    emit();

    const url = new URL(wsUrl);
    url.searchParams.set("room", roomCode);
    url.searchParams.set("username", username);
    const token = await resolveToken();
    if (token) url.searchParams.set("access_token", token);
    if (mySession !== session) return;

    const socket = new WebSocket(url.toString());
    ws = socket;

    socket.onopen = () => {
      if (ws !== socket) return;
      state.phase = "chatting";
      emit();
    };

    socket.onmessage = (event: MessageEvent) => {
      if (ws !== socket) return;
      handleMessage(typeof event.data === "string" ? event.data : String(event.data));
    };

    socket.onclose = (event: CloseEvent) => {
      if (ws !== socket) return;
      ws = null;
      state.phase = "closed";
      if (event.code >= 4000) {
        state.lastError = {
          code: CLOSE_CODE_NAMES[event.code] ?? "CONNECTION_CLOSED",
          message: event.reason || `Connection closed (${event.code})`,
        };
      }
      emit();
    };

    socket.onerror = () => {
      if (ws !== socket) return;
      state.lastError = { code: "WEBSOCKET_ERROR", message: "WebSocket error" };
      emit();
    };
  }

  function schedulePoll(mySession: number) {
    clearPoll();
    pollTimeoutId = setTimeout(() => {
      pollTimeoutId = null;
      pollQueue(mySession).catch((err: unknown) => {
        if (mySession === session) fail(err);
      });
    }, queuePollIntervalMs);
  }

  async function applyStart(result: StartChatResponse, mySession: number) {
    if (result.status === "room_assigned") {
      await connect(result.room, mySession);
      return;
    }
    state.phase = "queued";
    state.queuePosition = result.position;
    emit();
    schedulePoll(mySession);
  }

  async function pollQueue(mySession: number) {
    const status = readQueueStatus(await request("GET", "/api/chat/queue-status"));
    if (mySession !== session) return;
    if (status.in_queue) {
      state.queuePosition = status.position;
      state.queueSize = status.queue_size;
      emit();
      schedulePoll(mySession);
      return;
    }
    // Promoted (or expired): asking again returns the assigned room or re-queues.
    const result = readStartChat(await request("POST", "/api/chat/start"));
    if (mySession !== session) return;
    await applyStart(result, mySession);
  }

  async function startChat() {
    if (state.phase !== "idle" && state.phase !== "closed") return;
    const mySession = ++session;
    state.phase = "starting";
    state.roomCode = null;
    state.messages = [];
    state.lastError = null;
    emit();
    try {
      const result = readStartChat(await request("POST", "/api/chat/start"));
      if (mySession !== session) return;
      await applyStart(result, mySession);
    } catch (err) {
      if (mySession === session) fail(err);
    }
  }

  function send(msg: ClientMessage): boolean {
    if (!ws || ws.readyState !== WebSocket.OPEN) return false;
    ws.send(JSON.stringify(msg));
    return true;
  }

  function sendMessage(text: string): boolean {
    const message = text.trim();
    if (!message) return false;
    if (message.length > MAX_CHAT_TEXT_LENGTH) {
      state.lastError = {
        code: "MESSAGE_TOO_LONG",
        message: `Message exceeds ${MAX_CHAT_TEXT_LENGTH} characters`,
      };
      emit();
      return false;
    }
    return send({ type: MSG_SEND_CHAT, payload: { message } });
  }

  function leave() {
    session++;
    clearPoll();
    const socket = ws;
    ws = null;
    if (socket) socket.close(1000, "Leaving");
    state.phase = "closed";
    state.roomCode = null;
    state.queuePosition = null;
    state.queueSize = null;
    emit();
  }

  function subscribe(listener: (state: ChatClientState) => void): () => void {
    listeners.add(listener);
    return () => listeners.delete(listener);
  }

  return {
    startChat,
    sendMessage,
    leave,
    getState: snapshot,
    subscribe,
  };
}
