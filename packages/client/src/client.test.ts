import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { createChatClient, type ChatClientConfig, type FetchLike } from "./client.js";
import { MSG_CHAT_MESSAGE, MSG_SEND_CHAT, MSG_SYSTEM } from "./protocol.js";

class FakeWebSocket {
  static readonly CONNECTING = 0;
  static readonly OPEN = 1;
  static readonly CLOSING = 2;
  static readonly CLOSED = 3;
  static instances: FakeWebSocket[] = [];

  readonly url: string;
  readyState = FakeWebSocket.CONNECTING;
  readonly sent: unknown[] = [];
  onopen: (() => void) | null = null;
  onmessage: ((event: { data: string }) => void) | null = null;
  onclose: ((event: { code: number; reason: string }) => void) | null = null;
  onerror: (() => void) | null = null;

  constructor(url: string) {
    this.url = url;
    FakeWebSocket.instances.push(this);
  }

  send(data: string): void {
    this.sent.push(JSON.parse(data));
  }

  close(code = 1000, reason = ""): void {
    this.readyState = FakeWebSocket.CLOSED;
    this.onclose?.({ code, reason });
  }

  open(): void {
    this.readyState = FakeWebSocket.OPEN;
    this.onopen?.();
  }

  receive(data: unknown): void {
    this.onmessage?.({ data: typeof data === "string" ? data : JSON.stringify(data) });
  }
}

interface Call {
  url: string;
  method: string;
  headers: Record<string, string>;
}

function reply(status: number, body: unknown): Awaited<ReturnType<FetchLike>> {
  return { ok: status >= 200 && status < 300, status, json: async () => body };
}

describe("createChatClient", () => {
  let calls: Call[];
  let startReplies: Array<[number, unknown]>;
  let queueStatus: unknown;
  const fakeFetch: FetchLike = async (url, init) => {
    calls.push({ url, method: init.method, headers: init.headers });
    if (url.includes("/api/chat/start")) {
      const next = startReplies.shift();
      if (!next) throw new Error("unexpected start request");
      return reply(next[0], next[1]);
    }
    return reply(200, queueStatus);
  };

  function client(overrides: Partial<ChatClientConfig> = {}) {
    return createChatClient({
      baseUrl: "http://chat.test",
      username: "alice",
      fetch: fakeFetch,
      queuePollIntervalMs: 10,
      ...overrides,
    });
  }

  function lastSocket(): FakeWebSocket {
    const socket = FakeWebSocket.instances.at(-1);
    if (!socket) throw new Error("no socket opened");
    return socket;
  }

  beforeEach(() => {
    calls = [];
    startReplies = [];
    queueStatus = { in_queue: false, position: 0, queue_size: 0 };
    FakeWebSocket.instances = [];
    vi.stubGlobal("WebSocket", FakeWebSocket);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("connects to the assigned room and relays messages", async () => {
    startReplies.push([200, { status: "room_assigned", room: "ROOM1", message: "Created new room" }]);
    const c = client();
    await c.startChat();

    expect(calls).toEqual([
      {
        url: "http://chat.test/api/chat/start?username=alice",
        method: "POST",
        headers: { Accept: "application/json" },
      },
    ]);
    expect(c.getState()).toMatchObject({ phase: "connecting", roomCode: "ROOM1" });
    const socket = lastSocket();
    expect(socket.url).toBe("ws://chat.test/ws/chat?room=ROOM1&username=alice");

    socket.open();
    expect(c.getState().phase).toBe("chatting");

    const joined = {
      roomCode: "ROOM1",
      event: "joined",
      username: "alice",
      text: "alice joined the chat",
      timestamp: 1,
    };
    socket.receive({ type: MSG_SYSTEM, payload: joined });
    socket.receive({
      type: MSG_CHAT_MESSAGE,
      payload: { roomCode: "ROOM1", from: "bob", text: "hey", timestamp: 2 },
    });
    expect(c.getState().messages).toEqual([
      { kind: "system", ...joined },
      { kind: "chat", roomCode: "ROOM1", from: "bob", text: "hey", timestamp: 2 },
    ]);

    expect(c.sendMessage("  hello  ")).toBe(true);
    expect(socket.sent).toEqual([{ type: MSG_SEND_CHAT, payload: { message: "hello" } }]);
  });

  it("polls the queue and connects once promoted", async () => {
    startReplies.push(
      [200, { status: "queued", position: 2, message: "Added to queue. Position: 2" }],
      [200, { status: "room_assigned", room: "ROOM9", message: "Already in room" }]
    );
    queueStatus = { in_queue: true, position: 1, queue_size: 1 };
    const c = client();
    await c.startChat();
    expect(c.getState()).toMatchObject({ phase: "queued", queuePosition: 2, queueSize: null });

    await vi.waitFor(() =>
      expect(c.getState()).toMatchObject({ phase: "queued", queuePosition: 1, queueSize: 1 })
    );
    expect(calls[1]).toEqual({
      url: "http://chat.test/api/chat/queue-status?username=alice",
      method: "GET",
      headers: { Accept: "application/json" },
    });

    queueStatus = { in_queue: false, position: 0, queue_size: 0 };
    await vi.waitFor(() =>
      expect(c.getState()).toMatchObject({
        phase: "connecting",
        roomCode: "ROOM9",
        queuePosition: null,
      })
    );
    expect(lastSocket().url).toBe("ws://chat.test/ws/chat?room=ROOM9&username=alice");
  });

  it("stops polling after leave", async () => {
    startReplies.push([200, { status: "queued", position: 1, message: "Added to queue. Position: 1" }]);
    queueStatus = { in_queue: true, position: 1, queue_size: 1 };
    const c = client();
    await c.startChat();
    c.leave();
    const made = calls.length;
    await new Promise((resolve) => setTimeout(resolve, 50));

    expect(calls).toHaveLength(made);
    expect(c.getState()).toMatchObject({ phase: "closed", queuePosition: null });
  });

  it("reports API errors in lastError", async () => {
    startReplies.push([
      401,
      { error: "Missing or invalid token", code: "UNAUTHORIZED", timestamp: 1 },
    ]);
    const c = client();
    await c.startChat();
    expect(c.getState()).toMatchObject({
      phase: "closed",
      lastError: { code: "UNAUTHORIZED", message: "Missing or invalid token" },
    });
    expect(FakeWebSocket.instances).toHaveLength(0);
  });

  it("reports a malformed API response", async () => {
    startReplies.push([200, { status: "bogus" }]);
    const c = client();
    await c.startChat();
    expect(c.getState().lastError).toEqual({
      code: "INVALID_RESPONSE",
      message: "Unexpected start chat response",
    });
  });

  it("sends the auth token to the API and the socket", async () => {
    startReplies.push([200, { status: "room_assigned", room: "ROOM1", message: "Created new room" }]);
    const c = client({ getAuthToken: async () => "test-token" });
    await c.startChat();
    expect(calls[0].headers).toEqual({
      Accept: "application/json",
      Authorization: "Bearer test-token",
    });
    expect(lastSocket().url).toBe(
      "ws://chat.test/ws/chat?room=ROOM1&username=alice&access_token=test-token"
    );
  });

  it("fails with AUTH_ERROR when the token getter throws", async () => {
    const c = client({
      getAuthToken: () => {
        throw new Error("session expired");
      },
    });
    await c.startChat();
    expect(c.getState()).toMatchObject({
      phase: "closed",
      lastError: { code: "AUTH_ERROR", message: "session expired" },
    });
    expect(calls).toHaveLength(0);
  });

  it("uses wss for an https base URL", async () => {
    startReplies.push([200, { status: "room_assigned", room: "ROOM1", message: "Created new room" }]);
    await client({ baseUrl: "https://chat.test" }).startChat();
    expect(lastSocket().url).toBe("wss://chat.test/ws/chat?room=ROOM1&username=alice");
  });

  it("maps server close codes to errors", async () => {
    startReplies.push([200, { status: "room_assigned", room: "ROOM1", message: "Created new room" }]);
    const c = client();
    await c.startChat();
    const socket = lastSocket();
    socket.open();
    socket.close(4410, "Room closed");
    expect(c.getState()).toMatchObject({
      phase: "closed",
      lastError: { code: "ROOM_CLOSED", message: "Room closed" },
    });
  });

  it("rejects text that is blank, too long, or sent while not connected", async () => {
    startReplies.push([200, { status: "room_assigned", room: "ROOM1", message: "Created new room" }]);
    const c = client();
    await c.startChat();
    expect(c.sendMessage("hi")).toBe(false);

    const socket = lastSocket();
    socket.open();
    expect(c.sendMessage("   ")).toBe(false);
    expect(c.sendMessage("x".repeat(2001))).toBe(false);
    expect(c.getState().lastError).toEqual({
      code: "MESSAGE_TOO_LONG",
      message: "Message exceeds 2000 characters",
    });
    expect(socket.sent).toHaveLength(0);
  });

  it("records invalid frames and server errors", async () => {
    startReplies.push([200, { status: "room_assigned", room: "ROOM1", message: "Created new room" }]);
    const c = client();
    await c.startChat();
    const socket = lastSocket();
    socket.open();

    socket.receive("not json");
    expect(c.getState().lastError).toEqual({
      code: "INVALID_JSON",
      message: "Invalid JSON from server",
    });
    socket.receive({ type: "typing", payload: {} });
    expect(c.getState().lastError?.code).toBe("UNKNOWN_MESSAGE");
    socket.receive({
      type: "error",
      payload: { code: "MESSAGE_TOO_LONG", message: "Message exceeds 2000 characters" },
    });
    expect(c.getState().lastError?.code).toBe("MESSAGE_TOO_LONG");
    expect(c.getState().messages).toEqual([]);
  });

  it("leave closes the socket without reporting an error", async () => {
    startReplies.push([200, { status: "room_assigned", room: "ROOM1", message: "Created new room" }]);
    const c = client();
    await c.startChat();
    const socket = lastSocket();
    socket.open();
    c.leave();
    expect(socket.readyState).toBe(FakeWebSocket.CLOSED);
    expect(c.getState()).toMatchObject({ phase: "closed", roomCode: null, lastError: null });
  });

  it("notifies subscribers until they unsubscribe", async () => {
    startReplies.push([200, { status: "room_assigned", room: "ROOM1", message: "Created new room" }]);
    const c = client();
    const phases: string[] = [];
    const unsubscribe = c.subscribe((s) => phases.push(s.phase));
    await c.startChat();
    unsubscribe();
    lastSocket().open();

    expect(phases).toEqual(["starting", "connecting"]);
  });

  it("ignores startChat while a chat is in progress", async () => {
    startReplies.push([200, { status: "room_assigned", room: "ROOM1", message: "Created new room" }]);
    const c = client();
    await c.startChat();
    await c.startChat();
    expect(calls).toHaveLength(1);
  });
});
