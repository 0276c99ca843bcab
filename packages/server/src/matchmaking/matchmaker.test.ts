import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { ChatMatchmaker, type ChatMatchmakerOptions } from "./matchmaker.js";
import { RoomFullError, RoomNotFoundError } from "./errors.js";
import type { RoomSnapshot } from "./chat-room.js";

const QUEUE_TIMEOUT_MS = 300_000;
const CLEANUP_INTERVAL_MS = 300_000;

describe("ChatMatchmaker", () => {
  let clock: number;
  let matchmaker: ChatMatchmaker;

  function build(overrides: Partial<ChatMatchmakerOptions> = {}): ChatMatchmaker {
    let n = 0;
    matchmaker = new ChatMatchmaker({
      maxRooms: 10,
      queueTimeoutMs: QUEUE_TIMEOUT_MS,
      roomCleanupIntervalMs: CLEANUP_INTERVAL_MS,
      now: () => clock,
      generateCode: () => `ROOM${++n}`,
      startMaintenance: false,
      ...overrides,
    });
    return matchmaker;
  }

  beforeEach(() => {
    clock = 1_000;
  });

  afterEach(() => {
    matchmaker.close();
  });

  describe("startChat", () => {
    it("creates a room, then fills it, then reports the existing room", async () => {
      const mm = build();
      expect(await mm.startChat("alice")).toEqual({
        status: "room_assigned",
        room: "ROOM1",
        message: "Created new room",
      });
      expect(await mm.startChat("bob")).toEqual({
        status: "room_assigned",
        room: "ROOM1",
        message: "Joined existing room",
      });
      expect(await mm.startChat("alice")).toEqual({
        status: "room_assigned",
        room: "ROOM1",
        message: "Already in room",
      });
      expect((await mm.getRoom("ROOM1"))?.members).toEqual(["alice", "bob"]);
    });

    it("opens a new room once the waiting room is full", async () => {
      const mm = build();
      await mm.startChat("alice");
      await mm.startChat("bob");
      const third = await mm.startChat("carol");
      expect(third).toEqual({
        status: "room_assigned",
        room: "ROOM2",
        message: "Created new room",
      });
      expect(await mm.getRoomCount()).toBe(2);
    });

    it("queues users in FIFO order when no room can be created", async () => {
      const mm = build({ maxRooms: 1 });
      await mm.startChat("alice");
      await mm.startChat("bob");
      expect(await mm.startChat("carol")).toEqual({
        status: "queued",
        position: 1,
        message: "Added to queue. Position: 1",
      });
      expect(await mm.startChat("dave")).toEqual({
        status: "queued",
        position: 2,
        message: "Added to queue. Position: 2",
      });
      expect(await mm.startChat("carol")).toEqual({
        status: "queued",
        position: 1,
        message: "Already in queue",
      });
      expect(await mm.getQueueSize()).toBe(2);
      expect(await mm.getQueuePosition("dave")).toBe(2);
      expect(await mm.getQueuePosition("erin")).toBe(0);
    });

    it("serializes concurrent requests in call order", async () => {
      const mm = build({ maxRooms: 2 });
      const users = ["u0", "u1", "u2", "u3", "u4", "u5", "u6"];
      const results = await Promise.all(users.map((u) => mm.startChat(u)));
      expect(results.map((r) => r.status)).toEqual([
        "room_assigned",
        "room_assigned",
        "room_assigned",
        "room_assigned",
        "queued",
        "queued",
        "queued",
      ]);
      expect(results.slice(4).map((r) => (r.status === "queued" ? r.position : 0))).toEqual([
        1, 2, 3,
      ]);
      const rooms = await Promise.all([mm.getRoom("ROOM1"), mm.getRoom("ROOM2")]);
      expect(rooms.map((r) => r?.members)).toEqual([
        ["u0", "u1"],
        ["u2", "u3"],
      ]);
    });

    it("removes the queue entry when a repeat request gets a room", async () => {
      const mm = build({ maxRooms: 1 });
      await mm.startChat("alice");
      await mm.startChat("bob");
      await mm.startChat("carol");
      await mm.leaveRoom("ROOM1", "alice");
      await mm.leaveRoom("ROOM1", "bob");

      expect(await mm.startChat("carol")).toEqual({
        status: "room_assigned",
        room: "ROOM2",
        message: "Created new room",
      });
      expect(await mm.getQueuePosition("carol")).toBe(0);
      expect(await mm.getQueueSize()).toBe(0);
    });

    it("propagates a room code failure", async () => {
      const mm = build({ generateCode: () => "SAMECODE" });
      await mm.startChat("alice");
      await mm.startChat("bob");
      await expect(mm.startChat("carol")).rejects.toMatchObject({
        code: "ROOM_CODE_EXHAUSTED",
      });
    });
  });

  describe("joinRoom", () => {
    it("rejects an unknown room", async () => {
      const mm = build();
      const attempt = mm.joinRoom("NOPE", "alice");
      await expect(attempt).rejects.toBeInstanceOf(RoomNotFoundError);
      await expect(mm.joinRoom("NOPE", "alice")).rejects.toThrow("Room NOPE not found");
    });

    it("rejects a third member", async () => {
      const mm = build();
      await mm.startChat("alice");
      await mm.startChat("bob");
      await expect(mm.joinRoom("ROOM1", "carol")).rejects.toBeInstanceOf(RoomFullError);
      expect((await mm.getRoom("ROOM1"))?.members).toEqual(["alice", "bob"]);
    });

    it("is a no-op for an existing member", async () => {
      const mm = build();
      await mm.startChat("alice");
      await mm.startChat("bob");
      await expect(mm.joinRoom("ROOM1", "bob")).resolves.toBeUndefined();
      expect((await mm.getRoom("ROOM1"))?.members).toEqual(["alice", "bob"]);
    });

    it("adds a member to a waiting room", async () => {
      const mm = build();
      await mm.startChat("alice");
      clock = 2_000;
      await mm.joinRoom("ROOM1", "bob");
      expect(await mm.getRoom("ROOM1")).toEqual({
        code: "ROOM1",
        members: ["alice", "bob"],
        createdAt: 1_000,
        updatedAt: 2_000,
      });
    });
  });

  describe("leaveRoom", () => {
    it("deletes the room when its last member leaves", async () => {
      const mm = build();
      await mm.startChat("alice");
      await mm.startChat("bob");
      await mm.leaveRoom("ROOM1", "alice");
      expect((await mm.getRoom("ROOM1"))?.members).toEqual(["bob"]);
      await mm.leaveRoom("ROOM1", "bob");
      expect(await mm.getRoom("ROOM1")).toBeUndefined();
      expect(await mm.getRoomCount()).toBe(0);
    });

    it("ignores unknown rooms and non-members", async () => {
      const mm = build();
      await mm.startChat("alice");
      await expect(mm.leaveRoom("NOPE", "alice")).resolves.toBeUndefined();
      await mm.leaveRoom("ROOM1", "mallory");
      expect((await mm.getRoom("ROOM1"))?.members).toEqual(["alice"]);
    });
  });

  describe("queries", () => {
    it("lists waiting rooms as copies", async () => {
      const mm = build();
      await mm.startChat("alice");
      await mm.startChat("bob");
      await mm.startChat("carol");
      const waiting = await mm.getWaitingRooms();
      expect(waiting.map((r) => r.code)).toEqual(["ROOM2"]);
      waiting[0].members.push("mallory");
      expect((await mm.getRoom("ROOM2"))?.members).toEqual(["carol"]);
    });
  });

  describe("promoteQueued", () => {
    it("pairs queued users into a freed slot", async () => {
      const mm = build({ maxRooms: 1 });
      await mm.startChat("alice");
      await mm.startChat("bob");
      await mm.startChat("carol");
      await mm.startChat("dave");
      await mm.leaveRoom("ROOM1", "alice");
      await mm.leaveRoom("ROOM1", "bob");

      expect(await mm.promoteQueued()).toBe(2);
      expect(await mm.getQueueSize()).toBe(0);
      expect((await mm.getRoom("ROOM2"))?.members).toEqual(["carol", "dave"]);
      expect(await mm.startChat("dave")).toEqual({
        status: "room_assigned",
        room: "ROOM2",
        message: "Already in room",
      });
    });

    it("fills a waiting room and stops when nothing else fits", async () => {
      const mm = build({ maxRooms: 1 });
      await mm.startChat("alice");
      await mm.startChat("bob");
      await mm.startChat("carol");
      await mm.startChat("dave");
      await mm.leaveRoom("ROOM1", "alice");

      expect(await mm.promoteQueued()).toBe(1);
      expect((await mm.getRoom("ROOM1"))?.members).toEqual(["bob", "carol"]);
      expect(await mm.getQueuePosition("dave")).toBe(1);
    });

    it("drops queued users who already hold a room", async () => {
      const mm = build({ maxRooms: 1 });
      await mm.startChat("alice");
      await mm.startChat("bob");
      await mm.startChat("carol");
      await mm.leaveRoom("ROOM1", "bob");
      await mm.joinRoom("ROOM1", "carol");

      expect(await mm.promoteQueued()).toBe(1);
      expect(await mm.getQueueSize()).toBe(0);
      expect((await mm.getRoom("ROOM1"))?.members).toEqual(["alice", "carol"]);
    });

    it("returns 0 with an empty queue", async () => {
      const mm = build();
      expect(await mm.promoteQueued()).toBe(0);
    });
  });

  describe("expireQueueEntries", () => {
    it("drops entries once they reach the queue timeout", async () => {
      const mm = build({ maxRooms: 1 });
      await mm.startChat("alice");
      await mm.startChat("bob");
      await mm.startChat("carol");
      clock = 1_000 + QUEUE_TIMEOUT_MS / 2;
      await mm.startChat("dave");

      clock = 1_000 + QUEUE_TIMEOUT_MS - 1;
      expect(await mm.expireQueueEntries()).toBe(0);
      expect(await mm.getQueuePosition("carol")).toBe(1);

      clock = 1_000 + QUEUE_TIMEOUT_MS;
      expect(await mm.expireQueueEntries()).toBe(1);
      expect(await mm.getQueuePosition("carol")).toBe(0);
      expect(await mm.getQueuePosition("dave")).toBe(1);
    });
  });

  describe("reapLonelyRooms", () => {
    it("reaps one-member rooms after the cleanup interval and keeps full rooms", async () => {
      const mm = build();
      const reaped: RoomSnapshot[] = [];
      mm.onRoomReaped((room) => reaped.push(room));
      await mm.startChat("alice");
      await mm.startChat("bob");
      await mm.startChat("carol");

      clock = 1_000 + CLEANUP_INTERVAL_MS - 1;
      expect(await mm.reapLonelyRooms()).toBe(0);

      clock = 1_000 + CLEANUP_INTERVAL_MS;
      expect(await mm.reapLonelyRooms()).toBe(1);
      expect(await mm.getRoom("ROOM2")).toBeUndefined();
      expect((await mm.getRoom("ROOM1"))?.members).toEqual(["alice", "bob"]);
      expect(reaped).toEqual([
        { code: "ROOM2", members: ["carol"], createdAt: 1_000, updatedAt: 1_000 },
      ]);
    });

    it("measures idleness from the last membership change", async () => {
      const mm = build();
      await mm.startChat("alice");
      await mm.startChat("bob");
      clock = 50_000;
      await mm.leaveRoom("ROOM1", "bob");

      clock = 50_000 + CLEANUP_INTERVAL_MS - 1;
      expect(await mm.reapLonelyRooms()).toBe(0);
      clock = 50_000 + CLEANUP_INTERVAL_MS;
      expect(await mm.reapLonelyRooms()).toBe(1);
    });

    it("stops notifying after unsubscribe", async () => {
      const mm = build();
      const listener = vi.fn();
      const unsubscribe = mm.onRoomReaped(listener);
      unsubscribe();
      await mm.startChat("alice");
      clock += CLEANUP_INTERVAL_MS;
      expect(await mm.reapLonelyRooms()).toBe(1);
      expect(listener).not.toHaveBeenCalled();
    });
  });

  describe("options", () => {
    it("rejects non-positive limits", () => {
      expect(() => build({ maxRooms: 0 })).toThrow(RangeError);
      expect(() => build({ queueTimeoutMs: -1 })).toThrow(
        "queueTimeoutMs must be a positive number, got -1"
      );
      build();
    });
  });

  describe("background sweeps", () => {
    beforeEach(() => {
      vi.useFakeTimers();
    });

    afterEach(() => {
      vi.useRealTimers();
    });

    it("promotes queued users on the promotion interval", async () => {
      const mm = build({ maxRooms: 1, startMaintenance: true, promotionIntervalMs: 5_000 });
      await mm.startChat("alice");
      await mm.startChat("bob");
      await mm.startChat("carol");
      await mm.leaveRoom("ROOM1", "alice");

      await vi.advanceTimersByTimeAsync(5_000);
      await vi.waitFor(async () => {
        expect(await mm.getQueuePosition("carol")).toBe(0);
      });
      expect((await mm.getRoom("ROOM1"))?.members).toEqual(["bob", "carol"]);
    });

    it("expires queue entries on the sweep interval", async () => {
      const mm = build({
        maxRooms: 1,
        startMaintenance: true,
        queueTimeoutMs: 10_000,
        queueSweepIntervalMs: 30_000,
      });
      await mm.startChat("alice");
      await mm.startChat("bob");
      await mm.startChat("carol");
      clock += 10_000;

      await vi.advanceTimersByTimeAsync(30_000);
      await vi.waitFor(async () => {
        expect(await mm.getQueueSize()).toBe(0);
      });
    });

    it("runs no sweep after close", async () => {
      const mm = build({ maxRooms: 1, startMaintenance: true, promotionIntervalMs: 5_000 });
      await mm.startChat("alice");
      await mm.startChat("bob");
      await mm.startChat("carol");
      await mm.leaveRoom("ROOM1", "alice");
      mm.close();

      await vi.advanceTimersByTimeAsync(20_000);
      expect(await mm.getQueuePosition("carol")).toBe(1);
    });
  });
});
