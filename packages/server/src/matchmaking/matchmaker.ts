/**
 * ChatMatchmaker: pairs users into two-person rooms, queues them when no
 * room slot is free, and runs the background sweeps that promote, expire
 * and reap.
 *
 * The registry and the queue each sit behind their own ReadWriteLock.
 * Anything touching both takes the queue lock first.
 */

import type { Logger } from "../logger.js";
import { createSilentLogger } from "../logger.js";
import type { RoomSnapshot } from "./chat-room.js";
import { RoomFullError, RoomNotFoundError } from "./errors.js";
import { MaintenanceScheduler } from "./maintenance.js";
import type { RoomCodeGenerator } from "./room-code.js";
import { RoomRegistry } from "./room-registry.js";
import { ReadWriteLock } from "./rw-lock.js";
import { WaitQueue } from "./wait-queue.js";

const DEFAULT_PROMOTION_INTERVAL_MS = 5000;
const DEFAULT_QUEUE_SWEEP_INTERVAL_MS = 30000;

export const STATUS_ROOM_ASSIGNED = "room_assigned" as const;
export const STATUS_QUEUED = "queued" as const;

export type StartChatResult =
  | { status: typeof STATUS_ROOM_ASSIGNED; room: string; message: string }
  | { status: typeof STATUS_QUEUED; position: number; message: string };

export interface ChatMatchmakerOptions {
  /** Upper bound on live rooms. */
  maxRooms: number;
  /** Queue entries at least this old are dropped by the expiry sweep. */
  queueTimeoutMs: number;
  /** Reaper period, and how long a room may sit with one member. */
  roomCleanupIntervalMs: number;
  promotionIntervalMs?: number;
  queueSweepIntervalMs?: number;
  logger?: Logger;
  now?: () => number;
  generateCode?: RoomCodeGenerator;
  /** Start the background sweeps on construction (default: true). */
  startMaintenance?: boolean;
}

export type RoomReapedListener = (room: RoomSnapshot) => void;

function assertPositive(name: string, value: number): void {
  if (!Number.isFinite(value) || value <= 0) {
    throw new RangeError(`${name} must be a positive number, got ${value}`);
  }
}

export class ChatMatchmaker {
  private readonly registry: RoomRegistry;
  private readonly queue: WaitQueue;
  private readonly registryLock = new ReadWriteLock();
  private readonly queueLock = new ReadWriteLock();
  private readonly scheduler: MaintenanceScheduler;
  private readonly logger: Logger;
  private readonly queueTimeoutMs: number;
  private readonly roomCleanupIntervalMs: number;
  private readonly reapedListeners = new Set<RoomReapedListener>();

  constructor(options: ChatMatchmakerOptions) {
    assertPositive("maxRooms", options.maxRooms);
    assertPositive("queueTimeoutMs", options.queueTimeoutMs);
    assertPositive("roomCleanupIntervalMs", options.roomCleanupIntervalMs);
    const promotionIntervalMs =
      options.promotionIntervalMs ?? DEFAULT_PROMOTION_INTERVAL_MS;
    const queueSweepIntervalMs =
      options.queueSweepIntervalMs ?? DEFAULT_QUEUE_SWEEP_INTERVAL_MS;
    assertPositive("promotionIntervalMs", promotionIntervalMs);
    assertPositive("queueSweepIntervalMs", queueSweepIntervalMs);

    const now = options.now ?? Date.now;
    this.logger = (options.logger ?? createSilentLogger()).child({
      component: "matchmaker",
    });
    this.queueTimeoutMs = options.queueTimeoutMs;
    this.roomCleanupIntervalMs = options.roomCleanupIntervalMs;
    this.registry = new RoomRegistry({
      maxRooms: options.maxRooms,
      now,
      generateCode: options.generateCode,
    });
    this.queue = new WaitQueue(now);
    this.scheduler = new MaintenanceScheduler(this.logger);

    if (options.startMaintenance ?? true) {
      this.scheduler.schedule({
        name: "promote-queued",
        intervalMs: promotionIntervalMs,
        run: () => this.promoteQueued(),
      });
      this.scheduler.schedule({
        name: "expire-queue-entries",
        intervalMs: queueSweepIntervalMs,
        run: () => this.expireQueueEntries(),
      });
      this.scheduler.schedule({
        name: "reap-lonely-rooms",
        intervalMs: this.roomCleanupIntervalMs,
        run: () => this.reapLonelyRooms(),
      });
    }
  }

  /** Assigns the user a room, or queues them when no slot is free. */
  startChat(username: string): Promise<StartChatResult> {
    return this.withQueueAndRegistry((): StartChatResult => {
      const current = this.registry.findRoomContaining(username);
      if (current) {
        this.queue.remove(username);
        return {
          status: STATUS_ROOM_ASSIGNED,
          room: current.code,
          message: "Already in room",
        };
      }

      const waiting = this.registry.findWaitingRoom();
      if (waiting) {
        this.registry.addMember(waiting, username);
        this.queue.remove(username);
        this.logger.debug({ room: waiting.code, username }, "user joined waiting room");
        return {
          status: STATUS_ROOM_ASSIGNED,
          room: waiting.code,
          message: "Joined existing room",
        };
      }

      const created = this.registry.createRoom(username);
      if (created) {
        this.queue.remove(username);
        this.logger.debug({ room: created.code, username }, "room created");
        return {
          status: STATUS_ROOM_ASSIGNED,
          room: created.code,
          message: "Created new room",
        };
      }

      const { position, alreadyQueued } = this.queue.enqueue(username);
      if (alreadyQueued) {
        return { status: STATUS_QUEUED, position, message: "Already in queue" };
      }
      this.logger.info({ username, position }, "user queued");
      return {
        status: STATUS_QUEUED,
        position,
        message: `Added to queue. Position: ${position}`,
      };
    });
  }

  /**
   * Admits the user to an existing room. Succeeds without change when they
   * are already a member.
   */
  joinRoom(roomCode: string, username: string): Promise<void> {
    return this.registryLock.withWrite(() => {
      const room = this.registry.get(roomCode);
      if (!room) throw new RoomNotFoundError(roomCode);
      if (room.hasMember(username)) return;
      if (room.isFull()) throw new RoomFullError(roomCode);
      this.registry.addMember(room, username);
      this.logger.debug({ room: roomCode, username }, "user joined room");
    });
  }

  /** Unknown rooms and non-members are ignored. */
  leaveRoom(roomCode: string, username: string): Promise<void> {
    return this.registryLock.withWrite(() => {
      const room = this.registry.get(roomCode);
      if (!room || !room.hasMember(username)) return;
      const deleted = this.registry.removeMember(room, username);
      this.logger.debug({ room: roomCode, username, deleted }, "user left room");
    });
  }

  getQueuePosition(username: string): Promise<number> {
    return this.queueLock.withRead(() => this.queue.position(username));
  }

  getQueueSize(): Promise<number> {
    return this.queueLock.withRead(() => this.queue.size);
  }

  getRoom(roomCode: string): Promise<RoomSnapshot | undefined> {
    return this.registryLock.withRead(() => this.registry.get(roomCode)?.snapshot());
  }

  getWaitingRooms(): Promise<RoomSnapshot[]> {
    return this.registryLock.withRead(() => {
      const waiting: RoomSnapshot[] = [];
      for (const room of this.registry.values()) {
        if (room.isWaiting()) waiting.push(room.snapshot());
      }
      return waiting;
    });
  }

  getRoomCount(): Promise<number> {
    return this.registryLock.withRead(() => this.registry.size);
  }

  /**
   * Moves queued users into rooms in FIFO order. Entries whose user is
   * already in a room are dropped. Stops at the first entry that cannot be
   * placed. Returns how many entries left the queue.
   */
  promoteQueued(): Promise<number> {
    return this.withQueueAndRegistry(() => {
      let promoted = 0;
      let dropped = 0;
      for (let front = this.queue.peekFront(); front; front = this.queue.peekFront()) {
        const { username } = front;
        if (this.registry.findRoomContaining(username)) {
          this.queue.dequeueFront();
          dropped++;
          continue;
        }
        const waiting = this.registry.findWaitingRoom();
        const room = waiting ?? this.registry.createRoom(username);
        if (!room) break;
        if (waiting) this.registry.addMember(waiting, username);
        this.queue.dequeueFront();
        promoted++;
        this.logger.debug({ room: room.code, username }, "queued user promoted");
      }
      if (promoted > 0 || dropped > 0) {
        this.logger.info({ promoted, dropped }, "queue promotion");
      }
      return promoted + dropped;
    });
  }

  /** Drops queue entries older than queueTimeoutMs. */
  expireQueueEntries(): Promise<number> {
    return this.queueLock.withWrite(() => {
      const expired = this.queue.removeExpired(this.queueTimeoutMs);
      if (expired.length > 0) {
        this.logger.info(
          { count: expired.length, usernames: expired.map((e) => e.username) },
          "queue entries expired"
        );
      }
      return expired.length;
    });
  }

  /** Deletes one-member rooms idle for at least roomCleanupIntervalMs. */
  async reapLonelyRooms(): Promise<number> {
    const reaped = await this.registryLock.withWrite(() => {
      const lonely = this.registry.findLonelyRooms(this.roomCleanupIntervalMs);
      for (const room of lonely) {
        this.registry.delete(room.code);
      }
      return lonely.map((room) => room.snapshot());
    });
    for (const room of reaped) {
      this.logger.info({ room: room.code, members: room.members }, "lonely room reaped");
      this.notifyReaped(room);
    }
    return reaped.length;
  }

  /** Called after a lonely room is deleted. Returns an unsubscribe function. */
  onRoomReaped(listener: RoomReapedListener): () => void {
    this.reapedListeners.add(listener);
    return () => {
      this.reapedListeners.delete(listener);
    };
  }

  /** Stops the background sweeps. State stays readable. */
  close(): void {
    this.scheduler.stop();
  }

  private withQueueAndRegistry<T>(task: () => T): Promise<T> {
    return this.queueLock.withWrite(() => this.registryLock.withWrite(task));
  }

  private notifyReaped(room: RoomSnapshot): void {
    for (const listener of this.reapedListeners) {
      try {
        listener(room);
      } catch (err) {
        this.logger.error({ room: room.code, err }, "room reaped listener failed");
      }
    }
  }
}
