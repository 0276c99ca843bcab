/**
 * Periodic background sweeps. A failing tick is logged and the next one
 * runs as scheduled.
 */

import type { Logger } from "../logger.js";

export interface MaintenanceTask {
  name: string;
  intervalMs: number;
  run: () => Promise<unknown>;
}

export class MaintenanceScheduler {
  private readonly logger: Logger;
  private readonly timers = new Map<string, NodeJS.Timeout>();
  private readonly inFlight = new Set<string>();

  constructor(logger: Logger) {
    this.logger = logger;
  }

  get taskCount(): number {
    return this.timers.size;
  }

  schedule(task: MaintenanceTask): void {
    if (this.timers.has(task.name)) {
      throw new Error(`Maintenance task ${task.name} is already scheduled`);
    }
    const timer = setInterval(() => this.tick(task), task.intervalMs);
    timer.unref();
    this.timers.set(task.name, timer);
  }

  stop(): void {
    for (const timer of this.timers.values()) {
      clearInterval(timer);
    }
    this.timers.clear();
  }

  private tick(task: MaintenanceTask): void {
    // A slow tick is never overlapped by the next one.
    if (this.inFlight.has(task.name)) return;
    this.inFlight.add(task.name);
    void Promise.resolve()
      .then(() => task.run())
      .catch((err: unknown) => {
        this.logger.error({ task: task.name, err }, "maintenance tick failed");
      })
      .finally(() => {
        this.inFlight.delete(task.name);
      });
  }
}
