/**
 * Worker Pool
 *
 * Fixed number of worker slots, each handling one request unit at a time.
 * Units that find every slot busy wait in a FIFO queue. A unit that outlives
 * the worker timeout is aborted and its slot is replaced by a fresh one.
 */

import { EventEmitter } from 'node:events';
import { PoolClosedError, UnitCancelledError, WorkerTimeoutError } from '../errors.js';
import { createLogger } from '../utils/logger.js';
import type { RequestUnit, WorkerHealth, WorkerHealthStats, WorkerSlot } from '../types.js';

const log = createLogger('pool');

export interface WorkerPoolEvents {
  'worker:busy': { slotId: number; unitId: string };
  'worker:idle': { slotId: number; handled: number };
  'worker:restart': { previousId: number; slotId: number; restartCount: number };
  'unit:timeout': { slotId: number; unitId: string; timeoutMs: number };
  drained: Record<string, never>;
}

export type UnitTask<T> = (signal: AbortSignal) => T | Promise<T>;

interface Job {
  unit: RequestUnit;
  /** Runs the task; never rejects, yields a callback settling the caller */
  run: (signal: AbortSignal) => Promise<() => void>;
  /** Settles the caller with an error; false when already settled */
  fail: (error: Error) => boolean;
}

interface ActiveUnit {
  job: Job;
  slot: WorkerSlot;
  controller: AbortController;
  timer: NodeJS.Timeout | null;
}

export interface WorkerPoolOptions {
  size: number;
  /** 0 disables the per-unit timeout */
  timeoutMs?: number;
}

export class WorkerPool extends EventEmitter {
  private workers = new Map<number, WorkerSlot>();
  private active = new Map<string, ActiveUnit>();
  private queue: Job[] = [];
  private size: number;
  private timeoutMs: number;
  private nextSlotId = 1;
  private closed = false;
  private restartHistory: number[] = []; // recycle timestamps within the last hour
  private restartTotal = 0;

  constructor(options: WorkerPoolOptions) {
    super();
    if (!Number.isInteger(options.size) || options.size < 1) {
      throw new RangeError(`Pool size must be a positive integer, got ${options.size}`);
    }
    this.size = options.size;
    this.timeoutMs = options.timeoutMs ?? 0;
    for (let i = 0; i < this.size; i++) {
      this.addSlot(0);
    }
  }

  private emitEvent<K extends keyof WorkerPoolEvents>(event: K, payload: WorkerPoolEvents[K]): void {
    this.emit(event, payload);
  }

  private addSlot(restartCount: number): WorkerSlot {
    const slot: WorkerSlot = {
      id: this.nextSlotId++,
      state: 'ready',
      currentUnit: null,
      busySince: null,
      handled: 0,
      restartCount,
      createdAt: Date.now(),
    };
    this.workers.set(slot.id, slot);
    return slot;
  }

  /**
   * Run a unit's task in a free slot, or queue it until one frees up.
   */
  run<T>(unit: RequestUnit, task: UnitTask<T>): Promise<T> {
    if (this.closed) {
      return Promise.reject(new PoolClosedError());
    }

    return new Promise<T>((resolve, reject) => {
      let settled = false;
      const settle = (outcome: () => void): boolean => {
        if (settled) return false;
        settled = true;
        outcome();
        return true;
      };
      const job: Job = {
        unit,
        run: (signal) =>
          Promise.resolve()
            .then(() => task(signal))
            .then(
              (value) => () => settle(() => resolve(value)),
              (error: unknown) => () => settle(() => reject(error)),
            ),
        fail: (error) => settle(() => reject(error)),
      };

      this.queue.push(job);
      this.dispatch();
    });
  }

  private findReadySlot(): WorkerSlot | undefined {
    for (const slot of this.workers.values()) {
      if (slot.state === 'ready') return slot;
    }
    return undefined;
  }

  private dispatch(): void {
    let slot = this.findReadySlot();
    while (slot && this.queue.length > 0) {
      const job = this.queue.shift();
      if (job) {
        this.execute(slot, job);
      }
      slot = this.findReadySlot();
    }
  }

  private execute(slot: WorkerSlot, job: Job): void {
    slot.state = 'working';
    slot.currentUnit = job.unit;
    slot.busySince = Date.now();

    const active: ActiveUnit = { job, slot, controller: new AbortController(), timer: null };
    this.active.set(job.unit.id, active);
    this.emitEvent('worker:busy', { slotId: slot.id, unitId: job.unit.id });

    if (this.timeoutMs > 0) {
      const timeoutMs = this.timeoutMs;
      active.timer = setTimeout(() => this.expire(active, timeoutMs), timeoutMs);
    }

    // The slot is released before the caller hears the outcome
    void job.run(active.controller.signal).then((complete) => {
      this.finish(active);
      complete();
    });
  }

  private finish(active: ActiveUnit): void {
    if (active.timer) clearTimeout(active.timer);
    // Expired or cancelled units no longer own their slot
    if (this.active.get(active.job.unit.id) !== active) return;

    this.active.delete(active.job.unit.id);
    active.slot.handled++;
    this.releaseSlot(active.slot);
  }

  /**
   * Abort a unit that outlived the worker timeout and recycle its slot
   */
  private expire(active: ActiveUnit, timeoutMs: number): void {
    const { job, slot } = active;
    if (this.active.get(job.unit.id) !== active) return;

    this.active.delete(job.unit.id);
    active.timer = null;

    const error = new WorkerTimeoutError(job.unit.id, timeoutMs);
    active.controller.abort(error);
    job.fail(error);

    log.warn(`Unit ${job.unit.id.slice(0, 8)} timed out, recycling slot ${slot.id}`, {
      method: job.unit.method,
      path: job.unit.path,
      timeoutMs,
    });
    this.emitEvent('unit:timeout', { slotId: slot.id, unitId: job.unit.id, timeoutMs });

    slot.state = 'stopped';
    slot.currentUnit = null;
    slot.busySince = null;
    this.workers.delete(slot.id);
    this.restartHistory.push(Date.now());
    this.restartTotal++;

    if (!this.closed && this.workers.size < this.size) {
      const fresh = this.addSlot(slot.restartCount + 1);
      this.emitEvent('worker:restart', {
        previousId: slot.id,
        slotId: fresh.id,
        restartCount: fresh.restartCount,
      });
    }

    this.dispatch();
    this.checkDrained();
  }

  private releaseSlot(slot: WorkerSlot): void {
    slot.currentUnit = null;
    slot.busySince = null;

    if (this.workers.size > this.size) {
      // Shrunk by resize(); retire instead of taking more work
      slot.state = 'stopped';
      this.workers.delete(slot.id);
    } else {
      slot.state = 'ready';
      this.emitEvent('worker:idle', { slotId: slot.id, handled: slot.handled });
    }

    this.dispatch();
    this.checkDrained();
  }

  private checkDrained(): void {
    if (this.active.size === 0 && this.queue.length === 0) {
      this.emitEvent('drained', {});
    }
  }

  /**
   * Resolves once no unit is running or queued
   */
  drain(): Promise<void> {
    if (this.active.size === 0 && this.queue.length === 0) {
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      this.once('drained', () => resolve());
    });
  }

  /**
   * Abort every running unit and reject every queued one.
   * Returns how many units were cancelled.
   */
  cancelAll(reason: string): number {
    let cancelled = 0;

    for (const job of this.queue.splice(0)) {
      if (job.fail(new UnitCancelledError(job.unit.id, reason))) cancelled++;
    }

    for (const active of Array.from(this.active.values())) {
      if (active.timer) clearTimeout(active.timer);
      this.active.delete(active.job.unit.id);
      const error = new UnitCancelledError(active.job.unit.id, reason);
      active.controller.abort(error);
      if (active.job.fail(error)) cancelled++;
      this.releaseSlot(active.slot);
    }

    this.checkDrained();
    return cancelled;
  }

  /**
   * Change the number of slots. Busy slots above the new size retire once
   * their unit finishes.
   */
  resize(size: number): void {
    if (!Number.isInteger(size) || size < 1) {
      throw new RangeError(`Pool size must be a positive integer, got ${size}`);
    }
    this.size = size;

    while (this.workers.size < this.size) {
      this.addSlot(0);
    }
    for (const slot of Array.from(this.workers.values())) {
      if (this.workers.size <= this.size) break;
      if (slot.state === 'ready') {
        slot.state = 'stopped';
        this.workers.delete(slot.id);
      }
    }

    this.dispatch();
  }

  setTimeoutMs(timeoutMs: number): void {
    this.timeoutMs = timeoutMs;
  }

  /**
   * Refuse new units; running and queued ones continue
   */
  close(): void {
    this.closed = true;
  }

  isClosed(): boolean {
    return this.closed;
  }

  getSize(): number {
    return this.size;
  }

  getWorkers(): WorkerSlot[] {
    return Array.from(this.workers.values());
  }

  getWorkerCount(): number {
    return this.workers.size;
  }

  getActiveCount(): number {
    return this.active.size;
  }

  getQueuedCount(): number {
    return this.queue.length;
  }

  /**
   * A busy slot is degraded past half the worker timeout and unhealthy past it
   */
  getSlotHealth(slot: WorkerSlot, now = Date.now()): WorkerHealth {
    const busyFor = slot.busySince === null ? 0 : now - slot.busySince;
    if (this.timeoutMs > 0 && busyFor > this.timeoutMs) return 'unhealthy';
    if (this.timeoutMs > 0 && busyFor > this.timeoutMs / 2) return 'degraded';
    return 'healthy';
  }

  /**
   * Get slot health statistics
   */
  getHealthStats(now = Date.now()): WorkerHealthStats {
    let healthy = 0, degraded = 0, unhealthy = 0;
    for (const slot of this.workers.values()) {
      const health = this.getSlotHealth(slot, now);
      if (health === 'healthy') healthy++;
      else if (health === 'degraded') degraded++;
      else unhealthy++;
    }
    return { total: this.workers.size, healthy, degraded, unhealthy };
  }

  /**
   * Get restart stats
   */
  getRestartStats(now = Date.now()): { total: number; lastHour: number } {
    const oneHourAgo = now - 3600000;
    this.restartHistory = this.restartHistory.filter(t => t > oneHourAgo);
    return {
      total: this.restartTotal,
      lastHour: this.restartHistory.length,
    };
  }
}
