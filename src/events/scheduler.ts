import { performance } from 'node:perf_hooks';

// setTimeout clamps anything above this to 1 ms, so longer waits are chained.
const MAX_TIMER_DELAY_MS = 2_147_483_647;

type ScheduledTask = {
  token: number;
  /** Wall-clock deadline as given to `arm`. */
  deadline: number;
  /** The same instant on the monotonic clock. */
  due: number;
  timer: NodeJS.Timeout;
  onFire: () => void;
};

export interface EventSchedulerOptions {
  /** Wall clock that deadlines are expressed in. */
  now?: () => number;
  /** Clock the timers are measured against; it must never step. */
  monotonicNow?: () => number;
}

/**
 * One cancellable task per event. Re-arming replaces the previous task, and a
 * stale timer whose token no longer matches never fires.
 */
export class EventScheduler {
  private readonly tasks = new Map<string, ScheduledTask>();
  private readonly now: () => number;
  private readonly monotonicNow: () => number;
  private nextToken = 1;

  constructor(options: EventSchedulerOptions = {}) {
    this.now = options.now ?? Date.now;
    this.monotonicNow = options.monotonicNow ?? (() => performance.now());
  }

  get size() {
    return this.tasks.size;
  }

  arm(id: string, deadline: Date | number, onFire: () => void) {
    this.cancel(id);
    const token = this.nextToken;
    this.nextToken += 1;
    const deadlineMs = typeof deadline === 'number' ? deadline : deadline.getTime();
    const due = this.monotonicNow() + (deadlineMs - this.now());
    const task: ScheduledTask = {
      token,
      deadline: deadlineMs,
      due,
      timer: this.createTimer(id, token, due),
      onFire
    };
    this.tasks.set(id, task);
  }

  /** True when a pending task was torn down before it fired. */
  cancel(id: string): boolean {
    const task = this.tasks.get(id);
    if (!task) {
      return false;
    }
    clearTimeout(task.timer);
    this.tasks.delete(id);
    return true;
  }

  has(id: string) {
    return this.tasks.has(id);
  }

  deadlineOf(id: string): number | null {
    return this.tasks.get(id)?.deadline ?? null;
  }

  clear() {
    for (const task of this.tasks.values()) {
      clearTimeout(task.timer);
    }
    this.tasks.clear();
  }

  private createTimer(id: string, token: number, due: number): NodeJS.Timeout {
    const delay = Math.max(0, due - this.monotonicNow());
    return setTimeout(() => this.handleTimer(id, token), Math.min(delay, MAX_TIMER_DELAY_MS));
  }

  private handleTimer(id: string, token: number) {
    const task = this.tasks.get(id);
    if (!task || task.token !== token) {
      return;
    }

    if (task.due > this.monotonicNow()) {
      task.timer = this.createTimer(id, token, task.due);
      return;
    }

    this.tasks.delete(id);
    task.onFire();
  }
}

export default EventScheduler;
