// @filename: scheduler.ts
/**
 * Schedulers decide *where* a unit of work runs.
 *
 * Node.js runs JavaScript on one thread, so an execution context here is a
 * logical queue drained from the event loop rather than an OS thread. The
 * guarantees are the ones pipelines rely on: a serial scheduler runs its
 * actions one at a time in submission order, a concurrent scheduler may have
 * several (async) actions in flight, and every action can be cancelled until
 * it starts.
 *
 * Variants:
 * - {@link ImmediateScheduler}: runs the action right away on the caller's
 *   context.
 * - {@link MainScheduler}: the process-wide serial "main" context.
 * - {@link SerialScheduler}: a named serial background context.
 * - {@link ConcurrentScheduler}: a pool, optionally bounded by
 *   `maxConcurrent`.
 * - {@link ManualScheduler}: virtual time, driven by hand from tests.
 *
 * {@link currentScheduler} reports which scheduler is running the current
 * action, which is how tests (and logs) tell contexts apart.
 *
 * @example
 * ```ts
 * const io = new SerialScheduler("io");
 * io.schedule(() => {
 *   console.log(currentScheduler()?.name); // "io"
 * });
 * ```
 *
 * @module
 */
import type { Subscription } from "./_types.ts";
import { SerialDisposable, disposable } from "./disposable.ts";

/**
 * A unit of work. Returning a promise keeps the action "running" until it
 * settles, which holds a serial queue or a concurrency slot.
 */
export type SchedulerAction = () => void | PromiseLike<void>;

/**
 * Minimal scheduler contract.
 */
export interface Scheduler {
  /** Label used in diagnostics. */
  readonly name: string;

  /** The scheduler's notion of the current time, in milliseconds. */
  now(): number;

  /**
   * Queues `action`. Disposing the handle cancels it if it has not started.
   */
  schedule(action: SchedulerAction): Subscription;

  /** Queues `action` once `delay` milliseconds have passed. */
  scheduleAfter(delay: number, action: SchedulerAction): Subscription;

  /**
   * Runs `action` every `period` milliseconds until the handle is disposed.
   */
  schedulePeriodic(period: number, action: SchedulerAction): Subscription;
}

let running: Scheduler | null = null;

/**
 * The scheduler whose action is executing right now, or `null` outside any
 * scheduled action.
 */
export function currentScheduler(): Scheduler | null {
  return running;
}

function isPromiseLike(value: unknown): value is PromiseLike<void> {
  return typeof value === "object" && value !== null && typeof Reflect.get(value, "then") === "function";
}

function reportToHost(err: unknown): void {
  queueMicrotask(() => { throw err; });
}

/**
 * Runs an action with `scheduler` recorded as the current context. A thrown
 * error is reported to the host and the action counts as finished.
 */
function runOn(scheduler: Scheduler, action: SchedulerAction): PromiseLike<void> | undefined {
  const previous = running;
  running = scheduler;
  try {
    const result = action();
    return isPromiseLike(result) ? result : undefined;
  } catch (err) {
    reportToHost(err);
    return undefined;
  } finally {
    running = previous;
  }
}

/**
 * Shared timing logic: delays go through the host timers, then the action is
 * queued through {@link Scheduler.schedule}.
 */
export abstract class BaseScheduler implements Scheduler {
  constructor(readonly name: string) {}

  now(): number {
    return Date.now();
  }

  abstract schedule(action: SchedulerAction): Subscription;

  scheduleAfter(delay: number, action: SchedulerAction): Subscription {
    if (delay <= 0) return this.schedule(action);

    const inner = new SerialDisposable();
    const timer = setTimeout(() => inner.set(this.schedule(action)), delay);
    inner.set(() => clearTimeout(timer));
    return inner;
  }

  schedulePeriodic(period: number, action: SchedulerAction): Subscription {
    if (period <= 0) {
      throw new RangeError(`Period must be positive, got ${period}`);
    }

    const inner = new SerialDisposable();
    const tick = () => {
      inner.set(this.scheduleAfter(period, () => {
        if (inner.closed) return;
        tick();
        return action();
      }));
    };
    tick();
    return inner;
  }

  get [Symbol.toStringTag](): string { return `Scheduler(${this.name})`; }
}

/**
 * Runs every action synchronously on the calling context.
 */
export class ImmediateScheduler extends BaseScheduler {
  static readonly instance: ImmediateScheduler = new ImmediateScheduler();

  constructor(name = "immediate") {
    super(name);
  }

  schedule(action: SchedulerAction): Subscription {
    const handle = disposable();
    const pending = runOn(this, action);
    pending?.then(undefined, reportToHost);
    handle.unsubscribe();
    return handle;
  }
}

/** How a queue asks the event loop for a turn. */
export type Dispatch = (drain: () => void) => void;

const defaultDispatch: Dispatch = drain => { setImmediate(drain); };

interface Task {
  action: SchedulerAction;
  /** Set by the handle; a task dispatched but not yet run checks it. */
  cancelled: boolean;
}

/**
 * A serial context: one action at a time, in submission order.
 *
 * @remarks
 * Actions queued while the scheduler is draining run in the same turn, after
 * everything queued before them. An action that returns a promise holds the
 * queue until the promise settles.
 */
export class SerialScheduler extends BaseScheduler {
  #queue: Task[] = [];
  #active = false;
  #dispatch: Dispatch;
  #idle: Array<() => void> = [];

  constructor(name = "serial", options: { dispatch?: Dispatch } = {}) {
    super(name);
    this.#dispatch = options.dispatch ?? defaultDispatch;
  }

  /** Actions waiting to run. */
  get pending(): number {
    return this.#queue.length;
  }

  schedule(action: SchedulerAction): Subscription {
    const task: Task = { action, cancelled: false };
    this.#queue.push(task);
    this.#kick();

    return disposable(() => {
      task.cancelled = true;
      const index = this.#queue.indexOf(task);
      if (index !== -1) this.#queue.splice(index, 1);
    });
  }

  /**
   * Resolves once the queue has nothing left to run.
   */
  whenIdle(): Promise<void> {
    if (!this.#active && this.#queue.length === 0) return Promise.resolve();
    return new Promise(resolve => { this.#idle.push(resolve); });
  }

  #kick(): void {
    if (this.#active) return;
    this.#active = true;
    this.#dispatch(() => this.#drain());
  }

  #drain(): void {
    let task = this.#queue.shift();
    while (task) {
      const pending = runOn(this, task.action);
      if (pending) {
        const resume = () => this.#drain();
        pending.then(resume, err => {
          reportToHost(err);
          resume();
        });
        return;
      }
      task = this.#queue.shift();
    }

    this.#active = false;
    const idle = this.#idle;
    this.#idle = [];
    for (const resolve of idle) resolve();
  }
}

/**
 * The process-wide serial "main" context.
 *
 * Binders and control properties deliver here unless told otherwise; the
 * default can be swapped through `configure({ mainScheduler })`.
 */
export class MainScheduler extends SerialScheduler {
  static #instance: MainScheduler | null = null;

  static get instance(): MainScheduler {
    MainScheduler.#instance ??= new MainScheduler();
    return MainScheduler.#instance;
  }

  constructor(options: { dispatch?: Dispatch } = {}) {
    super("main", options);
  }
}

export interface ConcurrentSchedulerOptions {
  /** Upper bound on actions in flight. Defaults to no bound. */
  maxConcurrent?: number;
  dispatch?: Dispatch;
}

/**
 * A pool of contexts. Each action gets its own event-loop turn; async
 * actions overlap up to `maxConcurrent`, the rest wait in FIFO order.
 */
export class ConcurrentScheduler extends BaseScheduler {
  readonly maxConcurrent: number;
  #waiting: Task[] = [];
  #inFlight = 0;
  #dispatch: Dispatch;

  constructor(name = "concurrent", options: ConcurrentSchedulerOptions = {}) {
    super(name);
    const max = options.maxConcurrent ?? Infinity;
    if (!(max >= 1)) {
      throw new RangeError(`maxConcurrent must be at least 1, got ${max}`);
    }
    this.maxConcurrent = max;
    this.#dispatch = options.dispatch ?? defaultDispatch;
  }

  /** Actions started and not yet finished. */
  get inFlight(): number {
    return this.#inFlight;
  }

  /** Actions waiting for a free slot. */
  get pending(): number {
    return this.#waiting.length;
  }

  schedule(action: SchedulerAction): Subscription {
    const task: Task = { action, cancelled: false };

    if (this.#inFlight < this.maxConcurrent) this.#start(task);
    else this.#waiting.push(task);

    return disposable(() => {
      task.cancelled = true;
      const index = this.#waiting.indexOf(task);
      if (index !== -1) this.#waiting.splice(index, 1);
    });
  }

  #start(task: Task): void {
    this.#inFlight++;
    this.#dispatch(() => {
      if (task.cancelled) {
        this.#release();
        return;
      }
      const pending = runOn(this, task.action);
      if (!pending) {
        this.#release();
        return;
      }
      pending.then(() => this.#release(), err => {
        reportToHost(err);
        this.#release();
      });
    });
  }

  #release(): void {
    this.#inFlight--;
    const next = this.#waiting.shift();
    if (next) this.#start(next);
  }
}

interface TimedTask {
  due: number;
  seq: number;
  action: SchedulerAction;
}

/**
 * Deterministic scheduler on virtual time.
 *
 * Nothing runs until the test calls {@link ManualScheduler.flush} or
 * {@link ManualScheduler.advanceBy}. Tasks run by due time, ties in
 * submission order.
 *
 * @example
 * ```ts
 * const scheduler = new ManualScheduler();
 * const seen: number[] = [];
 * scheduler.scheduleAfter(10, () => { seen.push(scheduler.now()); });
 * scheduler.advanceBy(10);
 * // seen = [10]
 * ```
 */
export class ManualScheduler extends BaseScheduler {
  #clock = 0;
  #seq = 0;
  #tasks: TimedTask[] = [];

  constructor(name = "manual") {
    super(name);
  }

  override now(): number {
    return this.#clock;
  }

  /** Tasks not yet run. */
  get pending(): number {
    return this.#tasks.length;
  }

  schedule(action: SchedulerAction): Subscription {
    return this.#enqueue(this.#clock, action);
  }

  override scheduleAfter(delay: number, action: SchedulerAction): Subscription {
    return this.#enqueue(this.#clock + Math.max(0, delay), action);
  }

  /**
   * Runs every task due now, including ones those tasks queue. Returns how
   * many ran.
   */
  flush(): number {
    return this.#runUntil(this.#clock);
  }

  /** Moves the clock forward, running tasks as their due time is reached. */
  advanceBy(ms: number): number {
    return this.#runUntil(this.#clock + ms);
  }

  #enqueue(due: number, action: SchedulerAction): Subscription {
    const task: TimedTask = { due, seq: this.#seq++, action };
    this.#tasks.push(task);
    return disposable(() => {
      const index = this.#tasks.indexOf(task);
      if (index !== -1) this.#tasks.splice(index, 1);
    });
  }

  #next(limit: number): TimedTask | undefined {
    let best: TimedTask | undefined;
    for (const task of this.#tasks) {
      if (task.due > limit) continue;
      if (!best || task.due < best.due || (task.due === best.due && task.seq < best.seq)) best = task;
    }
    if (best) this.#tasks.splice(this.#tasks.indexOf(best), 1);
    return best;
  }

  #runUntil(limit: number): number {
    let count = 0;
    let task = this.#next(limit);
    while (task) {
      this.#clock = Math.max(this.#clock, task.due);
      runOn(this, task.action)?.then(undefined, reportToHost);
      count++;
      task = this.#next(limit);
    }
    this.#clock = Math.max(this.#clock, limit);
    return count;
  }
}
