// @filename: subjects.ts
/**
 * Subjects bridge imperative emission into a pipeline: each one is an
 * {@link Observable} that observers subscribe to, and an {@link Observer}
 * that producers push into.
 *
 * All four variants share one fan-out mechanism, a keyed registry of live
 * observers, and differ only in what they remember for late subscribers:
 *
 * | Variant | Remembers | A new subscriber first receives |
 * | --- | --- | --- |
 * | {@link PublishSubject} | nothing | nothing |
 * | {@link ReplaySubject} | last N values (or all) | the buffer, oldest first |
 * | {@link BehaviorSubject} | the current value | the current value |
 * | {@link AsyncSubject} | the last value | nothing until completion, then that value |
 *
 * Once a terminal event is recorded the subject is closed: current observers
 * get it exactly once, the registry is cleared, and later subscribers receive
 * only the recorded outcome (preceded by the replay buffer for a
 * {@link ReplaySubject}, or the final value for an {@link AsyncSubject} that
 * completed). Emissions after that are ignored.
 *
 * Events are processed one at a time. Emitting from inside a subject's own
 * fan-out queues the event until the current one has reached every observer;
 * emitting while a new subscriber is being replayed to queues it until that
 * subscriber has joined live delivery.
 * Producers on different schedulers still have to coordinate among
 * themselves: a subject does not order emissions that come from independent
 * sources.
 *
 * @example
 * ```ts
 * const subject = new PublishSubject<string>();
 * subject.subscribe(v => console.log("A", v));
 * subject.next("x");                              // A x
 * subject.subscribe(v => console.log("B", v));
 * subject.next("y");                              // A y, B y
 * subject.complete();
 * ```
 *
 * @module
 */
import type { Observer } from "./_types.ts";
import type { Teardown } from "./disposable.ts";
import type { TerminalEvent } from "./event.ts";
import type { Queue } from "./queue.ts";
import type { SubscriptionObserver } from "./observable.ts";

import { DisposedError } from "./error.ts";
import { Event, dispatch, isTerminal } from "./event.ts";
import { Observable } from "./observable.ts";
import { createQueue, dequeue, enqueue, isFull, toArray } from "./queue.ts";
import { Symbol } from "./symbol.ts";

/**
 * Shared fan-out mechanism of every subject.
 *
 * @remarks
 * Subclasses customise two hooks: {@link Subject.accept} decides what an
 * incoming event turns into for live observers, and
 * {@link Subject.replayTo} / {@link Subject.replayTerminalTo} decide what a
 * newly joining observer receives.
 *
 * @typeParam T - Type of values carried.
 */
export abstract class Subject<T> extends Observable<T> implements Observer<T>, Disposable, AsyncDisposable {
  #observers = new Map<number, SubscriptionObserver<T>>();
  #nextKey = 0;
  #terminal: TerminalEvent | null = null;
  #disposed = false;
  #pending: Event<T>[] = [];
  #dispatching = false;

  /** Whether any observer is registered for live delivery. */
  get hasObservers(): boolean {
    return this.#observers.size > 0;
  }

  /** Whether a terminal event has been recorded. */
  get isClosed(): boolean {
    return this.#terminal !== null;
  }

  /** Whether {@link Subject.dispose} has run. */
  get isDisposed(): boolean {
    return this.#disposed;
  }

  /** The recorded terminal event, if any. */
  protected get terminal(): TerminalEvent | null {
    return this.#terminal;
  }

  next(value: T): void {
    this.on(Event.next(value));
  }

  error(err: unknown): void {
    this.on(Event.error(err));
  }

  complete(): void {
    this.on(Event.complete());
  }

  /**
   * Feeds one event into the subject. Ignored once the subject is closed or
   * disposed.
   */
  on(event: Event<T>): void {
    if (this.#disposed) return;

    if (this.#dispatching) {
      this.#pending.push(event);
      return;
    }

    this.#exclusive(() => this.#process(event));
  }

  /**
   * Runs `work` with the subject marked busy, then drains whatever was
   * emitted meanwhile. Nested calls run `work` directly; the outer call
   * drains.
   */
  #exclusive<R>(work: () => R): R {
    if (this.#dispatching) return work();

    this.#dispatching = true;
    try {
      const result = work();
      let current = this.#pending.shift();
      while (current) {
        this.#process(current);
        current = this.#pending.shift();
      }
      return result;
    } catch (err) {
      // Events queued behind a failed step would arrive out of order later
      this.#pending.length = 0;
      throw err;
    } finally {
      this.#dispatching = false;
    }
  }

  #process(event: Event<T>): void {
    if (this.#terminal) return;

    const outgoing = this.accept(event);

    if (isTerminal(event)) {
      this.#terminal = event;
      const observers = [...this.#observers.values()];
      this.#observers.clear();
      for (const observer of observers) {
        for (const item of outgoing) observer.on(item);
      }
      return;
    }

    if (outgoing.length === 0 || this.#observers.size === 0) return;
    for (const observer of [...this.#observers.values()]) {
      for (const item of outgoing) observer.on(item);
    }
  }

  /**
   * Records `event` in the subject's state and returns what live observers
   * should receive for it. The default forwards the event unchanged.
   */
  protected accept(event: Event<T>): readonly Event<T>[] {
    return [event];
  }

  /**
   * Delivers what a new observer sees before joining live fan-out.
   */
  protected replayTo(_observer: SubscriptionObserver<T>): void {}

  /**
   * Delivers the recorded outcome to an observer joining a closed subject.
   */
  protected replayTerminalTo(observer: SubscriptionObserver<T>, terminal: TerminalEvent): void {
    observer.on(terminal);
  }

  protected override produce(observer: SubscriptionObserver<T>): Teardown {
    // Emissions made while the observer is replayed to wait until it is registered
    return this.#exclusive(() => this.#admit(observer));
  }

  #admit(observer: SubscriptionObserver<T>): Teardown {
    this.assertNotDisposed();

    const terminal = this.#terminal;
    if (terminal) {
      this.replayTerminalTo(observer, terminal);
      return;
    }

    this.replayTo(observer);
    if (observer.closed) return;

    const key = this.#nextKey++;
    this.#observers.set(key, observer);
    return () => { this.#observers.delete(key); };
  }

  /**
   * The subscribe side alone, so consumers can't emit into the subject.
   */
  asObservable(): Observable<T> {
    return new Observable<T>(observer => this.subscribe(observer));
  }

  /**
   * Completes the subject if still open and refuses further use. Subscribing
   * to a disposed subject fails with a {@link DisposedError}.
   */
  dispose(): void {
    if (this.#disposed) return;
    this.complete();
    this.#disposed = true;
  }

  [Symbol.dispose](): void {
    this.dispose();
  }

  [Symbol.asyncDispose](): Promise<void> {
    return Promise.resolve(this.dispose());
  }

  protected assertNotDisposed(): void {
    if (this.#disposed) throw new DisposedError(this[Symbol.toStringTag]);
  }

  override get [Symbol.toStringTag](): string { return "Subject"; }
}

/**
 * Fans each event out to the observers registered at that moment. Late
 * subscribers get nothing retroactively.
 */
export class PublishSubject<T> extends Subject<T> {
  override get [Symbol.toStringTag](): string { return "PublishSubject"; }
}

/**
 * Remembers the most recent `bufferSize` values (all of them when
 * unbounded) and replays them, oldest first, to every new subscriber before
 * live delivery.
 *
 * @example
 * ```ts
 * const subject = ReplaySubject.create<string>(1);
 * subject.next("x");
 * subject.next("y");
 * subject.subscribe(v => console.log(v)); // y
 * subject.next("z");                      // z
 * ```
 */
export class ReplaySubject<T> extends Subject<T> {
  readonly bufferSize: number;
  #buffer: Queue<T>;

  constructor(bufferSize: number = Infinity) {
    super();
    if (!(bufferSize >= 1)) {
      throw new RangeError(`Replay buffer size must be at least 1, got ${bufferSize}`);
    }
    this.bufferSize = bufferSize;
    this.#buffer = createQueue<T>(bufferSize);
  }

  static override create<T>(bufferSize: number): ReplaySubject<T> {
    return new ReplaySubject<T>(bufferSize);
  }

  static createUnbounded<T>(): ReplaySubject<T> {
    return new ReplaySubject<T>(Infinity);
  }

  protected override accept(event: Event<T>): readonly Event<T>[] {
    if (event.kind === "next") {
      if (isFull(this.#buffer)) dequeue(this.#buffer);
      enqueue(this.#buffer, event.value);
    }
    return [event];
  }

  protected override replayTo(observer: SubscriptionObserver<T>): void {
    for (const value of toArray(this.#buffer)) {
      if (observer.closed) return;
      observer.next(value);
    }
  }

  protected override replayTerminalTo(observer: SubscriptionObserver<T>, terminal: TerminalEvent): void {
    this.replayTo(observer);
    observer.on(terminal);
  }

  override get [Symbol.toStringTag](): string { return "ReplaySubject"; }
}

/**
 * Holds a current value, set at construction and replaced by every `next`.
 * New subscribers receive the current value first.
 *
 * @remarks
 * After a terminal event the value is no longer replayed; late subscribers
 * receive only the error or completion.
 */
export class BehaviorSubject<T> extends Subject<T> {
  #value: T;

  constructor(initial: T) {
    super();
    this.#value = initial;
  }

  /**
   * The current value.
   *
   * @throws The recorded error after the subject failed, or a
   * {@link DisposedError} after disposal.
   */
  get value(): T {
    this.assertNotDisposed();
    const terminal = this.terminal;
    if (terminal?.kind === "error") throw terminal.error;
    return this.#value;
  }

  protected override accept(event: Event<T>): readonly Event<T>[] {
    if (event.kind === "next") this.#value = event.value;
    return [event];
  }

  protected override replayTo(observer: SubscriptionObserver<T>): void {
    observer.next(this.#value);
  }

  override get [Symbol.toStringTag](): string { return "BehaviorSubject"; }
}

/**
 * Emits only the last value, and only once the source completes.
 *
 * @remarks
 * Values are buffered silently. On completion every observer (current and
 * future) receives the last value followed by completion, or completion
 * alone if no value arrived. An error discards the buffered value; every
 * observer receives only the error.
 */
export class AsyncSubject<T> extends Subject<T> {
  #last: { value: T } | null = null;

  protected override accept(event: Event<T>): readonly Event<T>[] {
    switch (event.kind) {
      case "next":
        this.#last = { value: event.value };
        return [];
      case "error":
        this.#last = null;
        return [event];
      case "complete":
        return this.#last ? [Event.next(this.#last.value), event] : [event];
    }
  }

  protected override replayTerminalTo(observer: SubscriptionObserver<T>, terminal: TerminalEvent): void {
    if (terminal.kind === "complete" && this.#last) observer.next(this.#last.value);
    dispatch(observer, terminal);
  }

  override get [Symbol.toStringTag](): string { return "AsyncSubject"; }
}
