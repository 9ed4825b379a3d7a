// @filename: property.ts
/**
 * Value holders built from the subject primitives.
 *
 * Both hold a current value in a {@link BehaviorSubject} and end through an
 * explicit `close()` (or a `using` block), never through garbage collection:
 * whoever owns the holder decides when its subscribers see completion.
 *
 * @module
 */
import type { Observer } from "./_types.ts";
import type { Scheduler } from "./scheduler.ts";
import type { Observable } from "./observable.ts";
import type { Event } from "./event.ts";

import { getConfig } from "./config.ts";
import { DisposedError } from "./error.ts";
import { dispatch } from "./event.ts";
import { subscribeOn } from "./helpers/operations/scheduling.ts";
import { Binder } from "./observer.ts";
import { BehaviorSubject } from "./subjects.ts";
import { Symbol } from "./symbol.ts";

/**
 * A mutable value whose changes can be observed. It never fails.
 *
 * @example
 * ```ts
 * {
 *   using count = new Variable(0);
 *   count.asObservable().subscribe(n => console.log(n)); // 0
 *   count.value = 1;                                     // 1
 * } // subscribers complete here
 * ```
 */
export class Variable<T> implements Disposable {
  #subject: BehaviorSubject<T>;

  constructor(initial: T) {
    this.#subject = new BehaviorSubject(initial);
  }

  get value(): T {
    return this.#subject.value;
  }

  /**
   * @throws {DisposedError} once the variable is closed.
   */
  set value(next: T) {
    if (this.#subject.isClosed) throw new DisposedError("Variable");
    this.#subject.next(next);
  }

  get closed(): boolean {
    return this.#subject.isClosed;
  }

  /** Current value first, then every change, then completion on close. */
  asObservable(): Observable<T> {
    return this.#subject.asObservable();
  }

  /** Completes every subscriber. */
  close(): void {
    this.#subject.complete();
  }

  [Symbol.dispose](): void {
    this.close();
  }
}

export interface ControlPropertyOptions {
  /** The context the property lives on. Defaults to the main scheduler. */
  scheduler?: Scheduler;
}

/**
 * A two-way property pinned to one scheduler, like a widget's value.
 *
 * @remarks
 * Writes from any context go through a {@link Binder}, so they land on the
 * property's scheduler; subscriptions are set up on that scheduler as well,
 * which means observers always hear about changes there. The property never
 * emits an error: an error pushed into it is escalated the way a binder does
 * it, and completion only comes from {@link ControlProperty.close}.
 *
 * @example
 * ```ts
 * const text = new ControlProperty("");
 * text.changes.subscribe(v => render(v));
 * network.subscribe(text); // writes hop onto main
 * ```
 */
export class ControlProperty<T> implements Observer<T>, Disposable {
  readonly scheduler: Scheduler;
  /** The current value, then every change, delivered on the scheduler. */
  readonly changes: Observable<T>;
  #subject: BehaviorSubject<T>;
  #sink: Binder<T>;

  constructor(initial: T, options: ControlPropertyOptions = {}) {
    this.scheduler = options.scheduler ?? getConfig().mainScheduler;
    const subject = new BehaviorSubject(initial);
    this.#subject = subject;
    this.#sink = new Binder<T>(value => subject.next(value), { scheduler: this.scheduler });
    this.changes = subscribeOn<T>(this.scheduler)(subject.asObservable());
  }

  /** The value as of the last write that reached the scheduler. */
  get value(): T {
    return this.#subject.value;
  }

  get closed(): boolean {
    return this.#subject.isClosed;
  }

  next(value: T): void {
    this.#sink.next(value);
  }

  error(err: unknown): void {
    this.#sink.error(err);
  }

  /** Ignored; use {@link ControlProperty.close}. */
  complete(): void {}

  on(event: Event<T>): void {
    dispatch(this, event);
  }

  /** Completes every subscriber. Writes still queued are dropped. */
  close(): void {
    this.#subject.complete();
  }

  [Symbol.dispose](): void {
    this.close();
  }
}
