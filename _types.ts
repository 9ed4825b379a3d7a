// @filename: _types.ts
import type { SpecSubscription, SpecObserver } from "./_spec.ts";
import type { Event } from "./event.ts";

/**
 * Observer accepted by this runtime.
 *
 * Same callbacks as {@link SpecObserver}, but `start()` receives the richer
 * {@link Subscription} so an observer can check `closed` or keep the handle
 * for later disposal.
 *
 * @typeParam T - Type of values this observer can receive.
 *
 * @example
 * ```ts
 * const observer: Observer<string> = {
 *   start(subscription) { console.log("open:", !subscription.closed); },
 *   next(value) { console.log(value); },
 *   complete() { console.log("done"); }
 * };
 * ```
 */
export interface Observer<T> extends SpecObserver<T> {
  start?(subscription: Subscription): void;
}

/**
 * Callback form of an observer: one function that receives every
 * {@link Event} of the subscription.
 */
export type EventHandler<T> = (event: Event<T>) => void;

/**
 * The disposal handle returned by `subscribe()` and by every scheduler.
 *
 * @remarks
 * A subscription closes when `unsubscribe()` is called, when a terminal
 * event is delivered, or when the owning subject releases its observers.
 * It never reopens. Disposal is idempotent and stops delivery synchronously.
 *
 * Works with `using` / `await using` blocks through `Symbol.dispose` and
 * `Symbol.asyncDispose`.
 *
 * @example
 * ```ts
 * {
 *   using sub = subject.subscribe({ next: console.log });
 *   subject.next("hi");
 * } // disposed here
 * ```
 */
export interface Subscription extends SpecSubscription, Disposable, AsyncDisposable {
  /** Whether this subscription has been closed. */
  readonly closed: boolean;

  [Symbol.dispose](): void;

  [Symbol.asyncDispose](): Promise<void>;

  readonly [Symbol.toStringTag]: "Subscription";
}

export type * from "./_spec.ts";
