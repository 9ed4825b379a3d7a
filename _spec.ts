// @filename: _spec.ts
import { Symbol } from "./symbol.ts";

/**
 * Minimal contract for anything that can be subscribed to.
 *
 * @remarks
 * This is the object returned by `[Symbol.observable]()`. Keeping it minimal
 * lets foreign producers (a network call wrapper, a widget's change
 * notifications, another Observable library) feed the runtime without
 * depending on its classes.
 *
 * @typeParam T - Type of values emitted.
 *
 * @example
 * ```ts
 * const source: ObservableProtocol<number> = {
 *   subscribe(observer) {
 *     observer.next?.(1);
 *     observer.complete?.();
 *     return { unsubscribe() {} };
 *   }
 * };
 * ```
 */
export interface ObservableProtocol<T> {
  /**
   * Admits a new observer and returns the handle that ends the association.
   */
  subscribe(observer: SpecObserver<T>): SpecSubscription;
}

/**
 * A cancellable association between one observer and one producer.
 */
export interface SpecSubscription {
  /**
   * Stops delivery to the observer and releases what the subscription
   * allocated.
   *
   * @remarks
   * Idempotent: the second and later calls do nothing. Delivery stops
   * synchronously, even when producer work already running elsewhere keeps
   * going until it notices.
   */
  unsubscribe(): void;
}

/**
 * A consumer of notifications.
 *
 * @remarks
 * All callbacks are optional; a missing one ignores its notification.
 * After `error` or `complete` a conforming producer never calls the observer
 * again.
 *
 * @typeParam T - Type of values this observer can receive.
 */
export interface SpecObserver<T> {
  /**
   * Called once, before any notification, with the subscription being set up.
   */
  start?(subscription: SpecSubscription): void;

  /** Receives the next value. */
  next?(value: T): void;

  /** Receives the terminal failure. */
  error?(error: unknown): void;

  /** Receives the terminal success. */
  complete?(): void;
}

/**
 * Anything that can be converted to an Observable through
 * `[Symbol.observable]()`.
 *
 * @see https://tc39.es/proposal-observable/#observable-interface
 */
export interface SpecObservable<T> {
  [Symbol.observable](): ObservableProtocol<T>;
}
