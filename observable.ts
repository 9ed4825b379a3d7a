// @filename: observable.ts
/**
 * The Observable contract: a producer that admits observers and hands back a
 * {@link Subscription} for each.
 *
 * ## Delivery guarantees
 * - **Grammar** – an observer sees `next* (error | complete)?`. A terminal
 *   event closes the subscription; anything the producer sends afterwards is
 *   a protocol violation (fatal in development, ignored in production).
 * - **Serial delivery** – events for one subscription never overlap. If a
 *   producer emits from inside the observer's own callback, the new event is
 *   queued and delivered once the current callback returns.
 * - **Deterministic teardown** – the producer's teardown runs exactly once,
 *   on the first of: `unsubscribe()`, a delivered terminal event, or an abort
 *   of the `signal` passed to `subscribe`.
 *
 * ## Error propagation
 * 1. A producer that throws is turned into an `error` event.
 * 2. An observer without an `error` callback has errors re-thrown on the
 *    microtask queue, like an unhandled promise rejection.
 * 3. An exception thrown by `next()` or `complete()` is routed to `error()`
 *    and ends the subscription.
 *
 * @example
 * ```ts
 * const ticks = new Observable<number>(observer => {
 *   let n = 0;
 *   const id = setInterval(() => observer.next(n++), 1000);
 *   return () => clearInterval(id);
 * });
 *
 * const sub = ticks.subscribe(n => console.log(n));
 * setTimeout(() => sub.unsubscribe(), 3500); // logs 0, 1, 2
 * ```
 *
 * @module
 */
import type { SpecObservable, ObservableProtocol } from "./_spec.ts";
import type { EventHandler, Observer, Subscription } from "./_types.ts";
import type { Teardown } from "./disposable.ts";

import { getConfig } from "./config.ts";
import { isTeardown, runTeardown } from "./disposable.ts";
import { ProtocolViolationError, reportProtocolViolation } from "./error.ts";
import { Event, isTerminal } from "./event.ts";
import { Symbol } from "./symbol.ts";

/** Options accepted by `subscribe()`. */
export interface SubscribeOptions {
  /** Aborting the signal unsubscribes. */
  signal?: AbortSignal;
}

/**
 * The function behind an Observable: runs once per subscriber and returns
 * the teardown for that subscriber.
 */
export type Producer<T> = (observer: SubscriptionObserver<T>) => Teardown;

/**
 * Per-subscription state, shared between the {@link Subscription} handed to
 * the consumer and the {@link SubscriptionObserver} handed to the producer.
 */
interface StateMap<T> {
  /** Unsubscribed, or a terminal event was delivered. */
  closed: boolean;

  /** A terminal event was accepted; it may still be waiting in the backlog. */
  terminated: boolean;

  observer: Observer<T> | null;

  cleanup: Teardown;

  removeAbortHandler: (() => void) | null;
}

function createSubscription<T>(
  observer: Observer<T>,
  opts?: SubscribeOptions | null,
): { subscription: Subscription; state: StateMap<T> } {
  if (observer.next !== undefined && typeof observer.next !== 'function') {
    throw new TypeError('Observer.next must be a function');
  }
  if (observer.error !== undefined && typeof observer.error !== 'function') {
    throw new TypeError('Observer.error must be a function');
  }
  if (observer.complete !== undefined && typeof observer.complete !== 'function') {
    throw new TypeError('Observer.complete must be a function');
  }

  const stateMap: StateMap<T> = {
    closed: false,
    terminated: false,
    observer,
    cleanup: null,
    removeAbortHandler: null,
  };

  const subscription: Subscription = {
    get [Symbol.toStringTag](): "Subscription" { return "Subscription" as const; },

    get closed() { return stateMap.closed; },

    unsubscribe(): void { closeSubscription(stateMap); },

    [Symbol.dispose]() {
      this.unsubscribe();
    },

    [Symbol.asyncDispose]() {
      return Promise.resolve(this.unsubscribe());
    }
  };

  const signal = opts?.signal;
  if (signal) {
    const abortHandler = () => subscription.unsubscribe();
    signal.addEventListener("abort", abortHandler, { once: true });
    stateMap.removeAbortHandler = () => signal.removeEventListener("abort", abortHandler);
  }

  return { subscription, state: stateMap };
}

function closeSubscription<T>(state: StateMap<T>): void {
  if (state.closed) return;

  // Mark closed first so nothing is delivered while the teardown runs
  state.closed = true;

  const cleanup = state.cleanup;
  const removeAbortHandler = state.removeAbortHandler;

  state.cleanup = null;
  state.observer = null;
  state.removeAbortHandler = null;

  removeAbortHandler?.();
  runTeardown(cleanup);
}

function reportToHost(err: unknown): void {
  queueMicrotask(() => { throw err; });
}

/**
 * The producer-side view of one subscription.
 *
 * @remarks
 * Producers push into it with `next`/`error`/`complete` (or `on(event)`);
 * it forwards to the consumer's observer while enforcing the event grammar
 * and serial delivery.
 *
 * @typeParam T - Type of values delivered.
 */
export class SubscriptionObserver<T> implements Observer<T> {
  #state: StateMap<T> | null;
  #subscription: Subscription | null;
  #backlog: Event<T>[] = [];
  #delivering = false;

  constructor(subscription: Subscription, state: StateMap<T>) {
    this.#subscription = subscription;
    this.#state = state;
  }

  /**
   * Whether delivery has stopped, because the consumer unsubscribed or a
   * terminal event went through. Long-running producers should poll this.
   */
  get closed(): boolean {
    return this.#state?.closed ?? true;
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
   * Delivers one event.
   *
   * @remarks
   * After unsubscribe the event is dropped. After a terminal event it is a
   * protocol violation and is reported, never delivered.
   */
  on(event: Event<T>): void {
    const state = this.#state;
    if (!state) return;

    if (state.terminated) {
      reportProtocolViolation(
        new ProtocolViolationError(event.kind, event.kind === "next" ? event.value : undefined)
      );
      return;
    }

    if (state.closed) return;
    if (isTerminal(event)) state.terminated = true;

    if (this.#delivering) {
      this.#backlog.push(event);
      return;
    }

    this.#delivering = true;
    try {
      let current: Event<T> | undefined = event;
      while (current) {
        this.#deliver(state, current);
        current = this.#backlog.shift();
      }
    } finally {
      this.#delivering = false;
    }
  }

  #deliver(state: StateMap<T>, event: Event<T>): void {
    const observer = state.observer;
    if (state.closed || !observer) return;

    switch (event.kind) {
      case "next": {
        const nextFn = observer.next;
        if (typeof nextFn !== 'function') return;
        try {
          nextFn.call(observer, event.value);
        } catch (err) {
          state.terminated = true;
          this.#fail(observer, err);
        }
        return;
      }

      case "error":
        this.#fail(observer, event.error);
        return;

      case "complete": {
        const completeFn = observer.complete;
        if (typeof completeFn === 'function') {
          try {
            completeFn.call(observer);
          } catch (err) {
            this.#fail(observer, err);
            return;
          }
        }
        this.#close();
        return;
      }
    }
  }

  #fail(observer: Observer<T>, err: unknown): void {
    this.#backlog.length = 0;

    const errorFn = observer.error;
    if (typeof errorFn === "function") {
      try { errorFn.call(observer, err); }
      catch (innerErr) { reportToHost(innerErr); }
    }

    // No error handler: delegate to the host
    else reportToHost(err);

    this.#close();
  }

  #close(): void {
    const subscription = this.#subscription;
    this.#subscription = null;
    subscription?.unsubscribe();
  }

  get [Symbol.toStringTag](): "Subscription Observer" { return "Subscription Observer" as const; }
}

function toObserver<T>(
  observerOrNext: Observer<T> | ((value: T) => void) | null | undefined,
  error?: (e: unknown) => void,
  complete?: () => void,
): Observer<T> {
  if (typeof observerOrNext === 'function') return { next: observerOrNext, error, complete };
  return observerOrNext ?? {};
}

/**
 * A cold, push-based sequence.
 *
 * @typeParam T - Type of values emitted.
 *
 * @example
 * ```ts
 * const greetings = Observable.of("hello", "world");
 * greetings.subscribe({
 *   next: word => console.log(word),
 *   complete: () => console.log("done"),
 * });
 * ```
 */
export class Observable<T> implements SpecObservable<T>, ObservableProtocol<T> {
  #producer: Producer<T> | null;

  /**
   * @param producer - Runs once per subscriber. Subclasses that override
   * {@link Observable.produce} may omit it.
   */
  constructor(producer?: Producer<T>) {
    if (producer !== undefined && typeof producer !== 'function') {
      throw new TypeError('Observable producer must be a function');
    }
    this.#producer = producer ?? null;
  }

  /**
   * Starts production for one subscriber. Without a producer the sequence
   * never emits.
   */
  protected produce(observer: SubscriptionObserver<T>): Teardown {
    return this.#producer?.call(undefined, observer);
  }

  [Symbol.observable](): Observable<T> { return this; }

  /**
   * Admits an observer.
   *
   * @returns The handle that stops delivery to this observer.
   */
  subscribe(observer: Observer<T>, opts?: SubscribeOptions): Subscription;
  subscribe(
    next: (value: T) => void,
    error?: (e: unknown) => void,
    complete?: () => void,
    opts?: SubscribeOptions,
  ): Subscription;
  subscribe(
    observerOrNext: Observer<T> | ((value: T) => void),
    errorOrOpts?: ((e: unknown) => void) | SubscribeOptions,
    complete?: () => void,
    callbackOpts?: SubscribeOptions,
  ): Subscription {
    const callbacks = typeof observerOrNext === 'function';
    const observer = toObserver(
      observerOrNext,
      typeof errorOrOpts === 'function' ? errorOrOpts : undefined,
      complete,
    );
    const opts = callbacks ? callbackOpts : (typeof errorOrOpts === 'object' ? errorOrOpts : undefined);

    const { subscription, state } = createSubscription(observer, opts);
    const subObserver = new SubscriptionObserver<T>(subscription, state);

    if (opts?.signal?.aborted) {
      subscription.unsubscribe();
      return subscription;
    }

    try {
      observer.start?.(subscription);
      if (subscription.closed) return subscription;
    } catch (err) {
      // Report later, but hand back a closed subscription
      queueMicrotask(() => {
        getConfig().logger.error(err);
        throw err;
      });

      subscription.unsubscribe();
      return subscription;
    }

    try {
      const cleanup = this.produce(subObserver);

      if (!isTeardown(cleanup)) {
        throw new TypeError('Expected producer to return a function, an unsubscribe object, a disposable, or nothing');
      }

      if (subscription.closed) runTeardown(cleanup);
      else state.cleanup = cleanup;
    } catch (err) {
      subObserver.error(err);
    }

    return subscription;
  }

  /**
   * Subscribes with a single handler that receives every event as a tagged
   * {@link Event}.
   *
   * @example
   * ```ts
   * source.subscribeEvent(e => console.log(describeEvent(e)));
   * ```
   */
  subscribeEvent(handler: EventHandler<T>, opts?: SubscribeOptions): Subscription {
    return this.subscribe({
      next: value => handler(Event.next(value)),
      error: err => handler(Event.error(err)),
      complete: () => handler(Event.complete()),
    }, opts);
  }

  static create<T>(producer: Producer<T>): Observable<T> {
    return new Observable(producer);
  }

  static readonly of: typeof of = of;

  static readonly from: typeof from = from;

  static readonly empty: typeof empty = empty;

  static readonly never: typeof never = never;

  static readonly throwError: typeof throwError = throwError;

  static readonly defer: typeof defer = defer;

  get [Symbol.toStringTag](): string { return "Observable"; }
}

function isSpecObservable<T>(value: object): value is SpecObservable<T> {
  return typeof Reflect.get(value, Symbol.observable) === 'function';
}

function isIterable<T>(value: object): value is Iterable<T> {
  return typeof Reflect.get(value, Symbol.iterator) === 'function';
}

/** Emits each argument in order, then completes. */
export function of<T>(...items: T[]): Observable<T> {
  return from(items);
}

/**
 * Converts an iterable, a promise or an Observable-like into an Observable.
 *
 * @remarks
 * Iteration stops as soon as the subscriber unsubscribes. A promise emits its
 * value then completes, or errors with its rejection reason.
 */
export function from<T>(input: SpecObservable<T> | Iterable<T> | PromiseLike<T>): Observable<T> {
  if (input === null || input === undefined) {
    throw new TypeError('Cannot convert undefined or null to Observable');
  }

  if (input instanceof Observable) return input;

  if (isSpecObservable<T>(input)) {
    const foreign = input[Symbol.observable]();
    if (!foreign || typeof foreign.subscribe !== 'function') {
      throw new TypeError('Object returned from [Symbol.observable]() does not implement subscribe');
    }
    return new Observable<T>(observer => {
      const sub = foreign.subscribe(observer);
      return () => sub.unsubscribe();
    });
  }

  if (isIterable<T>(input)) {
    const iterable = input;
    return new Observable<T>(observer => {
      for (const item of iterable) {
        observer.next(item);
        if (observer.closed) return;
      }
      observer.complete();
    });
  }

  const promise = input;
  if (typeof promise.then === 'function') {
    return new Observable<T>(observer => {
      promise.then(
        value => {
          observer.next(value);
          observer.complete();
        },
        err => observer.error(err),
      );
    });
  }

  throw new TypeError('Input is not an Observable, Iterable or Promise');
}

/** Completes immediately. */
export function empty<T = never>(): Observable<T> {
  return new Observable<T>(observer => observer.complete());
}

/** Never emits, never terminates. */
export function never<T = never>(): Observable<T> {
  return new Observable<T>(() => undefined);
}

/** Errors immediately with `error`. */
export function throwError<T = never>(error: unknown): Observable<T> {
  return new Observable<T>(observer => observer.error(error));
}

/**
 * Builds a fresh source per subscriber. A throwing factory becomes an error
 * event.
 */
export function defer<T>(factory: () => SpecObservable<T> | Iterable<T> | PromiseLike<T>): Observable<T> {
  return new Observable<T>(observer => from(factory()).subscribe(observer));
}
