// @filename: observer.ts
/**
 * Ready-made observers.
 *
 * - {@link AnyObserver} adapts ad hoc callbacks into the observer contract.
 * - {@link Binder} is the sink for UI-like consumers: it only acts on
 *   values, always on its scheduler, and treats an error as a defect.
 *
 * @module
 */
import type { EventHandler, Observer } from "./_types.ts";
import type { Scheduler } from "./scheduler.ts";

import { getConfig } from "./config.ts";
import { ProtocolViolationError, reportBinderError, reportProtocolViolation } from "./error.ts";
import { Event, dispatch } from "./event.ts";

/** Optional callbacks, one per event kind. */
export interface ObserverHandlers<T> {
  next?: (value: T) => void;
  error?: (err: unknown) => void;
  complete?: () => void;
}

const noop = () => {};

/**
 * An observer built from independent handlers, each defaulting to a no-op.
 *
 * @remarks
 * Accepts either a handler object or a single event handler receiving
 * tagged {@link Event}s. The observer stops after its first terminal event;
 * anything sent afterwards is reported as a protocol violation.
 *
 * @example
 * ```ts
 * const log = new AnyObserver<string>(e => console.log(describeEvent(e)));
 * source.subscribe(log);
 *
 * const values = new AnyObserver<number>({ next: n => total += n });
 * ```
 */
export class AnyObserver<T> implements Observer<T> {
  #handler: EventHandler<T>;
  #stopped = false;

  constructor(handlers: ObserverHandlers<T> | EventHandler<T> = {}) {
    if (typeof handlers === "function") {
      this.#handler = handlers;
      return;
    }

    const onNext = handlers.next ?? noop;
    const onError = handlers.error ?? noop;
    const onComplete = handlers.complete ?? noop;
    this.#handler = event => {
      switch (event.kind) {
        case "next": onNext(event.value); break;
        case "error": onError(event.error); break;
        case "complete": onComplete(); break;
      }
    };
  }

  /** Whether a terminal event has been received. */
  get stopped(): boolean {
    return this.#stopped;
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

  on(event: Event<T>): void {
    if (this.#stopped) {
      reportProtocolViolation(
        new ProtocolViolationError(event.kind, event.kind === "next" ? event.value : undefined)
      );
      return;
    }
    if (event.kind !== "next") this.#stopped = true;
    this.#handler(event);
  }
}

export interface BinderOptions {
  /**
   * Where the action runs. Defaults to the configured main scheduler.
   */
  scheduler?: Scheduler;
}

/**
 * An observer that applies each value through `action` on a fixed
 * scheduler.
 *
 * @remarks
 * - Only values reach the action; completion is ignored.
 * - Every call is dispatched through {@link Binder.scheduler}, whatever
 *   context delivered the value.
 * - An error means the upstream pipeline was allowed to fail, which a
 *   binding never expects: it is logged, and in development it is fatal.
 *
 * @example
 * ```ts
 * const title = new Binder<string>(text => { label.text = text; });
 * names.subscribe(title);
 * ```
 */
export class Binder<T> implements Observer<T> {
  readonly scheduler: Scheduler;
  #action: (value: T) => void;

  constructor(action: (value: T) => void, options: BinderOptions = {}) {
    this.#action = action;
    this.scheduler = options.scheduler ?? getConfig().mainScheduler;
  }

  next(value: T): void {
    const action = this.#action;
    this.scheduler.schedule(() => action(value));
  }

  error(err: unknown): void {
    reportBinderError(err);
  }

  complete(): void {}

  on(event: Event<T>): void {
    dispatch(this, event);
  }
}
