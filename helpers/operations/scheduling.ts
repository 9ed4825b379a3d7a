// @filename: helpers/operations/scheduling.ts
/**
 * Execution-context operators.
 *
 * - {@link subscribeOn} moves the act of subscribing (the producer's setup and
 *   anything it emits synchronously) onto a scheduler.
 * - {@link observeOn} moves the delivery of every event onto a scheduler.
 *
 * They compose with {@link pipe}: the usual shape is "produce on a background
 * context, observe on main".
 *
 * @example
 * ```ts
 * const io = new SerialScheduler("io");
 *
 * pipe(
 *   loadProfile,                      // producer work runs on "io"
 *   subscribeOn(io),
 *   observeOn(MainScheduler.instance) // observer runs on "main"
 * ).subscribe(render);
 * ```
 *
 * @module
 */
import type { Scheduler } from "../../scheduler.ts";
import type { Operator } from "../_types.ts";

import { SerialDisposable, disposable } from "../../disposable.ts";
import { Event } from "../../event.ts";
import { Observable } from "../../observable.ts";

/**
 * Subscribes to the source from inside an action on `scheduler`.
 *
 * @remarks
 * Only the subscription is relocated. Events emitted synchronously during
 * subscribe arrive on `scheduler`; events the producer emits later from other
 * contexts arrive wherever they are emitted. Disposal stops delivery at once,
 * cancels the pending subscribe if it has not run, and otherwise unsubscribes
 * from the source on `scheduler`.
 */
export function subscribeOn<T>(scheduler: Scheduler): Operator<T, T> {
  return source => new Observable<T>(observer => {
    const inner = new SerialDisposable();
    let started = false;

    const task = scheduler.schedule(() => {
      started = true;
      const upstream = source.subscribe(observer);
      inner.set(disposable(() => {
        scheduler.schedule(() => upstream.unsubscribe());
      }));
    });

    // A synchronous scheduler has already run the task
    if (!started) inner.set(task);

    return inner;
  });
}

/**
 * Re-delivers every event from the source on `scheduler`.
 *
 * @remarks
 * Events are queued per subscription and drained by one scheduled action at
 * a time, so delivery keeps the source's order and never overlaps, even on a
 * concurrent scheduler. After disposal nothing queued is delivered.
 */
export function observeOn<T>(scheduler: Scheduler): Operator<T, T> {
  return source => new Observable<T>(observer => {
    const queue: Event<T>[] = [];
    const pending = new SerialDisposable();
    let scheduled = false;

    // Events pushed while draining are picked up by the same loop
    const drain = () => {
      let event = queue.shift();
      while (event && !observer.closed) {
        observer.on(event);
        event = queue.shift();
      }
      if (observer.closed) queue.length = 0;
      scheduled = false;
    };

    const push = (event: Event<T>) => {
      if (observer.closed) return;
      queue.push(event);
      if (scheduled) return;
      scheduled = true;
      pending.set(scheduler.schedule(drain));
    };

    const upstream = source.subscribe({
      next: value => push(Event.next(value)),
      error: err => push(Event.error(err)),
      complete: () => push(Event.complete()),
    });

    return () => {
      upstream.unsubscribe();
      pending.unsubscribe();
      queue.length = 0;
    };
  });
}
