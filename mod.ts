/**
 * A push-based reactive stream core: observables, subjects and schedulers.
 *
 * Events flow from a producer to its observers as `next* (error | complete)?`.
 * Subjects let imperative code feed that flow and decide what late
 * subscribers get to see; schedulers decide on which execution context a
 * piece of the pipeline runs.
 *
 * ## Subjects at a glance
 *
 * ```ts
 * import { PublishSubject, ReplaySubject, BehaviorSubject, AsyncSubject } from "./mod.ts";
 *
 * const publish = new PublishSubject<string>();  // live values only
 * const replay = ReplaySubject.create<string>(2); // last 2 values, then live
 * const state = new BehaviorSubject("idle");      // current value, then live
 * const result = new AsyncSubject<number>();      // last value, at completion
 * ```
 *
 * ## Moving work between contexts
 *
 * ```ts
 * import { Observable, SerialScheduler, MainScheduler, pipe, subscribeOn, observeOn } from "./mod.ts";
 *
 * const io = new SerialScheduler("io");
 *
 * const profile = new Observable<string>(observer => {
 *   // runs on "io"
 *   const request = startRequest(body => {
 *     observer.next(body);
 *     observer.complete();
 *   });
 *   return () => request.cancel();
 * });
 *
 * using sub = pipe(profile, subscribeOn(io), observeOn(MainScheduler.instance))
 *   .subscribe(body => render(body)); // runs on "main"
 * ```
 *
 * ## Binding to consumers
 *
 * ```ts
 * import { Binder, ControlProperty } from "./mod.ts";
 *
 * const title = new Binder<string>(text => { label.text = text; });
 * const query = new ControlProperty("");
 * ```
 *
 * Errors that reach a binder are defects: fatal in development, logged in
 * production. Switch with `configure({ mode: "production" })`.
 *
 * @module
 */
export * from "./event.ts";
export * from "./disposable.ts";
export * from "./observable.ts";
export * from "./observer.ts";
export * from "./subjects.ts";
export * from "./scheduler.ts";
export * from "./property.ts";
export * from "./config.ts";
export * from "./error.ts";
export * from "./helpers/mod.ts";
export { Symbol } from "./symbol.ts";

export type * from "./_types.ts";
