// @filename: event.ts
/**
 * The event grammar of a subscription.
 *
 * Every notification an observer receives is one of three tagged values:
 * `next(value)`, `error(cause)` or `complete`. For any single subscription the
 * sequence follows `next* (error | complete)?`, so once a terminal event is
 * seen nothing else may follow it.
 *
 * Using a tagged union instead of loosely typed callbacks means consumers
 * switch on `kind` and TypeScript narrows the payload for them:
 *
 * @example
 * ```ts
 * import { Event, describeEvent } from "./event.ts";
 *
 * function log<T>(event: Event<T>) {
 *   switch (event.kind) {
 *     case "next": console.log("value", event.value); break;
 *     case "error": console.error("failed", event.error); break;
 *     case "complete": console.log("done"); break;
 *   }
 * }
 *
 * log(Event.next(1));
 * describeEvent(Event.complete()); // "completed"
 * ```
 *
 * @module
 */
import type { SpecObserver } from "./_spec.ts";

/** A value notification. */
export interface NextEvent<T> {
  readonly kind: "next";
  readonly value: T;
}

/** A terminal failure notification. */
export interface ErrorEvent {
  readonly kind: "error";
  readonly error: unknown;
}

/** A terminal success notification. */
export interface CompleteEvent {
  readonly kind: "complete";
}

/** Terminal events end a subscription. */
export type TerminalEvent = ErrorEvent | CompleteEvent;

/**
 * One unit of the `next* (error | complete)?` grammar.
 *
 * @typeParam T - Type of the value carried by `next` events.
 */
export type Event<T> = NextEvent<T> | TerminalEvent;

const COMPLETE: CompleteEvent = Object.freeze({ kind: "complete" });

/**
 * Constructors for {@link Event} values. Every event is frozen.
 */
export const Event = {
  next<T>(value: T): NextEvent<T> {
    return Object.freeze({ kind: "next", value });
  },

  error(error: unknown): ErrorEvent {
    return Object.freeze({ kind: "error", error });
  },

  complete(): CompleteEvent {
    return COMPLETE;
  },
} as const;

export function isNext<T>(event: Event<T>): event is NextEvent<T> {
  return event.kind === "next";
}

/** Whether the event ends its subscription. */
export function isTerminal<T>(event: Event<T>): event is TerminalEvent {
  return event.kind !== "next";
}

/**
 * Routes an event to the matching observer callback. Missing callbacks are
 * skipped.
 */
export function dispatch<T>(observer: SpecObserver<T>, event: Event<T>): void {
  switch (event.kind) {
    case "next":
      observer.next?.(event.value);
      break;
    case "error":
      observer.error?.(event.error);
      break;
    case "complete":
      observer.complete?.();
      break;
  }
}

/**
 * Debug form of an event: `next(x)`, `error(reason)` or `completed`.
 */
export function describeEvent<T>(event: Event<T>): string {
  switch (event.kind) {
    case "next":
      return `next(${String(event.value)})`;
    case "error": {
      const cause = event.error;
      return `error(${cause instanceof Error ? cause.message : String(cause)})`;
    }
    case "complete":
      return "completed";
  }
}
