import { vi } from "vitest";

import type { SpecObservable } from "../../_spec.ts";
import type { Subscription } from "../../_types.ts";
import type { RuntimeConfig } from "../../config.ts";

import { configure } from "../../config.ts";
import { describeEvent } from "../../event.ts";
import type { SubscriptionObserver } from "../../observable.ts";
import { Observable, from } from "../../observable.ts";
import { currentScheduler } from "../../scheduler.ts";

/**
 * Subscribes and records every event in its debug form, e.g. `next(x)`.
 */
export function record<T>(source: SpecObservable<T>): { events: string[]; subscription: Subscription } {
  const events: string[] = [];
  const subscription = from(source).subscribeEvent(e => { events.push(describeEvent(e)); });
  return { events, subscription };
}

/**
 * Like {@link record}, but each entry also names the scheduler the event
 * was delivered on (`-` outside any scheduler).
 */
export function recordWithContext<T>(source: SpecObservable<T>): { events: string[]; subscription: Subscription } {
  const events: string[] = [];
  const subscription = from(source).subscribeEvent(e => {
    events.push(`${describeEvent(e)}@${currentScheduler()?.name ?? "-"}`);
  });
  return { events, subscription };
}

/**
 * Replaces the logger and the fatal hook with spies.
 */
export function captureDiagnostics(overrides: Partial<RuntimeConfig> = {}) {
  const logger = { error: vi.fn(), warn: vi.fn() };
  const fatal = vi.fn<(error: Error) => void>();
  configure({ logger, fatal, ...overrides });
  return { logger, fatal };
}

/**
 * An Observable that hands every subscriber's producer-side observer to the
 * test, so events can be pushed by hand.
 */
export function manualSource<T>(teardown?: () => void): { source: Observable<T>; observers: SubscriptionObserver<T>[] } {
  const observers: SubscriptionObserver<T>[] = [];
  const source = new Observable<T>(observer => {
    observers.push(observer);
    return teardown;
  });
  return { source, observers };
}
