// @filename: disposable.ts
/**
 * Disposal primitives.
 *
 * A subscription, a scheduled action and a subject's registration all end the
 * same way: something gets disposed once and only once. This module holds the
 * shared pieces, the {@link Teardown} shapes a producer may hand back, a
 * stand-alone disposable handle, and two containers for handles,
 * {@link DisposeBag} and {@link SerialDisposable}.
 *
 * @module
 */
import type { SpecSubscription } from "./_spec.ts";
import type { Subscription } from "./_types.ts";
import { Symbol } from "./symbol.ts";

/**
 * Anything that can release a resource: a function, a subscription or an
 * object implementing `Symbol.dispose` / `Symbol.asyncDispose`.
 */
export type Teardown = (() => void) | SpecSubscription | AsyncDisposable | Disposable | null | undefined | void;

export function isTeardown(value: unknown): value is Teardown {
  if (value === null || value === undefined) return true;
  if (typeof value === "function") return true;
  if (typeof value !== "object") return false;
  return (
    typeof Reflect.get(value, "unsubscribe") === "function" ||
    typeof Reflect.get(value, Symbol.dispose) === "function" ||
    typeof Reflect.get(value, Symbol.asyncDispose) === "function"
  );
}

/**
 * Runs a teardown. Errors are reported to the host on the microtask queue so
 * one failing teardown never stops the rest of a disposal.
 */
export function runTeardown(teardown: Teardown): void {
  if (!teardown) return;
  try {
    if (typeof teardown === "function") teardown();
    else if ("unsubscribe" in teardown && typeof teardown.unsubscribe === "function")
      teardown.unsubscribe();
    else if (Symbol.dispose in teardown && typeof teardown[Symbol.dispose] === "function")
      teardown[Symbol.dispose]();
    else if (Symbol.asyncDispose in teardown && typeof teardown[Symbol.asyncDispose] === "function")
      teardown[Symbol.asyncDispose]().then(undefined, (err: unknown) => queueMicrotask(() => { throw err; }));
  } catch (err) {
    queueMicrotask(() => { throw err; });
  }
}

/**
 * Creates a stand-alone disposal handle around a teardown.
 *
 * @remarks
 * The teardown runs on the first `unsubscribe()` and never again. Without a
 * teardown the handle is an empty disposable that only records `closed`.
 *
 * @example
 * ```ts
 * const timer = setInterval(tick, 1000);
 * const handle = disposable(() => clearInterval(timer));
 * handle.unsubscribe();
 * handle.unsubscribe(); // no-op
 * ```
 */
export function disposable(teardown?: Teardown): Subscription {
  let closed = false;
  let pending: Teardown = teardown;

  return {
    get [Symbol.toStringTag](): "Subscription" { return "Subscription" as const; },
    get closed() { return closed; },
    unsubscribe() {
      if (closed) return;
      closed = true;
      const current = pending;
      pending = null;
      runTeardown(current);
    },
    [Symbol.dispose]() { this.unsubscribe(); },
    [Symbol.asyncDispose]() { return Promise.resolve(this.unsubscribe()); },
  };
}

/**
 * Collects subscriptions and disposes them together.
 *
 * @remarks
 * Anything added after the bag was disposed is disposed right away, so a
 * late subscription can't outlive the bag's owner.
 *
 * @example
 * ```ts
 * const bag = new DisposeBag();
 * bag.add(source.subscribe(render));
 * bag.add(other.subscribe(log));
 * // leaving the screen
 * bag.dispose();
 * ```
 */
export class DisposeBag implements Disposable, AsyncDisposable {
  #items: Teardown[] = [];
  #disposed = false;

  get disposed(): boolean { return this.#disposed; }

  /** Number of teardowns waiting for disposal. */
  get size(): number { return this.#items.length; }

  add(teardown: Teardown): this {
    if (!teardown) return this;
    if (this.#disposed) runTeardown(teardown);
    else this.#items.push(teardown);
    return this;
  }

  dispose(): void {
    if (this.#disposed) return;
    this.#disposed = true;

    const items = this.#items;
    this.#items = [];
    for (const item of items) runTeardown(item);
  }

  [Symbol.dispose](): void { this.dispose(); }

  [Symbol.asyncDispose](): Promise<void> { return Promise.resolve(this.dispose()); }

  get [Symbol.toStringTag](): "DisposeBag" { return "DisposeBag"; }
}

/**
 * Holds at most one teardown; replacing it disposes the previous one.
 * Once disposed, every new teardown is disposed immediately.
 */
export class SerialDisposable implements Subscription {
  #current: Teardown = null;
  #closed = false;

  get closed(): boolean { return this.#closed; }

  set(teardown: Teardown): void {
    if (this.#closed) {
      runTeardown(teardown);
      return;
    }
    const previous = this.#current;
    this.#current = teardown;
    runTeardown(previous);
  }

  unsubscribe(): void {
    if (this.#closed) return;
    this.#closed = true;
    const current = this.#current;
    this.#current = null;
    runTeardown(current);
  }

  [Symbol.dispose](): void { this.unsubscribe(); }

  [Symbol.asyncDispose](): Promise<void> { return Promise.resolve(this.unsubscribe()); }

  get [Symbol.toStringTag](): "Subscription" { return "Subscription"; }
}
