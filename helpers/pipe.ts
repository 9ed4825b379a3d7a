// @filename: helpers/pipe.ts
// Composition utility for Observable operators

import type { SpecObservable } from "../_spec.ts";
import type { Operator } from "./_types.ts";

import { Observable, from } from "../observable.ts";

/**
 * Threads a source through operators, left to right.
 *
 * @remarks
 * The source may be any Observable-like; it is converted with
 * `Observable.from()` first. Each operator receives the previous stage's
 * Observable.
 *
 * @example
 * ```ts
 * const onMain = pipe(
 *   source,
 *   subscribeOn(new SerialScheduler("io")),
 *   observeOn(MainScheduler.instance),
 * );
 * ```
 */
// Overload 0: No operator
export function pipe<T>(
  source: SpecObservable<T>,
): Observable<T>;

// Overload 1: Single operator
export function pipe<T, A>(
  source: SpecObservable<T>,
  op1: Operator<T, A>
): Observable<A>;

// Overload 2: Two operators
export function pipe<T, A, B>(
  source: SpecObservable<T>,
  op1: Operator<T, A>,
  op2: Operator<A, B>
): Observable<B>;

// Overload 3: Three operators
export function pipe<T, A, B, C>(
  source: SpecObservable<T>,
  op1: Operator<T, A>,
  op2: Operator<A, B>,
  op3: Operator<B, C>
): Observable<C>;

// Overload 4: Four operators
export function pipe<T, A, B, C, D>(
  source: SpecObservable<T>,
  op1: Operator<T, A>,
  op2: Operator<A, B>,
  op3: Operator<B, C>,
  op4: Operator<C, D>
): Observable<D>;

// Overload 5: Five operators
export function pipe<T, A, B, C, D, E>(
  source: SpecObservable<T>,
  op1: Operator<T, A>,
  op2: Operator<A, B>,
  op3: Operator<B, C>,
  op4: Operator<C, D>,
  op5: Operator<D, E>
): Observable<E>;

export function pipe(
  source: SpecObservable<unknown>,
  ...operators: Operator<unknown, unknown>[]
): Observable<unknown> {
  let result: Observable<unknown> = from(source);
  for (const operator of operators) {
    result = operator(result);
  }
  return result;
}
