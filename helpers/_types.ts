// @filename: helpers/_types.ts
import type { Observable } from "../observable.ts";

/**
 * A composable stage: takes a source and returns the derived Observable.
 */
export type Operator<In, Out> = (source: Observable<In>) => Observable<Out>;

