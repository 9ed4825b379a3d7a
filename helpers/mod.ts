// @filename: helpers/mod.ts
/**
 * Composition helpers.
 *
 * The runtime deliberately ships no operator algebra (map, filter, zip...).
 * What is here is the plumbing to relocate work between execution contexts,
 * plus `pipe` to chain it.
 *
 * @example
 * ```ts
 * import { pipe, subscribeOn, observeOn } from "./helpers/mod.ts";
 *
 * pipe(source, subscribeOn(worker), observeOn(main)).subscribe(render);
 * ```
 *
 * @module
 */
export type * from "./_types.ts";

export * from "./pipe.ts";
export * from "./operations/scheduling.ts";
