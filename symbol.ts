// @filename: symbol.ts
/**
 * Well-known symbols used by the runtime.
 *
 * `Symbol.observable` is the interop point other Observable libraries look
 * for; `Symbol.dispose` / `Symbol.asyncDispose` let subscriptions, subjects
 * and dispose bags take part in explicit resource management.
 *
 * Node.js 20 ships the disposal symbols, older builds don't, so all three are
 * defined here when missing.
 *
 * @module
 */
export interface SymbolConstructor
  extends Omit<typeof globalThis.Symbol, "observable"> {
  /**
   * Well-known symbol for Observable interoperability.
   *
   * Objects with a `[Symbol.observable]()` method can be passed directly to
   * `Observable.from()`.
   *
   * @see {@link https://github.com/tc39/proposal-observable | TC39 Observable proposal}
   */
  readonly observable: unique symbol;
}

export const Symbol: SymbolConstructor = globalThis.Symbol as unknown as SymbolConstructor;

function define(name: "dispose" | "asyncDispose" | "observable") {
  if (typeof Reflect.get(Symbol, name) === "symbol") return;
  Reflect.defineProperty(Symbol, name, {
    value: globalThis.Symbol(`Symbol.${name}`),
    enumerable: false,
    configurable: false,
    writable: false,
  });
}

define("dispose");
define("asyncDispose");
define("observable");
