// @filename: config.ts
/**
 * Process-wide runtime settings.
 *
 * The settings are initialised once when the module loads and can be
 * overridden at any time, which is how tests swap the main scheduler for a
 * deterministic one or turn the development fail-fast into a spy.
 *
 * @example
 * ```ts
 * import { configure } from "./config.ts";
 * import { ManualScheduler } from "./scheduler.ts";
 *
 * const main = new ManualScheduler("main");
 * const previous = configure({ mainScheduler: main, mode: "production" });
 * // ...
 * configure(previous);
 * ```
 *
 * @module
 */
import process from "node:process";

import type { Scheduler } from "./scheduler.ts";
import { MainScheduler } from "./scheduler.ts";

/**
 * `development` fails fast on defects, `production` logs or ignores them.
 */
export type RuntimeMode = "development" | "production";

/** Where diagnostics are written. `console` satisfies it. */
export interface Logger {
  error(...args: unknown[]): void;
  warn(...args: unknown[]): void;
}

export interface RuntimeConfig {
  mode: RuntimeMode;
  logger: Logger;
  /**
   * Called with a defect that must stop the program in development.
   */
  fatal: (error: Error) => void;
  /**
   * Default scheduler for binders and control properties.
   */
  mainScheduler: Scheduler;
}

function modeFromEnv(): RuntimeMode {
  return process.env.NODE_ENV === "production" ? "production" : "development";
}

// Rethrown outside the current job so it surfaces as an uncaught exception
function hostFatal(error: Error): void {
  queueMicrotask(() => { throw error; });
}

interface State {
  mode: RuntimeMode;
  logger: Logger;
  fatal: (error: Error) => void;
  mainScheduler: Scheduler | null;
}

const state: State = {
  mode: modeFromEnv(),
  logger: console,
  fatal: hostFatal,
  mainScheduler: null,
};

/**
 * Current settings. The main scheduler is created on first read.
 */
export function getConfig(): RuntimeConfig {
  state.mainScheduler ??= MainScheduler.instance;
  return {
    mode: state.mode,
    logger: state.logger,
    fatal: state.fatal,
    mainScheduler: state.mainScheduler,
  };
}

/**
 * Overrides some settings and returns the full set that was in effect before,
 * so callers can restore it.
 */
export function configure(overrides: Partial<RuntimeConfig>): RuntimeConfig {
  const previous = getConfig();
  if (overrides.mode !== undefined) state.mode = overrides.mode;
  if (overrides.logger !== undefined) state.logger = overrides.logger;
  if (overrides.fatal !== undefined) state.fatal = overrides.fatal;
  if (overrides.mainScheduler !== undefined) state.mainScheduler = overrides.mainScheduler;
  return previous;
}

/** Restores the settings the process started with. */
export function resetConfig(): void {
  state.mode = modeFromEnv();
  state.logger = console;
  state.fatal = hostFatal;
  state.mainScheduler = null;
}
