// @filename: error.ts
/**
 * Error types raised by the runtime, and the reporting policy for defects.
 *
 * Producer failures are not thrown: they travel as `error` events. The
 * classes below describe the other two cases, programming defects (an event
 * after a terminal event, an error reaching a binder) and use of something
 * already disposed.
 *
 * @module
 */
import { getConfig } from "./config.ts";

export interface ObservableErrorOptions {
  /** Operation that raised the error, e.g. `"binder"`. */
  operation?: string;
  /** Value involved when the error happened. */
  value?: unknown;
  /** Underlying failure; also listed in `errors`. */
  cause?: unknown;
  /** How to fix it, if there is something to say. */
  tip?: string;
}

/**
 * Base error of the runtime, carrying the operation it came from.
 *
 * `toString()` gives a multi-line report, which is what the logger receives:
 *
 * ```text
 * BinderError: Binding error: boom
 *   in operation: binder
 *   with errors:
 *     1) Error: boom
 *   tip: ...
 * ```
 */
export class ObservableError extends AggregateError {
  readonly operation?: string;
  readonly value?: unknown;
  readonly tip?: string;

  constructor(message: string, options: ObservableErrorOptions = {}) {
    const { cause } = options;
    super(cause === undefined ? [] : [cause], message, { cause });
    this.name = 'ObservableError';
    this.operation = options.operation;
    this.value = options.value;
    this.tip = options.tip;
  }

  override toString(): string {
    const lines = [`${this.name}: ${this.message}`];

    if (this.operation) lines.push(`  in operation: ${this.operation}`);
    if (this.value !== undefined) lines.push(`  processing value: ${String(this.value)}`);

    if (this.errors.length > 0) {
      lines.push('  with errors:');
      this.errors.forEach((err, i) => lines.push(`    ${i + 1}) ${String(err)}`));
    }

    if (this.tip) lines.push(`  tip: ${this.tip}`);
    return lines.join('\n');
  }
}

/**
 * An event was delivered to an observer after its terminal event.
 */
export class ProtocolViolationError extends ObservableError {
  constructor(attempted: "next" | "error" | "complete", value?: unknown) {
    super(`Observer received "${attempted}" after a terminal event`, {
      operation: attempted,
      value,
      tip: "A sequence ends at its first error or complete; check the producer emits nothing afterwards.",
    });
    this.name = 'ProtocolViolationError';
  }
}

/**
 * An error event reached a {@link Binder}, which only handles values.
 */
export class BinderError extends ObservableError {
  constructor(cause: unknown) {
    super(`Binding error: ${cause instanceof Error ? cause.message : String(cause)}`, {
      operation: "binder",
      cause,
      tip: "Binders sit at the end of pipelines that must not fail; handle the error upstream.",
    });
    this.name = 'BinderError';
  }
}

/**
 * The object was disposed and can no longer be used.
 */
export class DisposedError extends ObservableError {
  constructor(what: string) {
    super(`${what} has been disposed`, { operation: what });
    this.name = 'DisposedError';
  }
}

/**
 * Reports a protocol violation: fatal in development, ignored in production.
 */
export function reportProtocolViolation(error: ProtocolViolationError): void {
  const { mode, logger, fatal } = getConfig();
  if (mode === "production") return;

  logger.error(String(error));
  fatal(error);
}

/**
 * Escalates an error that reached a binder: logged and fatal in
 * development, logged only in production. The error never reaches the
 * binder's action.
 */
export function reportBinderError(cause: unknown): void {
  const { mode, logger, fatal } = getConfig();
  const error = cause instanceof BinderError ? cause : new BinderError(cause);

  logger.error(String(error));
  if (mode === "development") fatal(error);
}
