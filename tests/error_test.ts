import { expect, test } from "vitest";

import { BinderError, DisposedError, ObservableError, ProtocolViolationError } from "../error.ts";

test("the report lists the operation, the cause and the tip", () => {
  const cause = new Error("boom");
  const error = new BinderError(cause);

  expect(error).toBeInstanceOf(ObservableError);
  expect(error.cause).toBe(cause);
  expect(error.errors).toEqual([cause]);
  expect(String(error)).toBe([
    "BinderError: Binding error: boom",
    "  in operation: binder",
    "  with errors:",
    "    1) Error: boom",
    "  tip: Binders sit at the end of pipelines that must not fail; handle the error upstream.",
  ].join("\n"));
});

test("the report includes the value being processed", () => {
  const error = new ProtocolViolationError("next", 5);

  expect(error.operation).toBe("next");
  expect(error.value).toBe(5);
  expect(error.errors).toEqual([]);
  expect(String(error)).toBe([
    'ProtocolViolationError: Observer received "next" after a terminal event',
    "  in operation: next",
    "  processing value: 5",
    "  tip: A sequence ends at its first error or complete; check the producer emits nothing afterwards.",
  ].join("\n"));
});

test("sections without content are left out", () => {
  expect(String(new DisposedError("PublishSubject"))).toBe(
    "DisposedError: PublishSubject has been disposed\n  in operation: PublishSubject",
  );
  expect(String(new ObservableError("plain"))).toBe("ObservableError: plain");
});
