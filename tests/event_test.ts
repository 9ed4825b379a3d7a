import { expect, test, vi } from "vitest";

import { Event, describeEvent, dispatch, isNext, isTerminal } from "../event.ts";

test("constructors build tagged, frozen events", () => {
  const next = Event.next(1);
  const error = Event.error("bad");

  expect(next).toEqual({ kind: "next", value: 1 });
  expect(error).toEqual({ kind: "error", error: "bad" });
  expect(Event.complete()).toEqual({ kind: "complete" });
  expect(Object.isFrozen(next)).toBe(true);
  expect(Object.isFrozen(error)).toBe(true);
});

test("completion is a shared value", () => {
  expect(Event.complete()).toBe(Event.complete());
});

test("isNext and isTerminal", () => {
  expect(isNext(Event.next(0))).toBe(true);
  expect(isTerminal(Event.next(0))).toBe(false);
  expect(isTerminal(Event.error(new Error("x")))).toBe(true);
  expect(isTerminal(Event.complete())).toBe(true);
});

test("describeEvent gives the debug form", () => {
  expect(describeEvent(Event.next("x"))).toBe("next(x)");
  expect(describeEvent(Event.next(42))).toBe("next(42)");
  expect(describeEvent(Event.error(new TypeError("broken")))).toBe("error(broken)");
  expect(describeEvent(Event.error("plain"))).toBe("error(plain)");
  expect(describeEvent(Event.complete())).toBe("completed");
});

test("dispatch calls the matching callback", () => {
  const observer = { next: vi.fn(), error: vi.fn(), complete: vi.fn() };

  dispatch(observer, Event.next("a"));
  dispatch(observer, Event.error("e"));
  dispatch(observer, Event.complete());

  expect(observer.next).toHaveBeenCalledWith("a");
  expect(observer.error).toHaveBeenCalledWith("e");
  expect(observer.complete).toHaveBeenCalledTimes(1);
});

test("dispatch skips missing callbacks", () => {
  expect(() => dispatch<number>({}, Event.next(1))).not.toThrow();
});
