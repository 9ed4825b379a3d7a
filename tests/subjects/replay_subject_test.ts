import { expect, test } from "vitest";

import type { Subscription } from "../../_types.ts";
import { ReplaySubject } from "../../subjects.ts";
import { record } from "../_utils/_record.ts";

test("a buffer of one replays only the latest value", () => {
  const subject = ReplaySubject.create<string>(1);

  const s1 = record(subject);
  subject.next("x");
  subject.next("y");
  const s2 = record(subject);
  subject.next("z");

  expect(s1.events).toEqual(["next(x)", "next(y)", "next(z)"]);
  expect(s2.events).toEqual(["next(y)", "next(z)"]);
});

test("a late subscriber receives the last k values, oldest first, then live ones", () => {
  const subject = ReplaySubject.create<number>(3);
  for (const n of [1, 2, 3, 4, 5]) subject.next(n);

  const s = record(subject);
  subject.next(6);

  expect(s.events).toEqual(["next(3)", "next(4)", "next(5)", "next(6)"]);
});

test("fewer values than the buffer size are all replayed", () => {
  const subject = ReplaySubject.create<number>(5);
  subject.next(1);
  subject.next(2);

  expect(record(subject).events).toEqual(["next(1)", "next(2)"]);
});

test("an unbounded buffer replays everything", () => {
  const subject = ReplaySubject.createUnbounded<number>();
  for (let i = 1; i <= 100; i++) subject.next(i);

  const { events } = record(subject);

  expect(events).toHaveLength(100);
  expect(events[0]).toBe("next(1)");
  expect(events[99]).toBe("next(100)");
  expect(subject.bufferSize).toBe(Infinity);
});

test("after completion the buffer is replayed before the completion", () => {
  const subject = ReplaySubject.create<string>(2);
  subject.next("a");
  subject.next("b");
  subject.next("c");
  subject.complete();

  expect(record(subject).events).toEqual(["next(b)", "next(c)", "completed"]);
});

test("after an error the buffer is replayed before the error", () => {
  const subject = ReplaySubject.create<number>(2);
  subject.next(1);
  subject.error(new Error("boom"));

  expect(record(subject).events).toEqual(["next(1)", "error(boom)"]);
});

test("unsubscribing during replay stops the replay", () => {
  const subject = ReplaySubject.create<number>(3);
  subject.next(1);
  subject.next(2);
  subject.next(3);

  const seen: number[] = [];
  let subscription: Subscription | null = null;
  subject.subscribe({
    start: s => { subscription = s; },
    next: v => {
      seen.push(v);
      if (v === 2) subscription?.unsubscribe();
    },
  });

  expect(seen).toEqual([1, 2]);
  expect(subject.hasObservers).toBe(false);
});

test("an emission made during replay arrives after the whole buffer", () => {
  const subject = ReplaySubject.create<string>(2);
  subject.next("a");
  subject.next("b");

  const seen: string[] = [];
  subject.subscribe(v => {
    seen.push(v);
    if (v === "a") subject.next("c");
  });

  expect(seen).toEqual(["a", "b", "c"]);
  expect(record(subject).events).toEqual(["next(b)", "next(c)"]);
});

test("buffer size below one is rejected", () => {
  expect(() => ReplaySubject.create(0)).toThrow("Replay buffer size must be at least 1, got 0");
});
