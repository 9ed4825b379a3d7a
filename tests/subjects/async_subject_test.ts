import { expect, test } from "vitest";

import { AsyncSubject } from "../../subjects.ts";
import { record } from "../_utils/_record.ts";

test("emits only the last value, at completion", () => {
  const subject = new AsyncSubject<string>();
  const early = record(subject);

  subject.next("a");
  subject.next("b");
  subject.next("c");
  expect(early.events).toEqual([]);

  subject.complete();

  expect(early.events).toEqual(["next(c)", "completed"]);
});

test("a subscriber joining after completion receives the last value and completion", () => {
  const subject = new AsyncSubject<string>();
  subject.next("a");
  subject.next("c");
  subject.complete();

  expect(record(subject).events).toEqual(["next(c)", "completed"]);
});

test("completion without values emits only completion", () => {
  const subject = new AsyncSubject<number>();
  const early = record(subject);
  subject.complete();

  expect(early.events).toEqual(["completed"]);
  expect(record(subject).events).toEqual(["completed"]);
});

test("an error discards the buffered value", () => {
  const subject = new AsyncSubject<number>();
  const early = record(subject);

  subject.next(1);
  subject.error(new Error("boom"));

  expect(early.events).toEqual(["error(boom)"]);
  expect(record(subject).events).toEqual(["error(boom)"]);
});

test("values after completion are ignored", () => {
  const subject = new AsyncSubject<number>();
  subject.next(1);
  subject.complete();
  subject.next(2);

  expect(record(subject).events).toEqual(["next(1)", "completed"]);
});
