import { afterEach, expect, test } from "vitest";

import { configure, resetConfig } from "../config.ts";
import { DisposedError } from "../error.ts";
import { of } from "../observable.ts";
import { ControlProperty, Variable } from "../property.ts";
import { ManualScheduler } from "../scheduler.ts";
import { captureDiagnostics, record, recordWithContext } from "./_utils/_record.ts";

afterEach(() => {
  resetConfig();
});

// -----------------------------------------------------------------------------
// Variable
// -----------------------------------------------------------------------------

test("Variable emits its current value, then every change", () => {
  const count = new Variable(0);
  const { events } = record(count.asObservable());

  count.value = 1;
  count.value = 2;

  expect(events).toEqual(["next(0)", "next(1)", "next(2)"]);
  expect(count.value).toBe(2);
});

test("closing a Variable completes subscribers and freezes it", () => {
  const count = new Variable(0);
  const { events } = record(count.asObservable());

  count.close();

  expect(events).toEqual(["next(0)", "completed"]);
  expect(count.closed).toBe(true);
  expect(() => { count.value = 1; }).toThrow(DisposedError);
});

test("a using block closes the Variable", () => {
  let events: string[] = [];
  {
    using name = new Variable("a");
    events = record(name.asObservable()).events;
  }
  expect(events).toEqual(["next(a)", "completed"]);
});

// -----------------------------------------------------------------------------
// ControlProperty
// -----------------------------------------------------------------------------

test("ControlProperty subscribers hear the value on its scheduler", () => {
  const main = new ManualScheduler("main");
  const prop = new ControlProperty("idle", { scheduler: main });
  const { events } = recordWithContext(prop.changes);

  expect(events).toEqual([]);
  main.flush();
  expect(events).toEqual(["next(idle)@main"]);
});

test("writes land on the property's scheduler", () => {
  const main = new ManualScheduler("main");
  const network = new ManualScheduler("network");
  const prop = new ControlProperty("idle", { scheduler: main });
  const { events } = recordWithContext(prop.changes);
  main.flush();

  network.schedule(() => prop.next("loaded"));
  network.flush();
  expect(prop.value).toBe("idle");

  main.flush();
  expect(prop.value).toBe("loaded");
  expect(events).toEqual(["next(idle)@main", "next(loaded)@main"]);
});

test("ControlProperty can be bound to a source", () => {
  const main = new ManualScheduler("main");
  const prop = new ControlProperty("", { scheduler: main });

  of("a", "b").subscribe(prop);
  main.flush();

  expect(prop.value).toBe("b");
  expect(prop.closed).toBe(false);
});

test("ControlProperty defaults to the configured main scheduler", () => {
  const main = new ManualScheduler("main");
  configure({ mainScheduler: main });

  expect(new ControlProperty(0).scheduler).toBe(main);
});

test("an error pushed into a ControlProperty is escalated, not emitted", () => {
  const { logger, fatal } = captureDiagnostics({ mode: "production" });
  const main = new ManualScheduler("main");
  const prop = new ControlProperty(1, { scheduler: main });
  const { events } = record(prop.changes);
  main.flush();

  prop.error(new Error("bad write"));
  main.flush();

  expect(events).toEqual(["next(1)"]);
  expect(logger.error).toHaveBeenCalledTimes(1);
  expect(fatal).not.toHaveBeenCalled();
  expect(prop.closed).toBe(false);
});

test("only close() completes a ControlProperty", () => {
  const main = new ManualScheduler("main");
  const prop = new ControlProperty(1, { scheduler: main });
  const { events } = record(prop.changes);
  main.flush();

  prop.complete();
  expect(prop.closed).toBe(false);

  prop.close();
  expect(events).toEqual(["next(1)", "completed"]);
  expect(prop.closed).toBe(true);
});
