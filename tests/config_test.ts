import { afterEach, expect, test } from "vitest";

import { configure, getConfig, resetConfig } from "../config.ts";
import { MainScheduler, ManualScheduler } from "../scheduler.ts";

afterEach(() => {
  resetConfig();
});

test("the main scheduler defaults to the process-wide instance", () => {
  expect(getConfig().mainScheduler).toBe(MainScheduler.instance);
  expect(getConfig().logger).toBe(console);
});

test("configure returns the settings it replaced", () => {
  const manual = new ManualScheduler("main");
  const before = getConfig();

  const previous = configure({ mode: "production", mainScheduler: manual });

  expect(previous).toEqual(before);
  expect(getConfig().mode).toBe("production");
  expect(getConfig().mainScheduler).toBe(manual);

  configure(previous);
  expect(getConfig()).toEqual(before);
});

test("resetConfig restores the defaults", () => {
  configure({ mainScheduler: new ManualScheduler(), logger: { error() {}, warn() {} } });

  resetConfig();

  expect(getConfig().mainScheduler).toBe(MainScheduler.instance);
  expect(getConfig().logger).toBe(console);
});
