import { describe, expect, test } from "vitest";
import { compileSchedule, cronExpression, formatTriggerLine, nextRun, validateCronFields, type DeviceResolver } from "../src/cron/compiler.js";
import { ScheduleMode, TimeUnit, type ScheduleSpec } from "../src/cron/types.js";
import { ScheduleError } from "../src/errors.js";

function spec(overrides: Partial<ScheduleSpec> = {}): ScheduleSpec {
  return {
    mode: ScheduleMode.Disabled,
    time: 0,
    dayOfMonth: 1,
    weekday: 7,
    customHours: "8,12,18,23",
    repeat: { period: 1, unit: TimeUnit.Day },
    ...overrides,
  };
}

function expr(s: ScheduleSpec): string | null {
  const trigger = compileSchedule(s);
  return trigger && trigger.kind === "cron" ? cronExpression(trigger.fields) : null;
}

const resolver = (uuid: string | null): DeviceResolver => ({ uuidFromPath: () => uuid });

describe("schedule compiler", () => {
  test("disabled produces no trigger", () => {
    expect(compileSchedule(spec())).toBeNull();
  });

  test("boot trigger becomes an @reboot line", () => {
    const trigger = compileSchedule(spec({ mode: ScheduleMode.AtBoot }));
    expect(trigger).toEqual({ kind: "boot" });
    expect(formatTriggerLine(trigger, "backtide backup-job")).toBe("@reboot backtide backup-job");
  });

  test("fixed intervals", () => {
    expect(expr(spec({ mode: ScheduleMode.Every5Min }))).toBe("*/5 * * * *");
    expect(expr(spec({ mode: ScheduleMode.Every30Min }))).toBe("*/30 * * * *");
    expect(expr(spec({ mode: ScheduleMode.Hourly }))).toBe("0 * * * *");
    expect(expr(spec({ mode: ScheduleMode.Every6H }))).toBe("0 */6 * * *");
    expect(expr(spec({ mode: ScheduleMode.CustomHours, customHours: " 8,20 " }))).toBe("0 8,20 * * *");
  });

  test("time of day splits into hour and minute", () => {
    expect(expr(spec({ mode: ScheduleMode.Daily, time: 1345 }))).toBe("45 13 * * *");
    expect(expr(spec({ mode: ScheduleMode.Weekly, time: 0, weekday: 7 }))).toBe("0 0 * * 7");
    expect(expr(spec({ mode: ScheduleMode.Monthly, time: 830, dayOfMonth: 15 }))).toBe("30 8 15 * *");
    expect(expr(spec({ mode: ScheduleMode.Yearly, time: 2359 }))).toBe("59 23 1 1 *");
  });

  test("repeated intervals poll faster for short units", () => {
    expect(expr(spec({ mode: ScheduleMode.RepeatedInterval, repeat: { period: 3, unit: TimeUnit.Hour } }))).toBe("*/15 * * * *");
    expect(expr(spec({ mode: ScheduleMode.RepeatedInterval, repeat: { period: 2, unit: TimeUnit.Day } }))).toBe("*/15 * * * *");
    expect(expr(spec({ mode: ScheduleMode.RepeatedInterval, repeat: { period: 1, unit: TimeUnit.Week } }))).toBe("0 * * * *");
    expect(expr(spec({ mode: ScheduleMode.RepeatedInterval, repeat: { period: 1, unit: TimeUnit.Month } }))).toBe("0 * * * *");
  });

  test("device trigger prefers the resolved uuid", () => {
    const destination = { mode: "local", path: "/media/usb/backups", cachedUuid: "old-uuid" };
    const trigger = compileSchedule(spec({ mode: ScheduleMode.OnDeviceConnect }), { destination, resolver: resolver("1234-abcd") });
    expect(trigger).toEqual({ kind: "device", uuid: "1234-abcd", cached: false });
    expect(formatTriggerLine(trigger, "x")).toBeNull();
  });

  test("device trigger falls back to the cached uuid", () => {
    const destination = { mode: "local_encfs", path: "/media/usb", cachedUuid: "old-uuid" };
    const trigger = compileSchedule(spec({ mode: ScheduleMode.OnDeviceConnect }), { destination, resolver: resolver(null) });
    expect(trigger).toEqual({ kind: "device", uuid: "old-uuid", cached: true });
  });

  test("device trigger errors", () => {
    const s = spec({ mode: ScheduleMode.OnDeviceConnect });
    expect(() => compileSchedule(s)).toThrow(ScheduleError);
    expect(() => compileSchedule(s, { destination: { mode: "ssh", path: "/x", cachedUuid: "" }, resolver: resolver("u") }))
      .toThrow("Schedule on device connect doesn't work with mode ssh");
    expect(() => compileSchedule(s, { destination: { mode: "local", path: "/mnt/x", cachedUuid: "" }, resolver: resolver(null) }))
      .toThrow('Couldn\'t find UUID for "/mnt/x"');
  });

  test("fields cron would reject are refused", () => {
    expect(() => compileSchedule(spec({ mode: ScheduleMode.CustomHours, customHours: "" }))).toThrow(ScheduleError);
    expect(() => compileSchedule(spec({ mode: ScheduleMode.Weekly, weekday: 9 }))).toThrow(ScheduleError);
    expect(() => validateCronFields({ minute: "0", hour: "8 9", dayOfMonth: "*", month: "*", dayOfWeek: "*" }))
      .toThrow('Invalid cron expression "0 8 9 * * *": every field needs a value');
    expect(() => validateCronFields({ minute: "0", hour: "*/3", dayOfMonth: "*", month: "*", dayOfWeek: "*" })).not.toThrow();
  });

  test("nextRun follows the expression", () => {
    const from = new Date(2026, 9, 19, 10, 0);
    const next = nextRun({ minute: "45", hour: "13", dayOfMonth: "*", month: "*", dayOfWeek: "*" }, from);
    expect(next).toEqual(new Date(2026, 9, 19, 13, 45));
    expect(nextRun({ minute: "bogus", hour: "*", dayOfMonth: "*", month: "*", dayOfWeek: "*" }, from)).toBeNull();
  });
});
