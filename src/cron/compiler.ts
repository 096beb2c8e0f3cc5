import parser from "cron-parser";
import { ScheduleError } from "../errors.js";
import { ScheduleMode, TimeUnit, type CronFields, type Destination, type ScheduleSpec, type Trigger } from "./types.js";

export interface DeviceResolver {
  /** UUID of the filesystem holding `path`, or null when it cannot be determined. */
  uuidFromPath(path: string): string | null;
}

export interface DeviceContext {
  destination: Destination;
  resolver: DeviceResolver;
}

const DEVICE_MODES = ["local", "local_encfs"];

function cron(minute: string | number, hour: string | number, dayOfMonth: string | number = "*", month: string | number = "*", dayOfWeek: string | number = "*"): Trigger {
  return {
    kind: "cron",
    fields: { minute: String(minute), hour: String(hour), dayOfMonth: String(dayOfMonth), month: String(month), dayOfWeek: String(dayOfWeek) },
  };
}

/**
 * Trigger for the schedule, or null when it is disabled. Cron fields are
 * checked before they are returned; a bad field would make `crontab` reject
 * the whole file.
 */
export function compileSchedule(spec: ScheduleSpec, device?: DeviceContext): Trigger | null {
  const trigger = compileTrigger(spec, device);
  if (trigger && trigger.kind === "cron") validateCronFields(trigger.fields);
  return trigger;
}

function compileTrigger(spec: ScheduleSpec, device?: DeviceContext): Trigger | null {
  const minute = spec.time % 100;
  const hour = Math.floor(spec.time / 100);

  switch (spec.mode) {
    case ScheduleMode.Disabled: return null;
    case ScheduleMode.AtBoot: return { kind: "boot" };
    case ScheduleMode.Every5Min: return cron("*/5", "*");
    case ScheduleMode.Every10Min: return cron("*/10", "*");
    case ScheduleMode.Every30Min: return cron("*/30", "*");
    case ScheduleMode.Hourly: return cron(0, "*");
    case ScheduleMode.Every2H: return cron(0, "*/2");
    case ScheduleMode.Every4H: return cron(0, "*/4");
    case ScheduleMode.Every6H: return cron(0, "*/6");
    case ScheduleMode.Every12H: return cron(0, "*/12");
    case ScheduleMode.CustomHours: return cron(0, spec.customHours.trim());
    case ScheduleMode.Daily: return cron(minute, hour);
    // Only polls; the due-ness gate decides whether the job really runs.
    case ScheduleMode.RepeatedInterval: return spec.repeat.unit <= TimeUnit.Day ? cron("*/15", "*") : cron(0, "*");
    case ScheduleMode.OnDeviceConnect: return compileDeviceTrigger(device);
    case ScheduleMode.Weekly: return cron(minute, hour, "*", "*", spec.weekday);
    case ScheduleMode.Monthly: return cron(minute, hour, spec.dayOfMonth);
    case ScheduleMode.Yearly: return cron(minute, hour, 1, 1);
  }
}

function compileDeviceTrigger(device?: DeviceContext): Trigger {
  if (!device) throw new ScheduleError("No destination given for the device connect schedule");
  const { destination, resolver } = device;
  if (!DEVICE_MODES.includes(destination.mode)) {
    throw new ScheduleError(`Schedule on device connect doesn't work with mode ${destination.mode}`);
  }
  const uuid = resolver.uuidFromPath(destination.path);
  if (uuid) return { kind: "device", uuid, cached: false };
  if (destination.cachedUuid) return { kind: "device", uuid: destination.cachedUuid, cached: true };
  throw new ScheduleError(`Couldn't find UUID for "${destination.path}"`);
}

export function validateCronFields(fields: CronFields): void {
  const values = [fields.minute, fields.hour, fields.dayOfMonth, fields.month, fields.dayOfWeek];
  if (values.some((v) => !/^\S+$/.test(v))) {
    throw new ScheduleError(`Invalid cron expression "${values.join(" ")}": every field needs a value`);
  }
  try {
    parser.parseExpression(values.join(" "));
  } catch (err) {
    throw new ScheduleError(`Invalid cron expression "${values.join(" ")}": ${err instanceof Error ? err.message : String(err)}`);
  }
}

export function cronExpression(fields: CronFields): string {
  return [fields.minute, fields.hour, fields.dayOfMonth, fields.month, fields.dayOfWeek].join(" ");
}

/** Crontab line for the trigger, or null when the trigger is not time based. */
export function formatTriggerLine(trigger: Trigger | null, command: string): string | null {
  if (!trigger) return null;
  if (trigger.kind === "boot") return `@reboot ${command}`;
  if (trigger.kind === "cron") return `${cronExpression(trigger.fields)} ${command}`;
  return null;
}

export function nextRun(fields: CronFields, from: Date = new Date()): Date | null {
  try {
    const it = parser.parseExpression(cronExpression(fields), { currentDate: from });
    return it.next().toDate();
  } catch {
    return null;
  }
}
