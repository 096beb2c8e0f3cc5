import path from "node:path";
import { ScheduleMode, TimeUnit } from "../cron/types.js";
import { DiskUnit } from "../retention/types.js";
import { INCLUDE_FOLDER, includeList, isConfigured, sshMaxArgLength } from "./schema.js";
import type { ConfigStore } from "./store.js";

export interface FieldRule {
  type: "integer" | "string" | "boolean";
  minimum?: number;
  maximum?: number;
  enum?: readonly (number | string)[];
  pattern?: RegExp;
  /** Only check the field while the predicate holds for the profile. */
  when?: (store: ConfigStore, profileId: string) => boolean;
}

const typeMap: Record<FieldRule["type"], (v: unknown) => boolean> = {
  integer: (v) => Number.isInteger(v),
  string: (v) => typeof v === "string",
  boolean: (v) => typeof v === "boolean",
};

/** Comma separated hours (8,12,18,23) or a step (*\/3). */
export const CUSTOM_HOURS = /^(\*\/([1-9]|1\d|2[0-3])|([01]?\d|2[0-3])(,([01]?\d|2[0-3]))*)$/;

const modeIs = (...modes: number[]) => (store: ConfigStore, id: string) =>
  modes.includes(store.profileIntValue("schedule.mode", ScheduleMode.Disabled, id));
const enabled = (key: string, fallback: boolean) => (store: ConfigStore, id: string) => store.profileBoolValue(key, fallback, id);

export const PROFILE_RULES: Record<string, FieldRule> = {
  "schedule.mode": { type: "integer", enum: Object.values(ScheduleMode) },
  "schedule.time": {
    type: "integer", minimum: 0, maximum: 2400,
    when: modeIs(ScheduleMode.Daily, ScheduleMode.Weekly, ScheduleMode.Monthly, ScheduleMode.Yearly),
  },
  "schedule.day": { type: "integer", minimum: 1, maximum: 28, when: modeIs(ScheduleMode.Monthly) },
  "schedule.weekday": { type: "integer", minimum: 1, maximum: 7, when: modeIs(ScheduleMode.Weekly) },
  "schedule.custom_time": { type: "string", pattern: CUSTOM_HOURS, when: modeIs(ScheduleMode.CustomHours) },
  "schedule.repeatedly.period": {
    type: "integer", minimum: 1,
    when: modeIs(ScheduleMode.RepeatedInterval, ScheduleMode.OnDeviceConnect),
  },
  "schedule.repeatedly.unit": {
    type: "integer", enum: [TimeUnit.Hour, TimeUnit.Day, TimeUnit.Week, TimeUnit.Month],
    when: modeIs(ScheduleMode.RepeatedInterval, ScheduleMode.OnDeviceConnect),
  },
  "snapshots.remove_old_snapshots.value": {
    type: "integer", minimum: 1, when: enabled("snapshots.remove_old_snapshots.enabled", true),
  },
  "snapshots.remove_old_snapshots.unit": {
    type: "integer", enum: [TimeUnit.Day, TimeUnit.Week, TimeUnit.Year],
    when: enabled("snapshots.remove_old_snapshots.enabled", true),
  },
  "snapshots.min_free_space.value": {
    type: "integer", minimum: 1, maximum: 99999, when: enabled("snapshots.min_free_space.enabled", true),
  },
  "snapshots.min_free_space.unit": {
    type: "integer", enum: Object.values(DiskUnit), when: enabled("snapshots.min_free_space.enabled", true),
  },
  "snapshots.min_free_inodes.value": {
    type: "integer", minimum: 1, maximum: 15, when: enabled("snapshots.min_free_inodes.enabled", true),
  },
  "snapshots.smart_remove.keep_all": { type: "integer", minimum: 0, when: enabled("snapshots.smart_remove", false) },
  "snapshots.smart_remove.keep_one_per_day": { type: "integer", minimum: 0, when: enabled("snapshots.smart_remove", false) },
  "snapshots.smart_remove.keep_one_per_week": { type: "integer", minimum: 0, when: enabled("snapshots.smart_remove", false) },
  "snapshots.smart_remove.keep_one_per_month": { type: "integer", minimum: 0, when: enabled("snapshots.smart_remove", false) },
};

function coerce(raw: unknown, type: FieldRule["type"]): unknown {
  if (type === "integer" && typeof raw === "string" && /^-?\d+$/.test(raw.trim())) return Number.parseInt(raw, 10);
  if (type === "boolean" && typeof raw === "string") return raw === "true" ? true : raw === "false" ? false : raw;
  return raw;
}

export function validateValue(value: unknown, rule: FieldRule, label: string): string[] {
  const errors: string[] = [];
  if (!typeMap[rule.type](value)) return [`${label} should be ${rule.type}`];
  if (rule.enum && !rule.enum.some((e) => e === value)) errors.push(`${label} must be one of ${JSON.stringify(rule.enum)}`);
  if (typeof value === "number") {
    if (typeof rule.minimum === "number" && value < rule.minimum) errors.push(`${label} must be >= ${rule.minimum}`);
    if (typeof rule.maximum === "number" && value > rule.maximum) errors.push(`${label} must be <= ${rule.maximum}`);
  }
  if (typeof value === "string" && rule.pattern && !rule.pattern.test(value.trim())) errors.push(`${label} has an invalid format`);
  return errors;
}

/** Checks the stored values of one profile. Unset keys fall back to valid defaults and are skipped. */
export function validateProfile(store: ConfigStore, profileId: string): string[] {
  const errors: string[] = [];
  for (const [key, rule] of Object.entries(PROFILE_RULES)) {
    if (rule.when && !rule.when(store, profileId)) continue;
    const raw = store.raw(store.profileKey(key, profileId));
    if (raw === undefined) continue;
    errors.push(...validateValue(coerce(raw, rule.type), rule, key));
  }

  const mode = store.profileIntValue("schedule.mode", ScheduleMode.Disabled, profileId);
  if (mode === ScheduleMode.Daily || mode === ScheduleMode.Weekly || mode === ScheduleMode.Monthly || mode === ScheduleMode.Yearly) {
    const time = store.profileIntValue("schedule.time", 0, profileId);
    if (time % 100 > 59) errors.push("schedule.time minutes must be <= 59");
  }
  if (mode !== ScheduleMode.Disabled && !isConfigured(store, profileId)) {
    errors.push("profile is scheduled but has no snapshot path or nothing to back up");
  }
  errors.push(...includeOverlaps(store, profileId));
  try {
    sshMaxArgLength(store, profileId);
  } catch (err) {
    if (!(err instanceof RangeError)) throw err;
    errors.push(err.message);
  }
  return errors;
}

/** Folder entries must not be the snapshot folder or lie inside it. */
function includeOverlaps(store: ConfigStore, profileId: string): string[] {
  const raw = store.profileStrValue("snapshots.path", "", profileId);
  if (!raw) return [];
  const snapshots = path.resolve(raw);
  const errors: string[] = [];
  for (const entry of includeList(store, profileId)) {
    if (entry.type !== INCLUDE_FOLDER) continue;
    const folder = path.resolve(entry.path);
    if (folder === snapshots) errors.push(`backup folder cannot be included: ${entry.path}`);
    else if (folder.startsWith(snapshots.endsWith("/") ? snapshots : `${snapshots}/`)) {
      errors.push(`backup sub-folder cannot be included: ${entry.path}`);
    }
  }
  return errors;
}
