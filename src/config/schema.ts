import { ScheduleMode, TimeUnit, isScheduleMode, isTimeUnit, type Destination, type ScheduleSpec } from "../cron/types.js";
import { DiskUnit, type RetentionSpec } from "../retention/types.js";
import type { ConfigStore, ListField } from "./store.js";

export const INCLUDE_FIELDS: ListField[] = [{ name: "value", type: "str" }, { name: "type", type: "int" }];
export const EXCLUDE_FIELDS: ListField[] = [{ name: "value", type: "str" }];

export const INCLUDE_FOLDER = 0;
export const INCLUDE_FILE = 1;

export const DEFAULT_EXCLUDE = [
  ".gvfs",
  ".cache/*",
  ".thumbnails*",
  ".local/share/[Tt]rash*",
  "*.backup*",
  "*~",
  ".dropbox*",
  "/proc/*",
  "/sys/*",
  "/dev/*",
  "/run/*",
  "/etc/mtab",
  "/var/cache/apt/archives/*.deb",
  "lost+found/*",
  "/tmp/*",
  "/var/tmp/*",
  "/var/backups/*",
  ".Private",
  "/swapfile",
  "SingletonLock",
  "SingletonCookie",
  "lock",
];

export const MIN_SSH_ARG_LENGTH = 700;

export interface IncludeEntry {
  path: string;
  type: number;
}

export interface CronOptions {
  nice: boolean;
  ionice: boolean;
  redirectStdout: boolean;
  redirectStderr: boolean;
  debug: boolean;
}

export interface ProfileSettings {
  id: string;
  name: string;
  destination: Destination;
  include: IncludeEntry[];
  exclude: string[];
  schedule: ScheduleSpec;
  retention: RetentionSpec;
  cron: CronOptions;
  backupCommand: string;
}

export function includeList(store: ConfigStore, profileId: string): IncludeEntry[] {
  return store.profileListValue("snapshots.include", INCLUDE_FIELDS, [], profileId)
    .map((item) => ({ path: String(item.value), type: Number(item.type) }));
}

export function setIncludeList(store: ConfigStore, entries: IncludeEntry[], profileId: string): void {
  store.setProfileListValue("snapshots.include", INCLUDE_FIELDS, entries.map((e) => ({ value: e.path, type: e.type })), profileId);
}

export function excludeList(store: ConfigStore, profileId: string): string[] {
  const fallback = DEFAULT_EXCLUDE.map((value) => ({ value }));
  return store.profileListValue("snapshots.exclude", EXCLUDE_FIELDS, fallback, profileId).map((item) => String(item.value));
}

export function setExcludeList(store: ConfigStore, patterns: string[], profileId: string): void {
  store.setProfileListValue("snapshots.exclude", EXCLUDE_FIELDS, patterns.map((value) => ({ value })), profileId);
}

/** A profile counts as configured once it has a destination and something to back up. */
export function isConfigured(store: ConfigStore, profileId: string): boolean {
  return !!store.profileStrValue("snapshots.path", "", profileId) && includeList(store, profileId).length > 0;
}

export function readSchedule(store: ConfigStore, profileId: string): ScheduleSpec {
  const mode = store.profileIntValue("schedule.mode", ScheduleMode.Disabled, profileId);
  const unit = store.profileIntValue("schedule.repeatedly.unit", TimeUnit.Day, profileId);
  return {
    mode: isScheduleMode(mode) ? mode : ScheduleMode.Disabled,
    time: store.profileIntValue("schedule.time", 0, profileId),
    dayOfMonth: store.profileIntValue("schedule.day", 1, profileId),
    weekday: store.profileIntValue("schedule.weekday", 7, profileId),
    customHours: store.profileStrValue("schedule.custom_time", "8,12,18,23", profileId),
    repeat: {
      period: store.profileIntValue("schedule.repeatedly.period", 1, profileId),
      unit: isTimeUnit(unit) ? unit : TimeUnit.Day,
    },
  };
}

export function writeSchedule(store: ConfigStore, spec: ScheduleSpec, profileId: string): void {
  store.setProfileIntValue("schedule.mode", spec.mode, profileId);
  store.setProfileIntValue("schedule.time", spec.time, profileId);
  store.setProfileIntValue("schedule.day", spec.dayOfMonth, profileId);
  store.setProfileIntValue("schedule.weekday", spec.weekday, profileId);
  store.setProfileStrValue("schedule.custom_time", spec.customHours, profileId);
  store.setProfileIntValue("schedule.repeatedly.period", spec.repeat.period, profileId);
  store.setProfileIntValue("schedule.repeatedly.unit", spec.repeat.unit, profileId);
}

export function readRetention(store: ConfigStore, profileId: string): RetentionSpec {
  return {
    age: {
      enabled: store.profileBoolValue("snapshots.remove_old_snapshots.enabled", true, profileId),
      value: store.profileIntValue("snapshots.remove_old_snapshots.value", 10, profileId),
      unit: store.profileIntValue("snapshots.remove_old_snapshots.unit", TimeUnit.Year, profileId),
    },
    space: {
      enabled: store.profileBoolValue("snapshots.min_free_space.enabled", true, profileId),
      value: store.profileIntValue("snapshots.min_free_space.value", 1, profileId),
      unit: store.profileIntValue("snapshots.min_free_space.unit", DiskUnit.GB, profileId),
    },
    inodes: {
      enabled: store.profileBoolValue("snapshots.min_free_inodes.enabled", true, profileId),
      percent: store.profileIntValue("snapshots.min_free_inodes.value", 2, profileId),
    },
    smart: {
      enabled: store.profileBoolValue("snapshots.smart_remove", false, profileId),
      keepAll: store.profileIntValue("snapshots.smart_remove.keep_all", 2, profileId),
      keepOnePerDay: store.profileIntValue("snapshots.smart_remove.keep_one_per_day", 7, profileId),
      keepOnePerWeek: store.profileIntValue("snapshots.smart_remove.keep_one_per_week", 4, profileId),
      keepOnePerMonth: store.profileIntValue("snapshots.smart_remove.keep_one_per_month", 24, profileId),
    },
    dontRemoveNamed: store.profileBoolValue("snapshots.dont_remove_named_snapshots", true, profileId),
  };
}

export function readProfile(store: ConfigStore, profileId: string): ProfileSettings {
  return {
    id: profileId,
    name: store.profileName(profileId),
    destination: {
      mode: store.profileStrValue("snapshots.mode", "local", profileId),
      path: store.profileStrValue("snapshots.path", "", profileId),
      cachedUuid: store.profileStrValue("snapshots.path.uuid", "", profileId),
    },
    include: includeList(store, profileId),
    exclude: excludeList(store, profileId),
    schedule: readSchedule(store, profileId),
    retention: readRetention(store, profileId),
    cron: {
      nice: store.profileBoolValue("snapshots.cron.nice", true, profileId),
      ionice: store.profileBoolValue("snapshots.cron.ionice", true, profileId),
      redirectStdout: store.profileBoolValue("snapshots.cron.redirect_stdout", true, profileId),
      redirectStderr: store.profileBoolValue("snapshots.cron.redirect_stderr", isConfigured(store, profileId), profileId),
      debug: store.profileBoolValue("schedule.debug", false, profileId),
    },
    backupCommand: store.profileStrValue("snapshots.backup_command", "", profileId),
  };
}

/** Remote command length limit; 0 means unlimited. */
export function sshMaxArgLength(store: ConfigStore, profileId: string): number {
  const value = store.profileIntValue("snapshots.ssh.max_arg_length", 0, profileId);
  if (value && value < MIN_SSH_ARG_LENGTH) {
    throw new RangeError(`SSH max arg length ${value} is too low to run commands`);
  }
  return value;
}
