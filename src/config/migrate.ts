import path from "node:path";
import { ConfigVersionError } from "../errors.js";
import { expandHome } from "../utils/helpers.js";
import { INCLUDE_FOLDER, setExcludeList, setIncludeList } from "./schema.js";
import type { ConfigStore } from "./store.js";

/** Latest config layout. */
export const CONFIG_VERSION = 6;
/** Oldest config layout that can still be upgraded. */
export const MIN_CONFIG_VERSION = 4;

const LEGACY_EXCLUDE = ".gvfs:.cache*:[Cc]ache*:.thumbnails*:[Tt]rash*:*.backup*:*~";

export interface Migration {
  /** Version the config is at after this step. */
  version: number;
  description: string;
  apply(store: ConfigStore): void;
}

export interface MigrationResult {
  from: number;
  to: number;
  applied: string[];
}

const toV5: Migration = {
  version: 5,
  description: "include/exclude lists",
  apply(store) {
    for (const profileId of store.profiles()) {
      const hasLegacyInclude = store.hasProfileKey("snapshots.include_folders", profileId);
      if (hasLegacyInclude || !store.hasProfileKey("snapshots.include.size", profileId)) {
        const legacy = store.profileStrValue("snapshots.include_folders", "", profileId);
        const paths = legacy.split(":").filter(Boolean).map((item) => path.resolve(expandHome(item.split("|")[0])));
        setIncludeList(store, paths.map((p) => ({ path: p, type: INCLUDE_FOLDER })), profileId);
      }

      const hasLegacyExclude = store.hasProfileKey("snapshots.exclude_patterns", profileId);
      if (hasLegacyExclude || !store.hasProfileKey("snapshots.exclude.size", profileId)) {
        const legacy = store.profileStrValue("snapshots.exclude_patterns", LEGACY_EXCLUDE, profileId);
        setExcludeList(store, legacy ? legacy.split(":") : [], profileId);
      }

      store.removeProfileKey("snapshots.include_folders", profileId);
      store.removeProfileKey("snapshots.exclude_patterns", profileId);
    }
  },
};

const SCHEDULE_RENAMES: Array<[string, string]> = [
  ["snapshots.automatic_backup_anacron_period", "schedule.repeatedly.period"],
  ["snapshots.automatic_backup_anacron_unit", "schedule.repeatedly.unit"],
  ["snapshots.automatic_backup_day", "schedule.day"],
  ["snapshots.automatic_backup_mode", "schedule.mode"],
  ["snapshots.automatic_backup_time", "schedule.time"],
  ["snapshots.automatic_backup_weekday", "schedule.weekday"],
  ["snapshots.custom_backup_time", "schedule.custom_time"],
  // full rsync mode is gone
  ["snapshots.full_rsync.take_snapshot_regardless_of_changes", "snapshots.take_snapshot_regardless_of_changes"],
];

const toV6: Migration = {
  version: 6,
  description: "schedule namespace",
  apply(store) {
    for (const profileId of store.profiles()) {
      for (const [from, to] of SCHEDULE_RENAMES) store.remapProfileKey(from, to, profileId);
    }
    store.remapKeyRegex(/qt4/g, "qt");
    // desktop integrations that were removed
    store.removeKeysStartsWith("gnome");
    store.removeKeysStartsWith("kde");
  },
};

export const MIGRATIONS: readonly Migration[] = [toV5, toV6];

export function configVersion(store: ConfigStore): number {
  // The version was not written for a while; such configs are most likely current.
  return store.intValue("config.version", CONFIG_VERSION);
}

export function migrateConfig(
  store: ConfigStore,
  fromVersion: number = configVersion(store),
  onStep?: (step: Migration) => void,
): MigrationResult {
  if (fromVersion < MIN_CONFIG_VERSION) throw new ConfigVersionError(fromVersion, MIN_CONFIG_VERSION);
  if (fromVersion >= CONFIG_VERSION) return { from: fromVersion, to: fromVersion, applied: [] };

  const applied: string[] = [];
  for (const step of MIGRATIONS) {
    if (step.version <= fromVersion) continue;
    onStep?.(step);
    step.apply(store);
    applied.push(`v${step.version}: ${step.description}`);
  }
  store.setIntValue("config.version", CONFIG_VERSION);
  return { from: fromVersion, to: CONFIG_VERSION, applied };
}
