import which from "which";
import { readProfile, type ProfileSettings } from "../config/schema.js";
import type { ConfigStore } from "../config/store.js";
import { validateProfile } from "../config/validate.js";
import { ScheduleError } from "../errors.js";
import type { Notifier } from "../utils/notify.js";
import { compileAsShellString, type JobCommandOptions } from "./command.js";
import { compileSchedule, formatTriggerLine, type DeviceResolver } from "./compiler.js";
import type { Trigger } from "./types.js";
import type { UdevRules } from "./udev.js";

export interface TriggerSetContext {
  store: ConfigStore;
  executable: string;
  /** Passed on as `--config` when the config is not at its default location. */
  configPath?: string | null;
  resolver: DeviceResolver;
  udev: UdevRules;
  notifier: Notifier;
  findBinary?: (name: string) => string | null;
}

export interface ProfileTrigger {
  profileId: string;
  profileName: string;
  trigger: Trigger;
  command: string;
  /** Crontab line; null for device triggers. */
  line: string | null;
}

export interface TriggerSet {
  entries: ProfileTrigger[];
  lines: string[];
  failed: string[];
}

export function jobCommandOptions(profile: ProfileSettings, ctx: Pick<TriggerSetContext, "executable" | "configPath" | "findBinary">): JobCommandOptions {
  const find = ctx.findBinary ?? ((name: string) => which.sync(name, { nothrow: true }));
  return {
    executable: ctx.executable,
    profileId: profile.id,
    configPath: ctx.configPath ?? null,
    debug: profile.cron.debug,
    redirectStdout: profile.cron.redirectStdout,
    redirectStderr: profile.cron.redirectStderr,
    nice: profile.cron.nice ? find("nice") : null,
    ionice: profile.cron.ionice ? find("ionice") : null,
  };
}

/**
 * Compiles every profile's schedule. Profiles without a schedule are left
 * out; a profile with invalid settings or a trigger that cannot be built is
 * reported and skipped without affecting the rest.
 */
export function buildTriggerSet(ctx: TriggerSetContext): TriggerSet {
  const { store, notifier, udev } = ctx;
  const result: TriggerSet = { entries: [], lines: [], failed: [] };
  udev.clean();

  for (const profileId of store.profiles()) {
    const profileName = store.profileName(profileId);
    try {
      const invalid = validateProfile(store, profileId);
      if (invalid.length) throw new ScheduleError(invalid.join("; "), profileId);
      const profile = readProfile(store, profileId);
      notifier.debug(`Profile: ${profileName} | Automatic backup: ${profile.schedule.mode}`);
      const trigger = compileSchedule(profile.schedule, { destination: profile.destination, resolver: ctx.resolver });
      if (!trigger) continue;

      const command = compileAsShellString(jobCommandOptions(profile, ctx));
      if (trigger.kind === "device") {
        if (!trigger.cached) store.setProfileStrValue("snapshots.path.uuid", trigger.uuid, profileId);
        udev.addRule(command, trigger.uuid);
      }
      const line = formatTriggerLine(trigger, command);
      result.entries.push({ profileId, profileName, trigger, command, line });
      if (line) result.lines.push(line);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      notifier.error(`Profile "${profileName}": ${message}`);
      result.failed.push(profileId);
    }
  }
  return result;
}
