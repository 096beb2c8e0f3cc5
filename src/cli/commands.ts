import fs from "node:fs";
import path from "node:path";
import os from "node:os";
import { exec } from "node:child_process";
import { promisify } from "node:util";
import { Command } from "commander";
import which from "which";
import prompts from "prompts";
import chalk from "chalk";
import { getConfigPath, getDataDir, getDefaultConfigPath, loadConfig, saveLoadedConfig, type LoadedConfig } from "../config/loader.js";
import { readProfile, readSchedule, writeSchedule } from "../config/schema.js";
import { validateProfile, CUSTOM_HOURS } from "../config/validate.js";
import { BacktideError } from "../errors.js";
import { isDue, usesDueGate } from "../anacron/gate.js";
import { DueStateStore, formatTimestamp } from "../anacron/stamp.js";
import { compileSchedule, formatTriggerLine, nextRun } from "../cron/compiler.js";
import { compileAsShellString } from "../cron/command.js";
import { CrontabService } from "../cron/crontab.js";
import { LinuxDeviceResolver } from "../cron/device.js";
import { buildTriggerSet, jobCommandOptions } from "../cron/setup.js";
import { ScheduleMode, TimeUnit, isScheduleMode, isTimeUnit, scheduleModeName, timeUnitName, type ScheduleSpec } from "../cron/types.js";
import { UdevRules, udevRulesFileName, udevRulesPath } from "../cron/udev.js";
import {
  cutoffDate,
  freeInodesBelowMinimum,
  freeSpaceBelowMinimum,
  minFreeInodesPercent,
  minFreeSpaceMib,
  NEVER,
  readFsStats,
  tieredBuckets,
} from "../retention/policy.js";
import { ensureDir } from "../utils/helpers.js";
import { createConsoleNotifier, type Notifier } from "../utils/notify.js";

const execAsync = promisify(exec);

interface GlobalOptions {
  config?: string;
  profileId: string;
  debug?: boolean;
}

interface Session {
  loaded: LoadedConfig;
  notifier: Notifier;
  profileId: string;
  /** Config path to hand on to scheduled jobs, null when it is the default. */
  customConfigPath: string | null;
}

const MODE_CHOICES: Array<{ title: string; value: number }> = [
  { title: "Disabled", value: ScheduleMode.Disabled },
  { title: "At every boot", value: ScheduleMode.AtBoot },
  { title: "Every 5 minutes", value: ScheduleMode.Every5Min },
  { title: "Every 10 minutes", value: ScheduleMode.Every10Min },
  { title: "Every 30 minutes", value: ScheduleMode.Every30Min },
  { title: "Every hour", value: ScheduleMode.Hourly },
  { title: "Every 2 hours", value: ScheduleMode.Every2H },
  { title: "Every 4 hours", value: ScheduleMode.Every4H },
  { title: "Every 6 hours", value: ScheduleMode.Every6H },
  { title: "Every 12 hours", value: ScheduleMode.Every12H },
  { title: "Custom hours", value: ScheduleMode.CustomHours },
  { title: "Every day", value: ScheduleMode.Daily },
  { title: "Repeatedly (anacron style)", value: ScheduleMode.RepeatedInterval },
  { title: "When the drive gets connected", value: ScheduleMode.OnDeviceConnect },
  { title: "Every week", value: ScheduleMode.Weekly },
  { title: "Every month", value: ScheduleMode.Monthly },
  { title: "Every year", value: ScheduleMode.Yearly },
];

function fmtDate(d: Date): string {
  if (d.getTime() === NEVER.getTime()) return "never";
  return `${d.getFullYear()}-${String(d.getMonth() + 1).padStart(2, "0")}-${String(d.getDate()).padStart(2, "0")}`;
}

function parseIntOption(value: string | undefined, name: string): number | undefined {
  if (value === undefined) return undefined;
  const n = Number.parseInt(value, 10);
  if (!Number.isInteger(n) || String(n) !== value.trim()) throw new BacktideError(`--${name} must be an integer, got '${value}'`, "ERR_OPTION");
  return n;
}

function executablePath(): string {
  return which.sync("backtide", { nothrow: true }) ?? path.resolve(process.argv[1] ?? "backtide");
}

function dueStore(): DueStateStore {
  return new DueStateStore(path.join(getDataDir(), "anacron"));
}

export function buildProgram(): Command {
  const program = new Command();
  program
    .name("backtide")
    .description("backtide - snapshot schedules and retention")
    .version("0.1.0", "-v, --version", "show version")
    .option("--config <path>", "Config file to use")
    .option("--profile-id <id>", "Profile to act on", "1")
    .option("--debug", "Print debug output", false);

  const open = (): Session => {
    const g = program.opts<GlobalOptions>();
    const notifier = createConsoleNotifier({ debug: !!g.debug });
    const configPath = g.config ? path.resolve(g.config) : getConfigPath();
    const loaded = loadConfig(configPath, { onWarning: notifier.warn, onMigrate: notifier.info });
    if (!loaded.store.profiles().includes(g.profileId)) {
      throw new BacktideError(`Profile ${g.profileId} does not exist`, "ERR_PROFILE");
    }
    const customConfigPath = configPath === getDefaultConfigPath() ? null : configPath;
    return { loaded, notifier, profileId: g.profileId, customConfigPath };
  };

  program.command("check-config")
    .description("Validate profiles and install their schedules into the crontab")
    .option("--dry-run", "Print the crontab entries instead of installing them", false)
    .action(async (opts: { dryRun: boolean }) => {
      const { loaded, notifier, customConfigPath } = open();
      const { store } = loaded;

      const udev = new UdevRules();
      const set = buildTriggerSet({
        store,
        executable: executablePath(),
        configPath: customConfigPath,
        resolver: new LinuxDeviceResolver(),
        udev,
        notifier,
      });
      if (set.failed.length) process.exitCode = 1;

      if (opts.dryRun) {
        if (!set.lines.length) console.log("No crontab entries.");
        for (const line of set.lines) console.log(line);
        if (!udev.isEmpty) console.log(`\n${udev.render()}`);
        return;
      }

      saveLoadedConfig(loaded);
      const changed = await new CrontabService().install(set.lines);
      console.log(changed ? chalk.green(`Crontab updated (${set.lines.length} entries).`) : "Crontab already up to date.");

      if (!udev.isEmpty) {
        const file = path.join(ensureDir(path.join(getDataDir(), "udev")), udevRulesFileName());
        fs.writeFileSync(file, udev.render(), "utf8");
        console.log(chalk.yellow(`Device rules written to ${file}.`));
        console.log(chalk.yellow(`Install them with: sudo cp ${file} ${udevRulesPath()} && sudo udevadm control --reload`));
      }
    });

  const schedule = program.command("schedule").description("Inspect or change a profile's schedule");

  schedule.command("show").action(() => {
    const { loaded, profileId, customConfigPath } = open();
    const profile = readProfile(loaded.store, profileId);
    console.log(`Profile: ${profile.name} (${profileId})`);
    console.log(`Mode: ${scheduleModeName(profile.schedule.mode)}`);
    if (usesDueGate(profile.schedule.mode)) {
      console.log(`Repeat: every ${profile.schedule.repeat.period} ${timeUnitName(profile.schedule.repeat.unit).toLowerCase()}(s)`);
    }
    const trigger = compileSchedule(profile.schedule, { destination: profile.destination, resolver: new LinuxDeviceResolver() });
    if (!trigger) return console.log("Not scheduled.");
    if (trigger.kind === "device") return console.log(`Runs when device ${trigger.uuid} is connected${trigger.cached ? " (cached id)" : ""}.`);
    const command = compileAsShellString(jobCommandOptions(profile, { executable: executablePath(), configPath: customConfigPath }));
    console.log(formatTriggerLine(trigger, command));
    if (trigger.kind === "cron") {
      const next = nextRun(trigger.fields);
      console.log(`Next run: ${next ? next.toString() : chalk.red("invalid expression")}`);
    }
  });

  schedule.command("set")
    .option("--mode <mode>", "Schedule mode value")
    .option("--time <hhmm>", "Time of day as HHMM")
    .option("--day <day>", "Day of month (1-28)")
    .option("--weekday <weekday>", "Day of week (1 = Monday ... 7 = Sunday)")
    .option("--custom-hours <hours>", "Comma separated hours or */N")
    .option("--period <n>", "Repeat every n units")
    .option("--unit <unit>", "Repeat unit value (10 hour, 20 day, 30 week, 40 month)")
    .action(async (opts: Record<string, string | undefined>) => {
      const { loaded, notifier, profileId } = open();
      const spec: ScheduleSpec = readSchedule(loaded.store, profileId);
      const given = Object.values(opts).some((v) => v !== undefined);

      if (!given && process.stdin.isTTY && process.stdout.isTTY) {
        await askSchedule(spec);
      } else {
        const mode = parseIntOption(opts.mode, "mode");
        if (mode !== undefined) {
          if (!isScheduleMode(mode)) throw new BacktideError(`Unknown schedule mode ${mode}`, "ERR_OPTION");
          spec.mode = mode;
        }
        spec.time = parseIntOption(opts.time, "time") ?? spec.time;
        spec.dayOfMonth = parseIntOption(opts.day, "day") ?? spec.dayOfMonth;
        spec.weekday = parseIntOption(opts.weekday, "weekday") ?? spec.weekday;
        spec.customHours = opts.customHours ?? spec.customHours;
        spec.repeat.period = parseIntOption(opts.period, "period") ?? spec.repeat.period;
        const unit = parseIntOption(opts.unit, "unit");
        if (unit !== undefined) {
          if (!isTimeUnit(unit)) throw new BacktideError(`Unknown time unit ${unit}`, "ERR_OPTION");
          spec.repeat.unit = unit;
        }
      }

      writeSchedule(loaded.store, spec, profileId);
      const errors = validateProfile(loaded.store, profileId);
      for (const e of errors) notifier.warn(e);
      saveLoadedConfig(loaded);
      console.log(chalk.green(`Schedule saved: ${scheduleModeName(spec.mode)}`));
      console.log(chalk.gray("Run backtide check-config to install it."));
    });

  program.command("due")
    .description("Tell whether the profile should run now (exit code 0 when due)")
    .action(() => {
      const { loaded, profileId } = open();
      const profile = readProfile(loaded.store, profileId);
      const last = dueStore().lastRun(profile);
      const due = isDue(profile.schedule, last);
      console.log(`Last run: ${last ? formatTimestamp(last) : "never"}`);
      console.log(due ? chalk.green("Due") : chalk.yellow("Not due"));
      process.exitCode = due ? 0 : 1;
    });

  program.command("backup-job")
    .description("Run the profile's backup command when it is due")
    .action(async () => {
      const { loaded, notifier, profileId } = open();
      const profile = readProfile(loaded.store, profileId);
      const stamps = dueStore();
      const last = stamps.lastRun(profile);
      if (!isDue(profile.schedule, last)) {
        notifier.debug(`Profile ${profile.name} is not due (last run ${last ? formatTimestamp(last) : "never"})`);
        return;
      }
      if (!profile.backupCommand.trim()) {
        notifier.error(`Profile "${profile.name}": snapshots.backup_command is not set`);
        process.exitCode = 1;
        return;
      }
      notifier.debug(`Running: ${profile.backupCommand}`);
      try {
        const { stdout, stderr } = await execAsync(profile.backupCommand, { maxBuffer: 10 * 1024 * 1024 });
        if (stdout.trim()) console.log(stdout.trimEnd());
        if (stderr.trim()) notifier.warn(stderr.trimEnd());
      } catch (err) {
        notifier.error(`Profile "${profile.name}": backup failed: ${String(err)}`);
        process.exitCode = 1;
        return;
      }
      const file = stamps.record(profile);
      notifier.debug(`Recorded run in ${file}`);
    });

  program.command("retention")
    .description("Show retention cutoffs and thresholds for the profile")
    .action(() => {
      const { loaded, profileId } = open();
      const profile = readProfile(loaded.store, profileId);
      const r = profile.retention;
      console.log(`Profile: ${profile.name} (${profileId})`);
      console.log(`Remove snapshots older than: ${fmtDate(cutoffDate(r.age))}`);
      const mib = minFreeSpaceMib(r.space);
      console.log(`Keep free space: ${mib ? `${mib} MiB` : "off"}`);
      const inodes = minFreeInodesPercent(r.inodes);
      console.log(`Keep free inodes: ${inodes ? `${inodes}%` : "off"}`);
      const tiers = tieredBuckets(r.smart);
      if (!tiers.length) console.log("Smart remove: off");
      for (const t of tiers) console.log(`Smart remove ${t.kind.padEnd(8)} x${t.count} since ${fmtDate(t.since)}`);
      console.log(`Named snapshots exempt: ${r.dontRemoveNamed ? "yes" : "no"}`);

      const dest = profile.destination.path;
      if (dest && fs.existsSync(dest)) {
        const stats = readFsStats(dest);
        const free = (stats.freeBytes / (1024 * 1024)).toFixed(0);
        const lowSpace = freeSpaceBelowMinimum(stats, r.space);
        const lowInodes = freeInodesBelowMinimum(stats, r.inodes);
        console.log(`Free on ${dest}: ${free} MiB ${lowSpace ? chalk.red("(below minimum)") : chalk.green("(ok)")}`);
        if (stats.totalInodes > 0) {
          const pct = ((stats.freeInodes / stats.totalInodes) * 100).toFixed(1);
          console.log(`Free inodes: ${pct}% ${lowInodes ? chalk.red("(below minimum)") : chalk.green("(ok)")}`);
        }
      }
    });

  program.command("migrate").description("Upgrade the config file to the current layout").action(() => {
    const { loaded } = open();
    if (loaded.migration) console.log(chalk.green(`Config upgraded from version ${loaded.migration.from} to ${loaded.migration.to}.`));
    else console.log(`Config is at version ${loaded.store.intValue("config.version")}; nothing to do.`);
  });

  program.command("status").description("Show backtide status").action(() => {
    const { loaded } = open();
    const stamps = dueStore();
    console.log("backtide Status\n");
    console.log(`Config: ${loaded.path} ${fs.existsSync(loaded.path) ? "yes" : "no"}`);
    console.log(`Data: ${getDataDir()}`);
    for (const id of loaded.store.profiles()) {
      const p = readProfile(loaded.store, id);
      const last = stamps.lastRun(p);
      console.log(`${id.padEnd(3)} ${p.name.padEnd(20)} ${scheduleModeName(p.schedule.mode).padEnd(18)} last run: ${last ? formatTimestamp(last) : "never"}`);
    }
    console.log(`User: ${os.userInfo().username}`);
  });

  return program;
}

async function askSchedule(spec: ScheduleSpec): Promise<void> {
  const modeRes = await prompts({
    type: "select",
    name: "mode",
    message: "Choose a schedule",
    choices: MODE_CHOICES.map((c) => ({ title: c.title, value: String(c.value) })),
    initial: Math.max(0, MODE_CHOICES.findIndex((c) => c.value === spec.mode)),
  });
  const mode = Number(modeRes.mode);
  if (isScheduleMode(mode)) spec.mode = mode;

  if ([ScheduleMode.Daily, ScheduleMode.Weekly, ScheduleMode.Monthly, ScheduleMode.Yearly].some((m) => m === spec.mode)) {
    const res = await prompts({
      type: "text",
      name: "time",
      message: "Time of day (HH:MM)",
      initial: `${String(Math.floor(spec.time / 100)).padStart(2, "0")}:${String(spec.time % 100).padStart(2, "0")}`,
      validate: (v: string) => (/^([01]?\d|2[0-3]):[0-5]\d$/.test(v.trim()) ? true : "Use HH:MM"),
    });
    const [h, m] = String(res.time ?? "00:00").split(":").map((s) => Number.parseInt(s, 10));
    spec.time = h * 100 + m;
  }
  if (spec.mode === ScheduleMode.Weekly) {
    const res = await prompts({ type: "number", name: "weekday", message: "Weekday (1 = Monday ... 7 = Sunday)", initial: spec.weekday, min: 1, max: 7 });
    spec.weekday = Number(res.weekday ?? spec.weekday);
  }
  if (spec.mode === ScheduleMode.Monthly) {
    const res = await prompts({ type: "number", name: "day", message: "Day of month (1-28)", initial: spec.dayOfMonth, min: 1, max: 28 });
    spec.dayOfMonth = Number(res.day ?? spec.dayOfMonth);
  }
  if (spec.mode === ScheduleMode.CustomHours) {
    const res = await prompts({
      type: "text",
      name: "hours",
      message: "Hours (8,12,18,23 or */3)",
      initial: spec.customHours,
      validate: (v: string) => (CUSTOM_HOURS.test(v.trim()) ? true : "Comma separated hours or */N"),
    });
    spec.customHours = String(res.hours ?? spec.customHours).trim();
  }
  if (usesDueGate(spec.mode)) {
    const unitRes = await prompts({
      type: "select",
      name: "unit",
      message: "Repeat unit",
      choices: [TimeUnit.Hour, TimeUnit.Day, TimeUnit.Week, TimeUnit.Month].map((u) => ({ title: timeUnitName(u), value: String(u) })),
      initial: 1,
    });
    const unit = Number(unitRes.unit);
    if (isTimeUnit(unit)) spec.repeat.unit = unit;
    const periodRes = await prompts({ type: "number", name: "period", message: "Every how many units?", initial: spec.repeat.period, min: 1 });
    spec.repeat.period = Number(periodRes.period ?? spec.repeat.period);
  }
}
