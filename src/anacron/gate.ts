import { ScheduleMode, TimeUnit, type RepeatSpec } from "../cron/types.js";
import { addDays, dateOnly, mondayOf, monthsBack } from "../utils/dates.js";

const HOUR_MS = 60 * 60 * 1000;

/** Modes whose trigger fires more often than the backup should run. */
export function usesDueGate(mode: ScheduleMode): boolean {
  return mode === ScheduleMode.RepeatedInterval || mode === ScheduleMode.OnDeviceConnect;
}

/**
 * Whether `time` lies far enough in the past for `period` units to have
 * elapsed by `now`. Hours compare wall clock time; days, weeks and months
 * compare calendar dates with weeks starting on Monday.
 */
export function olderThan(time: Date, period: number, unit: number, now: Date = new Date()): boolean {
  if (unit <= TimeUnit.Hour) return now.getTime() - time.getTime() >= period * HOUR_MS;

  const then = dateOnly(time).getTime();
  const today = dateOnly(now);
  if (unit <= TimeUnit.Day) return then <= addDays(today, -period).getTime();
  if (unit <= TimeUnit.Week) return then < addDays(mondayOf(today), -7 * (period - 1)).getTime();

  // Months and years share this walk.
  const reference = monthsBack(addDays(today, -(today.getDate() + 1)), period - 1);
  return then < reference.getTime();
}

export function isDue(spec: { mode: ScheduleMode; repeat: RepeatSpec }, lastRun: Date | null, now: Date = new Date()): boolean {
  if (!usesDueGate(spec.mode)) return true;
  if (!lastRun) return true;
  return olderThan(lastRun, spec.repeat.period, spec.repeat.unit, now);
}
