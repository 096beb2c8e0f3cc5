import fs from "node:fs";
import { TimeUnit } from "../cron/types.js";
import { addDays, calendarDate, dateOnly, minDate, mondayOf, monthsBack, startOfMonth } from "../utils/dates.js";
import {
  DiskUnit,
  type AgePolicy,
  type DateWindow,
  type FsStats,
  type InodePolicy,
  type RetentionTier,
  type SmartPolicy,
  type SnapshotInfo,
  type SpacePolicy,
} from "./types.js";

const MIB = 1024 * 1024;

/** Cutoff returned when nothing is old enough to delete. */
export const NEVER = minDate();

/** Snapshots dated before the returned day may be removed. */
export function cutoffDate(age: AgePolicy, today: Date = new Date()): Date {
  if (!age.enabled) return NEVER;
  const day = dateOnly(today);
  if (age.unit === TimeUnit.Day) return addDays(day, -age.value);
  if (age.unit === TimeUnit.Week) return addDays(mondayOf(day), -7 * (age.value - 1));
  if (age.unit === TimeUnit.Year) return calendarDate(day.getFullYear() - age.value, day.getMonth(), 1);
  return NEVER;
}

export function isOlderThanCutoff(snapshotDate: Date, cutoff: Date): boolean {
  return snapshotDate.getTime() < cutoff.getTime();
}

export function minFreeSpaceMib(space: SpacePolicy): number {
  if (!space.enabled) return 0;
  if (space.unit === DiskUnit.MB) return space.value;
  if (space.unit === DiskUnit.GB) return space.value * 1024;
  return 0;
}

export function minFreeInodesPercent(inodes: InodePolicy): number {
  return inodes.enabled ? inodes.percent : 0;
}

export function freeSpaceBelowMinimum(stats: FsStats, space: SpacePolicy): boolean {
  const min = minFreeSpaceMib(space);
  return min > 0 && stats.freeBytes / MIB < min;
}

export function freeInodesBelowMinimum(stats: FsStats, inodes: InodePolicy): boolean {
  const min = minFreeInodesPercent(inodes);
  // some filesystems report no inode counts at all
  if (min <= 0 || stats.totalInodes <= 0) return false;
  return (stats.freeInodes / stats.totalInodes) * 100 < min;
}

export function readFsStats(path: string): FsStats {
  const s = fs.statfsSync(path);
  return { freeBytes: s.bavail * s.bsize, totalInodes: s.files, freeInodes: s.ffree };
}

function tier(kind: RetentionTier["kind"], count: number, windows: DateWindow[]): RetentionTier {
  return { kind, count, since: windows[windows.length - 1].start, windows };
}

/**
 * Smart retention tiers, newest window first. A snapshot survives when any
 * tier keeps it.
 */
export function tieredBuckets(smart: SmartPolicy, today: Date = new Date()): RetentionTier[] {
  if (!smart.enabled) return [];
  const day = dateOnly(today);
  const tiers: RetentionTier[] = [];

  if (smart.keepAll > 0) {
    tiers.push(tier("all", smart.keepAll, [{ start: addDays(day, -(smart.keepAll - 1)), end: addDays(day, 1) }]));
  }
  if (smart.keepOnePerDay > 0) {
    const windows = Array.from({ length: smart.keepOnePerDay }, (_, i) => ({ start: addDays(day, -i), end: addDays(day, 1 - i) }));
    tiers.push(tier("daily", smart.keepOnePerDay, windows));
  }
  if (smart.keepOnePerWeek > 0) {
    const monday = mondayOf(day);
    const windows = Array.from({ length: smart.keepOnePerWeek }, (_, i) => ({ start: addDays(monday, -7 * i), end: addDays(monday, 7 - 7 * i) }));
    tiers.push(tier("weekly", smart.keepOnePerWeek, windows));
  }
  if (smart.keepOnePerMonth > 0) {
    const first = startOfMonth(day);
    const windows = Array.from({ length: smart.keepOnePerMonth }, (_, i) => {
      const start = monthsBack(first, i);
      return { start, end: new Date(start.getFullYear(), start.getMonth() + 1, 1) };
    });
    tiers.push(tier("monthly", smart.keepOnePerMonth, windows));
  }
  return tiers;
}

function inWindow(date: Date, w: DateWindow): boolean {
  return date.getTime() >= w.start.getTime() && date.getTime() < w.end.getTime();
}

/**
 * Ids kept by the tiers: everything inside an `all` window, otherwise the
 * newest snapshot of each window. Named snapshots are kept when exempt.
 */
export function smartKeepSet(snapshots: SnapshotInfo[], tiers: RetentionTier[], exemptNamed: boolean): Set<string> {
  const newestFirst = [...snapshots].sort((a, b) => b.date.getTime() - a.date.getTime());
  const keep = new Set<string>();
  for (const t of tiers) {
    for (const w of t.windows) {
      const hits = newestFirst.filter((s) => inWindow(s.date, w));
      if (t.kind === "all") hits.forEach((s) => keep.add(s.id));
      else if (hits.length) keep.add(hits[0].id);
    }
  }
  if (exemptNamed) for (const s of snapshots) if (s.name && s.name.trim()) keep.add(s.id);
  return keep;
}
