export const DiskUnit = {
  MB: 10,
  GB: 20,
} as const;

export type DiskUnit = (typeof DiskUnit)[keyof typeof DiskUnit];

export interface AgePolicy {
  enabled: boolean;
  value: number;
  /** A TimeUnit; only Day, Week and Year produce a cutoff. */
  unit: number;
}

export interface SpacePolicy {
  enabled: boolean;
  value: number;
  /** Raw stored unit; anything other than MB/GB disables the check. */
  unit: number;
}

export interface InodePolicy {
  enabled: boolean;
  /** Percent of free inodes to keep, 1-15. */
  percent: number;
}

export interface SmartPolicy {
  enabled: boolean;
  keepAll: number;
  keepOnePerDay: number;
  keepOnePerWeek: number;
  keepOnePerMonth: number;
}

export interface RetentionSpec {
  age: AgePolicy;
  space: SpacePolicy;
  inodes: InodePolicy;
  smart: SmartPolicy;
  dontRemoveNamed: boolean;
}

export type TierKind = "all" | "daily" | "weekly" | "monthly";

/** Half-open date range `[start, end)`. */
export interface DateWindow {
  start: Date;
  end: Date;
}

export interface RetentionTier {
  kind: TierKind;
  count: number;
  /** Oldest date the tier still covers. */
  since: Date;
  windows: DateWindow[];
}

export interface SnapshotInfo {
  id: string;
  date: Date;
  name?: string;
}

export interface FsStats {
  freeBytes: number;
  totalInodes: number;
  freeInodes: number;
}
