// Values are persisted and compared with `<=`, so their order matters.
export const ScheduleMode = {
  Disabled: 0,
  AtBoot: 1,
  Every5Min: 2,
  Every10Min: 4,
  Every30Min: 7,
  Hourly: 10,
  Every2H: 12,
  Every4H: 14,
  Every6H: 16,
  Every12H: 18,
  CustomHours: 19,
  Daily: 20,
  RepeatedInterval: 25,
  OnDeviceConnect: 27,
  Weekly: 30,
  Monthly: 40,
  Yearly: 80,
} as const;

export type ScheduleMode = (typeof ScheduleMode)[keyof typeof ScheduleMode];

export const TimeUnit = {
  Hour: ScheduleMode.Hourly,
  Day: ScheduleMode.Daily,
  Week: ScheduleMode.Weekly,
  Month: ScheduleMode.Monthly,
  Year: ScheduleMode.Yearly,
} as const;

export type TimeUnit = (typeof TimeUnit)[keyof typeof TimeUnit];

const MODE_VALUES: readonly number[] = Object.values(ScheduleMode);
const UNIT_VALUES: readonly number[] = Object.values(TimeUnit);

export function isScheduleMode(value: number): value is ScheduleMode {
  return MODE_VALUES.includes(value);
}

export function isTimeUnit(value: number): value is TimeUnit {
  return UNIT_VALUES.includes(value);
}

export function scheduleModeName(mode: number): string {
  const entry = Object.entries(ScheduleMode).find(([, v]) => v === mode);
  return entry ? entry[0] : `Unknown(${mode})`;
}

export function timeUnitName(unit: number): string {
  const entry = Object.entries(TimeUnit).find(([, v]) => v === unit);
  return entry ? entry[0] : `Unknown(${unit})`;
}

export interface RepeatSpec {
  period: number;
  unit: TimeUnit;
}

export interface ScheduleSpec {
  mode: ScheduleMode;
  /** `HHMM`, leading zeros optional. */
  time: number;
  dayOfMonth: number;
  /** 1 = Monday ... 7 = Sunday */
  weekday: number;
  customHours: string;
  repeat: RepeatSpec;
}

export interface CronFields {
  minute: string;
  hour: string;
  dayOfMonth: string;
  month: string;
  dayOfWeek: string;
}

export type Trigger =
  | { kind: "cron"; fields: CronFields }
  | { kind: "boot" }
  | { kind: "device"; uuid: string; cached: boolean };

export interface Destination {
  mode: string;
  path: string;
  cachedUuid: string;
}
