import dayjs from "dayjs";
import utc from "dayjs/plugin/utc";
import timezone from "dayjs/plugin/timezone";

dayjs.extend(utc);
dayjs.extend(timezone);

export const DAY_KEYS = ["sun", "mon", "tue", "wed", "thu", "fri", "sat"] as const;
export type DayKey = (typeof DAY_KEYS)[number];

const SERVICE_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;
const GTFS_TIME_PATTERN = /^(\d{1,3}):([0-5]\d):([0-5]\d)$/;

export function isServiceDate(value: string): boolean {
  if (!SERVICE_DATE_PATTERN.test(value)) return false;
  const parsed = dayjs.utc(value);
  return parsed.isValid() && parsed.format("YYYY-MM-DD") === value;
}

export function isTimeZone(value: string): boolean {
  try {
    new Intl.DateTimeFormat("en-US", { timeZone: value });
    return true;
  } catch {
    return false;
  }
}

/** GTFS `HH:MM:SS`, hours may run past 24 for trips after midnight. */
export function parseGtfsTime(raw: string | null | undefined): number | null {
  if (!raw) return null;
  const match = GTFS_TIME_PATTERN.exec(raw.trim());
  if (!match) return null;

  const [, hours, minutes, seconds] = match;
  return Number(hours) * 3600 + Number(minutes) * 60 + Number(seconds);
}

/**
 * GTFS times count from "noon minus 12h" on the service date, which differs
 * from midnight on days with a DST change.
 */
export function serviceDayOrigin(serviceDate: string, timeZone: string): number {
  return dayjs
    .tz(`${serviceDate} 12:00:00`, timeZone)
    .subtract(12, "hour")
    .valueOf();
}

export function resolveServiceTime(
  serviceDate: string,
  secondsSinceOrigin: number,
  timeZone: string,
): number {
  return serviceDayOrigin(serviceDate, timeZone) + secondsSinceOrigin * 1000;
}

export function toGtfsDate(serviceDate: string): string {
  return serviceDate.replace(/-/g, "");
}

export function serviceDayOfWeek(serviceDate: string): DayKey {
  return DAY_KEYS[dayjs.utc(serviceDate).day()];
}

export function hourOfDay(timestamp: number, timeZone: string): number {
  return dayjs(timestamp).tz(timeZone).hour();
}

export function dayOfWeek(timestamp: number, timeZone: string): DayKey {
  return DAY_KEYS[dayjs(timestamp).tz(timeZone).day()];
}

export function formatTimestamp(timestamp: number, timeZone: string): string {
  return dayjs(timestamp).tz(timeZone).format("YYYY-MM-DD HH:mm:ss");
}
