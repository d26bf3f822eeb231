import { type DayKey, serviceDayOfWeek, toGtfsDate } from "../utils/time";

type DayFlag = number | null | undefined;

export type CalendarRow = {
  service_id: string;
  monday?: DayFlag;
  tuesday?: DayFlag;
  wednesday?: DayFlag;
  thursday?: DayFlag;
  friday?: DayFlag;
  saturday?: DayFlag;
  sunday?: DayFlag;
  start_date?: string | null;
  end_date?: string | null;
};

export type CalendarDateRow = {
  service_id: string;
  date: string;
  exception_type: number;
};

const DAY_COLUMNS: Record<DayKey, keyof CalendarRow> = {
  sun: "sunday",
  mon: "monday",
  tue: "tuesday",
  wed: "wednesday",
  thu: "thursday",
  fri: "friday",
  sat: "saturday",
};

const SERVICE_ADDED = 1;
const SERVICE_REMOVED = 2;

/**
 * Services running on `serviceDate`: weekly calendar rows whose range covers
 * the date, then calendar_dates exceptions applied on top.
 */
export function resolveActiveServiceIds(
  calendars: readonly CalendarRow[],
  calendarDates: readonly CalendarDateRow[],
  serviceDate: string,
): string[] {
  const gtfsDate = toGtfsDate(serviceDate);
  const dayColumn = DAY_COLUMNS[serviceDayOfWeek(serviceDate)];
  const active = new Set<string>();

  for (const row of calendars) {
    if (!row.start_date || !row.end_date) continue;
    // YYYYMMDD compares correctly as text
    if (row.start_date > gtfsDate || row.end_date < gtfsDate) continue;
    if (row[dayColumn] === 1) active.add(row.service_id);
  }

  for (const exception of calendarDates) {
    if (exception.date !== gtfsDate) continue;
    if (exception.exception_type === SERVICE_ADDED) {
      active.add(exception.service_id);
    } else if (exception.exception_type === SERVICE_REMOVED) {
      active.delete(exception.service_id);
    }
  }

  return Array.from(active).sort();
}
