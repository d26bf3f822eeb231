import {
  type CalendarDateRow,
  type CalendarRow,
  resolveActiveServiceIds,
} from "../stores/serviceCalendar";

function weekly(
  serviceId: string,
  days: Partial<Record<"monday" | "saturday" | "sunday", number>>,
  startDate = "20260101",
  endDate = "20261231",
): CalendarRow {
  return {
    service_id: serviceId,
    monday: 0,
    tuesday: 0,
    wednesday: 0,
    thursday: 0,
    friday: 0,
    saturday: 0,
    sunday: 0,
    ...days,
    start_date: startDate,
    end_date: endDate,
  };
}

const calendars: CalendarRow[] = [
  weekly("WEEKDAY", { monday: 1 }),
  weekly("WEEKEND", { saturday: 1, sunday: 1 }),
  weekly("LAST_YEAR", { monday: 1 }, "20250101", "20251231"),
  { service_id: "UNDATED", monday: 1, start_date: null, end_date: null },
];

describe("resolveActiveServiceIds", () => {
  test("selects services whose weekday flag and date range match", () => {
    expect(resolveActiveServiceIds(calendars, [], "2026-03-02")).toEqual([
      "WEEKDAY",
    ]);
    expect(resolveActiveServiceIds(calendars, [], "2026-03-07")).toEqual([
      "WEEKEND",
    ]);
  });

  test("uses the range of the calendar row", () => {
    expect(resolveActiveServiceIds(calendars, [], "2025-12-29")).toEqual([
      "LAST_YEAR",
    ]);
  });

  test("applies added and removed exceptions for the date", () => {
    const exceptions: CalendarDateRow[] = [
      { service_id: "WEEKDAY", date: "20260302", exception_type: 2 },
      { service_id: "HOLIDAY", date: "20260302", exception_type: 1 },
      { service_id: "WEEKEND", date: "20260303", exception_type: 1 },
    ];

    expect(resolveActiveServiceIds(calendars, exceptions, "2026-03-02")).toEqual([
      "HOLIDAY",
    ]);
  });
});
