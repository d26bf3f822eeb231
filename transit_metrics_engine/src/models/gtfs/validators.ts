const GTFS_DATE_PATTERN = /^\d{8}$/;
const GTFS_TIME_PATTERN = /^\d{1,3}:[0-5]\d:[0-5]\d$/;

export function isGtfsDate(value: unknown): boolean {
  return typeof value === "string" && GTFS_DATE_PATTERN.test(value);
}

export function isOptionalGtfsTime(value: unknown): boolean {
  if (value === null || value === undefined || value === "") return true;
  return typeof value === "string" && GTFS_TIME_PATTERN.test(value.trim());
}
