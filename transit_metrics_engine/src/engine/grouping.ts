import type { GroupKey } from "../types";
import { DAY_KEYS, type DayKey, dayOfWeek, hourOfDay } from "../utils/time";

export const ALL_ROUTES = "*";

export type MetricGroup = {
  routeId: string;
  groupKey: GroupKey;
};

export function hourGroupKey(hour: number): GroupKey {
  return `hour:${String(hour).padStart(2, "0")}`;
}

export function dayGroupKey(day: DayKey): GroupKey {
  return `dow:${day}`;
}

export function groupId(group: MetricGroup): string {
  return `${group.routeId}|${group.groupKey}`;
}

/**
 * Every group a record contributes to: the route overall, the route by hour of
 * day and by day of week, plus the network-wide total.
 */
export function groupsFor(
  routeId: string,
  timestamp: number,
  timeZone: string,
): MetricGroup[] {
  return [
    { routeId, groupKey: "overall" },
    { routeId, groupKey: hourGroupKey(hourOfDay(timestamp, timeZone)) },
    { routeId, groupKey: dayGroupKey(dayOfWeek(timestamp, timeZone)) },
    { routeId: ALL_ROUTES, groupKey: "overall" },
  ];
}

function groupRank(groupKey: GroupKey): number {
  if (groupKey === "overall") return 0;
  const [kind, value] = groupKey.split(":");
  if (kind === "hour") return 1 + Number(value);
  return 25 + DAY_KEYS.findIndex((day) => day === value);
}

export function compareGroups(a: MetricGroup, b: MetricGroup): number {
  if (a.routeId !== b.routeId) {
    if (a.routeId === ALL_ROUTES) return -1;
    if (b.routeId === ALL_ROUTES) return 1;
    return a.routeId < b.routeId ? -1 : 1;
  }
  return groupRank(a.groupKey) - groupRank(b.groupKey);
}
