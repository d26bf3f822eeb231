import type { MetricsConfig } from "../config/metricsConfig";
import type { AggregateMetric, DelayRecord, HeadwayRecord } from "../types";
import { roundTo } from "../utils/numbers";
import { type MetricGroup, compareGroups } from "./grouping";
import { summarizeBunching } from "./headway";
import { summarizePunctuality } from "./punctuality";
import { computeReliabilityScore } from "./reliability";

function roundOrNull(value: number | null, digits: number): number | null {
  return value === null ? null : roundTo(value, digits);
}

/**
 * Rebuilds every aggregate from the record sets. Groups exist when they have
 * at least one delay or headway record.
 */
export function buildAggregateMetrics(
  delayRecords: readonly DelayRecord[],
  headwayRecords: readonly HeadwayRecord[],
  config: MetricsConfig,
): AggregateMetric[] {
  const punctuality = summarizePunctuality(delayRecords, config.timeZone);
  const bunching = summarizeBunching(headwayRecords, config.timeZone);

  const groups = new Map<string, MetricGroup>();
  for (const [id, summary] of punctuality) {
    groups.set(id, { routeId: summary.routeId, groupKey: summary.groupKey });
  }
  for (const [id, summary] of bunching) {
    if (!groups.has(id)) {
      groups.set(id, { routeId: summary.routeId, groupKey: summary.groupKey });
    }
  }

  return Array.from(groups.entries())
    .sort(([, a], [, b]) => compareGroups(a, b))
    .map(([id, group]): AggregateMetric => {
      const delays = punctuality.get(id);
      const headways = bunching.get(id);
      const otpPercent = delays?.otpPercent ?? null;
      const delayStddevSeconds = delays?.delayStddevSeconds ?? null;

      return {
        routeId: group.routeId,
        groupKey: group.groupKey,
        arrivalCount: delays?.arrivalCount ?? 0,
        headwayCount: headways?.headwayCount ?? 0,
        otpPercent: roundOrNull(otpPercent, 2),
        avgDelaySeconds: roundOrNull(delays?.avgDelaySeconds ?? null, 2),
        delayStddevSeconds: roundOrNull(delayStddevSeconds, 2),
        bunchingRate: roundOrNull(headways?.bunchingRate ?? null, 4),
        reliabilityScore: roundOrNull(
          computeReliabilityScore(otpPercent, delayStddevSeconds, config),
          2,
        ),
      };
    });
}
