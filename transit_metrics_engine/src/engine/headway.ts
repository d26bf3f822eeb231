import { groupBy, sortBy } from "lodash";
import type { MetricsConfig } from "../config/metricsConfig";
import type { HeadwayRecord, InferredArrival } from "../types";
import { type MetricGroup, groupId, groupsFor } from "./grouping";

export type HeadwayAnalysis = {
  records: HeadwayRecord[];
  skippedPairs: number;
};

export type BunchingSummary = MetricGroup & {
  headwayCount: number;
  bunchedCount: number;
  bunchingRate: number | null;
};

export function isBunching(
  actualHeadwaySeconds: number,
  scheduledHeadwaySeconds: number,
  bunchingRatio: number,
): boolean {
  return actualHeadwaySeconds < bunchingRatio * scheduledHeadwaySeconds;
}

/**
 * Pairs consecutive arrivals of a route at a stop. The scheduled headway is the
 * timetable gap between the two trips whichever ran first, so an overtaking
 * pair is still measured. Only a trip looping back past the same stop is
 * counted as skipped.
 */
export function analyzeHeadways(
  arrivals: readonly InferredArrival[],
  rules: Pick<MetricsConfig, "bunchingRatio">,
): HeadwayAnalysis {
  const byStop = groupBy(arrivals, (arrival) => `${arrival.routeId}|${arrival.stopId}`);
  const records: HeadwayRecord[] = [];
  let skippedPairs = 0;

  for (const key of Object.keys(byStop).sort()) {
    const ordered = sortBy(byStop[key], [
      "inferredTime",
      "scheduledTime",
      "tripId",
      "stopSequence",
    ]);

    for (let i = 1; i < ordered.length; i += 1) {
      const previous = ordered[i - 1];
      const current = ordered[i];
      if (current.tripId === previous.tripId) {
        skippedPairs += 1;
        continue;
      }

      const scheduledHeadwaySeconds =
        Math.abs(current.scheduledTime - previous.scheduledTime) / 1000;

      const actualHeadwaySeconds =
        (current.inferredTime - previous.inferredTime) / 1000;

      records.push({
        routeId: current.routeId,
        stopId: current.stopId,
        tripId: current.tripId,
        previousTripId: previous.tripId,
        stopSequence: current.stopSequence,
        timestamp: current.scheduledTime,
        scheduledHeadwaySeconds,
        actualHeadwaySeconds,
        bunching: isBunching(
          actualHeadwaySeconds,
          scheduledHeadwaySeconds,
          rules.bunchingRatio,
        ),
      });
    }
  }

  return { records, skippedPairs };
}

export function summarizeBunching(
  records: readonly HeadwayRecord[],
  timeZone: string,
): Map<string, BunchingSummary> {
  const summaries = new Map<string, BunchingSummary>();

  for (const record of records) {
    for (const group of groupsFor(record.routeId, record.timestamp, timeZone)) {
      const id = groupId(group);
      const summary: BunchingSummary = summaries.get(id) ?? {
        ...group,
        headwayCount: 0,
        bunchedCount: 0,
        bunchingRate: null,
      };
      summary.headwayCount += 1;
      if (record.bunching) summary.bunchedCount += 1;
      summary.bunchingRate = summary.bunchedCount / summary.headwayCount;
      summaries.set(id, summary);
    }
  }

  return summaries;
}
