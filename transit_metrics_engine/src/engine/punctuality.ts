import { sortBy } from "lodash";
import type { MetricsConfig } from "../config/metricsConfig";
import type { DelayClassification, DelayRecord, InferredArrival } from "../types";
import { mean, standardDeviation } from "../utils/numbers";
import { type MetricGroup, groupId, groupsFor } from "./grouping";

type ClassificationRules = Pick<
  MetricsConfig,
  "lateThresholdSeconds" | "earlyThresholdSeconds"
>;

export type PunctualitySummary = MetricGroup & {
  arrivalCount: number;
  onTimeCount: number;
  otpPercent: number | null;
  avgDelaySeconds: number | null;
  delayStddevSeconds: number | null;
};

type DelayBucket = {
  group: MetricGroup;
  delays: number[];
  onTime: number;
};

export function delaySecondsFor(arrival: InferredArrival): number {
  const delay = Math.round((arrival.inferredTime - arrival.scheduledTime) / 1000);
  return Object.is(delay, -0) ? 0 : delay;
}

export function classifyDelay(
  delaySeconds: number,
  rules: ClassificationRules,
): DelayClassification {
  if (delaySeconds > rules.lateThresholdSeconds) return "late";
  if (delaySeconds < rules.earlyThresholdSeconds) return "early";
  return "on_time";
}

export function buildDelayRecords(
  arrivals: readonly InferredArrival[],
  rules: ClassificationRules,
): DelayRecord[] {
  const records = arrivals.map((arrival): DelayRecord => {
    const delaySeconds = delaySecondsFor(arrival);
    return {
      routeId: arrival.routeId,
      stopId: arrival.stopId,
      tripId: arrival.tripId,
      stopSequence: arrival.stopSequence,
      timestamp: arrival.scheduledTime,
      inferredTime: arrival.inferredTime,
      delaySeconds,
      classification: classifyDelay(delaySeconds, rules),
    };
  });

  return sortBy(records, [
    "routeId",
    "stopId",
    "timestamp",
    "tripId",
    "stopSequence",
  ]);
}

/**
 * OTP only counts classified arrivals: stops without an inferred arrival are
 * not in the denominator.
 */
export function summarizePunctuality(
  records: readonly DelayRecord[],
  timeZone: string,
): Map<string, PunctualitySummary> {
  const buckets = new Map<string, DelayBucket>();

  for (const record of records) {
    for (const group of groupsFor(record.routeId, record.timestamp, timeZone)) {
      const id = groupId(group);
      const bucket: DelayBucket = buckets.get(id) ?? {
        group,
        delays: [],
        onTime: 0,
      };
      bucket.delays.push(record.delaySeconds);
      if (record.classification === "on_time") bucket.onTime += 1;
      buckets.set(id, bucket);
    }
  }

  const summaries = new Map<string, PunctualitySummary>();
  for (const [id, bucket] of buckets) {
    const count = bucket.delays.length;
    const avg = mean(bucket.delays);
    const stddev = standardDeviation(bucket.delays);
    summaries.set(id, {
      ...bucket.group,
      arrivalCount: count,
      onTimeCount: bucket.onTime,
      otpPercent: count > 0 ? (100 * bucket.onTime) / count : null,
      avgDelaySeconds: avg,
      delayStddevSeconds: stddev,
    });
  }
  return summaries;
}
