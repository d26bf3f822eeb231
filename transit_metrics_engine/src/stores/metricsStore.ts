import { randomUUID } from "crypto";
import mongoose from "mongoose";
import type { MetricsConfig } from "../config/metricsConfig";
import AggregateMetrics from "../models/metrics/aggregateMetrics";
import DelayRecords from "../models/metrics/delayRecords";
import HeadwayRecords from "../models/metrics/headwayRecords";
import MetricRuns from "../models/metrics/metricRuns";
import type {
  AggregateMetric,
  DelayRecord,
  HeadwayRecord,
  MetricsResult,
} from "../types";

type RunScope = {
  runId: string;
  serviceDate: string;
};

export function toDelayRecordDoc(record: DelayRecord, scope: RunScope) {
  return {
    run_id: scope.runId,
    service_date: scope.serviceDate,
    route_id: record.routeId,
    stop_id: record.stopId,
    trip_id: record.tripId,
    stop_sequence: record.stopSequence,
    scheduled_at: new Date(record.timestamp),
    inferred_at: new Date(record.inferredTime),
    delay_seconds: record.delaySeconds,
    classification: record.classification,
  };
}

export function toHeadwayRecordDoc(record: HeadwayRecord, scope: RunScope) {
  return {
    run_id: scope.runId,
    service_date: scope.serviceDate,
    route_id: record.routeId,
    stop_id: record.stopId,
    trip_id: record.tripId,
    previous_trip_id: record.previousTripId,
    stop_sequence: record.stopSequence,
    scheduled_at: new Date(record.timestamp),
    scheduled_headway_seconds: record.scheduledHeadwaySeconds,
    actual_headway_seconds: record.actualHeadwaySeconds,
    bunching: record.bunching,
  };
}

export function toAggregateMetricDoc(metric: AggregateMetric, scope: RunScope) {
  return {
    run_id: scope.runId,
    service_date: scope.serviceDate,
    route_id: metric.routeId,
    group_key: metric.groupKey,
    arrival_count: metric.arrivalCount,
    headway_count: metric.headwayCount,
    otp_percent: metric.otpPercent,
    avg_delay_seconds: metric.avgDelaySeconds,
    delay_stddev_seconds: metric.delayStddevSeconds,
    bunching_rate: metric.bunchingRate,
    reliability_score: metric.reliabilityScore,
  };
}

export function toMetricRunDoc(
  result: MetricsResult,
  config: MetricsConfig,
  scope: RunScope,
) {
  return {
    run_id: scope.runId,
    service_date: scope.serviceDate,
    range_start: new Date(result.timeRange.start),
    range_end: new Date(result.timeRange.end),
    config: { ...config, scoreClampRange: [...config.scoreClampRange] },
    diagnostics: result.diagnostics,
    delay_record_count: result.delayRecords.length,
    headway_record_count: result.headwayRecords.length,
    aggregate_count: result.aggregateMetrics.length,
  };
}

/**
 * Persists a run's output. Earlier results for the same service date are
 * replaced in one transaction, so readers never see a mix of two runs.
 * Transactions need a replica set or sharded cluster.
 */
export function createMongoMetricsStore() {
  async function replaceServiceDate(
    result: MetricsResult,
    config: MetricsConfig,
  ): Promise<string> {
    const scope: RunScope = {
      runId: randomUUID(),
      serviceDate: result.serviceDate,
    };
    const filter = { service_date: scope.serviceDate };

    const session = await mongoose.startSession();
    try {
      await session.withTransaction(async () => {
        // operations on one session must not overlap
        await MetricRuns.deleteMany(filter, { session });
        await DelayRecords.deleteMany(filter, { session });
        await HeadwayRecords.deleteMany(filter, { session });
        await AggregateMetrics.deleteMany(filter, { session });

        await MetricRuns.create([toMetricRunDoc(result, config, scope)], {
          session,
        });
        if (result.delayRecords.length > 0) {
          await DelayRecords.insertMany(
            result.delayRecords.map((record) => toDelayRecordDoc(record, scope)),
            { session },
          );
        }
        if (result.headwayRecords.length > 0) {
          await HeadwayRecords.insertMany(
            result.headwayRecords.map((record) => toHeadwayRecordDoc(record, scope)),
            { session },
          );
        }
        if (result.aggregateMetrics.length > 0) {
          await AggregateMetrics.insertMany(
            result.aggregateMetrics.map((metric) =>
              toAggregateMetricDoc(metric, scope),
            ),
            { session },
          );
        }
      });
    } finally {
      await session.endSession();
    }

    console.log("[metrics-store] replaced service date", {
      serviceDate: scope.serviceDate,
      runId: scope.runId,
      delayRecords: result.delayRecords.length,
      headwayRecords: result.headwayRecords.length,
      aggregates: result.aggregateMetrics.length,
    });
    return scope.runId;
  }

  return { replaceServiceDate };
}

export type MetricsStore = ReturnType<typeof createMongoMetricsStore>;
