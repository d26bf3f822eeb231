import {
  type MetricsConfig,
  type MetricsConfigInput,
  resolveMetricsConfig,
} from "../config/metricsConfig";
import type {
  InferredArrival,
  MetricsResult,
  PositionLog,
  PositionObservation,
  RunDiagnostics,
  ScheduleStore,
  ScheduledStopEvent,
  StopMatch,
  TimeRange,
  UnmatchedReason,
} from "../types";
import { ConfigurationError, createSkipTracker } from "../utils/errors";
import { isFiniteNumber } from "../utils/numbers";
import { isServiceDate } from "../utils/time";
import { runWorkUnits } from "../utils/workPool";
import { buildAggregateMetrics } from "./aggregates";
import { inferTripArrivals, type TripWorkUnit } from "./arrivalInference";
import { analyzeHeadways } from "./headway";
import { buildDelayRecords } from "./punctuality";

type MetricsEngineOptions = {
  scheduleStore: ScheduleStore;
  positionLog: PositionLog;
};

export type ComputeOptions = {
  routeFilter?: readonly string[];
};

type SkipTracker = ReturnType<typeof createSkipTracker>;

function assertRunScope(serviceDate: string, timeRange: TimeRange): void {
  const issues: string[] = [];
  if (!isServiceDate(serviceDate)) {
    issues.push(`serviceDate: expected YYYY-MM-DD, got "${serviceDate}"`);
  }
  if (!isFiniteNumber(timeRange.start) || !isFiniteNumber(timeRange.end)) {
    issues.push("timeRange: start and end must be epoch milliseconds");
  } else if (timeRange.start >= timeRange.end) {
    issues.push("timeRange: start must be before end");
  }

  if (issues.length > 0) {
    throw new ConfigurationError("Invalid metrics run scope", issues);
  }
}

export function isValidObservation(observation: PositionObservation): boolean {
  const { latitude, longitude, timestamp, currentStopSequence } = observation;
  if (!observation.tripId) return false;
  if (!isFiniteNumber(latitude) || latitude < -90 || latitude > 90) return false;
  if (!isFiniteNumber(longitude) || longitude < -180 || longitude > 180) {
    return false;
  }
  if (!isFiniteNumber(timestamp) || timestamp <= 0) return false;
  if (currentStopSequence !== undefined) {
    return Number.isInteger(currentStopSequence) && currentStopSequence >= 0;
  }
  return true;
}

function buildTripUnits(
  events: readonly ScheduledStopEvent[],
  skips: SkipTracker,
): Map<string, TripWorkUnit> {
  const units = new Map<string, TripWorkUnit>();
  const seen = new Set<string>();

  for (const event of events) {
    const { routeId } = event;
    if (!routeId) {
      skips.skip("missing_route", {
        tripId: event.tripId,
        stopSequence: event.stopSequence,
        message: "Scheduled event has no route mapping",
      });
      continue;
    }

    const scheduledTime = event.scheduledArrival ?? event.scheduledDeparture;
    if (scheduledTime === null) {
      skips.skip("missing_scheduled_time", {
        tripId: event.tripId,
        stopSequence: event.stopSequence,
        routeId,
      });
      continue;
    }

    const key = `${event.tripId}#${event.stopSequence}`;
    if (seen.has(key)) {
      skips.skip("duplicate_stop_event", {
        tripId: event.tripId,
        stopSequence: event.stopSequence,
        routeId,
      });
      continue;
    }
    seen.add(key);

    const unit: TripWorkUnit = units.get(event.tripId) ?? {
      tripId: event.tripId,
      events: [],
      observations: [],
    };
    unit.events.push({ ...event, routeId, scheduledTime });
    units.set(event.tripId, unit);
  }

  return units;
}

function attachObservations(
  units: Map<string, TripWorkUnit>,
  scheduledTripIds: ReadonlySet<string>,
  observations: readonly PositionObservation[],
  skips: SkipTracker,
): void {
  for (const observation of observations) {
    if (!isValidObservation(observation)) {
      skips.skip("invalid_observation", {
        tripId: observation.tripId,
        message: "Observation has invalid coordinates, timestamp or sequence",
      });
      continue;
    }

    const unit = units.get(observation.tripId);
    if (unit) {
      unit.observations.push(observation);
      continue;
    }

    // trips whose every event was skipped are already counted
    if (!scheduledTripIds.has(observation.tripId)) {
      skips.skip("unknown_trip", {
        tripId: observation.tripId,
        message: "Observation references a trip absent from the schedule",
      });
    }
  }
}

function countUnmatched(matches: readonly StopMatch[]): Record<UnmatchedReason, number> {
  const counts: Record<UnmatchedReason, number> = {
    no_observation_in_window: 0,
    no_observation_near_stop: 0,
    stop_without_location: 0,
  };
  for (const match of matches) {
    if (match.status === "unmatched") counts[match.reason] += 1;
  }
  return counts;
}

export function createMetricsEngine(options: MetricsEngineOptions) {
  async function inferArrivals(
    units: readonly TripWorkUnit[],
    config: MetricsConfig,
  ): Promise<StopMatch[]> {
    const perTrip = await runWorkUnits(units, config.concurrency, (unit) =>
      inferTripArrivals(unit, config),
    );
    return perTrip.flat();
  }

  return {
    async computeMetrics(
      serviceDate: string,
      timeRange: TimeRange,
      configInput: MetricsConfigInput | MetricsConfig = {},
      computeOptions: ComputeOptions = {},
    ): Promise<MetricsResult> {
      const config = resolveMetricsConfig(configInput);
      assertRunScope(serviceDate, timeRange);

      const skips = createSkipTracker();
      const events = await options.scheduleStore.getScheduledStopEvents(
        serviceDate,
        computeOptions.routeFilter,
      );
      const scheduledTripIds = new Set(events.map((event) => event.tripId));
      const units = buildTripUnits(events, skips);

      // narrow the log query only when the schedule itself was narrowed
      const tripFilter = computeOptions.routeFilter
        ? Array.from(scheduledTripIds).sort()
        : undefined;
      const observations =
        tripFilter && tripFilter.length === 0
          ? []
          : await options.positionLog.getPositionObservations(
              timeRange.start,
              timeRange.end,
              tripFilter,
            );
      attachObservations(units, scheduledTripIds, observations, skips);

      const orderedUnits = Array.from(units.values()).sort((a, b) =>
        a.tripId < b.tripId ? -1 : a.tripId > b.tripId ? 1 : 0,
      );
      const matches = await inferArrivals(orderedUnits, config);
      const inferredArrivals: InferredArrival[] = [];
      for (const match of matches) {
        if (match.status === "matched") inferredArrivals.push(match.arrival);
      }

      // independent read-only consumers of the same arrival set
      const delayRecords = buildDelayRecords(inferredArrivals, config);
      const headways = analyzeHeadways(inferredArrivals, config);
      const aggregateMetrics = buildAggregateMetrics(
        delayRecords,
        headways.records,
        config,
      );

      const diagnostics: RunDiagnostics = {
        tripsScheduled: units.size,
        tripsObserved: orderedUnits.filter((unit) => unit.observations.length > 0)
          .length,
        scheduledEvents: events.length,
        observations: observations.length,
        inferredArrivals: inferredArrivals.length,
        unmatched: countUnmatched(matches),
        skipped: skips.summary(),
        headwayPairsSkipped: headways.skippedPairs,
      };

      console.log("[metrics] run complete", {
        serviceDate,
        delayRecords: delayRecords.length,
        headwayRecords: headways.records.length,
        aggregates: aggregateMetrics.length,
        ...diagnostics,
      });

      return {
        serviceDate,
        timeRange: { start: timeRange.start, end: timeRange.end },
        inferredArrivals,
        delayRecords,
        headwayRecords: headways.records,
        aggregateMetrics,
        diagnostics,
      };
    },
  };
}

export type MetricsEngine = ReturnType<typeof createMetricsEngine>;
