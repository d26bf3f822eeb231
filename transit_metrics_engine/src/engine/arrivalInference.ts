import type { MetricsConfig } from "../config/metricsConfig";
import type {
  InferredArrival,
  LatLng,
  MatchMethod,
  PositionObservation,
  ScheduledStopEvent,
  StopMatch,
  UnmatchedReason,
} from "../types";
import { haversineMeters, projectOntoSegment } from "../utils/geo";
import { roundTo } from "../utils/numbers";

export type ResolvedStopEvent = ScheduledStopEvent & {
  routeId: string;
  scheduledTime: number;
};

export type TripWorkUnit = {
  tripId: string;
  events: ResolvedStopEvent[];
  observations: PositionObservation[];
};

type InferenceRules = Pick<
  MetricsConfig,
  "matchWindowSeconds" | "maxMatchDistanceMeters"
>;

type GeographicCandidate = {
  distanceMeters: number;
  time: number;
  method: "geographic_point" | "geographic_interpolated";
  sourceTimestamps: number[];
};

export const MATCH_CONFIDENCE: Record<MatchMethod, number> = {
  sequence_exact: 0.95,
  sequence_passed: 0.8,
  geographic_point: 0.6,
  geographic_interpolated: 0.5,
};

export function compareObservations(
  a: PositionObservation,
  b: PositionObservation,
): number {
  return (
    a.timestamp - b.timestamp ||
    (a.currentStopSequence ?? -1) - (b.currentStopSequence ?? -1) ||
    a.latitude - b.latitude ||
    a.longitude - b.longitude
  );
}

function firstIndexAtOrAfter(
  observations: readonly PositionObservation[],
  timestamp: number,
): number {
  let low = 0;
  let high = observations.length;
  while (low < high) {
    const mid = (low + high) >> 1;
    if (observations[mid].timestamp < timestamp) {
      low = mid + 1;
    } else {
      high = mid;
    }
  }
  return low;
}

/** `observations` must already be sorted with `compareObservations`. */
export function observationsInWindow(
  observations: readonly PositionObservation[],
  centre: number,
  windowSeconds: number,
): PositionObservation[] {
  const windowMs = windowSeconds * 1000;
  const from = firstIndexAtOrAfter(observations, centre - windowMs);
  const result: PositionObservation[] = [];
  for (let i = from; i < observations.length; i += 1) {
    if (observations[i].timestamp > centre + windowMs) break;
    result.push(observations[i]);
  }
  return result;
}

// Vehicles do not move backward in sequence, so the first report at or past
// the target stop is the earliest moment the vehicle can have reached it.
function pickSequenceTagged(
  candidates: readonly PositionObservation[],
  stopSequence: number,
): PositionObservation | null {
  for (const observation of candidates) {
    if (
      observation.currentStopSequence !== undefined &&
      observation.currentStopSequence >= stopSequence
    ) {
      return observation;
    }
  }
  return null;
}

function toLatLng(observation: PositionObservation): LatLng {
  return { lat: observation.latitude, lng: observation.longitude };
}

function isCloser(a: GeographicCandidate, b: GeographicCandidate): boolean {
  if (a.distanceMeters !== b.distanceMeters) {
    return a.distanceMeters < b.distanceMeters;
  }
  if (a.time !== b.time) {
    // later wins: the vehicle has not necessarily left yet
    return a.time > b.time;
  }
  return a.method === "geographic_point" && b.method !== "geographic_point";
}

function pickNearest(
  candidates: readonly PositionObservation[],
  stopLocation: LatLng,
  maxDistanceMeters: number,
): GeographicCandidate | null {
  const positions: GeographicCandidate[] = [];

  for (let i = 0; i < candidates.length; i += 1) {
    const current = candidates[i];
    positions.push({
      distanceMeters: haversineMeters(stopLocation, toLatLng(current)),
      time: current.timestamp,
      method: "geographic_point",
      sourceTimestamps: [current.timestamp],
    });

    if (i === 0) continue;
    const previous = candidates[i - 1];
    if (current.timestamp <= previous.timestamp) continue;

    const projection = projectOntoSegment(
      stopLocation,
      toLatLng(previous),
      toLatLng(current),
    );
    if (projection.fraction <= 0 || projection.fraction >= 1) continue;

    positions.push({
      distanceMeters: projection.distanceMeters,
      time: Math.round(
        previous.timestamp +
          projection.fraction * (current.timestamp - previous.timestamp),
      ),
      method: "geographic_interpolated",
      sourceTimestamps: [previous.timestamp, current.timestamp],
    });
  }

  let best: GeographicCandidate | null = null;
  for (const position of positions) {
    if (position.distanceMeters > maxDistanceMeters) continue;
    if (!best || isCloser(position, best)) best = position;
  }
  return best;
}

function unmatched(event: ResolvedStopEvent, reason: UnmatchedReason): StopMatch {
  return {
    status: "unmatched",
    tripId: event.tripId,
    stopSequence: event.stopSequence,
    reason,
  };
}

function matched(
  event: ResolvedStopEvent,
  inferredTime: number,
  method: MatchMethod,
  confidence: number,
  sourceTimestamps: number[],
): StopMatch {
  const arrival: InferredArrival = {
    tripId: event.tripId,
    stopId: event.stopId,
    stopSequence: event.stopSequence,
    routeId: event.routeId,
    scheduledTime: event.scheduledTime,
    inferredTime,
    confidence,
    method,
    sourceTimestamps,
  };
  return { status: "matched", arrival };
}

export function matchStop(
  event: ResolvedStopEvent,
  observations: readonly PositionObservation[],
  rules: InferenceRules,
): StopMatch {
  const candidates = observationsInWindow(
    observations,
    event.scheduledTime,
    rules.matchWindowSeconds,
  );
  if (candidates.length === 0) {
    return unmatched(event, "no_observation_in_window");
  }

  const tagged = pickSequenceTagged(candidates, event.stopSequence);
  if (tagged) {
    const method: MatchMethod =
      tagged.currentStopSequence === event.stopSequence
        ? "sequence_exact"
        : "sequence_passed";
    return matched(event, tagged.timestamp, method, MATCH_CONFIDENCE[method], [
      tagged.timestamp,
    ]);
  }

  if (!event.stopLocation) {
    return unmatched(event, "stop_without_location");
  }

  // a report tagged below the target says the vehicle has not reached it yet
  const untagged = candidates.filter(
    (observation) => observation.currentStopSequence === undefined,
  );
  const nearest = pickNearest(
    untagged,
    event.stopLocation,
    rules.maxMatchDistanceMeters,
  );
  if (!nearest) {
    return unmatched(event, "no_observation_near_stop");
  }

  // confidence decays to half of the method's base at the distance limit
  const confidence = roundTo(
    MATCH_CONFIDENCE[nearest.method] *
      (1 - 0.5 * (nearest.distanceMeters / rules.maxMatchDistanceMeters)),
    3,
  );
  return matched(
    event,
    nearest.time,
    nearest.method,
    confidence,
    nearest.sourceTimestamps,
  );
}

export function inferTripArrivals(
  unit: TripWorkUnit,
  rules: InferenceRules,
): StopMatch[] {
  const observations = [...unit.observations].sort(compareObservations);
  const events = [...unit.events].sort(
    (a, b) => a.stopSequence - b.stopSequence,
  );
  return events.map((event) => matchStop(event, observations, rules));
}
