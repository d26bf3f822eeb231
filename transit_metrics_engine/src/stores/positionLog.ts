import type Redis from "ioredis";
import { z } from "zod";
import type { PositionLog, PositionObservation } from "../types";

export const POSITION_TRIP_INDEX_KEY = "positions:trips";

export function positionTripKey(tripId: string): string {
  return `positions:trip:${tripId}`;
}

type KeydbPositionLogOptions = {
  keydb: Redis;
  retentionSeconds?: number;
};

const storedObservationSchema = z.object({
  tripId: z.string().min(1),
  timestamp: z.number().finite(),
  lat: z.number().finite(),
  lng: z.number().finite(),
  currentStopSequence: z.number().finite().nullish(),
});

export function serializeObservation(observation: PositionObservation): string {
  return JSON.stringify({
    tripId: observation.tripId,
    timestamp: observation.timestamp,
    lat: observation.latitude,
    lng: observation.longitude,
    currentStopSequence: observation.currentStopSequence ?? null,
  });
}

export function parseObservationEntry(raw: string): PositionObservation | null {
  let payload: unknown;
  try {
    payload = JSON.parse(raw);
  } catch {
    return null;
  }

  const parsed = storedObservationSchema.safeParse(payload);
  if (!parsed.success) return null;

  const { tripId, timestamp, lat, lng, currentStopSequence } = parsed.data;
  const observation: PositionObservation = {
    tripId,
    timestamp,
    latitude: lat,
    longitude: lng,
  };
  if (currentStopSequence !== null && currentStopSequence !== undefined) {
    observation.currentStopSequence = currentStopSequence;
  }
  return observation;
}

export function createKeydbPositionLog(options: KeydbPositionLogOptions) {
  async function appendObservations(
    observations: readonly PositionObservation[],
  ): Promise<void> {
    if (observations.length === 0) return;

    const pipeline = options.keydb.multi();
    const tripIds = new Set<string>();
    for (const observation of observations) {
      const key = positionTripKey(observation.tripId);
      pipeline.zadd(key, observation.timestamp, serializeObservation(observation));
      tripIds.add(observation.tripId);
    }
    pipeline.sadd(POSITION_TRIP_INDEX_KEY, ...Array.from(tripIds));
    if (options.retentionSeconds && options.retentionSeconds > 0) {
      for (const tripId of tripIds) {
        pipeline.expire(positionTripKey(tripId), options.retentionSeconds);
      }
    }
    await pipeline.exec();
  }

  async function getPositionObservations(
    rangeStart: number,
    rangeEnd: number,
    tripFilter?: readonly string[],
  ): Promise<PositionObservation[]> {
    const tripIds = tripFilter
      ? [...tripFilter]
      : (await options.keydb.smembers(POSITION_TRIP_INDEX_KEY)).sort();
    if (tripIds.length === 0) return [];

    const pipeline = options.keydb.multi();
    for (const tripId of tripIds) {
      pipeline.zrangebyscore(positionTripKey(tripId), rangeStart, rangeEnd);
    }
    const results = await pipeline.exec();

    const observations: PositionObservation[] = [];
    let malformed = 0;
    for (let i = 0; i < tripIds.length; i += 1) {
      const reply = results?.[i];
      if (!reply) continue;
      const [error, entries] = reply;
      if (error) throw error;
      if (!Array.isArray(entries)) continue;

      for (const entry of entries) {
        const observation =
          typeof entry === "string" ? parseObservationEntry(entry) : null;
        if (observation) {
          observations.push(observation);
        } else {
          malformed += 1;
        }
      }
    }

    if (malformed > 0) {
      console.warn("[position-log] skipped malformed entries", {
        malformed,
        rangeStart,
        rangeEnd,
      });
    }

    return observations.sort(
      (a, b) =>
        a.timestamp - b.timestamp ||
        (a.tripId < b.tripId ? -1 : a.tripId > b.tripId ? 1 : 0),
    );
  }

  async function removeTrips(tripIds: readonly string[]): Promise<void> {
    if (tripIds.length === 0) return;
    await options.keydb
      .multi()
      .del(...tripIds.map((tripId) => positionTripKey(tripId)))
      .srem(POSITION_TRIP_INDEX_KEY, ...tripIds)
      .exec();
  }

  const positionLog: PositionLog = { getPositionObservations };
  return { ...positionLog, appendObservations, removeTrips };
}
