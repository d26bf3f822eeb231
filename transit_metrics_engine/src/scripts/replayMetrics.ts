import dotenv from "dotenv";
import Redis from "ioredis";
import { createMetricsEngine } from "../engine/metricsEngine";
import { createMemoryScheduleStore } from "../stores/memoryStores";
import { createKeydbPositionLog } from "../stores/positionLog";
import type { ScheduledStopEvent } from "../types";
import { resolveServiceTime, serviceDayOrigin } from "../utils/time";

dotenv.config();

const keydbUrl = process.env.KEYDB_URL ?? "redis://localhost:6379";
const keepKeys =
  (process.env.REPLAY_KEEP_KEYS ?? "false").toLowerCase() === "true";

const serviceDate = "2026-03-02";
const timeZone = "UTC";
const routeId = "REPLAY_METRICS_ROUTE";
const leadTrip = "REPLAY_METRICS_TRIP_A";
const followTrip = "REPLAY_METRICS_TRIP_B";

function assertOrThrow(condition: boolean, message: string): void {
  if (!condition) {
    throw new Error(message);
  }
}

function at(clock: string): number {
  const [hours, minutes, seconds] = clock.split(":").map(Number);
  return resolveServiceTime(
    serviceDate,
    hours * 3600 + minutes * 60 + seconds,
    timeZone,
  );
}

function stopEvent(
  tripId: string,
  stopSequence: number,
  stopId: string,
  clock: string,
): ScheduledStopEvent {
  return {
    tripId,
    stopId,
    stopSequence,
    scheduledArrival: at(clock),
    scheduledDeparture: at(clock),
    routeId,
    serviceDate,
    stopLocation: null,
  };
}

async function main(): Promise<void> {
  const keydb = new Redis(keydbUrl, {
    maxRetriesPerRequest: null,
    enableReadyCheck: true,
    connectTimeout: 3000,
    retryStrategy: () => null,
  });
  keydb.on("error", (error) => {
    console.warn("[replay:metrics] keydb error", error.message);
  });

  const positionLog = createKeydbPositionLog({ keydb });
  const scheduleStore = createMemoryScheduleStore([
    stopEvent(leadTrip, 1, "REPLAY_STOP_1", "08:00:00"),
    stopEvent(leadTrip, 2, "REPLAY_STOP_2", "08:05:00"),
    stopEvent(followTrip, 1, "REPLAY_STOP_1", "08:10:00"),
    stopEvent(followTrip, 2, "REPLAY_STOP_2", "08:15:00"),
  ]);

  try {
    await keydb.ping();
    await positionLog.removeTrips([leadTrip, followTrip]);

    // the follower runs 8 minutes early and catches the leader
    await positionLog.appendObservations([
      { tripId: leadTrip, timestamp: at("08:00:30"), latitude: 43.6453, longitude: -79.3806, currentStopSequence: 1 },
      { tripId: leadTrip, timestamp: at("08:05:30"), latitude: 43.6487, longitude: -79.3771, currentStopSequence: 2 },
      { tripId: followTrip, timestamp: at("08:02:00"), latitude: 43.6453, longitude: -79.3806, currentStopSequence: 1 },
      { tripId: followTrip, timestamp: at("08:07:00"), latitude: 43.6487, longitude: -79.3771, currentStopSequence: 2 },
    ]);

    const origin = serviceDayOrigin(serviceDate, timeZone);
    const engine = createMetricsEngine({ scheduleStore, positionLog });
    const result = await engine.computeMetrics(
      serviceDate,
      { start: origin, end: origin + 30 * 60 * 60 * 1000 },
      { timeZone, concurrency: 2 },
      { routeFilter: [routeId] },
    );

    console.log("[replay:metrics] diagnostics", result.diagnostics);
    console.log("[replay:metrics] headways", result.headwayRecords);

    const leadFirstStop = result.inferredArrivals.find(
      (arrival) => arrival.tripId === leadTrip && arrival.stopSequence === 1,
    );
    assertOrThrow(
      result.inferredArrivals.length === 4,
      `Expected 4 inferred arrivals, got ${result.inferredArrivals.length}`,
    );
    assertOrThrow(
      leadFirstStop?.method === "sequence_exact" &&
        leadFirstStop.inferredTime === at("08:00:30"),
      "Lead trip should match its first stop on the sequence-tagged report",
    );
    assertOrThrow(
      result.headwayRecords.length === 2,
      `Expected 2 headway records, got ${result.headwayRecords.length}`,
    );
    assertOrThrow(
      result.headwayRecords.every(
        (record) =>
          record.actualHeadwaySeconds === 90 &&
          record.scheduledHeadwaySeconds === 600 &&
          record.bunching,
      ),
      "Follower trip should be flagged as bunching at both stops",
    );
    assertOrThrow(
      result.diagnostics.skipped.unknown_trip === 0,
      "Replay observations should all belong to scheduled trips",
    );

    console.log("[replay:metrics] PASS: arrival matching and bunching validated");
  } finally {
    if (!keepKeys) {
      await positionLog.removeTrips([leadTrip, followTrip]);
    }

    keydb.disconnect();
  }
}

main().catch((error) => {
  console.error("[replay:metrics] FAIL:", error);
  process.exitCode = 1;
});
