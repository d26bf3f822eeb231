import { createMetricsEngine } from "../engine/metricsEngine";
import {
  createMemoryPositionLog,
  createMemoryScheduleStore,
} from "../stores/memoryStores";
import type { PositionObservation, ScheduledStopEvent } from "../types";
import { ConfigurationError } from "../utils/errors";

const serviceDate = "2026-03-02";
const timeRange = {
  start: Date.UTC(2026, 2, 2, 0, 0),
  end: Date.UTC(2026, 2, 3, 6, 0),
};

function at(hours: number, minutes: number, seconds = 0): number {
  return Date.UTC(2026, 2, 2, hours, minutes, seconds);
}

function stopEvent(
  tripId: string,
  stopSequence: number,
  scheduledTime: number | null,
  overrides: Partial<ScheduledStopEvent> = {},
): ScheduledStopEvent {
  return {
    tripId,
    stopId: `S${stopSequence}`,
    stopSequence,
    scheduledArrival: scheduledTime,
    scheduledDeparture: scheduledTime,
    routeId: "R1",
    serviceDate,
    stopLocation: { lat: 43.65 + stopSequence / 100, lng: -79.38 },
    ...overrides,
  };
}

function report(
  tripId: string,
  timestamp: number,
  currentStopSequence: number,
): PositionObservation {
  return {
    tripId,
    timestamp,
    latitude: 43.65 + currentStopSequence / 100,
    longitude: -79.38,
    currentStopSequence,
  };
}

function buildSchedule(): ScheduledStopEvent[] {
  return [
    stopEvent("T1", 1, at(8, 0)),
    stopEvent("T1", 2, at(8, 10)),
    stopEvent("T2", 1, at(8, 10)),
    stopEvent("T2", 2, at(8, 20)),
    stopEvent("T3", 1, at(8, 30)),
    stopEvent("T3", 2, at(8, 40)),
  ];
}

function buildReports(): PositionObservation[] {
  return [
    report("T1", at(8, 1, 10), 1),
    report("T1", at(8, 10, 30), 2),
    report("T2", at(8, 4), 1),
    report("T2", at(8, 13), 2),
  ];
}

function buildEngine(
  events: ScheduledStopEvent[] = buildSchedule(),
  observations: PositionObservation[] = buildReports(),
) {
  const scheduleStore = createMemoryScheduleStore(events);
  const positionLog = createMemoryPositionLog(observations);
  return {
    scheduleStore,
    positionLog,
    engine: createMetricsEngine({ scheduleStore, positionLog }),
  };
}

beforeEach(() => {
  jest.spyOn(console, "log").mockImplementation(() => undefined);
  jest.spyOn(console, "warn").mockImplementation(() => undefined);
});

afterEach(() => {
  jest.restoreAllMocks();
});

describe("computeMetrics", () => {
  test("builds delay, headway and aggregate records for a service day", async () => {
    const { engine } = buildEngine();

    const result = await engine.computeMetrics(serviceDate, timeRange, {
      concurrency: 2,
    });

    expect(
      result.delayRecords.map((record) => [
        record.tripId,
        record.stopSequence,
        record.delaySeconds,
        record.classification,
      ]),
    ).toEqual([
      ["T1", 1, 70, "on_time"],
      ["T2", 1, -360, "early"],
      ["T1", 2, 30, "on_time"],
      ["T2", 2, -420, "early"],
    ]);
    expect(
      result.headwayRecords.map((record) => [
        record.stopId,
        record.actualHeadwaySeconds,
        record.bunching,
      ]),
    ).toEqual([
      ["S1", 170, true],
      ["S2", 150, true],
    ]);
    expect(result.aggregateMetrics.map((metric) => metric.groupKey)).toEqual([
      "overall",
      "overall",
      "hour:08",
      "dow:mon",
    ]);
    expect(result.aggregateMetrics[1]).toEqual({
      routeId: "R1",
      groupKey: "overall",
      arrivalCount: 4,
      headwayCount: 2,
      otpPercent: 50,
      avgDelaySeconds: -170,
      delayStddevSeconds: 221.47,
      bunchingRate: 1,
      reliabilityScore: 48.15,
    });
  });

  test("keeps every inferred arrival on its scheduled time", async () => {
    const { engine } = buildEngine();
    const scheduled = new Map(
      buildSchedule().map((event) => [
        `${event.tripId}#${event.stopSequence}`,
        event.scheduledArrival,
      ]),
    );

    const result = await engine.computeMetrics(serviceDate, timeRange);

    expect(result.inferredArrivals).toHaveLength(4);
    for (const arrival of result.inferredArrivals) {
      expect(arrival.scheduledTime).toBe(
        scheduled.get(`${arrival.tripId}#${arrival.stopSequence}`),
      );
    }
  });

  test("reports diagnostics for unobserved trips", async () => {
    const { engine } = buildEngine();

    const { diagnostics, delayRecords } = await engine.computeMetrics(
      serviceDate,
      timeRange,
    );

    expect(delayRecords.some((record) => record.tripId === "T3")).toBe(false);
    expect(diagnostics).toEqual({
      tripsScheduled: 3,
      tripsObserved: 2,
      scheduledEvents: 6,
      observations: 4,
      inferredArrivals: 4,
      unmatched: {
        no_observation_in_window: 2,
        no_observation_near_stop: 0,
        stop_without_location: 0,
      },
      skipped: {
        unknown_trip: 0,
        missing_route: 0,
        missing_scheduled_time: 0,
        duplicate_stop_event: 0,
        invalid_observation: 0,
      },
      headwayPairsSkipped: 0,
    });
  });

  test("gives identical aggregates for identical inputs in any order", async () => {
    const first = await buildEngine().engine.computeMetrics(serviceDate, timeRange, {
      concurrency: 1,
    });
    const second = await buildEngine(
      buildSchedule().reverse(),
      buildReports().reverse(),
    ).engine.computeMetrics(serviceDate, timeRange, { concurrency: 4 });

    expect(JSON.stringify(second.aggregateMetrics)).toBe(
      JSON.stringify(first.aggregateMetrics),
    );
    expect(second.delayRecords).toEqual(first.delayRecords);
  });

  test("never loses arrivals when the match window widens", async () => {
    const { engine } = buildEngine();

    const narrow = await engine.computeMetrics(serviceDate, timeRange, {
      matchWindowSeconds: 60,
    });
    const wide = await engine.computeMetrics(serviceDate, timeRange, {
      matchWindowSeconds: 1200,
    });

    expect(narrow.inferredArrivals).toHaveLength(1);
    expect(wide.inferredArrivals).toHaveLength(4);
  });

  test("skips inconsistent input and counts each reason", async () => {
    const { engine } = buildEngine(
      [
        ...buildSchedule(),
        stopEvent("T1", 1, at(8, 0)),
        stopEvent("T9", 1, at(9, 0), { routeId: null }),
        stopEvent("T8", 1, null),
      ],
      [
        ...buildReports(),
        report("TX", at(8, 5), 1),
        report("T9", at(9, 1), 1),
        { tripId: "T1", timestamp: at(8, 2), latitude: 200, longitude: -79.38 },
      ],
    );

    const { diagnostics, delayRecords } = await engine.computeMetrics(
      serviceDate,
      timeRange,
    );

    expect(diagnostics.skipped).toEqual({
      unknown_trip: 1,
      missing_route: 1,
      missing_scheduled_time: 1,
      duplicate_stop_event: 1,
      invalid_observation: 1,
    });
    expect(delayRecords).toHaveLength(4);
  });

  test("only reads positions for trips on the filtered routes", async () => {
    const { engine, positionLog } = buildEngine();

    const result = await engine.computeMetrics(
      serviceDate,
      timeRange,
      {},
      { routeFilter: ["R2"] },
    );

    expect(positionLog.calls).toBe(0);
    expect(result.aggregateMetrics).toEqual([]);
    expect(result.diagnostics.tripsScheduled).toBe(0);
  });

  test("rejects contradictory thresholds before touching any store", async () => {
    const { engine, scheduleStore, positionLog } = buildEngine();

    await expect(
      engine.computeMetrics(serviceDate, timeRange, {
        earlyThresholdSeconds: 400,
      }),
    ).rejects.toThrow(ConfigurationError);
    expect(scheduleStore.calls).toBe(0);
    expect(positionLog.calls).toBe(0);
  });

  test("rejects a malformed run scope", async () => {
    const { engine, scheduleStore } = buildEngine();

    await expect(
      engine.computeMetrics("2026-02-30", timeRange),
    ).rejects.toThrow(ConfigurationError);
    await expect(
      engine.computeMetrics(serviceDate, { start: timeRange.end, end: timeRange.start }),
    ).rejects.toThrow("timeRange: start must be before end");
    expect(scheduleStore.calls).toBe(0);
  });
});
