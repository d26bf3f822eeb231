import { resolveMetricsConfig } from "../config/metricsConfig";
import { buildAggregateMetrics } from "../engine/aggregates";
import { compareGroups, groupsFor, hourGroupKey } from "../engine/grouping";
import type { DelayRecord, HeadwayRecord } from "../types";

const config = resolveMetricsConfig({ concurrency: 1 });

function at(hours: number, minutes: number): number {
  return Date.UTC(2026, 2, 2, hours, minutes);
}

function buildDelay(
  tripId: string,
  delaySeconds: number,
  classification: DelayRecord["classification"],
): DelayRecord {
  return {
    routeId: "R1",
    stopId: "S1",
    tripId,
    stopSequence: 1,
    timestamp: at(8, 0),
    inferredTime: at(8, 0) + delaySeconds * 1000,
    delaySeconds,
    classification,
  };
}

function buildHeadway(routeId: string, bunching: boolean): HeadwayRecord {
  return {
    routeId,
    stopId: "S1",
    tripId: "T2",
    previousTripId: "T1",
    stopSequence: 1,
    timestamp: at(17, 30),
    scheduledHeadwaySeconds: 600,
    actualHeadwaySeconds: bunching ? 120 : 540,
    bunching,
  };
}

describe("grouping", () => {
  test("places a record in route, hour, weekday and network groups", () => {
    expect(groupsFor("R1", at(8, 15), "America/Toronto")).toEqual([
      { routeId: "R1", groupKey: "overall" },
      { routeId: "R1", groupKey: "hour:03" },
      { routeId: "R1", groupKey: "dow:mon" },
      { routeId: "*", groupKey: "overall" },
    ]);
  });

  test("orders the network first, then routes by overall, hour and weekday", () => {
    const groups = [
      { routeId: "R2", groupKey: "overall" as const },
      { routeId: "R1", groupKey: "dow:sun" as const },
      { routeId: "R1", groupKey: hourGroupKey(17) },
      { routeId: "*", groupKey: "overall" as const },
      { routeId: "R1", groupKey: hourGroupKey(8) },
      { routeId: "R1", groupKey: "overall" as const },
    ].sort(compareGroups);

    expect(groups.map((group) => `${group.routeId}|${group.groupKey}`)).toEqual([
      "*|overall",
      "R1|overall",
      "R1|hour:08",
      "R1|hour:17",
      "R1|dow:sun",
      "R2|overall",
    ]);
  });
});

describe("buildAggregateMetrics", () => {
  test("rounds the published statistics", () => {
    const metrics = buildAggregateMetrics(
      [
        buildDelay("T1", 0, "on_time"),
        buildDelay("T2", 120, "on_time"),
        buildDelay("T3", 400, "late"),
      ],
      [],
      config,
    );

    expect(metrics.map((metric) => `${metric.routeId}|${metric.groupKey}`)).toEqual([
      "*|overall",
      "R1|overall",
      "R1|hour:08",
      "R1|dow:mon",
    ]);
    expect(metrics[1]).toEqual({
      routeId: "R1",
      groupKey: "overall",
      arrivalCount: 3,
      headwayCount: 0,
      otpPercent: 66.67,
      avgDelaySeconds: 173.33,
      delayStddevSeconds: 167.6,
      bunchingRate: null,
      reliabilityScore: 65.27,
    });
  });

  test("keeps headway-only groups with null punctuality statistics", () => {
    const metrics = buildAggregateMetrics(
      [buildDelay("T1", 30, "on_time")],
      [buildHeadway("R1", true), buildHeadway("R1", false)],
      config,
    );

    const evening = metrics.find(
      (metric) => metric.routeId === "R1" && metric.groupKey === "hour:17",
    );
    expect(evening).toEqual({
      routeId: "R1",
      groupKey: "hour:17",
      arrivalCount: 0,
      headwayCount: 2,
      otpPercent: null,
      avgDelaySeconds: null,
      delayStddevSeconds: null,
      bunchingRate: 0.5,
      reliabilityScore: null,
    });

    const network = metrics.find((metric) => metric.routeId === "*");
    expect(network?.arrivalCount).toBe(1);
    expect(network?.headwayCount).toBe(2);
    expect(network?.otpPercent).toBe(100);
    expect(network?.reliabilityScore).toBe(100);
  });

  test("produces no groups without records", () => {
    expect(buildAggregateMetrics([], [], config)).toEqual([]);
  });
});
