import {
  buildDelayRecords,
  classifyDelay,
  delaySecondsFor,
  summarizePunctuality,
} from "../engine/punctuality";
import type { DelayRecord, InferredArrival } from "../types";

const rules = { lateThresholdSeconds: 300, earlyThresholdSeconds: -60 };

function at(hours: number, minutes: number, seconds = 0): number {
  return Date.UTC(2026, 2, 2, hours, minutes, seconds);
}

function buildArrival(overrides: Partial<InferredArrival> = {}): InferredArrival {
  return {
    tripId: "T1",
    stopId: "S1",
    stopSequence: 1,
    routeId: "R1",
    scheduledTime: at(8, 0),
    inferredTime: at(8, 1, 10),
    confidence: 0.95,
    method: "sequence_exact",
    sourceTimestamps: [at(8, 1, 10)],
    ...overrides,
  };
}

function buildRecord(delaySeconds: number): DelayRecord {
  return {
    routeId: "R1",
    stopId: "S1",
    tripId: `T${delaySeconds}`,
    stopSequence: 1,
    timestamp: at(8, 0),
    inferredTime: at(8, 0) + delaySeconds * 1000,
    delaySeconds,
    classification: classifyDelay(delaySeconds, rules),
  };
}

describe("delay classification", () => {
  test("computes delay in whole seconds", () => {
    expect(delaySecondsFor(buildArrival())).toBe(70);
    expect(
      delaySecondsFor(buildArrival({ inferredTime: at(8, 0) + 1500 })),
    ).toBe(2);
    expect(delaySecondsFor(buildArrival({ inferredTime: at(8, 0) - 500 }))).toBe(0);
  });

  test("treats both thresholds as on time", () => {
    expect(classifyDelay(300, rules)).toBe("on_time");
    expect(classifyDelay(301, rules)).toBe("late");
    expect(classifyDelay(-60, rules)).toBe("on_time");
    expect(classifyDelay(-61, rules)).toBe("early");
  });
});

describe("buildDelayRecords", () => {
  test("keys records on the scheduled time and sorts them by route and stop", () => {
    const records = buildDelayRecords(
      [
        buildArrival({ routeId: "R2", tripId: "T9" }),
        buildArrival({ routeId: "R1", inferredTime: at(8, 6) }),
      ],
      rules,
    );

    expect(records).toEqual([
      {
        routeId: "R1",
        stopId: "S1",
        tripId: "T1",
        stopSequence: 1,
        timestamp: at(8, 0),
        inferredTime: at(8, 6),
        delaySeconds: 360,
        classification: "late",
      },
      {
        routeId: "R2",
        stopId: "S1",
        tripId: "T9",
        stopSequence: 1,
        timestamp: at(8, 0),
        inferredTime: at(8, 1, 10),
        delaySeconds: 70,
        classification: "on_time",
      },
    ]);
  });
});

describe("summarizePunctuality", () => {
  test("summarizes each group the records fall into", () => {
    const summaries = summarizePunctuality(
      [buildRecord(0), buildRecord(120), buildRecord(400)],
      "UTC",
    );

    expect(Array.from(summaries.keys())).toEqual([
      "R1|overall",
      "R1|hour:08",
      "R1|dow:mon",
      "*|overall",
    ]);
    const overall = summaries.get("R1|overall");
    expect(overall?.arrivalCount).toBe(3);
    expect(overall?.onTimeCount).toBe(2);
    expect(overall?.otpPercent).toBeCloseTo(66.6667, 4);
    expect(overall?.avgDelaySeconds).toBeCloseTo(173.3333, 4);
    expect(overall?.delayStddevSeconds).toBeCloseTo(167.5974, 4);
  });

  test("returns nothing for an empty record set", () => {
    expect(summarizePunctuality([], "UTC").size).toBe(0);
  });
});
