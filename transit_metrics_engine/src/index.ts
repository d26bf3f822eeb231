import Redis from "ioredis";
import mongoose from "mongoose";
import { loadRuntimeConfig, requireRunSettings } from "./config";
import { resolveMetricsConfig } from "./config/metricsConfig";
import { createMetricsEngine } from "./engine/metricsEngine";
import { createKeydbPositionLog } from "./stores/positionLog";
import { createMongoMetricsStore } from "./stores/metricsStore";
import { createMongoScheduleStore } from "./stores/scheduleStore";
import { createRunLock } from "./utils/runLock";
import { formatTimestamp, serviceDayOrigin } from "./utils/time";

const SERVICE_DAY_SPAN_MS = 30 * 60 * 60 * 1000;

async function main(): Promise<void> {
  const runtime = loadRuntimeConfig();
  const config = resolveMetricsConfig(runtime.metrics);

  const { mongoConnection, serviceDate } = requireRunSettings(runtime);

  // GTFS times past 24:00 belong to the same service day
  const origin = serviceDayOrigin(serviceDate, config.timeZone);
  const timeRange = {
    start: runtime.rangeStart ?? origin,
    end: runtime.rangeEnd ?? origin + SERVICE_DAY_SPAN_MS,
  };

  const keydb = new Redis(runtime.keydbUrl, {
    connectionName: runtime.keydbClientName,
    maxRetriesPerRequest: 3,
    enableReadyCheck: true,
    connectTimeout: 5000,
  });
  keydb.on("error", (error) => {
    console.warn("[runner] keydb error", error.message);
  });

  try {
    await mongoose.connect(mongoConnection, {
      maxPoolSize: 5,
      serverSelectionTimeoutMS: 5000,
      socketTimeoutMS: 45000,
    });
    await keydb.ping();

    const release = await createRunLock({
      keydb,
      ttlMs: runtime.lockTtlMs,
    }).acquire(serviceDate);

    try {
      const engine = createMetricsEngine({
        scheduleStore: createMongoScheduleStore({ timeZone: config.timeZone }),
        positionLog: createKeydbPositionLog({ keydb }),
      });
      const startedAt = Date.now();
      const result = await engine.computeMetrics(serviceDate, timeRange, config, {
        routeFilter: runtime.routeFilter,
      });
      const runId = await createMongoMetricsStore().replaceServiceDate(
        result,
        config,
      );

      console.log("[runner] metrics run stored", {
        runId,
        serviceDate,
        rangeStart: formatTimestamp(timeRange.start, config.timeZone),
        rangeEnd: formatTimestamp(timeRange.end, config.timeZone),
        timeZone: config.timeZone,
        routeFilter: runtime.routeFilter ?? null,
        durationMs: Date.now() - startedAt,
        diagnostics: result.diagnostics,
      });
    } finally {
      await release();
    }
  } finally {
    keydb.disconnect();
    await mongoose.disconnect();
  }
}

main().catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  const code =
    error instanceof Error && "code" in error ? String(error.code) : undefined;
  console.error("[runner] metrics run failed", { message, code });
  process.exitCode = 1;
});
