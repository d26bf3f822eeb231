import dotenv from "dotenv";
import { ConfigurationError } from "../utils/errors";
import { isServiceDate } from "../utils/time";
import type { MetricsConfigInput } from "./metricsConfig";

dotenv.config();

type Env = Record<string, string | undefined>;

export type RuntimeConfig = {
  mongoConnection: string | undefined;
  keydbUrl: string;
  keydbClientName: string;
  serviceDate: string | undefined;
  rangeStart: number | undefined;
  rangeEnd: number | undefined;
  routeFilter: string[] | undefined;
  lockTtlMs: number;
  metrics: MetricsConfigInput;
};

function readNumber(env: Env, key: string): number | undefined {
  const raw = env[key];
  if (raw === undefined || raw.trim() === "") return undefined;
  // NaN is passed through so validation reports the variable
  return Number.parseFloat(raw);
}

function readTimestamp(env: Env, key: string): number | undefined {
  const raw = env[key];
  if (!raw) return undefined;
  const numeric = Number(raw);
  return Number.isFinite(numeric) ? numeric : Date.parse(raw);
}

function readList(env: Env, key: string): string[] | undefined {
  const raw = env[key];
  if (!raw) return undefined;
  const items = raw
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
  return items.length > 0 ? items : undefined;
}

export function loadMetricsConfigInput(env: Env): MetricsConfigInput {
  const clampMin = readNumber(env, "METRICS_SCORE_CLAMP_MIN");
  const clampMax = readNumber(env, "METRICS_SCORE_CLAMP_MAX");
  const concurrency = readNumber(env, "METRICS_CONCURRENCY");

  const input: MetricsConfigInput = {
    matchWindowSeconds: readNumber(env, "METRICS_MATCH_WINDOW_SECONDS"),
    lateThresholdSeconds: readNumber(env, "METRICS_LATE_THRESHOLD_SECONDS"),
    earlyThresholdSeconds: readNumber(env, "METRICS_EARLY_THRESHOLD_SECONDS"),
    bunchingRatio: readNumber(env, "METRICS_BUNCHING_RATIO"),
    scoreStddevDivisor: readNumber(env, "METRICS_SCORE_STDDEV_DIVISOR"),
    maxMatchDistanceMeters: readNumber(env, "METRICS_MAX_MATCH_DISTANCE_METERS"),
    timeZone: env.METRICS_TIME_ZONE || undefined,
    concurrency,
  };

  if (clampMin !== undefined || clampMax !== undefined) {
    input.scoreClampRange = [clampMin ?? 0, clampMax ?? 100];
  }

  return input;
}

export function loadRuntimeConfig(env: Env = process.env): RuntimeConfig {
  const lockTtlMs = Number.parseInt(env.METRICS_LOCK_TTL_MS ?? "600000", 10);

  return {
    mongoConnection: env.MONGO_CONNECTION,
    keydbUrl: env.KEYDB_URL ?? "redis://127.0.0.1:6379",
    keydbClientName: env.KEYDB_CLIENT_NAME ?? "transit_metrics_engine",
    serviceDate: env.SERVICE_DATE,
    rangeStart: readTimestamp(env, "METRICS_RANGE_START"),
    rangeEnd: readTimestamp(env, "METRICS_RANGE_END"),
    routeFilter: readList(env, "METRICS_ROUTE_FILTER"),
    lockTtlMs: Number.isFinite(lockTtlMs) && lockTtlMs > 0 ? lockTtlMs : 600000,
    metrics: loadMetricsConfigInput(env),
  };
}

export type RunSettings = {
  mongoConnection: string;
  serviceDate: string;
};

/** Checked before any connection is opened or lock taken. */
export function requireRunSettings(runtime: RuntimeConfig): RunSettings {
  const { mongoConnection, serviceDate } = runtime;
  const issues: string[] = [];
  if (!mongoConnection) issues.push("MONGO_CONNECTION is required");
  if (!serviceDate) {
    issues.push("SERVICE_DATE is required");
  } else if (!isServiceDate(serviceDate)) {
    issues.push(`SERVICE_DATE: expected YYYY-MM-DD, got "${serviceDate}"`);
  }

  if (!mongoConnection || !serviceDate || issues.length > 0) {
    throw new ConfigurationError("Invalid runtime settings", issues);
  }
  return { mongoConnection, serviceDate };
}
