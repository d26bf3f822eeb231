import os from "os";
import { z } from "zod";
import { ConfigurationError } from "../utils/errors";
import { isTimeZone } from "../utils/time";

export const DEFAULT_MATCH_WINDOW_SECONDS = 1200;
export const DEFAULT_LATE_THRESHOLD_SECONDS = 300;
export const DEFAULT_EARLY_THRESHOLD_SECONDS = -60;
export const DEFAULT_BUNCHING_RATIO = 0.5;
export const DEFAULT_SCORE_CLAMP_RANGE: [number, number] = [0, 100];
export const DEFAULT_SCORE_STDDEV_DIVISOR = 2;
export const DEFAULT_MAX_MATCH_DISTANCE_METERS = 200;

export const metricsConfigSchema = z
  .object({
    matchWindowSeconds: z
      .number()
      .positive()
      .default(DEFAULT_MATCH_WINDOW_SECONDS),
    lateThresholdSeconds: z.number().default(DEFAULT_LATE_THRESHOLD_SECONDS),
    earlyThresholdSeconds: z.number().default(DEFAULT_EARLY_THRESHOLD_SECONDS),
    bunchingRatio: z.number().positive().max(1).default(DEFAULT_BUNCHING_RATIO),
    scoreClampRange: z
      .tuple([z.number(), z.number()])
      .default(DEFAULT_SCORE_CLAMP_RANGE),
    scoreStddevDivisor: z
      .number()
      .positive()
      .default(DEFAULT_SCORE_STDDEV_DIVISOR),
    maxMatchDistanceMeters: z
      .number()
      .positive()
      .default(DEFAULT_MAX_MATCH_DISTANCE_METERS),
    timeZone: z.string().min(1).default("UTC"),
    concurrency: z
      .number()
      .int()
      .positive()
      .default(() => os.availableParallelism()),
  })
  .strict()
  .superRefine((config, ctx) => {
    if (config.earlyThresholdSeconds > config.lateThresholdSeconds) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["earlyThresholdSeconds"],
        message: "earlyThresholdSeconds must not exceed lateThresholdSeconds",
      });
    }

    const [min, max] = config.scoreClampRange;
    if (min >= max) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["scoreClampRange"],
        message: "scoreClampRange minimum must be below its maximum",
      });
    }

    if (!isTimeZone(config.timeZone)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["timeZone"],
        message: `Unknown time zone ${config.timeZone}`,
      });
    }
  });

export type MetricsConfigInput = z.input<typeof metricsConfigSchema>;

export type MetricsConfig = Readonly<
  Omit<z.output<typeof metricsConfigSchema>, "scoreClampRange"> & {
    scoreClampRange: readonly [number, number];
  }
>;

export function resolveMetricsConfig(
  input: MetricsConfigInput | MetricsConfig = {},
): MetricsConfig {
  const parsed = metricsConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigurationError(
      "Invalid metrics configuration",
      parsed.error.issues.map(
        (issue) => `${issue.path.join(".") || "config"}: ${issue.message}`,
      ),
    );
  }

  const scoreClampRange = Object.freeze([
    parsed.data.scoreClampRange[0],
    parsed.data.scoreClampRange[1],
  ] as const);

  return Object.freeze({ ...parsed.data, scoreClampRange });
}
