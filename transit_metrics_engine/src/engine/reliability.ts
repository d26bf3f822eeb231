import type { MetricsConfig } from "../config/metricsConfig";
import { clamp } from "../utils/numbers";

type ScoreRules = Pick<MetricsConfig, "scoreClampRange" | "scoreStddevDivisor">;

/**
 * `otp - (stddev in minutes / divisor)`, clamped to the configured range.
 * No delay records means no score.
 */
export function computeReliabilityScore(
  otpPercent: number | null,
  delayStddevSeconds: number | null,
  rules: ScoreRules,
): number | null {
  if (otpPercent === null || delayStddevSeconds === null) return null;

  const [min, max] = rules.scoreClampRange;
  const penalty = delayStddevSeconds / 60 / rules.scoreStddevDivisor;
  return clamp(otpPercent - penalty, min, max);
}
