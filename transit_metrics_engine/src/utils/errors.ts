import type { SkipReason } from "../types";

export class ConfigurationError extends Error {
  readonly code = "CONFIGURATION_ERROR";
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join("; ")}` : message);
    this.name = "ConfigurationError";
    this.issues = issues;
  }
}

export class RunLockError extends Error {
  readonly code = "RUN_LOCKED";

  constructor(serviceDate: string) {
    super(`A metrics run for ${serviceDate} is already in progress`);
    this.name = "RunLockError";
  }
}

type SkipLogContext = {
  tripId?: string;
  stopSequence?: number;
  routeId?: string | null;
  message?: string;
};

export function createEmptySkipCounts(): Record<SkipReason, number> {
  return {
    unknown_trip: 0,
    missing_route: 0,
    missing_scheduled_time: 0,
    duplicate_stop_event: 0,
    invalid_observation: 0,
  };
}

/**
 * Counts skipped input records per reason. Only the first record of each
 * reason is logged so a bad feed cannot flood the output.
 */
export function createSkipTracker() {
  const counts = createEmptySkipCounts();

  function skip(reason: SkipReason, context: SkipLogContext): void {
    counts[reason] += 1;
    if (counts[reason] > 1) return;

    console.warn("[metrics.skip]", {
      reason,
      tripId: context.tripId ?? null,
      stopSequence: context.stopSequence ?? null,
      routeId: context.routeId ?? null,
      message: context.message ?? null,
    });
  }

  function summary(): Record<SkipReason, number> {
    return { ...counts };
  }

  return { skip, summary };
}
