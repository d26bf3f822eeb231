import type {
  PositionLog,
  PositionObservation,
  ScheduleStore,
  ScheduledStopEvent,
} from "../types";

/** Schedule store over a fixed set of events, for replays and tests. */
export function createMemoryScheduleStore(
  events: readonly ScheduledStopEvent[],
): ScheduleStore & { calls: number } {
  const store: ScheduleStore & { calls: number } = {
    calls: 0,
    async getScheduledStopEvents(
      serviceDate: string,
      routeFilter?: readonly string[],
    ): Promise<ScheduledStopEvent[]> {
      store.calls += 1;
      const routes = routeFilter ? new Set(routeFilter) : null;
      return events
        .filter((event) => event.serviceDate === serviceDate)
        .filter((event) => !routes || (event.routeId !== null && routes.has(event.routeId)))
        .map((event) => ({ ...event }));
    },
  };
  return store;
}

export function createMemoryPositionLog(
  observations: readonly PositionObservation[],
): PositionLog & { calls: number } {
  const log: PositionLog & { calls: number } = {
    calls: 0,
    async getPositionObservations(
      rangeStart: number,
      rangeEnd: number,
      tripFilter?: readonly string[],
    ): Promise<PositionObservation[]> {
      log.calls += 1;
      const trips = tripFilter ? new Set(tripFilter) : null;
      return observations
        .filter(
          (observation) =>
            observation.timestamp >= rangeStart && observation.timestamp <= rangeEnd,
        )
        .filter((observation) => !trips || trips.has(observation.tripId))
        .map((observation) => ({ ...observation }));
    },
  };
  return log;
}
