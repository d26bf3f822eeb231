export type LatLng = {
  lat: number;
  lng: number;
};

export type ScheduledStopEvent = {
  tripId: string;
  stopId: string;
  stopSequence: number;
  scheduledArrival: number | null;
  scheduledDeparture: number | null;
  routeId: string | null;
  serviceDate: string;
  stopLocation: LatLng | null;
};

export type PositionObservation = {
  tripId: string;
  timestamp: number;
  latitude: number;
  longitude: number;
  currentStopSequence?: number;
};

export type MatchMethod =
  | "sequence_exact"
  | "sequence_passed"
  | "geographic_point"
  | "geographic_interpolated";

export type InferredArrival = {
  tripId: string;
  stopId: string;
  stopSequence: number;
  routeId: string;
  scheduledTime: number;
  inferredTime: number;
  confidence: number;
  method: MatchMethod;
  sourceTimestamps: number[];
};

export type UnmatchedReason =
  | "no_observation_in_window"
  | "no_observation_near_stop"
  | "stop_without_location";

export type StopMatch =
  | { status: "matched"; arrival: InferredArrival }
  | {
      status: "unmatched";
      tripId: string;
      stopSequence: number;
      reason: UnmatchedReason;
    };

export type DelayClassification = "early" | "on_time" | "late";

export type DelayRecord = {
  routeId: string;
  stopId: string;
  tripId: string;
  stopSequence: number;
  timestamp: number;
  inferredTime: number;
  delaySeconds: number;
  classification: DelayClassification;
};

export type HeadwayRecord = {
  routeId: string;
  stopId: string;
  tripId: string;
  previousTripId: string;
  stopSequence: number;
  timestamp: number;
  scheduledHeadwaySeconds: number;
  actualHeadwaySeconds: number;
  bunching: boolean;
};

export type GroupKey = "overall" | `hour:${string}` | `dow:${string}`;

export type AggregateMetric = {
  routeId: string;
  groupKey: GroupKey;
  arrivalCount: number;
  headwayCount: number;
  otpPercent: number | null;
  avgDelaySeconds: number | null;
  delayStddevSeconds: number | null;
  bunchingRate: number | null;
  reliabilityScore: number | null;
};

export type TimeRange = {
  start: number;
  end: number;
};

export type SkipReason =
  | "unknown_trip"
  | "missing_route"
  | "missing_scheduled_time"
  | "duplicate_stop_event"
  | "invalid_observation";

export type RunDiagnostics = {
  tripsScheduled: number;
  tripsObserved: number;
  scheduledEvents: number;
  observations: number;
  inferredArrivals: number;
  unmatched: Record<UnmatchedReason, number>;
  skipped: Record<SkipReason, number>;
  headwayPairsSkipped: number;
};

export type MetricsResult = {
  serviceDate: string;
  timeRange: TimeRange;
  inferredArrivals: InferredArrival[];
  delayRecords: DelayRecord[];
  headwayRecords: HeadwayRecord[];
  aggregateMetrics: AggregateMetric[];
  diagnostics: RunDiagnostics;
};

export type ScheduleStore = {
  getScheduledStopEvents: (
    serviceDate: string,
    routeFilter?: readonly string[],
  ) => Promise<ScheduledStopEvent[]>;
};

export type PositionLog = {
  getPositionObservations: (
    rangeStart: number,
    rangeEnd: number,
    tripFilter?: readonly string[],
  ) => Promise<PositionObservation[]>;
};
