import { uniq } from "lodash";
import GtfsCalendar from "../models/gtfs/calendar";
import GtfsCalendarDates from "../models/gtfs/calendarDates";
import GtfsRoutes from "../models/gtfs/routes";
import GtfsStopTimes from "../models/gtfs/stopTimes";
import GtfsStops from "../models/gtfs/stops";
import GtfsTrips from "../models/gtfs/trips";
import type { LatLng, ScheduleStore, ScheduledStopEvent } from "../types";
import { isFiniteNumber } from "../utils/numbers";
import { parseGtfsTime, resolveServiceTime, toGtfsDate } from "../utils/time";
import { resolveActiveServiceIds } from "./serviceCalendar";

type MongoScheduleStoreOptions = {
  timeZone: string;
};

type StopRow = {
  stop_id: string;
  stop_lat?: number | null;
  stop_lon?: number | null;
};

type StopTimeRow = {
  trip_id: string;
  stop_id: string;
  stop_sequence: number;
  arrival_time?: string | null;
  departure_time?: string | null;
};

export function toStopLocation(stop: StopRow | undefined): LatLng | null {
  if (!stop) return null;
  const lat = Number(stop.stop_lat ?? Number.NaN);
  const lng = Number(stop.stop_lon ?? Number.NaN);
  return isFiniteNumber(lat) && isFiniteNumber(lng) ? { lat, lng } : null;
}

export function toScheduledStopEvent(
  stopTime: StopTimeRow,
  routeId: string | null,
  stop: StopRow | undefined,
  serviceDate: string,
  timeZone: string,
): ScheduledStopEvent {
  const arrivalSeconds = parseGtfsTime(stopTime.arrival_time);
  const departureSeconds = parseGtfsTime(stopTime.departure_time);

  return {
    tripId: stopTime.trip_id,
    stopId: stopTime.stop_id,
    stopSequence: stopTime.stop_sequence,
    scheduledArrival:
      arrivalSeconds === null
        ? null
        : resolveServiceTime(serviceDate, arrivalSeconds, timeZone),
    scheduledDeparture:
      departureSeconds === null
        ? null
        : resolveServiceTime(serviceDate, departureSeconds, timeZone),
    routeId,
    serviceDate,
    stopLocation: toStopLocation(stop),
  };
}

export function createMongoScheduleStore(
  options: MongoScheduleStoreOptions,
): ScheduleStore {
  async function loadActiveServiceIds(serviceDate: string): Promise<string[]> {
    const gtfsDate = toGtfsDate(serviceDate);
    const [calendars, calendarDates] = await Promise.all([
      GtfsCalendar.find({
        start_date: { $lte: gtfsDate },
        end_date: { $gte: gtfsDate },
      }).lean(),
      GtfsCalendarDates.find({ date: gtfsDate }).lean(),
    ]);
    return resolveActiveServiceIds(calendars, calendarDates, serviceDate);
  }

  async function getScheduledStopEvents(
    serviceDate: string,
    routeFilter?: readonly string[],
  ): Promise<ScheduledStopEvent[]> {
    const serviceIds = await loadActiveServiceIds(serviceDate);
    if (serviceIds.length === 0) {
      console.warn("[schedule] no active services", { serviceDate });
      return [];
    }

    const trips = await GtfsTrips.find(
      routeFilter && routeFilter.length > 0
        ? { service_id: { $in: serviceIds }, route_id: { $in: [...routeFilter] } }
        : { service_id: { $in: serviceIds } },
    )
      .sort({ trip_id: 1 })
      .lean();
    if (trips.length === 0) return [];

    const tripIds = trips.map((trip) => trip.trip_id);
    const [routes, stopTimes] = await Promise.all([
      GtfsRoutes.find({ route_id: { $in: uniq(trips.map((trip) => trip.route_id)) } })
        .select("route_id")
        .lean(),
      GtfsStopTimes.find({ trip_id: { $in: tripIds } })
        .sort({ trip_id: 1, stop_sequence: 1 })
        .lean(),
    ]);
    const stops = await GtfsStops.find({
      stop_id: { $in: uniq(stopTimes.map((stopTime) => stopTime.stop_id)) },
    }).lean();

    // a trip pointing at a route missing from the feed has no route mapping
    const knownRoutes = new Set(routes.map((route) => route.route_id));
    const routeByTrip = new Map<string, string | null>();
    for (const trip of trips) {
      routeByTrip.set(
        trip.trip_id,
        knownRoutes.has(trip.route_id) ? trip.route_id : null,
      );
    }
    const stopById = new Map<string, StopRow>();
    for (const stop of stops) stopById.set(stop.stop_id, stop);

    const events = stopTimes.map((stopTime) =>
      toScheduledStopEvent(
        stopTime,
        routeByTrip.get(stopTime.trip_id) ?? null,
        stopById.get(stopTime.stop_id),
        serviceDate,
        options.timeZone,
      ),
    );

    console.log("[schedule] loaded stop events", {
      serviceDate,
      services: serviceIds.length,
      trips: trips.length,
      events: events.length,
    });
    return events;
  }

  return { getScheduledStopEvents };
}
