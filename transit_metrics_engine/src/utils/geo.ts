import type { LatLng } from "../types";

const EARTH_RADIUS_METERS = 6371000;

function toRadians(value: number): number {
  return (value * Math.PI) / 180;
}

export function haversineMeters(a: LatLng, b: LatLng): number {
  const dLat = toRadians(b.lat - a.lat);
  const dLng = toRadians(b.lng - a.lng);
  const lat1 = toRadians(a.lat);
  const lat2 = toRadians(b.lat);

  const sinLat = Math.sin(dLat / 2);
  const sinLng = Math.sin(dLng / 2);
  const aa =
    sinLat * sinLat + Math.cos(lat1) * Math.cos(lat2) * sinLng * sinLng;
  return 2 * EARTH_RADIUS_METERS * Math.atan2(Math.sqrt(aa), Math.sqrt(1 - aa));
}

function toXY(point: LatLng, refLatRad: number): { x: number; y: number } {
  return {
    x: EARTH_RADIUS_METERS * toRadians(point.lng) * Math.cos(refLatRad),
    y: EARTH_RADIUS_METERS * toRadians(point.lat),
  };
}

export type SegmentProjection = {
  /** Position along the segment, 0 at `start` and 1 at `end`. */
  fraction: number;
  distanceMeters: number;
};

/**
 * Projects `point` onto the segment start→end using a local equirectangular
 * plane, which is accurate at stop-to-stop distances.
 */
export function projectOntoSegment(
  point: LatLng,
  start: LatLng,
  end: LatLng,
): SegmentProjection {
  const refLatRad = toRadians((start.lat + end.lat) / 2);
  const startXY = toXY(start, refLatRad);
  const endXY = toXY(end, refLatRad);
  const pointXY = toXY(point, refLatRad);

  const segmentX = endXY.x - startXY.x;
  const segmentY = endXY.y - startXY.y;
  const segmentLengthSq = segmentX * segmentX + segmentY * segmentY;

  let t = 0;
  if (segmentLengthSq > 0) {
    t =
      ((pointXY.x - startXY.x) * segmentX +
        (pointXY.y - startXY.y) * segmentY) /
      segmentLengthSq;
    t = Math.min(1, Math.max(0, t));
  }

  const closestX = startXY.x + t * segmentX;
  const closestY = startXY.y + t * segmentY;
  return {
    fraction: t,
    distanceMeters: Math.hypot(pointXY.x - closestX, pointXY.y - closestY),
  };
}
