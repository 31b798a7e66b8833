/**
 * Point-to-route projection.
 *
 * Each segment is flattened into a local equirectangular plane around its
 * start point, the query point is clamped onto it, and the closest result by
 * great-circle distance wins. Adequate for the segment lengths of a flight
 * plan; not a geodesic solution.
 */

import { DEG_TO_RAD } from "../physics/constants";
import {
  haversineDistance,
  interpolateLongitude,
  normalizeAzimuth,
} from "../physics/geometry";
import type { POI, POIProjection, Route } from "../schemas";

export interface RouteCoordinate {
  latitude: number;
  longitude: number;
}

export interface RouteProjection {
  segmentIndex: number;
  /** Position along the segment, 0–1. */
  fraction: number;
  latitude: number;
  longitude: number;
  distanceAlongMeters: number;
  distanceFromRouteMeters: number;
  /** Share of total route distance, 0–1. */
  progress: number;
}

/** Running great-circle distance at each point, starting at 0. */
export function cumulativeDistances(points: readonly RouteCoordinate[]): number[] {
  const distances: number[] = [];
  let total = 0;
  points.forEach((point, index) => {
    if (index > 0) {
      const prev = points[index - 1];
      total += haversineDistance(prev.latitude, prev.longitude, point.latitude, point.longitude);
    }
    distances.push(total);
  });
  return distances;
}

/** Signed longitude difference on the shorter arc. */
function deltaLongitude(from: number, to: number): number {
  return normalizeAzimuth(to - from + 180) - 180;
}

function segmentFraction(
  start: RouteCoordinate,
  end: RouteCoordinate,
  lat: number,
  lon: number,
): number {
  const scale = Math.cos(start.latitude * DEG_TO_RAD);
  const sx = deltaLongitude(start.longitude, end.longitude) * scale;
  const sy = end.latitude - start.latitude;
  const px = deltaLongitude(start.longitude, lon) * scale;
  const py = lat - start.latitude;

  const lengthSq = sx * sx + sy * sy;
  if (lengthSq === 0) return 0;
  return Math.min(1, Math.max(0, (px * sx + py * sy) / lengthSq));
}

export function nearestPointIndex(
  points: readonly RouteCoordinate[],
  lat: number,
  lon: number,
): number {
  let best = -1;
  let bestDistance = Infinity;
  points.forEach((point, index) => {
    const distance = haversineDistance(lat, lon, point.latitude, point.longitude);
    if (distance < bestDistance) {
      bestDistance = distance;
      best = index;
    }
  });
  return best;
}

/**
 * Project a coordinate onto the closest point of the route polyline.
 * Returns null for an empty route.
 */
export function projectPointOntoRoute(
  points: readonly RouteCoordinate[],
  lat: number,
  lon: number,
  distances: readonly number[] = cumulativeDistances(points),
): RouteProjection | null {
  if (points.length === 0) return null;

  const totalDistance = distances[distances.length - 1];
  let best: RouteProjection | null = null;

  const consider = (segmentIndex: number, fraction: number) => {
    const start = points[segmentIndex];
    const end = points[Math.min(segmentIndex + 1, points.length - 1)];
    const latitude = start.latitude + (end.latitude - start.latitude) * fraction;
    const longitude = interpolateLongitude(start.longitude, end.longitude, fraction);
    const distanceFromRouteMeters = haversineDistance(lat, lon, latitude, longitude);
    if (best !== null && distanceFromRouteMeters >= best.distanceFromRouteMeters) return;

    const segmentLength = distances[Math.min(segmentIndex + 1, points.length - 1)] - distances[segmentIndex];
    const distanceAlongMeters = distances[segmentIndex] + segmentLength * fraction;
    best = {
      segmentIndex,
      fraction,
      latitude,
      longitude,
      distanceAlongMeters,
      distanceFromRouteMeters,
      progress: totalDistance > 0 ? distanceAlongMeters / totalDistance : 0,
    };
  };

  if (points.length === 1) {
    consider(0, 0);
  }
  for (let i = 0; i < points.length - 1; i++) {
    consider(i, segmentFraction(points[i], points[i + 1], lat, lon));
  }

  return best;
}

/** Precompute a POI's nearest point on the route. */
export function projectPOIOntoRoute(poi: POI, route: Route): POI {
  const projection = projectPointOntoRoute(route.points, poi.latitude, poi.longitude);
  if (projection === null) return { ...poi, projection: null };

  const poiProjection: POIProjection = {
    latitude: projection.latitude,
    longitude: projection.longitude,
    segmentIndex: projection.segmentIndex,
    distanceAlongMeters: projection.distanceAlongMeters,
    routeProgress: projection.progress,
  };
  return { ...poi, routeId: poi.routeId ?? route.id, projection: poiProjection };
}
