/**
 * Route-aware ETA in both modes.
 *
 * Both functions are pure and report failure as a result value; the caller
 * decides the fallback.
 */

import { ETA_CONFIG } from "../config";
import { ConfigurationError } from "../errors";
import { METERS_PER_NM } from "../physics/constants";
import { haversineDistance } from "../physics/geometry";
import { RouteTemporalProjector, routeHasTimingData } from "../route/projector";
import { nearestPointIndex, projectPointOntoRoute } from "../route/projection";
import type { POI, Route, RoutePoint, RouteWaypoint } from "../schemas";

export type RouteETAResult =
  | { kind: "estimate"; seconds: number }
  /** Planned arrival already in the past, or target behind the aircraft. */
  | { kind: "elapsed" }
  | { kind: "unavailable"; reason: string };

interface Leg {
  fromLat: number;
  fromLon: number;
  toLat: number;
  toLon: number;
  plannedSpeedKnots: number | null;
}

function unavailable(reason: string): RouteETAResult {
  return { kind: "unavailable", reason };
}

function sortedPoints(route: Route): RoutePoint[] {
  return [...route.points].sort((a, b) => a.sequence - b.sequence);
}

/** Waypoint sharing the POI's name, case-insensitively. */
export function findWaypointForPOI(route: Route, poi: POI): RouteWaypoint | undefined {
  const name = poi.name.toLowerCase();
  return route.waypoints.find((waypoint) => waypoint.name.toLowerCase() === name);
}

function legSeconds(distanceM: number, speedKnots: number): number {
  return (distanceM / METERS_PER_NM / speedKnots) * 3600;
}

// ─── Anticipated ────────────────────────────────────────────────────────────

/**
 * Pre-departure ETA from the flight plan: planned arrival at the matching
 * waypoint, or the planned time at the POI's position along the route.
 */
export function anticipatedRouteETA(route: Route, poi: POI, now: Date): RouteETAResult {
  const waypoint = findWaypointForPOI(route, poi);
  let arrival = waypoint?.expectedArrivalTime ?? null;

  if (arrival === null) {
    if (!routeHasTimingData(route) || route.points.length === 0) {
      return unavailable("route has no planned times");
    }

    let projector: RouteTemporalProjector;
    try {
      projector = new RouteTemporalProjector(route);
    } catch (error) {
      if (error instanceof ConfigurationError) return unavailable(error.message);
      throw error;
    }

    if (waypoint !== undefined) {
      arrival = projector.project(waypoint.latitude, waypoint.longitude)?.timestamp ?? null;
    } else if (poi.projection !== null) {
      arrival = projector.timestampForDistance(poi.projection.distanceAlongMeters);
    }
  }

  if (arrival === null) return unavailable("POI is not on the route");

  const seconds = (arrival.getTime() - now.getTime()) / 1000;
  return seconds > 0 ? { kind: "estimate", seconds } : { kind: "elapsed" };
}

// ─── Estimated ──────────────────────────────────────────────────────────────

/**
 * In-flight ETA by walking the route from the nearest point to the target.
 *
 * The first leg flies at the mean of live and planned speed; later legs use
 * their planned speed, or live speed when none is planned. Off-route POIs
 * stop at the segment holding their projection, provided it lies within
 * tolerance.
 */
export function estimatedRouteETA(
  route: Route,
  poi: POI,
  currentLat: number,
  currentLon: number,
  speedKnots: number,
  toleranceMeters: number = ETA_CONFIG.segmentToleranceMeters,
): RouteETAResult {
  if (!routeHasTimingData(route)) return unavailable("route has no timing data");

  const points = sortedPoints(route);
  const nearest = nearestPointIndex(points, currentLat, currentLon);
  if (nearest === -1) return unavailable("route has no points");

  const legs: Leg[] = [];
  let cursorLat = currentLat;
  let cursorLon = currentLon;
  const walkTo = (index: number) => {
    legs.push({
      fromLat: cursorLat,
      fromLon: cursorLon,
      toLat: points[index].latitude,
      toLon: points[index].longitude,
      plannedSpeedKnots: points[Math.max(index - 1, 0)].expectedSegmentSpeedKnots,
    });
    cursorLat = points[index].latitude;
    cursorLon = points[index].longitude;
  };

  const waypoint = findWaypointForPOI(route, poi);
  if (waypoint !== undefined) {
    const stop = nearestPointIndex(points, waypoint.latitude, waypoint.longitude);
    if (stop < nearest) return { kind: "elapsed" };
    for (let i = Math.min(nearest + 1, stop); i <= stop; i++) walkTo(i);
  } else if (poi.projection !== null) {
    const target = poi.projection;
    let segment = -1;
    for (let i = nearest; i < points.length - 1; i++) {
      const offset = projectPointOntoRoute([points[i], points[i + 1]], target.latitude, target.longitude);
      if (offset !== null && offset.distanceFromRouteMeters < toleranceMeters) {
        segment = i;
        break;
      }
    }
    if (segment === -1) return unavailable("POI projection is not ahead on the route");
    for (let i = nearest + 1; i <= segment; i++) walkTo(i);
    legs.push({
      fromLat: cursorLat,
      fromLon: cursorLon,
      toLat: target.latitude,
      toLon: target.longitude,
      plannedSpeedKnots: points[segment].expectedSegmentSpeedKnots,
    });
  } else {
    return unavailable("POI has no route position");
  }

  let seconds = 0;
  legs.forEach((leg, index) => {
    const distance = haversineDistance(leg.fromLat, leg.fromLon, leg.toLat, leg.toLon);
    let speed: number;
    if (index === 0) {
      speed = leg.plannedSpeedKnots === null ? speedKnots : (speedKnots + leg.plannedSpeedKnots) / 2;
    } else {
      speed = leg.plannedSpeedKnots ?? speedKnots;
    }
    if (speed <= ETA_CONFIG.minimumSpeedKnots) {
      console.warn(
        `[ETA] Skipping leg ${index + 1} toward ${poi.name}: ${speed} kn is at or below the ${ETA_CONFIG.minimumSpeedKnots} kn minimum`,
      );
      return;
    }
    seconds += legSeconds(distance, speed);
  });

  return seconds > 0 ? { kind: "estimate", seconds } : unavailable("no travel time along route");
}
