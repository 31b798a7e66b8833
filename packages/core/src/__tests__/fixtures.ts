/**
 * Shared test builders. Kept out of the test glob; imported by the suites.
 */

import type { RouteSample } from "../route/projector";
import {
  parseMissionConfig,
  parsePOI,
  parseRoute,
  type MissionConfig,
  type POI,
  type POIInput,
  type Route,
  type RouteInput,
} from "../schemas";

export const T0 = new Date("2030-03-01T10:00:00.000Z");

export function at(minutes: number, seconds: number = 0): Date {
  return new Date(T0.getTime() + minutes * 60_000 + seconds * 1000);
}

export function route(input: Partial<RouteInput> & Pick<RouteInput, "points">): Route {
  return parseRoute({ id: "route-1", name: "Test Route", ...input });
}

/**
 * Two-hour eastbound leg along 40°N from 40°W to 20°W at 10 km.
 * With a satellite at 30°W the X look angle stays abeam on the right.
 */
export function eastboundRoute(overrides: Partial<RouteInput> = {}): Route {
  return route({
    points: [
      { latitude: 40, longitude: -40, altitude: 10_000, sequence: 0, expectedArrivalTime: at(0) },
      { latitude: 40, longitude: -20, altitude: 10_000, sequence: 1, expectedArrivalTime: at(120) },
    ],
    ...overrides,
  });
}

export function mission(transports: Record<string, unknown> = {}): MissionConfig {
  return parseMissionConfig({
    id: "mission-1",
    name: "Test Mission",
    routeId: "route-1",
    transports: { initialXSatelliteId: "X-1", ...transports },
  });
}

export function poi(input: Partial<POIInput> & Pick<POIInput, "latitude" | "longitude">): POI {
  return parsePOI({ id: "poi-1", name: "Target", ...input });
}

/**
 * A sample parked at 30°W. A satellite at 30°W then sits due south at 43.8°
 * elevation, so heading 0 puts it dead aft and heading 180 dead ahead.
 */
export function observerAt(
  minutes: number,
  headingDeg: number | null,
  latitude: number = 40,
): RouteSample {
  return {
    timestamp: at(minutes),
    latitude,
    longitude: -30,
    altitudeM: 0,
    headingDeg,
    distanceMeters: 0,
    coverage: [],
  };
}

/** A clock the test advances by hand. */
export function manualClock(start: Date = T0) {
  let current = start.getTime();
  return {
    now: () => new Date(current),
    advance(seconds: number) {
      current += seconds * 1000;
    },
    set(date: Date) {
      current = date.getTime();
    },
  };
}

/** Silence console output for the suite and return the spies. */
export function silenceConsole() {
  return {
    log: jest.spyOn(console, "log").mockImplementation(() => undefined),
    warn: jest.spyOn(console, "warn").mockImplementation(() => undefined),
    error: jest.spyOn(console, "error").mockImplementation(() => undefined),
  };
}
