/**
 * Look-angle and great-circle geometry.
 *
 * Geostationary satellites are modeled at a fixed sub-satellite longitude
 * on the equator. Observer positions use WGS-84; distances use a spherical
 * Earth. This module is pure math.
 */

import * as satellite from "satellite.js";
import {
  DEG_TO_RAD,
  DEFAULT_CRUISE_ALTITUDE_M,
  EARTH_RADIUS_M,
  GEO_ALTITUDE_M,
  RAD_TO_DEG,
} from "./constants";
import { GeometryInputError } from "../errors";

// ─── Types ──────────────────────────────────────────────────────────────────

export interface LookAngles {
  /** Degrees clockwise from true north, [0, 360). */
  azimuthDeg: number;
  /** Degrees above the local horizon. */
  elevationDeg: number;
}

/** Inclusive azimuth arc; wraps through 0° when `minDeg > maxDeg`. */
export interface AzimuthRange {
  minDeg: number;
  maxDeg: number;
}

export type XViolationReason = "elevation" | "azimuth";

/** Full result of testing one sample against the X exclusion rules. */
export interface XAzimuthEvaluation {
  absoluteAzimuthDeg: number;
  relativeAzimuthDeg: number;
  elevationDeg: number;
  minElevationDeg: number;
  elevationBelowMin: boolean;
  violation: XViolationReason | null;
}

/** Observer state needed for an X evaluation. */
export interface ObserverSample {
  latitude: number;
  longitude: number;
  altitudeM: number;
  headingDeg: number | null;
}

// ─── Validation ─────────────────────────────────────────────────────────────

function assertFinite(values: Record<string, number>): void {
  for (const [name, value] of Object.entries(values)) {
    if (!Number.isFinite(value)) {
      throw new GeometryInputError(`${name} must be a finite number, got ${value}`);
    }
  }
}

// ─── Angles ─────────────────────────────────────────────────────────────────

/** Positive modulo into [0, 360). */
export function normalizeAzimuth(deg: number): number {
  const wrapped = deg % 360;
  return wrapped < 0 ? wrapped + 360 : wrapped;
}

/**
 * Normalize a longitude into [-180, 180]. An exact −180 is reported as 180
 * so both sides of the antimeridian map to one value.
 */
export function normalizeLongitude(lon: number): number {
  const wrapped = normalizeAzimuth(lon + 180) - 180;
  return Math.abs(wrapped + 180) < 1e-9 ? 180 : wrapped;
}

/**
 * Whether an azimuth falls inside an inclusive arc.
 *
 * isInAzimuthRange(350, 315, 45) → true
 * isInAzimuthRange(100, 315, 45) → false
 */
export function isInAzimuthRange(
  azimuthDeg: number,
  minDeg: number,
  maxDeg: number,
): boolean {
  const az = normalizeAzimuth(azimuthDeg);
  const min = normalizeAzimuth(minDeg);
  const max = normalizeAzimuth(maxDeg);

  if (min <= max) {
    return az >= min && az <= max;
  }
  return az >= min || az <= max;
}

/** Azimuth relative to the nose; absolute when heading is unknown. */
export function relativeAzimuth(
  azimuthDeg: number,
  headingDeg: number | null,
): number {
  if (headingDeg === null) return normalizeAzimuth(azimuthDeg);
  return normalizeAzimuth(azimuthDeg - headingDeg);
}

// ─── Look Angles ────────────────────────────────────────────────────────────

const GEO_ALTITUDE_KM = GEO_ALTITUDE_M / 1000;

/**
 * Azimuth and elevation from an observer to a geostationary satellite.
 *
 * Both ends go through satellite.js: the observer as WGS-84 geodetic, the
 * satellite as an ECF point on the equator at GEO altitude.
 */
export function lookAngles(
  latDeg: number,
  lonDeg: number,
  altitudeM: number,
  satelliteLonDeg: number,
): LookAngles {
  assertFinite({
    latitude: latDeg,
    longitude: lonDeg,
    altitude: altitudeM,
    "satellite longitude": satelliteLonDeg,
  });

  const observer = {
    latitude: satellite.degreesToRadians(latDeg),
    longitude: satellite.degreesToRadians(lonDeg),
    height: altitudeM / 1000,
  };
  const satelliteEcf = satellite.geodeticToEcf({
    latitude: 0,
    longitude: satellite.degreesToRadians(satelliteLonDeg),
    height: GEO_ALTITUDE_KM,
  });
  const angles = satellite.ecfToLookAngles(observer, satelliteEcf);
  if (angles.rangeSat === 0) {
    return { azimuthDeg: 0, elevationDeg: 90 };
  }

  return {
    azimuthDeg: normalizeAzimuth(angles.azimuth * RAD_TO_DEG),
    elevationDeg: angles.elevation * RAD_TO_DEG,
  };
}

/**
 * Test one observer sample against the X exclusion rules.
 *
 * The elevation floor is checked first; an azimuth conflict is only
 * reported when the satellite is above it.
 */
export function evaluateXAzimuth(
  sample: ObserverSample,
  satelliteLonDeg: number,
  range: AzimuthRange,
  minElevationDeg: number,
): XAzimuthEvaluation {
  const angles = lookAngles(
    sample.latitude,
    sample.longitude,
    sample.altitudeM,
    satelliteLonDeg,
  );
  const relativeAzimuthDeg = relativeAzimuth(angles.azimuthDeg, sample.headingDeg);
  const elevationBelowMin = angles.elevationDeg < minElevationDeg;

  let violation: XViolationReason | null = null;
  if (elevationBelowMin) {
    violation = "elevation";
  } else if (isInAzimuthRange(relativeAzimuthDeg, range.minDeg, range.maxDeg)) {
    violation = "azimuth";
  }

  return {
    absoluteAzimuthDeg: angles.azimuthDeg,
    relativeAzimuthDeg,
    elevationDeg: angles.elevationDeg,
    minElevationDeg,
    elevationBelowMin,
    violation,
  };
}

// ─── Great Circle ───────────────────────────────────────────────────────────

/**
 * Haversine great-circle distance between two geodetic points (metres).
 */
export function haversineDistance(
  lat1: number,
  lon1: number,
  lat2: number,
  lon2: number,
): number {
  const dLat = (lat2 - lat1) * DEG_TO_RAD;
  const dLon = (lon2 - lon1) * DEG_TO_RAD;

  const a =
    Math.sin(dLat / 2) ** 2 +
    Math.cos(lat1 * DEG_TO_RAD) *
      Math.cos(lat2 * DEG_TO_RAD) *
      Math.sin(dLon / 2) ** 2;

  return EARTH_RADIUS_M * 2 * Math.atan2(Math.sqrt(a), Math.sqrt(1 - a));
}

/** Initial great-circle bearing from point 1 to point 2, [0, 360). */
export function initialBearing(
  lat1: number,
  lon1: number,
  lat2: number,
  lon2: number,
): number {
  const phi1 = lat1 * DEG_TO_RAD;
  const phi2 = lat2 * DEG_TO_RAD;
  const dLon = (lon2 - lon1) * DEG_TO_RAD;

  const y = Math.sin(dLon) * Math.cos(phi2);
  const x =
    Math.cos(phi1) * Math.sin(phi2) -
    Math.sin(phi1) * Math.cos(phi2) * Math.cos(dLon);

  return normalizeAzimuth(Math.atan2(y, x) * RAD_TO_DEG);
}

// ─── Interpolation ──────────────────────────────────────────────────────────

/**
 * Interpolate longitude along the shorter arc, crossing the antimeridian
 * when the raw difference exceeds 180°.
 *
 * interpolateLongitude(170, -170, 0.5) → 180
 */
export function interpolateLongitude(
  prevLon: number,
  nextLon: number,
  ratio: number,
): number {
  const delta = normalizeAzimuth(nextLon - prevLon + 180) - 180;
  return normalizeLongitude(prevLon + delta * ratio);
}

/** Linear altitude interpolation; missing ends fall back to cruise altitude. */
export function interpolateAltitude(
  prevAlt: number | null,
  nextAlt: number | null,
  ratio: number,
  fallbackM: number = DEFAULT_CRUISE_ALTITUDE_M,
): number {
  const start = prevAlt ?? nextAlt ?? fallbackM;
  const end = nextAlt ?? prevAlt ?? fallbackM;
  return start + (end - start) * ratio;
}
