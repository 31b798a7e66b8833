/**
 * Engine configuration: compiled-in defaults plus `COMMPLAN_*` environment
 * overrides, validated once at load.
 */

import { z } from "zod";
import { ConfigurationError } from "./errors";
import type { AzimuthRange } from "./physics/geometry";

// ─── Defaults ───────────────────────────────────────────────────────────────

export const TIMELINE_ENGINE_CONFIG = {
  sampleIntervalSeconds: 60,
  /** Per-sample geometry dominates build cost past this count. */
  sampleCountWarning: 2000,
} as const;

export const FLIGHT_STATE_THRESHOLDS = {
  departureSpeedKnots: 50,
  departurePersistenceSeconds: 10,
  arrivalDistanceMeters: 100,
  arrivalDwellSeconds: 60,
} as const;

export const ETA_CONFIG = {
  defaultSpeedKnots: 150,
  smoothingDurationSeconds: 120,
  passedThresholdMeters: 100,
  /** Below this a speed is treated as stationary. */
  minimumSpeedKnots: 0.5,
  /** Off-route POIs must sit this close to a route segment to be walked to. */
  segmentToleranceMeters: 1000,
} as const;

// ─── Constraint Config ──────────────────────────────────────────────────────

export interface ConstraintConfig {
  /** X exclusion cone outside refueling windows (aft of the aircraft). */
  normalAzimuthRange: AzimuthRange;
  /** X exclusion cone inside refueling windows; wraps through 0°. */
  refuelingAzimuthRange: AzimuthRange;
  transitionBufferMinutes: number;
  takeoffBufferMinutes: number;
  landingBufferMinutes: number;
  minimumElevationDeg: number;
}

export const DEFAULT_CONSTRAINTS: Readonly<ConstraintConfig> = Object.freeze({
  normalAzimuthRange: Object.freeze({ minDeg: 135, maxDeg: 225 }),
  refuelingAzimuthRange: Object.freeze({ minDeg: 315, maxDeg: 45 }),
  transitionBufferMinutes: 15,
  takeoffBufferMinutes: 15,
  landingBufferMinutes: 15,
  minimumElevationDeg: 0,
});

export function createConstraintConfig(
  overrides: Partial<ConstraintConfig> = {},
): Readonly<ConstraintConfig> {
  return Object.freeze({
    ...DEFAULT_CONSTRAINTS,
    ...overrides,
    normalAzimuthRange: Object.freeze({
      ...(overrides.normalAzimuthRange ?? DEFAULT_CONSTRAINTS.normalAzimuthRange),
    }),
    refuelingAzimuthRange: Object.freeze({
      ...(overrides.refuelingAzimuthRange ?? DEFAULT_CONSTRAINTS.refuelingAzimuthRange),
    }),
  });
}

// ─── Environment ────────────────────────────────────────────────────────────

const positive = z.coerce.number().finite().positive();
const nonNegative = z.coerce.number().finite().nonnegative();

const EngineEnvSchema = z.object({
  COMMPLAN_SAMPLE_INTERVAL_SECONDS: positive.optional(),
  COMMPLAN_COVERAGE_GEOJSON_PATH: z.string().min(1).optional(),
  COMMPLAN_TRANSITION_BUFFER_MINUTES: nonNegative.optional(),
  COMMPLAN_TAKEOFF_BUFFER_MINUTES: nonNegative.optional(),
  COMMPLAN_LANDING_BUFFER_MINUTES: nonNegative.optional(),
  COMMPLAN_MIN_ELEVATION_DEG: z.coerce.number().finite().min(-90).max(90).optional(),
  COMMPLAN_DEPARTURE_SPEED_KNOTS: positive.optional(),
  COMMPLAN_DEPARTURE_PERSISTENCE_SECONDS: nonNegative.optional(),
  COMMPLAN_ARRIVAL_DISTANCE_METERS: positive.optional(),
  COMMPLAN_ARRIVAL_DWELL_SECONDS: nonNegative.optional(),
  COMMPLAN_DEFAULT_SPEED_KNOTS: positive.optional(),
});

export interface FlightStateThresholds {
  departureSpeedKnots: number;
  departurePersistenceSeconds: number;
  arrivalDistanceMeters: number;
  arrivalDwellSeconds: number;
}

export interface EngineConfig {
  sampleIntervalSeconds: number;
  coverageGeoJsonPath: string | null;
  constraints: Readonly<ConstraintConfig>;
  flightState: FlightStateThresholds;
  defaultSpeedKnots: number;
}

/** Blank variables count as unset. */
function presentOnly(env: NodeJS.ProcessEnv): Record<string, string> {
  const present: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (key.startsWith("COMMPLAN_") && value !== undefined && value.trim() !== "") {
      present[key] = value.trim();
    }
  }
  return present;
}

export function loadEngineConfig(
  env: NodeJS.ProcessEnv = process.env,
): EngineConfig {
  const result = EngineEnvSchema.safeParse(presentOnly(env));
  if (!result.success) {
    const names = result.error.issues.map((issue) => issue.path.join(".")).join(", ");
    throw new ConfigurationError(`Invalid engine environment: ${names}`, {
      cause: result.error,
    });
  }
  const vars = result.data;

  return {
    sampleIntervalSeconds:
      vars.COMMPLAN_SAMPLE_INTERVAL_SECONDS ?? TIMELINE_ENGINE_CONFIG.sampleIntervalSeconds,
    coverageGeoJsonPath: vars.COMMPLAN_COVERAGE_GEOJSON_PATH ?? null,
    constraints: createConstraintConfig({
      transitionBufferMinutes:
        vars.COMMPLAN_TRANSITION_BUFFER_MINUTES ?? DEFAULT_CONSTRAINTS.transitionBufferMinutes,
      takeoffBufferMinutes:
        vars.COMMPLAN_TAKEOFF_BUFFER_MINUTES ?? DEFAULT_CONSTRAINTS.takeoffBufferMinutes,
      landingBufferMinutes:
        vars.COMMPLAN_LANDING_BUFFER_MINUTES ?? DEFAULT_CONSTRAINTS.landingBufferMinutes,
      minimumElevationDeg:
        vars.COMMPLAN_MIN_ELEVATION_DEG ?? DEFAULT_CONSTRAINTS.minimumElevationDeg,
    }),
    flightState: {
      departureSpeedKnots:
        vars.COMMPLAN_DEPARTURE_SPEED_KNOTS ?? FLIGHT_STATE_THRESHOLDS.departureSpeedKnots,
      departurePersistenceSeconds:
        vars.COMMPLAN_DEPARTURE_PERSISTENCE_SECONDS ??
        FLIGHT_STATE_THRESHOLDS.departurePersistenceSeconds,
      arrivalDistanceMeters:
        vars.COMMPLAN_ARRIVAL_DISTANCE_METERS ?? FLIGHT_STATE_THRESHOLDS.arrivalDistanceMeters,
      arrivalDwellSeconds:
        vars.COMMPLAN_ARRIVAL_DWELL_SECONDS ?? FLIGHT_STATE_THRESHOLDS.arrivalDwellSeconds,
    },
    defaultSpeedKnots: vars.COMMPLAN_DEFAULT_SPEED_KNOTS ?? ETA_CONFIG.defaultSpeedKnots,
  };
}
