/**
 * Zod runtime validation schemas for mission planning inputs.
 *
 * These schemas validate external input at system boundaries: routes,
 * mission configuration, points of interest, satellite definitions,
 * coverage footprints and telemetry ticks. Timestamps are accepted as ISO
 * strings (or Date) and parsed into Date.
 */

import { z } from "zod";
import { ConfigurationError, formatZodIssues } from "../errors";

// ─── Enum Schemas ───────────────────────────────────────────────────────────

export const TransportSchema = z.enum(["X", "Ka", "Ku"]);

export const TransportStateSchema = z.enum(["available", "degraded", "offline"]);

export const TimelineStatusSchema = z.enum(["nominal", "degraded", "critical"]);

export const EventSeveritySchema = z.enum(["info", "warning", "critical", "safety"]);

export const FlightPhaseSchema = z.enum(["pre_departure", "in_flight", "post_arrival"]);

export const ETAModeSchema = z.enum(["anticipated", "estimated"]);

// ─── Primitives ─────────────────────────────────────────────────────────────

const LatitudeSchema = z.number().finite().min(-90).max(90);
const LongitudeSchema = z.number().finite().min(-180).max(180);
const OptionalTimestampSchema = z.coerce.date().nullable().default(null);

// ─── Route Schemas ──────────────────────────────────────────────────────────

export const RoutePointSchema = z.object({
  latitude: LatitudeSchema,
  longitude: LongitudeSchema,
  altitude: z.number().finite().nullable().default(null),
  sequence: z.number().int().nonnegative(),
  expectedArrivalTime: OptionalTimestampSchema,
  expectedSegmentSpeedKnots: z.number().finite().nonnegative().nullable().default(null),
});

export const RouteWaypointSchema = z.object({
  name: z.string().min(1),
  latitude: LatitudeSchema,
  longitude: LongitudeSchema,
  order: z.number().int().nonnegative(),
  role: z.string().nullable().default(null),
  expectedArrivalTime: OptionalTimestampSchema,
});

export const RouteTimingProfileSchema = z.object({
  departureTime: OptionalTimestampSchema,
  arrivalTime: OptionalTimestampSchema,
  hasTimingData: z.boolean().default(false),
});

export const RouteSchema = z.object({
  id: z.string(),
  name: z.string().default(""),
  points: z.array(RoutePointSchema),
  waypoints: z.array(RouteWaypointSchema).default([]),
  timingProfile: RouteTimingProfileSchema.nullable().default(null),
});

// ─── Mission Schemas ────────────────────────────────────────────────────────

export const XTransitionSchema = z.object({
  id: z.string().min(1),
  latitude: LatitudeSchema,
  longitude: LongitudeSchema,
  targetSatelliteId: z.string().min(1),
  targetBeamId: z.string().nullable().default(null),
});

export const OutageWindowSchema = z.object({
  id: z.string().min(1),
  startTime: z.coerce.date(),
  durationSeconds: z.number().finite().positive(),
  reason: z.string().nullable().default(null),
});

export const RefuelingWindowSchema = z.object({
  id: z.string().min(1),
  startWaypointName: z.string().min(1),
  endWaypointName: z.string().min(1),
});

export const TransportConfigSchema = z.object({
  initialXSatelliteId: z.string().min(1),
  initialKaSatelliteIds: z.array(z.string().min(1)).default(["AOR", "POR", "IOR"]),
  xTransitions: z.array(XTransitionSchema).default([]),
  kaOutages: z.array(OutageWindowSchema).default([]),
  kuOutages: z.array(OutageWindowSchema).default([]),
  refuelingWindows: z.array(RefuelingWindowSchema).default([]),
});

export const MissionConfigSchema = z.object({
  id: z.string().min(1),
  name: z.string().default(""),
  routeId: z.string().min(1),
  transports: TransportConfigSchema,
});

export const MissionWindowSchema = z
  .object({
    start: z.coerce.date(),
    end: z.coerce.date(),
  })
  .refine((window) => window.end.getTime() > window.start.getTime(), {
    message: "Mission window end must be after start",
  });

// ─── POI Schemas ────────────────────────────────────────────────────────────

export const POIProjectionSchema = z.object({
  latitude: LatitudeSchema,
  longitude: LongitudeSchema,
  segmentIndex: z.number().int().nonnegative(),
  distanceAlongMeters: z.number().finite().nonnegative(),
  routeProgress: z.number().finite().min(0).max(1),
});

export const POISchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  latitude: LatitudeSchema,
  longitude: LongitudeSchema,
  category: z.string().nullable().default(null),
  routeId: z.string().nullable().default(null),
  projection: POIProjectionSchema.nullable().default(null),
});

// ─── Satellite Schemas ──────────────────────────────────────────────────────

export const SatelliteDefinitionSchema = z.object({
  id: z.string().min(1),
  transport: TransportSchema,
  longitude: LongitudeSchema.nullable().default(null),
  slot: z.string().nullable().default(null),
});

// ─── Coverage Schemas (GeoJSON) ─────────────────────────────────────────────

/** [lon, lat] with optional trailing elevation. */
export const PositionSchema = z.tuple([z.number().finite(), z.number().finite()]).rest(z.number());

export const LinearRingSchema = z.array(PositionSchema).min(3);

export const CoverageGeometrySchema = z.discriminatedUnion("type", [
  z.object({
    type: z.literal("Polygon"),
    coordinates: z.array(LinearRingSchema).min(1),
  }),
  z.object({
    type: z.literal("MultiPolygon"),
    coordinates: z.array(z.array(LinearRingSchema).min(1)).min(1),
  }),
]);

export const CoverageFeatureSchema = z.object({
  type: z.literal("Feature"),
  properties: z.object({ satellite_id: z.string().min(1) }).passthrough(),
  geometry: CoverageGeometrySchema,
});

export const CoverageFeatureCollectionSchema = z.object({
  type: z.literal("FeatureCollection"),
  features: z.array(z.unknown()),
});

// ─── Telemetry Schemas ──────────────────────────────────────────────────────

export const TelemetryTickSchema = z.object({
  speedKnots: z.number().finite(),
  distanceToDestinationMeters: z.number().finite().nonnegative().nullable().default(null),
  timestamp: z.coerce.date().optional(),
});

// ─── Inferred Types ─────────────────────────────────────────────────────────

export type Transport = z.infer<typeof TransportSchema>;
export type TransportState = z.infer<typeof TransportStateSchema>;
export type TimelineStatus = z.infer<typeof TimelineStatusSchema>;
export type EventSeverity = z.infer<typeof EventSeveritySchema>;
export type FlightPhase = z.infer<typeof FlightPhaseSchema>;
export type ETAMode = z.infer<typeof ETAModeSchema>;

export type RoutePoint = z.infer<typeof RoutePointSchema>;
export type RouteWaypoint = z.infer<typeof RouteWaypointSchema>;
export type RouteTimingProfile = z.infer<typeof RouteTimingProfileSchema>;
export type Route = z.infer<typeof RouteSchema>;
export type RouteInput = z.input<typeof RouteSchema>;

export type XTransition = z.infer<typeof XTransitionSchema>;
export type OutageWindow = z.infer<typeof OutageWindowSchema>;
export type RefuelingWindow = z.infer<typeof RefuelingWindowSchema>;
export type TransportConfig = z.infer<typeof TransportConfigSchema>;
export type MissionConfig = z.infer<typeof MissionConfigSchema>;
export type MissionConfigInput = z.input<typeof MissionConfigSchema>;
export type MissionWindow = z.infer<typeof MissionWindowSchema>;

export type POIProjection = z.infer<typeof POIProjectionSchema>;
export type POI = z.infer<typeof POISchema>;
export type POIInput = z.input<typeof POISchema>;

export type SatelliteDefinition = z.infer<typeof SatelliteDefinitionSchema>;
export type CoverageFeature = z.infer<typeof CoverageFeatureSchema>;
export type TelemetryTick = z.infer<typeof TelemetryTickSchema>;

export const TRANSPORTS: readonly Transport[] = TransportSchema.options;

// ─── Parsers ────────────────────────────────────────────────────────────────

export function parseRoute(input: unknown): Route {
  return RouteSchema.parse(input);
}

export function parsePOI(input: unknown): POI {
  return POISchema.parse(input);
}

/** Parse mission configuration; validation failures become ConfigurationError. */
export function parseMissionConfig(input: unknown): MissionConfig {
  const result = MissionConfigSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigurationError(
      `Invalid mission configuration: ${formatZodIssues(result.error)}`,
      { cause: result.error },
    );
  }
  return result.data;
}
