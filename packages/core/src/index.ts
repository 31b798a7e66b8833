/**
 * @commplan/core — Domain logic entrypoint.
 *
 * Pure TypeScript mission communication planning: look angles, coverage,
 * event rules, timeline assembly, flight state and ETAs.
 * No UI code. No API endpoints. No persistence.
 */

// ─── Configuration & Errors ─────────────────────────────────────────────────

export {
  TIMELINE_ENGINE_CONFIG,
  FLIGHT_STATE_THRESHOLDS,
  ETA_CONFIG,
  DEFAULT_CONSTRAINTS,
  createConstraintConfig,
  loadEngineConfig,
} from "./config";

export type {
  ConstraintConfig,
  EngineConfig,
  FlightStateThresholds,
} from "./config";

export {
  MissionPlanningError,
  ConfigurationError,
  GeometryInputError,
  CoverageDataError,
  TimelineComputationError,
  ErrorCodeSchema,
  ErrorResponseSchema,
  isMissionPlanningError,
  toErrorResponse,
  formatZodIssues,
} from "./errors";

export type { ErrorCode, ErrorResponse } from "./errors";

// ─── Physics ────────────────────────────────────────────────────────────────

export {
  EARTH_RADIUS_M,
  GEO_ALTITUDE_M,
  DEG_TO_RAD,
  RAD_TO_DEG,
  METERS_PER_NM,
  DEFAULT_CRUISE_ALTITUDE_M,
} from "./physics/constants";

export {
  lookAngles,
  evaluateXAzimuth,
  isInAzimuthRange,
  relativeAzimuth,
  normalizeAzimuth,
  normalizeLongitude,
  haversineDistance,
  initialBearing,
  interpolateLongitude,
  interpolateAltitude,
} from "./physics/geometry";

export type {
  LookAngles,
  AzimuthRange,
  ObserverSample,
  XAzimuthEvaluation,
  XViolationReason,
} from "./physics/geometry";

// ─── Satellites ─────────────────────────────────────────────────────────────

export { SatelliteCatalog, createDefaultSatelliteCatalog } from "./satellites/catalog";

export {
  CoverageSampler,
  pointInRing,
  parseCoverageDataset,
  loadCoverageSampler,
  getDefaultCoverageSampler,
  resetCoverageCache,
} from "./satellites/coverage";

export type {
  Ring,
  CoveragePoint,
  CoverageEvent,
  CoverageEventKind,
} from "./satellites/coverage";

// ─── Route ──────────────────────────────────────────────────────────────────

export {
  cumulativeDistances,
  nearestPointIndex,
  projectPointOntoRoute,
  projectPOIOntoRoute,
} from "./route/projection";

export type { RouteCoordinate, RouteProjection } from "./route/projection";

export {
  RouteTemporalProjector,
  deriveMissionWindow,
  routeHasTimingData,
} from "./route/projector";

export type {
  TimedPosition,
  RouteSample,
  ProjectedCoordinate,
} from "./route/projector";

// ─── Timeline ───────────────────────────────────────────────────────────────

export { analyzeKaCoverage } from "./timeline/coverage-analysis";

export type {
  KaCoverageGap,
  KaSwap,
  KaCoverageAnalysis,
  DistanceResolver,
} from "./timeline/coverage-analysis";

export { compareEvents } from "./timeline/events";

export type {
  EventEdge,
  EventMetadata,
  MissionEvent,
  MissionEventDetail,
  MissionEventKind,
  TimelineAdvisory,
  XAzimuthViolation,
} from "./timeline/events";

export {
  RuleEngine,
  buildAssignmentSchedule,
  formatZulu,
} from "./timeline/rules";

export type {
  SatelliteAssignment,
  ResolvedRefuelingWindow,
  LongitudeResolver,
} from "./timeline/rules";

export { generateTransportIntervals, perTransport } from "./timeline/state";

export type { TransportInterval, TransportIntervals } from "./timeline/state";

export {
  buildTimelineSegments,
  assembleMissionTimeline,
  attachStatistics,
  annotateRefuelingBlocks,
  summarizeTimeline,
  statusForImpactedCount,
} from "./timeline/assembler";

export type {
  TimelineSegment,
  TimelineStatistics,
  RefuelingBlock,
  MissionTimeline,
  TimelineSummary,
  AssembledTimeline,
} from "./timeline/assembler";

export {
  buildMissionTimeline,
  createLongitudeResolver,
  resolveRefuelingWindows,
} from "./timeline/builder";

export type {
  POISource,
  BuildMissionTimelineOptions,
  MissionTimelineResult,
} from "./timeline/builder";

// ─── Flight State ───────────────────────────────────────────────────────────

export { FlightStateManager, etaModeForPhase } from "./flight/state-manager";

export type {
  FlightStatus,
  PhaseChange,
  ETAModeChange,
  PhaseChangeListener,
  ETAModeChangeListener,
  FlightStateManagerOptions,
} from "./flight/state-manager";

// ─── ETA ────────────────────────────────────────────────────────────────────

export { ETACalculator, ETA_UNKNOWN } from "./eta/calculator";

export type {
  ETACalculatorOptions,
  ETACalculatorStats,
  POIMetrics,
} from "./eta/calculator";

export {
  anticipatedRouteETA,
  estimatedRouteETA,
  findWaypointForPOI,
} from "./eta/route-eta";

export type { RouteETAResult } from "./eta/route-eta";

// ─── Schemas ────────────────────────────────────────────────────────────────

export {
  // Enum schemas
  TransportSchema,
  TransportStateSchema,
  TimelineStatusSchema,
  EventSeveritySchema,
  FlightPhaseSchema,
  ETAModeSchema,
  // Route
  RoutePointSchema,
  RouteWaypointSchema,
  RouteTimingProfileSchema,
  RouteSchema,
  // Mission
  XTransitionSchema,
  OutageWindowSchema,
  RefuelingWindowSchema,
  TransportConfigSchema,
  MissionConfigSchema,
  MissionWindowSchema,
  // POI
  POIProjectionSchema,
  POISchema,
  // Satellites & coverage
  SatelliteDefinitionSchema,
  PositionSchema,
  LinearRingSchema,
  CoverageGeometrySchema,
  CoverageFeatureSchema,
  CoverageFeatureCollectionSchema,
  // Telemetry
  TelemetryTickSchema,
  // Parsers
  parseRoute,
  parsePOI,
  parseMissionConfig,
  TRANSPORTS,
} from "./schemas";

export type {
  Transport,
  TransportState,
  TimelineStatus,
  EventSeverity,
  FlightPhase,
  ETAMode,
  RoutePoint,
  RouteWaypoint,
  RouteTimingProfile,
  Route,
  RouteInput,
  XTransition,
  OutageWindow,
  RefuelingWindow,
  TransportConfig,
  MissionConfig,
  MissionConfigInput,
  MissionWindow,
  POIProjection,
  POI,
  POIInput,
  SatelliteDefinition,
  CoverageFeature,
  TelemetryTick,
} from "./schemas";
