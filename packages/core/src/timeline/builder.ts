/**
 * Mission timeline builder.
 *
 * A build is a pure function of its inputs: route, mission configuration and
 * coverage dataset in, timeline and summary out. Any failure surfaces as a
 * single typed error and no partial timeline is returned.
 */

import { performance } from "node:perf_hooks";
import { DEFAULT_CONSTRAINTS, TIMELINE_ENGINE_CONFIG, type ConstraintConfig } from "../config";
import { TimelineComputationError, isMissionPlanningError } from "../errors";
import { RouteTemporalProjector, deriveMissionWindow } from "../route/projector";
import {
  type CoverageSampler,
  getDefaultCoverageSampler,
} from "../satellites/coverage";
import {
  SatelliteCatalog,
  createDefaultSatelliteCatalog,
} from "../satellites/catalog";
import type {
  MissionConfig,
  MissionWindow,
  POI,
  RefuelingWindow,
  Route,
} from "../schemas";
import { analyzeKaCoverage } from "./coverage-analysis";
import {
  RuleEngine,
  buildAssignmentSchedule,
  type LongitudeResolver,
  type ResolvedRefuelingWindow,
} from "./rules";
import {
  annotateRefuelingBlocks,
  assembleMissionTimeline,
  summarizeTimeline,
  type MissionTimeline,
  type TimelineSummary,
} from "./assembler";

// ─── Types ──────────────────────────────────────────────────────────────────

/** Lookup into the operator's POI store. */
export interface POISource {
  findGlobalPoiByName(name: string): POI | null | undefined;
}

export interface BuildMissionTimelineOptions {
  /** Undefined loads the configured dataset; null disables Ka coverage analysis. */
  coverageSampler?: CoverageSampler | null;
  poiSource?: POISource | null;
  catalog?: SatelliteCatalog;
  constraints?: Readonly<ConstraintConfig>;
  sampleIntervalSeconds?: number;
  missionWindow?: MissionWindow | null;
  now?: () => Date;
}

export interface MissionTimelineResult {
  timeline: MissionTimeline;
  summary: TimelineSummary;
}

// ─── Resolution Helpers ─────────────────────────────────────────────────────

/** Satellite longitude from the catalog, else from a same-named POI. */
export function createLongitudeResolver(
  catalog: SatelliteCatalog,
  poiSource: POISource | null = null,
): LongitudeResolver {
  return (satelliteId) =>
    catalog.longitudeOf(satelliteId) ??
    poiSource?.findGlobalPoiByName(satelliteId)?.longitude ??
    null;
}

/**
 * Turn waypoint-to-waypoint refueling windows into time ranges. A waypoint's
 * planned arrival is used when present, else its projection onto the route.
 * Windows that cannot be resolved are skipped.
 */
export function resolveRefuelingWindows(
  route: Route,
  projector: RouteTemporalProjector,
  windows: readonly RefuelingWindow[],
): ResolvedRefuelingWindow[] {
  const timeAtWaypoint = (name: string): Date | null => {
    const waypoint = route.waypoints.find(
      (candidate) => candidate.name.toLowerCase() === name.toLowerCase(),
    );
    if (waypoint === undefined) return null;
    return (
      waypoint.expectedArrivalTime ??
      projector.project(waypoint.latitude, waypoint.longitude)?.timestamp ??
      null
    );
  };

  const resolved: ResolvedRefuelingWindow[] = [];
  for (const window of windows) {
    const start = timeAtWaypoint(window.startWaypointName);
    const end = timeAtWaypoint(window.endWaypointName);
    if (start === null || end === null) {
      console.warn(
        `[TIMELINE] Refueling window ${window.id}: waypoint ${start === null ? window.startWaypointName : window.endWaypointName} not found`,
      );
      continue;
    }
    if (end.getTime() <= start.getTime()) {
      console.warn(`[TIMELINE] Refueling window ${window.id} ends before it starts; skipped`);
      continue;
    }
    resolved.push({
      id: window.id,
      start,
      end,
      startWaypointName: window.startWaypointName,
      endWaypointName: window.endWaypointName,
    });
  }
  return resolved;
}

// ─── Build ──────────────────────────────────────────────────────────────────

function runBuild(
  mission: MissionConfig,
  route: Route,
  options: BuildMissionTimelineOptions,
  startedAt: number,
): MissionTimelineResult {
  const constraints = options.constraints ?? DEFAULT_CONSTRAINTS;
  const catalog = options.catalog ?? createDefaultSatelliteCatalog();
  const intervalSeconds =
    options.sampleIntervalSeconds ?? TIMELINE_ENGINE_CONFIG.sampleIntervalSeconds;
  const now = options.now ?? (() => new Date());
  const { transports } = mission;

  const window = deriveMissionWindow(route, options.missionWindow ?? null);
  const projector = new RouteTemporalProjector(route, window);

  const sampler =
    options.coverageSampler === undefined ? getDefaultCoverageSampler() : options.coverageSampler;
  const coverageEnabled = sampler !== null && !sampler.isEmpty;
  const samples = projector.generateSamples(intervalSeconds, coverageEnabled ? sampler : null);

  const engine = new RuleEngine(window.start, window.end, constraints);
  engine.addSafetyBuffers();

  // X transitions are placed where the route passes their coordinates.
  const transitions: Array<{ at: Date; satelliteId: string }> = [];
  for (const transition of transports.xTransitions) {
    const projected = projector.project(transition.latitude, transition.longitude);
    if (projected === null) {
      console.warn(`[TIMELINE] X transition ${transition.id} could not be placed on the route`);
      continue;
    }
    engine.addXTransition(projected.timestamp, transition.targetSatelliteId, {
      transitionId: transition.id,
      targetBeamId: transition.targetBeamId,
    });
    transitions.push({ at: projected.timestamp, satelliteId: transition.targetSatelliteId });
  }
  const schedule = buildAssignmentSchedule(
    window.start,
    transports.initialXSatelliteId,
    transitions,
  );

  const refuelingWindows = resolveRefuelingWindows(route, projector, transports.refuelingWindows);
  for (const refueling of refuelingWindows) {
    engine.addRefuelingWindow(refueling);
  }

  if (coverageEnabled) {
    const analysis = analyzeKaCoverage(samples, projector, transports.initialKaSatelliteIds);
    analysis.gaps.forEach((gap) => engine.addKaCoverageGap(gap));
    analysis.swaps.forEach((swap, index) => engine.addKaSwap(swap, index));
  }

  const outages = [
    ...transports.kaOutages.map((outage) => ({ transport: "Ka" as const, outage })),
    ...transports.kuOutages.map((outage) => ({ transport: "Ku" as const, outage })),
  ];
  for (const { transport, outage } of outages) {
    const endMs = outage.startTime.getTime() + outage.durationSeconds * 1000;
    if (endMs <= window.start.getTime() || outage.startTime.getTime() >= window.end.getTime()) {
      console.warn(`[TIMELINE] ${transport} outage ${outage.id} falls outside the mission window`);
      continue;
    }
    engine.addManualOutage(transport, outage);
  }

  engine.applyXAzimuthSweep(
    samples,
    schedule,
    createLongitudeResolver(catalog, options.poiSource ?? null),
    refuelingWindows,
    route.waypoints,
  );

  const events = engine.sortedEvents();
  const assembled = assembleMissionTimeline(
    mission.id,
    events,
    window.start,
    window.end,
    engine.generateAdvisories(),
    now(),
  );
  const timeline = annotateRefuelingBlocks(assembled.timeline, refuelingWindows);

  const generationRuntimeMs = performance.now() - startedAt;
  const summary = summarizeTimeline(timeline, assembled.intervals, {
    sampleCount: samples.length,
    sampleIntervalSeconds: intervalSeconds,
    generationRuntimeMs,
  });

  console.log(
    `[TIMELINE] Built ${mission.id}: ${timeline.segments.length} segments from ${events.length} events in ${generationRuntimeMs.toFixed(0)}ms`,
  );
  return { timeline, summary };
}

/**
 * Build the communication timeline for a mission flown along a route.
 */
export function buildMissionTimeline(
  mission: MissionConfig,
  route: Route,
  options: BuildMissionTimelineOptions = {},
): MissionTimelineResult {
  const startedAt = performance.now();

  if (route.id.trim() === "") {
    throw new TimelineComputationError("Route has no id");
  }
  if (route.points.length === 0) {
    throw new TimelineComputationError(`Route ${route.id} has no points`);
  }
  if (mission.routeId !== route.id) {
    console.warn(`[TIMELINE] Mission ${mission.id} references route ${mission.routeId}, building against ${route.id}`);
  }

  try {
    return runBuild(mission, route, options, startedAt);
  } catch (error) {
    if (isMissionPlanningError(error)) throw error;
    const message = error instanceof Error ? error.message : String(error);
    console.error(`[TIMELINE] Build failed for mission ${mission.id}:`, error);
    throw new TimelineComputationError(`Timeline build failed for mission ${mission.id}: ${message}`, {
      cause: error,
    });
  }
}
