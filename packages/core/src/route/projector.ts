/**
 * Route Temporal Projector — maps a route onto an absolute time axis and
 * produces uniformly spaced samples across the mission window.
 */

import { TIMELINE_ENGINE_CONFIG } from "../config";
import { ConfigurationError, TimelineComputationError } from "../errors";
import { METERS_PER_NM } from "../physics/constants";
import {
  initialBearing,
  interpolateAltitude,
  interpolateLongitude,
} from "../physics/geometry";
import type { MissionWindow, Route, RoutePoint } from "../schemas";
import type { CoverageSampler } from "../satellites/coverage";
import {
  cumulativeDistances,
  projectPointOntoRoute,
  type RouteProjection,
} from "./projection";

// ─── Types ──────────────────────────────────────────────────────────────────

export interface TimedPosition {
  timestamp: Date;
  latitude: number;
  longitude: number;
  altitudeM: number;
  /** Bearing of the current route segment; null on degenerate segments. */
  headingDeg: number | null;
  /** Distance flown along the route. */
  distanceMeters: number;
}

export interface RouteSample extends TimedPosition {
  /** Satellites covering the sample, alphabetically. Empty without a sampler. */
  coverage: string[];
}

export interface ProjectedCoordinate extends RouteProjection {
  timestamp: Date;
}

/** Whether the route carries any planned times. */
export function routeHasTimingData(route: Route): boolean {
  return (
    (route.timingProfile?.hasTimingData ?? false) ||
    route.points.some((point) => point.expectedArrivalTime !== null) ||
    route.waypoints.some((waypoint) => waypoint.expectedArrivalTime !== null)
  );
}

// ─── Mission Window ─────────────────────────────────────────────────────────

/**
 * Earliest to latest known timestamp on the route (timing profile plus
 * point arrival times). An override wins outright.
 */
export function deriveMissionWindow(
  route: Route,
  override: MissionWindow | null = null,
): MissionWindow {
  if (override !== null) {
    if (override.end.getTime() <= override.start.getTime()) {
      throw new ConfigurationError("Mission window override ends before it starts");
    }
    return { start: new Date(override.start), end: new Date(override.end) };
  }

  const pointTimes = route.points
    .map((point) => point.expectedArrivalTime?.getTime())
    .filter((time): time is number => time !== undefined);
  const departure = route.timingProfile?.departureTime?.getTime();
  const arrival = route.timingProfile?.arrivalTime?.getTime();

  const startCandidates = departure === undefined ? pointTimes : [departure, ...pointTimes];
  const endCandidates = arrival === undefined ? pointTimes : [arrival, ...pointTimes];

  if (startCandidates.length === 0 || endCandidates.length === 0) {
    throw new ConfigurationError(
      `Route ${route.id} has no timing data; supply a mission window override`,
    );
  }

  const start = Math.min(...startCandidates);
  const end = Math.max(...endCandidates);
  if (end <= start) {
    throw new ConfigurationError(`Route ${route.id} timing does not span a positive window`);
  }

  return { start: new Date(start), end: new Date(end) };
}

// ─── Time Axis ──────────────────────────────────────────────────────────────

interface Anchor {
  index: number;
  time: number;
}

function plannedDurationMs(distanceM: number, speedKnots: number | null): number | null {
  if (speedKnots === null || speedKnots <= 0) return null;
  const metersPerSecond = (speedKnots * METERS_PER_NM) / 3600;
  return (distanceM / metersPerSecond) * 1000;
}

/**
 * Spread an anchor interval over its segments. Segments with a planned
 * speed take distance / speed; the rest share the remainder by distance.
 * Planned durations are scaled down when they overrun the interval.
 */
function allocateSpan(
  segmentLengths: number[],
  plannedSpeeds: Array<number | null>,
  spanMs: number,
): number[] {
  const planned = segmentLengths.map((length, i) => plannedDurationMs(length, plannedSpeeds[i]));
  const plannedTotal = planned.reduce<number>((sum, d) => sum + (d ?? 0), 0);
  const unplannedLength = segmentLengths.reduce(
    (sum, length, i) => sum + (planned[i] === null ? length : 0),
    0,
  );

  if (unplannedLength > 0 && plannedTotal < spanMs) {
    const remaining = spanMs - plannedTotal;
    return segmentLengths.map((length, i) => planned[i] ?? (remaining * length) / unplannedLength);
  }
  if (plannedTotal > 0) {
    const scale = spanMs / plannedTotal;
    return planned.map((d) => (d ?? 0) * scale);
  }

  const totalLength = segmentLengths.reduce((sum, length) => sum + length, 0);
  if (totalLength > 0) {
    return segmentLengths.map((length) => (spanMs * length) / totalLength);
  }
  return segmentLengths.map(() => spanMs / segmentLengths.length);
}

function collectAnchors(points: RoutePoint[], window: MissionWindow): Anchor[] {
  const raw: Anchor[] = [];
  points.forEach((point, index) => {
    if (point.expectedArrivalTime !== null) {
      raw.push({ index, time: point.expectedArrivalTime.getTime() });
    }
  });
  if (raw.length === 0 || raw[0].index !== 0) {
    raw.unshift({ index: 0, time: window.start.getTime() });
  }
  if (raw[raw.length - 1].index !== points.length - 1) {
    raw.push({ index: points.length - 1, time: window.end.getTime() });
  }

  const anchors: Anchor[] = [];
  for (const anchor of raw) {
    const last = anchors[anchors.length - 1];
    if (last !== undefined && anchor.time < last.time) {
      console.warn(
        `[PROJECTOR] Ignoring out-of-order timestamp on route point ${anchor.index}`,
      );
      continue;
    }
    anchors.push(anchor);
  }

  const tail = anchors[anchors.length - 1];
  if (tail.index !== points.length - 1) {
    anchors.push({ index: points.length - 1, time: Math.max(tail.time, window.end.getTime()) });
  }
  return anchors;
}

// ─── Projector ──────────────────────────────────────────────────────────────

export class RouteTemporalProjector {
  readonly window: MissionWindow;
  readonly points: RoutePoint[];
  readonly distances: number[];
  /** Absolute time (ms) at which the aircraft reaches each point. */
  readonly pointTimes: number[];
  private readonly headings: Array<number | null>;

  constructor(route: Route, window: MissionWindow = deriveMissionWindow(route)) {
    if (route.points.length === 0) {
      throw new TimelineComputationError(`Route ${route.id} has no points`);
    }
    this.window = window;
    this.points = [...route.points].sort((a, b) => a.sequence - b.sequence);
    this.distances = cumulativeDistances(this.points);
    this.headings = this.points.slice(0, -1).map((point, i) => {
      const next = this.points[i + 1];
      if (this.distances[i + 1] - this.distances[i] === 0) return null;
      return initialBearing(point.latitude, point.longitude, next.latitude, next.longitude);
    });
    this.pointTimes = this.buildTimeAxis();
  }

  get totalDistanceMeters(): number {
    return this.distances[this.distances.length - 1];
  }

  private buildTimeAxis(): number[] {
    const times = new Array<number>(this.points.length).fill(0);
    const anchors = collectAnchors(this.points, this.window);
    times[anchors[0].index] = anchors[0].time;

    for (let a = 0; a < anchors.length - 1; a++) {
      const from = anchors[a];
      const to = anchors[a + 1];
      const lengths: number[] = [];
      const speeds: Array<number | null> = [];
      for (let i = from.index; i < to.index; i++) {
        lengths.push(this.distances[i + 1] - this.distances[i]);
        speeds.push(this.points[i].expectedSegmentSpeedKnots);
      }

      const durations = allocateSpan(lengths, speeds, to.time - from.time);
      let cursor = from.time;
      durations.forEach((duration, offset) => {
        cursor += duration;
        times[from.index + offset + 1] = cursor;
      });
      times[to.index] = to.time;
    }

    return times;
  }

  /** Segment index and fraction for an absolute time. */
  private locateTime(timeMs: number): { index: number; fraction: number } {
    const last = this.points.length - 1;
    if (last === 0 || timeMs <= this.pointTimes[0]) return { index: 0, fraction: 0 };
    if (timeMs >= this.pointTimes[last]) return { index: last - 1, fraction: 1 };

    for (let i = 0; i < last; i++) {
      const start = this.pointTimes[i];
      const end = this.pointTimes[i + 1];
      if (timeMs >= start && timeMs < end) {
        return { index: i, fraction: (timeMs - start) / (end - start) };
      }
    }
    return { index: last - 1, fraction: 1 };
  }

  private locateDistance(distanceM: number): { index: number; fraction: number } {
    const last = this.points.length - 1;
    if (last === 0 || distanceM <= 0) return { index: 0, fraction: 0 };
    if (distanceM >= this.totalDistanceMeters) return { index: last - 1, fraction: 1 };

    for (let i = 0; i < last; i++) {
      const start = this.distances[i];
      const end = this.distances[i + 1];
      if (distanceM >= start && distanceM < end) {
        return { index: i, fraction: (distanceM - start) / (end - start) };
      }
    }
    return { index: last - 1, fraction: 1 };
  }

  private positionOnSegment(index: number, fraction: number, timeMs: number): TimedPosition {
    const start = this.points[index];
    const end = this.points[Math.min(index + 1, this.points.length - 1)];
    const segmentLength = this.distances[Math.min(index + 1, this.points.length - 1)] - this.distances[index];

    return {
      timestamp: new Date(timeMs),
      latitude: start.latitude + (end.latitude - start.latitude) * fraction,
      longitude: interpolateLongitude(start.longitude, end.longitude, fraction),
      altitudeM: interpolateAltitude(start.altitude, end.altitude, fraction),
      headingDeg: this.headings[index] ?? null,
      distanceMeters: this.distances[index] + segmentLength * fraction,
    };
  }

  positionAtTime(at: Date): TimedPosition {
    const timeMs = at.getTime();
    const { index, fraction } = this.locateTime(timeMs);
    return this.positionOnSegment(index, fraction, timeMs);
  }

  timestampForDistance(distanceM: number): Date {
    const { index, fraction } = this.locateDistance(distanceM);
    if (this.points.length === 1) return new Date(this.pointTimes[0]);
    const start = this.pointTimes[index];
    const end = this.pointTimes[index + 1];
    return new Date(start + (end - start) * fraction);
  }

  sampleAtDistance(distanceM: number): TimedPosition {
    const { index, fraction } = this.locateDistance(distanceM);
    return this.positionOnSegment(index, fraction, this.timestampForDistance(distanceM).getTime());
  }

  /** Where and when the route passes closest to a coordinate. */
  project(lat: number, lon: number): ProjectedCoordinate | null {
    const projection = projectPointOntoRoute(this.points, lat, lon, this.distances);
    if (projection === null) return null;
    return {
      ...projection,
      timestamp: this.timestampForDistance(projection.distanceAlongMeters),
    };
  }

  /**
   * Uniform samples from mission start to mission end inclusive. The final
   * sample always lands exactly on mission end.
   */
  generateSamples(
    intervalSeconds: number = TIMELINE_ENGINE_CONFIG.sampleIntervalSeconds,
    sampler: CoverageSampler | null = null,
  ): RouteSample[] {
    if (!Number.isFinite(intervalSeconds) || intervalSeconds <= 0) {
      throw new ConfigurationError(`Sample interval must be positive, got ${intervalSeconds}`);
    }

    const startMs = this.window.start.getTime();
    const durationMs = this.window.end.getTime() - startMs;
    const intervalMs = intervalSeconds * 1000;
    const samples: RouteSample[] = [];

    for (let step = 0; ; step++) {
      const elapsed = Math.min(step * intervalMs, durationMs);
      const position = this.positionAtTime(new Date(startMs + elapsed));
      samples.push({
        ...position,
        coverage: sampler === null ? [] : sampler.coverageAt(position.latitude, position.longitude),
      });
      if (elapsed >= durationMs) break;
    }

    backfillHeadings(samples);

    if (samples.length > TIMELINE_ENGINE_CONFIG.sampleCountWarning) {
      console.warn(
        `[PROJECTOR] ${samples.length} samples at ${intervalSeconds}s; consider a coarser interval`,
      );
    }
    return samples;
  }
}

/** Carry the last known heading forward, then the first known backward. */
function backfillHeadings(samples: TimedPosition[]): void {
  let last: number | null = null;
  for (const sample of samples) {
    if (sample.headingDeg === null) {
      sample.headingDeg = last;
    } else {
      last = sample.headingDeg;
    }
  }

  let next: number | null = null;
  for (let i = samples.length - 1; i >= 0; i--) {
    const heading = samples[i].headingDeg;
    if (heading === null) {
      samples[i].headingDeg = next;
    } else {
      next = heading;
    }
  }
}
