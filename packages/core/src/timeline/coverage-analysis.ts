/**
 * Ka constellation gap and handoff detection over a sample sequence.
 */

import type { RouteSample, TimedPosition } from "../route/projector";

export interface KaCoverageGap {
  start: Date;
  /** Null when coverage is never regained before the last sample. */
  end: Date | null;
  /** Null when the route starts outside coverage. */
  lostSatelliteId: string | null;
  regainedSatelliteId: string | null;
  startLongitude: number;
  endLongitude: number | null;
}

export interface KaSwap {
  fromSatelliteId: string;
  toSatelliteId: string;
  start: Date;
  end: Date;
  /** Buffer placement anchor, halfway through the handoff. */
  midpoint: Date;
}

export interface KaCoverageAnalysis {
  gaps: KaCoverageGap[];
  swaps: KaSwap[];
}

/** Anything able to place a position at a distance along the route. */
export interface DistanceResolver {
  sampleAtDistance(distanceM: number): TimedPosition;
}

interface OpenGap {
  start: Date;
  lostSatelliteId: string | null;
  startLongitude: number;
}

interface OpenOverlap {
  fromSatelliteId: string;
  start: Date;
}

/** A lost-and-regained jump this wide is an antimeridian split, not a gap. */
const IDL_ARTIFACT_LONGITUDE_DEG = 300;

function firstAlphabetical(ids: Iterable<string>): string {
  return [...ids].sort()[0];
}

function sameSet(a: ReadonlySet<string>, b: ReadonlySet<string>): boolean {
  return a.size === b.size && [...a].every((id) => b.has(id));
}

function midpointTime(a: Date, b: Date): Date {
  return new Date((a.getTime() + b.getTime()) / 2);
}

/** Interpolated crossing point between two consecutive samples. */
function boundaryBetween(
  prev: RouteSample,
  curr: RouteSample,
  resolver: DistanceResolver,
): { timestamp: Date; longitude: number } {
  if (prev.distanceMeters === curr.distanceMeters) {
    return { timestamp: midpointTime(prev.timestamp, curr.timestamp), longitude: curr.longitude };
  }
  const position = resolver.sampleAtDistance((prev.distanceMeters + curr.distanceMeters) / 2);
  return { timestamp: position.timestamp, longitude: position.longitude };
}

/**
 * Classify coverage changes into gaps (maximal uncovered stretches) and
 * swaps (satellite-to-satellite handoffs with no uncovered stretch).
 *
 * A swap is either an overlap handoff, where coverage widens to several
 * satellites and later narrows to a single different one, or a direct
 * change between disjoint sets. When `satelliteIds` is given, satellites
 * outside it are ignored.
 */
export function analyzeKaCoverage(
  samples: readonly RouteSample[],
  resolver: DistanceResolver,
  satelliteIds?: readonly string[],
): KaCoverageAnalysis {
  const gaps: KaCoverageGap[] = [];
  const swaps: KaSwap[] = [];
  if (samples.length === 0) return { gaps, swaps };

  const allowed = satelliteIds === undefined ? null : new Set(satelliteIds);
  const coverageOf = (sample: RouteSample): Set<string> =>
    new Set(
      allowed === null ? sample.coverage : sample.coverage.filter((id) => allowed.has(id)),
    );

  let gap: OpenGap | null = null;
  let overlap: OpenOverlap | null = null;

  if (coverageOf(samples[0]).size === 0) {
    gap = {
      start: samples[0].timestamp,
      lostSatelliteId: null,
      startLongitude: samples[0].longitude,
    };
  }

  for (let i = 1; i < samples.length; i++) {
    const prevSample = samples[i - 1];
    const currSample = samples[i];
    const prev = coverageOf(prevSample);
    const curr = coverageOf(currSample);
    if (sameSet(prev, curr)) continue;

    if (curr.size === 0) {
      overlap = null;
      if (gap === null) {
        const boundary = boundaryBetween(prevSample, currSample, resolver);
        gap = {
          start: boundary.timestamp,
          lostSatelliteId: firstAlphabetical(prev),
          startLongitude: boundary.longitude,
        };
      }
      continue;
    }

    if (gap !== null) {
      const boundary = boundaryBetween(prevSample, currSample, resolver);
      const regained = firstAlphabetical(curr);
      const isIdlArtifact =
        gap.lostSatelliteId === regained &&
        Math.abs(boundary.longitude - gap.startLongitude) > IDL_ARTIFACT_LONGITUDE_DEG;
      if (!isIdlArtifact) {
        gaps.push({
          ...gap,
          end: boundary.timestamp,
          regainedSatelliteId: regained,
          endLongitude: boundary.longitude,
        });
      }
      gap = null;
      continue;
    }

    if (curr.size >= 2) {
      const shared = [...prev].some((id) => curr.has(id));
      if (overlap === null && (shared || curr.size > prev.size)) {
        const dropped = [...prev].filter((id) => !curr.has(id));
        overlap = {
          fromSatelliteId: firstAlphabetical(dropped.length > 0 ? dropped : prev),
          start: boundaryBetween(prevSample, currSample, resolver).timestamp,
        };
      }
      continue;
    }

    const only = firstAlphabetical(curr);
    if (overlap !== null) {
      const handoff = overlap;
      overlap = null;
      if (only !== handoff.fromSatelliteId) {
        const end = boundaryBetween(prevSample, currSample, resolver).timestamp;
        swaps.push({
          fromSatelliteId: handoff.fromSatelliteId,
          toSatelliteId: only,
          start: handoff.start,
          end,
          midpoint: midpointTime(handoff.start, end),
        });
      }
      continue;
    }

    if (prev.size > 0 && !prev.has(only)) {
      const boundary = boundaryBetween(prevSample, currSample, resolver);
      swaps.push({
        fromSatelliteId: firstAlphabetical(prev),
        toSatelliteId: only,
        start: boundary.timestamp,
        end: boundary.timestamp,
        midpoint: boundary.timestamp,
      });
    }
  }

  if (gap !== null) {
    gaps.push({ ...gap, end: null, regainedSatelliteId: null, endLongitude: null });
  }

  return { gaps, swaps };
}
