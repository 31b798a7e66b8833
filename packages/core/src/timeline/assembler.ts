/**
 * Timeline Assembler — merges per-transport intervals into one partition of
 * the mission window with an aggregate status per segment.
 */

import type {
  TimelineStatus,
  Transport,
  TransportState,
} from "../schemas";
import { TRANSPORTS } from "../schemas";
import type { MissionEvent, TimelineAdvisory } from "./events";
import type { ResolvedRefuelingWindow } from "./rules";
import {
  generateTransportIntervals,
  perTransport,
  type TransportInterval,
  type TransportIntervals,
} from "./state";

// ─── Types ──────────────────────────────────────────────────────────────────

export interface TimelineSegment {
  id: string;
  /** Half-open [start, end). */
  start: Date;
  end: Date;
  status: TimelineStatus;
  states: Record<Transport, TransportState>;
  reasons: string[];
  impactedTransports: Transport[];
  /**
   * X was degraded only by the expected X/Ku aft-cone conflict, so the
   * segment reports nominal. Reasons and impacted transports are kept.
   */
  kuAftConflictOnly: boolean;
}

export interface RefuelingBlock {
  id: string;
  start: Date;
  end: Date;
}

export interface TimelineStatistics {
  totalDurationSeconds: number;
  nominalSeconds: number;
  degradedSeconds: number;
  criticalSeconds: number;
  /** Seconds until the next non-nominal segment, 0 inside one, −1 if none. */
  nextConflictSeconds: number;
  refuelingBlocks: RefuelingBlock[];
}

export interface MissionTimeline {
  missionId: string;
  createdAt: Date;
  missionStart: Date;
  missionEnd: Date;
  segments: TimelineSegment[];
  advisories: TimelineAdvisory[];
  statistics: TimelineStatistics;
}

export interface TimelineSummary {
  missionId: string;
  missionStart: Date;
  missionEnd: Date;
  segmentCount: number;
  nominalSeconds: number;
  degradedSeconds: number;
  criticalSeconds: number;
  nextConflictSeconds: number;
  /** Worst state each transport reaches during the mission. */
  transportStates: Record<Transport, TransportState>;
  sampleCount: number;
  sampleIntervalSeconds: number;
  generationRuntimeMs: number;
}

// ─── Status ─────────────────────────────────────────────────────────────────

const STATE_RANK: Record<TransportState, number> = {
  available: 0,
  degraded: 1,
  offline: 2,
};

/** 0 impacted → nominal, 1 → degraded, 2+ → critical. */
export function statusForImpactedCount(count: number): TimelineStatus {
  if (count === 0) return "nominal";
  if (count === 1) return "degraded";
  return "critical";
}

function intervalAt(intervals: readonly TransportInterval[], atMs: number): TransportInterval | undefined {
  return intervals.find(
    (interval) => interval.start.getTime() <= atMs && atMs < interval.end.getTime(),
  );
}

function formatSegmentId(missionId: string, index: number): string {
  return `${missionId}-segment-${String(index + 1).padStart(3, "0")}`;
}

// ─── Segments ───────────────────────────────────────────────────────────────

/**
 * Split the mission window at every interval boundary of every transport.
 * The result tiles [missionStart, missionEnd] with no gaps or overlaps.
 */
export function buildTimelineSegments(
  missionId: string,
  intervals: TransportIntervals,
  missionStart: Date,
  missionEnd: Date,
): TimelineSegment[] {
  const startMs = missionStart.getTime();
  const endMs = missionEnd.getTime();

  const boundarySet = new Set<number>([startMs, endMs]);
  for (const transport of TRANSPORTS) {
    for (const interval of intervals[transport]) {
      for (const at of [interval.start.getTime(), interval.end.getTime()]) {
        if (at > startMs && at < endMs) boundarySet.add(at);
      }
    }
  }
  const boundaries = [...boundarySet].sort((a, b) => a - b);

  const segments: TimelineSegment[] = [];
  for (let i = 0; i < boundaries.length - 1; i++) {
    const segmentStart = boundaries[i];
    const active = perTransport((transport) => intervalAt(intervals[transport], segmentStart));
    const states = perTransport((transport) => active[transport]?.state ?? "available");

    const impactedTransports = TRANSPORTS.filter((transport) => states[transport] !== "available");
    const reasons = [
      ...new Set(TRANSPORTS.flatMap((transport) => active[transport]?.reasons ?? [])),
    ];

    const kuAftConflictOnly =
      impactedTransports.length === 1 &&
      impactedTransports[0] === "X" &&
      states.X === "degraded" &&
      (active.X?.kuAftConflictOnly ?? false);

    segments.push({
      id: formatSegmentId(missionId, segments.length),
      start: new Date(segmentStart),
      end: new Date(boundaries[i + 1]),
      status: kuAftConflictOnly ? "nominal" : statusForImpactedCount(impactedTransports.length),
      states,
      reasons,
      impactedTransports,
      kuAftConflictOnly,
    });
  }

  return segments;
}

// ─── Statistics ─────────────────────────────────────────────────────────────

function durationSeconds(start: Date, end: Date): number {
  return (end.getTime() - start.getTime()) / 1000;
}

/**
 * Seconds per status and the countdown from `referenceTime` to the next
 * non-nominal segment.
 */
export function attachStatistics(
  timeline: MissionTimeline,
  missionStart: Date,
  missionEnd: Date,
  referenceTime: Date = missionStart,
): MissionTimeline {
  const totals: Record<TimelineStatus, number> = { nominal: 0, degraded: 0, critical: 0 };
  for (const segment of timeline.segments) {
    totals[segment.status] += durationSeconds(segment.start, segment.end);
  }

  const refMs = referenceTime.getTime();
  const next = timeline.segments.find(
    (segment) => segment.status !== "nominal" && segment.end.getTime() > refMs,
  );
  const nextConflictSeconds =
    next === undefined ? -1 : Math.max(0, (next.start.getTime() - refMs) / 1000);

  return {
    ...timeline,
    statistics: {
      ...timeline.statistics,
      totalDurationSeconds: durationSeconds(missionStart, missionEnd),
      nominalSeconds: totals.nominal,
      degradedSeconds: totals.degraded,
      criticalSeconds: totals.critical,
      nextConflictSeconds,
    },
  };
}

/** Record refueling windows, clipped to the mission, as statistics blocks. */
export function annotateRefuelingBlocks(
  timeline: MissionTimeline,
  windows: readonly ResolvedRefuelingWindow[],
): MissionTimeline {
  const startMs = timeline.missionStart.getTime();
  const endMs = timeline.missionEnd.getTime();
  const refuelingBlocks = windows
    .map((window) => ({
      id: window.id,
      start: new Date(Math.max(window.start.getTime(), startMs)),
      end: new Date(Math.min(window.end.getTime(), endMs)),
    }))
    .filter((block) => block.end.getTime() > block.start.getTime());

  return { ...timeline, statistics: { ...timeline.statistics, refuelingBlocks } };
}

// ─── Assembly ───────────────────────────────────────────────────────────────

export interface AssembledTimeline {
  timeline: MissionTimeline;
  intervals: TransportIntervals;
}

export function assembleMissionTimeline(
  missionId: string,
  events: readonly MissionEvent[],
  missionStart: Date,
  missionEnd: Date,
  advisories: TimelineAdvisory[] = [],
  createdAt: Date = new Date(),
): AssembledTimeline {
  const intervals = generateTransportIntervals(events, missionStart, missionEnd);
  const segments = buildTimelineSegments(missionId, intervals, missionStart, missionEnd);

  const timeline = attachStatistics(
    {
      missionId,
      createdAt,
      missionStart,
      missionEnd,
      segments,
      advisories,
      statistics: {
        totalDurationSeconds: 0,
        nominalSeconds: 0,
        degradedSeconds: 0,
        criticalSeconds: 0,
        nextConflictSeconds: -1,
        refuelingBlocks: [],
      },
    },
    missionStart,
    missionEnd,
  );

  return { timeline, intervals };
}

export function summarizeTimeline(
  timeline: MissionTimeline,
  intervals: TransportIntervals,
  run: { sampleCount: number; sampleIntervalSeconds: number; generationRuntimeMs: number },
): TimelineSummary {
  const transportStates = perTransport((transport) =>
    intervals[transport].reduce<TransportState>(
      (worst, interval) => (STATE_RANK[interval.state] > STATE_RANK[worst] ? interval.state : worst),
      "available",
    ),
  );

  return {
    missionId: timeline.missionId,
    missionStart: timeline.missionStart,
    missionEnd: timeline.missionEnd,
    segmentCount: timeline.segments.length,
    nominalSeconds: timeline.statistics.nominalSeconds,
    degradedSeconds: timeline.statistics.degradedSeconds,
    criticalSeconds: timeline.statistics.criticalSeconds,
    nextConflictSeconds: timeline.statistics.nextConflictSeconds,
    transportStates,
    ...run,
  };
}
