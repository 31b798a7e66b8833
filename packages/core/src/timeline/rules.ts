/**
 * Rule Engine — turns mission configuration and route geometry into a
 * chronological, typed event stream per transport.
 *
 * Append operations accumulate events; `sortedEvents()` returns them in
 * stable timestamp order for the interval state machine.
 */

import { DEFAULT_CONSTRAINTS, type ConstraintConfig } from "../config";
import { evaluateXAzimuth, haversineDistance } from "../physics/geometry";
import type {
  EventSeverity,
  OutageWindow,
  RouteWaypoint,
  Transport,
} from "../schemas";
import { TRANSPORTS } from "../schemas";
import type { RouteSample } from "../route/projector";
import type { KaCoverageGap, KaSwap } from "./coverage-analysis";
import {
  compareEvents,
  type EventMetadata,
  type MissionEvent,
  type MissionEventDetail,
  type TimelineAdvisory,
  type XAzimuthViolation,
} from "./events";

// ─── Types ──────────────────────────────────────────────────────────────────

/** X satellite in use from `start` until the next assignment. */
export interface SatelliteAssignment {
  start: Date;
  satelliteId: string;
}

export interface ResolvedRefuelingWindow {
  id: string;
  start: Date;
  end: Date;
  startWaypointName: string;
  endWaypointName: string;
}

export type LongitudeResolver = (satelliteId: string) => number | null;

interface EventInput {
  timestamp: Date;
  detail: MissionEventDetail;
  transport: Transport;
  affectedTransport?: Transport;
  severity: EventSeverity;
  reason: string;
  satelliteId?: string | null;
  metadata?: EventMetadata;
}

const MINUTE_MS = 60_000;

// ─── Helpers ────────────────────────────────────────────────────────────────

function offset(at: Date, ms: number): Date {
  return new Date(at.getTime() + ms);
}

/** HH:MMZ in UTC. */
export function formatZulu(at: Date): string {
  const hours = String(at.getUTCHours()).padStart(2, "0");
  const minutes = String(at.getUTCMinutes()).padStart(2, "0");
  return `${hours}:${minutes}Z`;
}

/**
 * Time-ordered X assignments: the initial satellite from mission start,
 * then each transition target from its projected time.
 */
export function buildAssignmentSchedule(
  missionStart: Date,
  initialSatelliteId: string,
  transitions: ReadonlyArray<{ at: Date; satelliteId: string }>,
): SatelliteAssignment[] {
  const schedule: SatelliteAssignment[] = [
    { start: missionStart, satelliteId: initialSatelliteId },
    ...transitions.map((t) => ({ start: t.at, satelliteId: t.satelliteId })),
  ];
  return schedule
    .map((entry, index) => ({ entry, index }))
    .sort((a, b) => a.entry.start.getTime() - b.entry.start.getTime() || a.index - b.index)
    .map(({ entry }) => entry);
}

function describeViolation(violation: XAzimuthViolation): string {
  const { evaluation, satelliteId } = violation;
  const el = evaluation.elevationDeg.toFixed(1);

  if (violation.reason === "elevation") {
    return `X line-of-sight blocked (${satelliteId}, elevation ${el}° < min ${evaluation.minElevationDeg.toFixed(1)}°)`;
  }
  const az = evaluation.relativeAzimuthDeg.toFixed(1);
  if (violation.isKuAftConflict) {
    return `X-Ku Conflict az=${az}° el=${el}°`;
  }
  return `X-AAR Conflict az=${az}° el=${el}°`;
}

/** Same satellite, cause and cone: the open violation carries on. */
function sameViolation(a: XAzimuthViolation, b: XAzimuthViolation): boolean {
  return (
    a.satelliteId === b.satelliteId &&
    a.reason === b.reason &&
    a.refuelingMode === b.refuelingMode
  );
}

function nearestWaypointName(
  waypoints: readonly RouteWaypoint[],
  lat: number,
  lon: number,
): string | null {
  let name: string | null = null;
  let best = Infinity;
  for (const waypoint of waypoints) {
    const distance = haversineDistance(lat, lon, waypoint.latitude, waypoint.longitude);
    if (distance < best) {
      best = distance;
      name = waypoint.name;
    }
  }
  return name;
}

// ─── Rule Engine ────────────────────────────────────────────────────────────

export class RuleEngine {
  private readonly events: MissionEvent[] = [];
  private nextSequence = 0;

  constructor(
    readonly missionStart: Date,
    readonly missionEnd: Date,
    readonly constraints: Readonly<ConstraintConfig> = DEFAULT_CONSTRAINTS,
  ) {}

  get eventCount(): number {
    return this.events.length;
  }

  private push(input: EventInput): MissionEvent {
    const event: MissionEvent = Object.freeze({
      sequence: this.nextSequence++,
      timestamp: input.timestamp,
      detail: input.detail,
      transport: input.transport,
      affectedTransport: input.affectedTransport ?? input.transport,
      severity: input.severity,
      reason: input.reason,
      satelliteId: input.satelliteId ?? null,
      metadata: Object.freeze({ ...input.metadata }),
    });
    this.events.push(event);
    return event;
  }

  // ─── Safety Buffers ─────────────────────────────────────────────────────

  /** Takeoff and landing safety-of-flight windows on every transport. */
  addSafetyBuffers(
    departure: Date = this.missionStart,
    arrival: Date = this.missionEnd,
  ): void {
    const takeoffMinutes = this.constraints.takeoffBufferMinutes;
    const landingMinutes = this.constraints.landingBufferMinutes;

    for (const transport of TRANSPORTS) {
      this.push({
        timestamp: departure,
        detail: { kind: "takeoff_buffer", edge: "open" },
        transport,
        severity: "safety",
        reason: "Safety-of-Flight (takeoff)",
        metadata: { bufferMinutes: takeoffMinutes },
      });
      this.push({
        timestamp: offset(departure, takeoffMinutes * MINUTE_MS),
        detail: { kind: "takeoff_buffer", edge: "close" },
        transport,
        severity: "info",
        reason: "Takeoff window complete",
      });
      this.push({
        timestamp: offset(arrival, -landingMinutes * MINUTE_MS),
        detail: { kind: "landing_buffer", edge: "open" },
        transport,
        severity: "safety",
        reason: "Safety-of-Flight (landing)",
        metadata: { bufferMinutes: landingMinutes },
      });
      this.push({
        timestamp: arrival,
        detail: { kind: "landing_buffer", edge: "close" },
        transport,
        severity: "info",
        reason: "Landing window complete",
      });
    }
  }

  // ─── Transitions ────────────────────────────────────────────────────────

  /** Degrade X for the transition buffer on either side of a switch. */
  addXTransition(at: Date, satelliteId: string, metadata: EventMetadata = {}): void {
    const bufferMs = this.constraints.transitionBufferMinutes * MINUTE_MS;
    this.push({
      timestamp: offset(at, -bufferMs),
      detail: { kind: "x_transition", edge: "open" },
      transport: "X",
      severity: "warning",
      reason: `X Transition to ${satelliteId}`,
      satelliteId,
      metadata: { ...metadata, transitionTime: at.toISOString() },
    });
    this.push({
      timestamp: offset(at, bufferMs),
      detail: { kind: "x_transition", edge: "close" },
      transport: "X",
      severity: "info",
      reason: `X Transition to ${satelliteId} complete`,
      satelliteId,
      metadata: { ...metadata, transitionTime: at.toISOString() },
    });
  }

  addKaSwap(swap: KaSwap, index: number): void {
    const bufferMs = this.constraints.transitionBufferMinutes * MINUTE_MS;
    const label = `${swap.fromSatelliteId}->${swap.toSatelliteId}`;
    const transitionId = `${label}-${index}`;
    const metadata = {
      transitionId,
      fromSatellite: swap.fromSatelliteId,
      toSatellite: swap.toSatelliteId,
    };

    this.push({
      timestamp: offset(swap.midpoint, -bufferMs),
      detail: { kind: "ka_swap", edge: "open", transitionId },
      transport: "Ka",
      severity: "warning",
      reason: `Ka transition ${swap.fromSatelliteId} → ${swap.toSatelliteId}`,
      satelliteId: label,
      metadata,
    });
    this.push({
      timestamp: offset(swap.midpoint, bufferMs),
      detail: { kind: "ka_swap", edge: "close", transitionId },
      transport: "Ka",
      severity: "info",
      reason: `Ka transition ${swap.fromSatelliteId} → ${swap.toSatelliteId} complete`,
      satelliteId: label,
      metadata,
    });
  }

  // ─── Coverage ───────────────────────────────────────────────────────────

  addKaCoverageGap(gap: KaCoverageGap): void {
    this.push({
      timestamp: gap.start,
      detail: { kind: "ka_coverage", edge: "open" },
      transport: "Ka",
      severity: "warning",
      reason:
        gap.lostSatelliteId === null
          ? "Ka coverage unavailable"
          : `Ka coverage lost (${gap.lostSatelliteId})`,
      satelliteId: gap.lostSatelliteId,
    });
    if (gap.end !== null) {
      this.push({
        timestamp: gap.end,
        detail: { kind: "ka_coverage", edge: "close" },
        transport: "Ka",
        severity: "info",
        reason: `Ka coverage restored (${gap.regainedSatelliteId ?? "unknown"})`,
        satelliteId: gap.regainedSatelliteId,
      });
    }
  }

  // ─── Outages ────────────────────────────────────────────────────────────

  addManualOutage(transport: Exclude<Transport, "X">, outage: OutageWindow): void {
    const end = offset(outage.startTime, outage.durationSeconds * 1000);
    const metadata = { outageId: outage.id, durationSeconds: outage.durationSeconds };

    this.push({
      timestamp: outage.startTime,
      detail: { kind: "manual_outage", edge: "open", outageId: outage.id },
      transport,
      severity: "warning",
      reason: outage.reason ?? `${transport} outage`,
      metadata,
    });
    this.push({
      timestamp: end,
      detail: { kind: "manual_outage", edge: "close", outageId: outage.id },
      transport,
      severity: "info",
      reason: `${transport} outage ended`,
      metadata,
    });
  }

  // ─── Refueling ──────────────────────────────────────────────────────────

  /** Marker events; the cone switch itself happens in the azimuth sweep. */
  addRefuelingWindow(window: ResolvedRefuelingWindow): void {
    const metadata = {
      windowId: window.id,
      startWaypoint: window.startWaypointName,
      endWaypoint: window.endWaypointName,
    };
    this.push({
      timestamp: window.start,
      detail: { kind: "refueling_window", edge: "open", windowId: window.id },
      transport: "X",
      severity: "safety",
      reason: "AAR Start",
      metadata,
    });
    this.push({
      timestamp: window.end,
      detail: { kind: "refueling_window", edge: "close", windowId: window.id },
      transport: "X",
      severity: "info",
      reason: "AAR End",
      metadata,
    });
  }

  // ─── Azimuth Sweep ──────────────────────────────────────────────────────

  /**
   * Evaluate every sample against the X exclusion rules and record only
   * changes of violation state. When the satellite, the cause or the cone of
   * an open violation changes, it is closed and a new one opened at that
   * sample. A violation still open at the last sample is closed at mission
   * end.
   */
  applyXAzimuthSweep(
    samples: readonly RouteSample[],
    schedule: readonly SatelliteAssignment[],
    resolveLongitude: LongitudeResolver,
    refuelingWindows: readonly ResolvedRefuelingWindow[] = [],
    waypoints: readonly RouteWaypoint[] = [],
  ): void {
    if (schedule.length === 0) return;

    let cursor = 0;
    let open: XAzimuthViolation | null = null;
    const unresolved = new Set<string>();

    for (const sample of samples) {
      const time = sample.timestamp.getTime();
      while (cursor + 1 < schedule.length && schedule[cursor + 1].start.getTime() <= time) {
        cursor++;
      }

      const satelliteId = schedule[cursor].satelliteId;
      const satelliteLon = resolveLongitude(satelliteId);
      if (satelliteLon === null) {
        if (!unresolved.has(satelliteId)) {
          unresolved.add(satelliteId);
          console.warn(`[RULES] No longitude for X satellite ${satelliteId}; skipping its samples`);
        }
        continue;
      }

      const refuelingMode = refuelingWindows.some(
        (window) => time >= window.start.getTime() && time <= window.end.getTime(),
      );
      const range = refuelingMode
        ? this.constraints.refuelingAzimuthRange
        : this.constraints.normalAzimuthRange;
      const evaluation = evaluateXAzimuth(
        sample,
        satelliteLon,
        range,
        this.constraints.minimumElevationDeg,
      );

      if (open !== null && evaluation.violation === null) {
        this.closeXViolation(sample.timestamp, open, "X azimuth clear");
        open = null;
        continue;
      }
      if (evaluation.violation === null) continue;

      const violation: XAzimuthViolation = {
        satelliteId,
        reason: evaluation.violation,
        evaluation,
        refuelingMode,
        isKuAftConflict: evaluation.violation === "azimuth" && !refuelingMode,
      };
      if (open !== null) {
        if (sameViolation(open, violation)) continue;
        this.closeXViolation(sample.timestamp, open, "X azimuth violation changed");
      }
      open = violation;
      this.push({
        timestamp: sample.timestamp,
        detail: { kind: "x_azimuth", edge: "open", violation },
        transport: "X",
        severity: "warning",
        reason: describeViolation(violation),
        satelliteId,
        metadata: {
          absoluteAzimuthDeg: evaluation.absoluteAzimuthDeg,
          relativeAzimuthDeg: evaluation.relativeAzimuthDeg,
          elevationDeg: evaluation.elevationDeg,
          violationReason: evaluation.violation,
          refuelingMode,
          isKuAftConflict: violation.isKuAftConflict,
          nearestWaypoint: nearestWaypointName(waypoints, sample.latitude, sample.longitude),
        },
      });
    }

    if (open !== null) {
      this.closeXViolation(this.missionEnd, open, "X azimuth clear (mission end)");
    }
  }

  private closeXViolation(at: Date, open: XAzimuthViolation, reason: string): void {
    this.push({
      timestamp: at,
      detail: { kind: "x_azimuth", edge: "close" },
      transport: "X",
      severity: "info",
      reason,
      satelliteId: open.satelliteId,
    });
  }

  // ─── Output ─────────────────────────────────────────────────────────────

  sortedEvents(): MissionEvent[] {
    return [...this.events].sort(compareEvents);
  }

  /**
   * One advisory per X transition: each start pairs with the next unused end
   * for the same satellite. Starts without an end produce nothing.
   */
  generateAdvisories(): TimelineAdvisory[] {
    const transitions = this.sortedEvents().filter(
      (event) => event.detail.kind === "x_transition",
    );
    const consumed = new Set<number>();
    const advisories: TimelineAdvisory[] = [];

    transitions.forEach((start, i) => {
      if (start.detail.edge !== "open") return;

      let endIndex = -1;
      for (let j = i + 1; j < transitions.length; j++) {
        const candidate = transitions[j];
        if (
          !consumed.has(j) &&
          candidate.detail.edge === "close" &&
          candidate.satelliteId === start.satelliteId
        ) {
          endIndex = j;
          break;
        }
      }
      if (endIndex === -1) return;
      consumed.add(endIndex);

      const end = transitions[endIndex];
      const target = start.satelliteId ?? "unknown";
      advisories.push({
        id: `x-transition-${advisories.length + 1}`,
        timestamp: start.timestamp,
        transport: "X",
        severity: "warning",
        message: `Disable X from ${formatZulu(start.timestamp)} to ${formatZulu(end.timestamp)} during transition to ${target}`,
        metadata: {
          satelliteId: target,
          start: start.timestamp.toISOString(),
          end: end.timestamp.toISOString(),
        },
      });
    });

    return advisories;
  }
}
