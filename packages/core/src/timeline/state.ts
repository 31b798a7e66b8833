/**
 * Per-transport availability intervals.
 *
 * Each transport tracks its open conditions in three buckets. Offline
 * conditions come only from manual outages; safety conditions annotate an
 * interval without changing its state.
 */

import type { Transport, TransportState } from "../schemas";
import type { MissionEvent } from "./events";

export interface TransportInterval {
  transport: Transport;
  start: Date;
  end: Date;
  state: TransportState;
  reasons: string[];
  /** Degraded only by the expected X/Ku aft-cone conflict. */
  kuAftConflictOnly: boolean;
}

export type TransportIntervals = Record<Transport, TransportInterval[]>;

/** Build a value for every transport. */
export function perTransport<T>(make: (transport: Transport) => T): Record<Transport, T> {
  return { X: make("X"), Ka: make("Ka"), Ku: make("Ku") };
}

interface Condition {
  reason: string;
  kuAftConflict: boolean;
}

interface DerivedState {
  state: TransportState;
  reasons: string[];
  kuAftConflictOnly: boolean;
}

interface OpenInterval extends DerivedState {
  startMs: number;
  endMs: number | null;
}

class ConditionSet {
  readonly degraded = new Map<string, Condition>();
  readonly offline = new Map<string, Condition>();
  readonly safety = new Map<string, Condition>();

  derive(): DerivedState {
    const offline = [...this.offline.values()];
    const degraded = [...this.degraded.values()];
    const safety = [...this.safety.values()];

    if (offline.length > 0) {
      return {
        state: "offline",
        reasons: uniqueReasons([...offline, ...degraded, ...safety]),
        kuAftConflictOnly: false,
      };
    }
    if (degraded.length > 0) {
      return {
        state: "degraded",
        reasons: uniqueReasons([...degraded, ...safety]),
        kuAftConflictOnly: degraded.every((condition) => condition.kuAftConflict),
      };
    }
    return { state: "available", reasons: uniqueReasons(safety), kuAftConflictOnly: false };
  }

  clear(key: string): void {
    this.degraded.delete(key);
    this.offline.delete(key);
    this.safety.delete(key);
  }
}

function uniqueReasons(conditions: Condition[]): string[] {
  return [...new Set(conditions.map((condition) => condition.reason))];
}

function sameDerived(a: DerivedState, b: DerivedState): boolean {
  return (
    a.state === b.state &&
    a.kuAftConflictOnly === b.kuAftConflictOnly &&
    a.reasons.length === b.reasons.length &&
    a.reasons.every((reason, i) => reason === b.reasons[i])
  );
}

/** Apply one event to a transport's open conditions. */
function applyEvent(conditions: ConditionSet, event: MissionEvent): void {
  const { detail } = event;
  const condition: Condition = { reason: event.reason, kuAftConflict: false };

  switch (detail.kind) {
    case "x_azimuth":
      if (detail.edge === "open") {
        conditions.degraded.set("x_azimuth", {
          reason: event.reason,
          kuAftConflict: detail.violation.isKuAftConflict,
        });
      } else {
        conditions.clear("x_azimuth");
      }
      return;
    case "x_transition": {
      const key = `x_transition:${event.satelliteId ?? "unknown"}`;
      if (detail.edge === "open") conditions.degraded.set(key, condition);
      else conditions.clear(key);
      return;
    }
    case "ka_coverage":
      if (detail.edge === "open") conditions.degraded.set("ka_no_coverage", condition);
      else conditions.clear("ka_no_coverage");
      return;
    case "ka_swap": {
      const key = `ka_swap:${detail.transitionId}`;
      if (detail.edge === "open") conditions.degraded.set(key, condition);
      else conditions.clear(key);
      return;
    }
    case "manual_outage": {
      const key = `outage:${detail.outageId}`;
      if (detail.edge === "open") conditions.offline.set(key, condition);
      else conditions.clear(key);
      return;
    }
    case "takeoff_buffer":
    case "landing_buffer": {
      const key = detail.kind;
      if (detail.edge === "close") {
        conditions.clear(key);
      } else if (event.severity === "safety") {
        conditions.safety.set(key, condition);
      } else {
        conditions.degraded.set(key, condition);
      }
      return;
    }
    case "refueling_window":
      return;
  }
}

/**
 * Sweep sorted events into a gapless partition of [missionStart, missionEnd]
 * per transport. Event times are clamped into the window; events at or after
 * mission end are ignored.
 */
export function generateTransportIntervals(
  events: readonly MissionEvent[],
  missionStart: Date,
  missionEnd: Date,
): TransportIntervals {
  const startMs = missionStart.getTime();
  const endMs = missionEnd.getTime();

  const conditions = perTransport(() => new ConditionSet());
  const timelines = perTransport((): OpenInterval[] => [
    { startMs, endMs: null, state: "available", reasons: [], kuAftConflictOnly: false },
  ]);

  for (const event of events) {
    const atMs = Math.min(Math.max(event.timestamp.getTime(), startMs), endMs);
    if (atMs >= endMs) break;

    const transport = event.affectedTransport;
    applyEvent(conditions[transport], event);
    const next = conditions[transport].derive();
    const intervals = timelines[transport];
    const current = intervals[intervals.length - 1];
    if (sameDerived(current, next)) continue;

    if (current.startMs === atMs) {
      intervals.pop();
      const previous = intervals[intervals.length - 1];
      if (previous !== undefined && sameDerived(previous, next)) {
        previous.endMs = null;
        continue;
      }
    } else {
      current.endMs = atMs;
    }
    intervals.push({ ...next, startMs: atMs, endMs: null });
  }

  return perTransport((transport) =>
    timelines[transport].map((interval) => ({
      transport,
      start: new Date(interval.startMs),
      end: new Date(interval.endMs ?? endMs),
      state: interval.state,
      reasons: interval.reasons,
      kuAftConflictOnly: interval.kuAftConflictOnly,
    })),
  );
}
