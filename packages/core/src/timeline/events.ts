/**
 * Mission event model.
 *
 * Every event names the transport it concerns and carries a `detail` tagged
 * on `kind`. An `open` edge starts a condition, a `close` edge ends it.
 */

import type { EventSeverity, Transport } from "../schemas";
import type { XAzimuthEvaluation, XViolationReason } from "../physics/geometry";

export type EventEdge = "open" | "close";

/** One X azimuth/elevation violation as recorded at its onset. */
export interface XAzimuthViolation {
  satelliteId: string;
  reason: XViolationReason;
  evaluation: XAzimuthEvaluation;
  /** Sample fell inside a refueling window (refueling cone applied). */
  refuelingMode: boolean;
  /**
   * Aft-cone azimuth conflict outside refueling, where the X and Ku
   * antennas share sky. Expected geometry rather than a fault.
   */
  isKuAftConflict: boolean;
}

export type MissionEventDetail =
  | { kind: "x_azimuth"; edge: "open"; violation: XAzimuthViolation }
  | { kind: "x_azimuth"; edge: "close" }
  | { kind: "x_transition"; edge: EventEdge }
  | { kind: "ka_coverage"; edge: EventEdge }
  | { kind: "ka_swap"; edge: EventEdge; transitionId: string }
  | { kind: "manual_outage"; edge: EventEdge; outageId: string }
  | { kind: "takeoff_buffer"; edge: EventEdge }
  | { kind: "landing_buffer"; edge: EventEdge }
  | { kind: "refueling_window"; edge: EventEdge; windowId: string };

export type MissionEventKind = MissionEventDetail["kind"];

export type EventMetadata = Record<string, string | number | boolean | null>;

export interface MissionEvent {
  /** Insertion order; breaks timestamp ties. */
  readonly sequence: number;
  readonly timestamp: Date;
  readonly detail: MissionEventDetail;
  /** Transport the event is filed under. */
  readonly transport: Transport;
  /** Transport whose availability it changes. */
  readonly affectedTransport: Transport;
  readonly severity: EventSeverity;
  readonly reason: string;
  readonly satelliteId: string | null;
  readonly metadata: Readonly<EventMetadata>;
}

export interface TimelineAdvisory {
  id: string;
  timestamp: Date;
  transport: Transport;
  severity: EventSeverity;
  message: string;
  metadata: EventMetadata;
}

/** Stable chronological order. */
export function compareEvents(a: MissionEvent, b: MissionEvent): number {
  return a.timestamp.getTime() - b.timestamp.getTime() || a.sequence - b.sequence;
}
