/**
 * Flight State Manager — flight phase and ETA mode with automatic departure
 * and arrival detection.
 *
 * One instance is constructed at startup and passed to whoever needs it.
 * Telemetry ticks mutate it; request handlers read frozen snapshots from
 * `getStatus()`. All mutation runs through a single critical section, and
 * listeners are notified only after that section has closed.
 */

import { FLIGHT_STATE_THRESHOLDS, type FlightStateThresholds } from "../config";
import { formatZodIssues } from "../errors";
import { routeHasTimingData } from "../route/projector";
import {
  TelemetryTickSchema,
  type ETAMode,
  type FlightPhase,
  type Route,
} from "../schemas";

// ─── Types ──────────────────────────────────────────────────────────────────

export interface FlightStatus {
  phase: FlightPhase;
  etaMode: ETAMode;
  activeRouteId: string | null;
  activeRouteName: string | null;
  hasTimingData: boolean;
  scheduledDepartureTime: Date | null;
  scheduledArrivalTime: Date | null;
  departureTime: Date | null;
  arrivalTime: Date | null;
  speedPersistenceSeconds: number;
  arrivalDwellSeconds: number;
  lastDepartureCheckAt: Date | null;
  lastArrivalCheckAt: Date | null;
  /** Until scheduled departure; null once departed or when unscheduled. */
  timeUntilDepartureSeconds: number | null;
  timeSinceDepartureSeconds: number | null;
}

export interface PhaseChange {
  previous: FlightPhase;
  current: FlightPhase;
  reason: string;
  at: Date;
}

export interface ETAModeChange {
  previous: ETAMode;
  current: ETAMode;
  at: Date;
}

export type PhaseChangeListener = (change: PhaseChange) => void;
export type ETAModeChangeListener = (change: ETAModeChange) => void;

export interface FlightStateManagerOptions {
  thresholds?: Partial<FlightStateThresholds>;
  now?: () => Date;
}

interface FlightState {
  phase: FlightPhase;
  activeRouteId: string | null;
  activeRouteName: string | null;
  hasTimingData: boolean;
  scheduledDepartureTime: Date | null;
  scheduledArrivalTime: Date | null;
  departureTime: Date | null;
  arrivalTime: Date | null;
  aboveSpeedSince: Date | null;
  withinDistanceSince: Date | null;
  speedPersistenceSeconds: number;
  arrivalDwellSeconds: number;
  lastDepartureCheckAt: Date | null;
  lastArrivalCheckAt: Date | null;
}

/** ETA mode is derived from phase, never set directly. */
export function etaModeForPhase(phase: FlightPhase): ETAMode {
  return phase === "pre_departure" ? "anticipated" : "estimated";
}

function initialState(): FlightState {
  return {
    phase: "pre_departure",
    activeRouteId: null,
    activeRouteName: null,
    hasTimingData: false,
    scheduledDepartureTime: null,
    scheduledArrivalTime: null,
    departureTime: null,
    arrivalTime: null,
    aboveSpeedSince: null,
    withinDistanceSince: null,
    speedPersistenceSeconds: 0,
    arrivalDwellSeconds: 0,
    lastDepartureCheckAt: null,
    lastArrivalCheckAt: null,
  };
}

function copyDate(value: Date | null): Date | null {
  return value === null ? null : new Date(value);
}

function clearTimers(state: FlightState): void {
  state.aboveSpeedSince = null;
  state.withinDistanceSince = null;
  state.speedPersistenceSeconds = 0;
  state.arrivalDwellSeconds = 0;
}

// ─── Manager ────────────────────────────────────────────────────────────────

export class FlightStateManager {
  readonly thresholds: Readonly<FlightStateThresholds>;
  private readonly now: () => Date;
  private readonly state: FlightState = initialState();
  private locked = false;
  private pending: PhaseChange[] = [];
  private readonly phaseListeners = new Set<PhaseChangeListener>();
  private readonly modeListeners = new Set<ETAModeChangeListener>();

  constructor(options: FlightStateManagerOptions = {}) {
    this.thresholds = Object.freeze({ ...FLIGHT_STATE_THRESHOLDS, ...options.thresholds });
    this.now = options.now ?? (() => new Date());
  }

  // ─── Critical Section ───────────────────────────────────────────────────

  private mutate<T>(fn: (state: FlightState) => T): T {
    if (this.locked) {
      throw new Error("FlightStateManager mutated from inside its own critical section");
    }
    this.locked = true;
    try {
      return fn(this.state);
    } finally {
      this.locked = false;
      this.flush();
    }
  }

  private flush(): void {
    const changes = this.pending;
    this.pending = [];
    for (const change of changes) {
      this.notify(this.phaseListeners, change);
      const previous = etaModeForPhase(change.previous);
      const current = etaModeForPhase(change.current);
      if (previous !== current) {
        this.notify(this.modeListeners, { previous, current, at: change.at });
      }
    }
  }

  private notify<C>(listeners: Set<(change: C) => void>, change: C): void {
    for (const listener of listeners) {
      try {
        listener(change);
      } catch (error) {
        console.error("[FLIGHT STATE] Listener failed:", error);
      }
    }
  }

  /** Move to `next`, stamping departure/arrival and queueing notifications. */
  private applyPhase(state: FlightState, next: FlightPhase, reason: string, at: Date): boolean {
    if (state.phase === next) return false;

    const previous = state.phase;
    state.phase = next;
    if (next === "pre_departure") {
      state.departureTime = null;
      state.arrivalTime = null;
    } else if (next === "in_flight") {
      if (state.departureTime === null) state.departureTime = at;
      state.arrivalTime = null;
    } else {
      if (state.arrivalTime === null) state.arrivalTime = at;
    }
    clearTimers(state);

    console.log(`[FLIGHT STATE] ${previous} → ${next} (${reason})`);
    this.pending.push({ previous, current: next, reason, at });
    return true;
  }

  // ─── Reads ──────────────────────────────────────────────────────────────

  /** Frozen snapshot; departure countdowns are computed against now. */
  getStatus(): Readonly<FlightStatus> {
    const state = this.state;
    const nowMs = this.now().getTime();

    let timeUntilDepartureSeconds: number | null = null;
    let timeSinceDepartureSeconds: number | null = null;
    if (state.departureTime !== null) {
      timeSinceDepartureSeconds = (nowMs - state.departureTime.getTime()) / 1000;
    } else if (state.scheduledDepartureTime !== null) {
      timeUntilDepartureSeconds = (state.scheduledDepartureTime.getTime() - nowMs) / 1000;
    }

    return Object.freeze({
      phase: state.phase,
      etaMode: etaModeForPhase(state.phase),
      activeRouteId: state.activeRouteId,
      activeRouteName: state.activeRouteName,
      hasTimingData: state.hasTimingData,
      scheduledDepartureTime: copyDate(state.scheduledDepartureTime),
      scheduledArrivalTime: copyDate(state.scheduledArrivalTime),
      departureTime: copyDate(state.departureTime),
      arrivalTime: copyDate(state.arrivalTime),
      speedPersistenceSeconds: state.speedPersistenceSeconds,
      arrivalDwellSeconds: state.arrivalDwellSeconds,
      lastDepartureCheckAt: copyDate(state.lastDepartureCheckAt),
      lastArrivalCheckAt: copyDate(state.lastArrivalCheckAt),
      timeUntilDepartureSeconds,
      timeSinceDepartureSeconds,
    });
  }

  // ─── Detection ──────────────────────────────────────────────────────────

  /**
   * Departure fires once speed has stayed above threshold for the
   * persistence window. Only active before departure.
   */
  checkDeparture(speedKnots: number, at: Date = this.now()): boolean {
    if (!Number.isFinite(speedKnots)) {
      console.warn(`[FLIGHT STATE] Ignoring departure check with speed ${speedKnots}`);
      return false;
    }

    return this.mutate((state) => {
      state.lastDepartureCheckAt = at;
      if (state.phase !== "pre_departure") return false;

      if (speedKnots <= this.thresholds.departureSpeedKnots) {
        state.aboveSpeedSince = null;
        state.speedPersistenceSeconds = 0;
        return false;
      }

      const since = state.aboveSpeedSince ?? at;
      state.aboveSpeedSince = since;
      state.speedPersistenceSeconds = (at.getTime() - since.getTime()) / 1000;
      if (state.speedPersistenceSeconds < this.thresholds.departurePersistenceSeconds) {
        return false;
      }
      return this.applyPhase(state, "in_flight", "departure detected", at);
    });
  }

  /**
   * Arrival fires once the aircraft has stayed within the arrival radius
   * for the dwell window. Only active in flight.
   */
  checkArrival(distanceMeters: number, speedKnots: number, at: Date = this.now()): boolean {
    if (!Number.isFinite(distanceMeters) || !Number.isFinite(speedKnots)) {
      console.warn(
        `[FLIGHT STATE] Ignoring arrival check with distance ${distanceMeters}, speed ${speedKnots}`,
      );
      return false;
    }

    return this.mutate((state) => {
      state.lastArrivalCheckAt = at;
      if (state.phase !== "in_flight") return false;

      if (distanceMeters > this.thresholds.arrivalDistanceMeters) {
        state.withinDistanceSince = null;
        state.arrivalDwellSeconds = 0;
        return false;
      }

      const since = state.withinDistanceSince ?? at;
      state.withinDistanceSince = since;
      state.arrivalDwellSeconds = (at.getTime() - since.getTime()) / 1000;
      if (state.arrivalDwellSeconds < this.thresholds.arrivalDwellSeconds) {
        return false;
      }
      return this.applyPhase(state, "post_arrival", `arrival detected at ${speedKnots.toFixed(0)} kn`, at);
    });
  }

  /**
   * Validate and apply one telemetry tick. Malformed ticks are logged and
   * skipped; state is left untouched.
   */
  ingestTelemetry(tick: unknown): boolean {
    const parsed = TelemetryTickSchema.safeParse(tick);
    if (!parsed.success) {
      console.warn(`[FLIGHT STATE] Rejected telemetry tick: ${formatZodIssues(parsed.error)}`);
      return false;
    }

    const { speedKnots, distanceToDestinationMeters, timestamp } = parsed.data;
    const at = timestamp ?? this.now();
    switch (this.state.phase) {
      case "pre_departure":
        return this.checkDeparture(speedKnots, at);
      case "in_flight":
        return distanceToDestinationMeters === null
          ? false
          : this.checkArrival(distanceToDestinationMeters, speedKnots, at);
      case "post_arrival":
        return false;
    }
  }

  // ─── Manual Control ─────────────────────────────────────────────────────

  /** Move to any phase. Returns false when already there. */
  transitionPhase(phase: FlightPhase, reason: string = "manual transition"): boolean {
    const at = this.now();
    return this.mutate((state) => this.applyPhase(state, phase, reason, at));
  }

  triggerDeparture(at: Date = this.now(), reason: string = "manual departure"): boolean {
    return this.mutate((state) => this.applyPhase(state, "in_flight", reason, at));
  }

  triggerArrival(at: Date = this.now(), reason: string = "manual arrival"): boolean {
    return this.mutate((state) => this.applyPhase(state, "post_arrival", reason, at));
  }

  /** Back to pre-departure with all times and timers cleared. */
  reset(reason: string = "manual reset"): void {
    const at = this.now();
    this.mutate((state) => {
      this.applyPhase(state, "pre_departure", reason, at);
      state.departureTime = null;
      state.arrivalTime = null;
      state.lastDepartureCheckAt = null;
      state.lastArrivalCheckAt = null;
      clearTimers(state);
    });
  }

  // ─── Route Context ──────────────────────────────────────────────────────

  /**
   * Record the active route. A change of route identity resets the flight
   * unless `autoReset` is false (startup synchronization).
   */
  updateRouteContext(
    route: Route | null,
    autoReset: boolean = true,
    reason: string = "active route changed",
  ): void {
    const at = this.now();
    this.mutate((state) => {
      const routeId = route?.id ?? null;
      const changed = routeId !== state.activeRouteId;

      state.activeRouteId = routeId;
      state.activeRouteName = route === null ? null : route.name || route.id;
      state.hasTimingData = route === null ? false : routeHasTimingData(route);
      state.scheduledDepartureTime = copyDate(route?.timingProfile?.departureTime ?? null);
      state.scheduledArrivalTime = copyDate(route?.timingProfile?.arrivalTime ?? null);

      if (changed && autoReset) {
        this.applyPhase(state, "pre_departure", reason, at);
        state.departureTime = null;
        state.arrivalTime = null;
        clearTimers(state);
      }
    });
  }

  /** Forget the active route without touching phase. */
  clearRouteContext(): void {
    this.mutate((state) => {
      state.activeRouteId = null;
      state.activeRouteName = null;
      state.hasTimingData = false;
      state.scheduledDepartureTime = null;
      state.scheduledArrivalTime = null;
    });
  }

  // ─── Listeners ──────────────────────────────────────────────────────────

  onPhaseChange(listener: PhaseChangeListener): () => void {
    this.phaseListeners.add(listener);
    return () => {
      this.phaseListeners.delete(listener);
    };
  }

  onEtaModeChange(listener: ETAModeChangeListener): () => void {
    this.modeListeners.add(listener);
    return () => {
      this.modeListeners.delete(listener);
    };
  }
}
