/**
 * ETA Calculator — distance, speed smoothing and per-POI arrival estimates.
 */

import { ETA_CONFIG } from "../config";
import { METERS_PER_NM } from "../physics/constants";
import { haversineDistance } from "../physics/geometry";
import type { ETAMode, FlightPhase, POI, Route } from "../schemas";
import {
  anticipatedRouteETA,
  estimatedRouteETA,
  type RouteETAResult,
} from "./route-eta";

/** ETA sentinel for a stationary aircraft or an elapsed planned time. */
export const ETA_UNKNOWN = -1;

export interface ETACalculatorOptions {
  defaultSpeedKnots?: number;
  smoothingDurationSeconds?: number;
  passedThresholdMeters?: number;
  now?: () => Date;
}

export interface POIMetrics {
  poiId: string;
  poiName: string;
  category: string | null;
  distanceMeters: number;
  /** Seconds to arrival, or ETA_UNKNOWN. */
  etaSeconds: number;
  etaType: ETAMode;
  /** ETA came from the route rather than straight-line distance. */
  routeAware: boolean;
  passed: boolean;
  flightPhase: FlightPhase | null;
  isPreDeparture: boolean;
}

export interface ETACalculatorStats {
  smoothedSpeedKnots: number;
  speedSamples: number;
  smoothingWindowSeconds: number;
  windowCoverageSeconds: number;
  passedPoiCount: number;
  lastUpdate: Date | null;
}

interface SpeedSample {
  speedKnots: number;
  atMs: number;
}

export class ETACalculator {
  readonly defaultSpeedKnots: number;
  readonly smoothingDurationSeconds: number;
  readonly passedThresholdMeters: number;
  private readonly now: () => Date;

  private speedHistory: SpeedSample[] = [];
  private smoothedSpeed: number;
  private lastUpdate: Date | null = null;
  private readonly passedPOIs = new Set<string>();

  constructor(options: ETACalculatorOptions = {}) {
    this.defaultSpeedKnots = options.defaultSpeedKnots ?? ETA_CONFIG.defaultSpeedKnots;
    this.smoothingDurationSeconds =
      options.smoothingDurationSeconds ?? ETA_CONFIG.smoothingDurationSeconds;
    this.passedThresholdMeters = options.passedThresholdMeters ?? ETA_CONFIG.passedThresholdMeters;
    this.now = options.now ?? (() => new Date());
    this.smoothedSpeed = this.defaultSpeedKnots;
  }

  // ─── Speed ──────────────────────────────────────────────────────────────

  /** Add a speed reading; the smoothed speed averages the trailing window. */
  updateSpeed(speedKnots: number, at: Date = this.now()): void {
    if (!Number.isFinite(speedKnots)) {
      console.warn(`[ETA] Ignoring non-finite speed ${speedKnots}`);
      return;
    }

    const atMs = at.getTime();
    this.speedHistory.push({ speedKnots, atMs });
    const cutoff = atMs - this.smoothingDurationSeconds * 1000;
    this.speedHistory = this.speedHistory.filter((sample) => sample.atMs >= cutoff);

    this.smoothedSpeed =
      this.speedHistory.length === 0
        ? this.defaultSpeedKnots
        : this.speedHistory.reduce((sum, sample) => sum + sample.speedKnots, 0) /
          this.speedHistory.length;
    this.lastUpdate = at;
  }

  getSmoothedSpeed(): number {
    return this.smoothedSpeed;
  }

  // ─── Distance & Time ────────────────────────────────────────────────────

  calculateDistance(lat1: number, lon1: number, lat2: number, lon2: number): number {
    return haversineDistance(lat1, lon1, lat2, lon2);
  }

  /**
   * Seconds to cover a distance at a speed (smoothed speed when omitted).
   * Returns ETA_UNKNOWN when the speed is effectively stationary.
   */
  calculateETA(distanceMeters: number, speedKnots?: number): number {
    const speed = speedKnots ?? this.smoothedSpeed;
    if (!(speed >= ETA_CONFIG.minimumSpeedKnots)) return ETA_UNKNOWN;
    return (distanceMeters / METERS_PER_NM / speed) * 3600;
  }

  // ─── POI Metrics ────────────────────────────────────────────────────────

  private routeAwareETA(
    poi: POI,
    route: Route,
    currentLat: number,
    currentLon: number,
    speedKnots: number,
    etaMode: ETAMode,
  ): RouteETAResult {
    try {
      return etaMode === "anticipated"
        ? anticipatedRouteETA(route, poi, this.now())
        : estimatedRouteETA(route, poi, currentLat, currentLon, speedKnots);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.warn(`[ETA] Route ETA failed for ${poi.name}: ${message}`);
      return { kind: "unavailable", reason: message };
    }
  }

  /**
   * Distance, ETA and passed state for each POI, keyed by POI id.
   *
   * POIs on the active route get a route-aware ETA in the given mode; any
   * other POI, or a route-aware failure, falls back to straight-line
   * distance. Without `speedKnots` the smoothed speed is used; it holds the
   * configured default speed until the first reading and after `reset()`.
   */
  calculatePOIMetrics(
    currentLat: number,
    currentLon: number,
    pois: readonly POI[],
    speedKnots: number | null = null,
    activeRoute: Route | null = null,
    etaMode: ETAMode = "estimated",
    flightPhase: FlightPhase | null = null,
  ): Record<string, POIMetrics> {
    const speed = speedKnots ?? this.smoothedSpeed;
    const metrics: Record<string, POIMetrics> = {};

    for (const poi of pois) {
      const distanceMeters = haversineDistance(currentLat, currentLon, poi.latitude, poi.longitude);
      if (distanceMeters < this.passedThresholdMeters) {
        this.passedPOIs.add(poi.id);
      }

      let etaSeconds: number | null = null;
      if (activeRoute !== null && poi.routeId === activeRoute.id) {
        const result = this.routeAwareETA(poi, activeRoute, currentLat, currentLon, speed, etaMode);
        if (result.kind === "estimate") etaSeconds = result.seconds;
        else if (result.kind === "elapsed") etaSeconds = ETA_UNKNOWN;
      }
      const routeAware = etaSeconds !== null;

      metrics[poi.id] = {
        poiId: poi.id,
        poiName: poi.name,
        category: poi.category,
        distanceMeters,
        etaSeconds: etaSeconds ?? this.calculateETA(distanceMeters, speed),
        etaType: etaMode,
        routeAware,
        passed: this.passedPOIs.has(poi.id),
        flightPhase,
        isPreDeparture: flightPhase === "pre_departure",
      };
    }

    return metrics;
  }

  // ─── State ──────────────────────────────────────────────────────────────

  getPassedPOIs(): Set<string> {
    return new Set(this.passedPOIs);
  }

  clearPassedPOIs(): void {
    this.passedPOIs.clear();
  }

  getStats(): ETACalculatorStats {
    const first = this.speedHistory[0];
    const last = this.speedHistory[this.speedHistory.length - 1];
    return {
      smoothedSpeedKnots: this.smoothedSpeed,
      speedSamples: this.speedHistory.length,
      smoothingWindowSeconds: this.smoothingDurationSeconds,
      windowCoverageSeconds:
        first !== undefined && last !== undefined ? (last.atMs - first.atMs) / 1000 : 0,
      passedPoiCount: this.passedPOIs.size,
      lastUpdate: this.lastUpdate === null ? null : new Date(this.lastUpdate),
    };
  }

  reset(): void {
    this.speedHistory = [];
    this.smoothedSpeed = this.defaultSpeedKnots;
    this.passedPOIs.clear();
    this.lastUpdate = null;
  }
}
