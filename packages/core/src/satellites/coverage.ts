/**
 * Coverage Sampler — which Ka satellites cover a point.
 *
 * Footprints come from a GeoJSON FeatureCollection keyed by the
 * `satellite_id` feature property. A footprint may be split into several
 * rings where it crosses the antimeridian; a satellite covers a point when
 * any of its rings contains it.
 */

import { readFileSync } from "node:fs";
import { ConfigurationError, CoverageDataError } from "../errors";
import { loadEngineConfig } from "../config";
import {
  CoverageFeatureCollectionSchema,
  CoverageFeatureSchema,
} from "../schemas";

// ─── Types ──────────────────────────────────────────────────────────────────

/** Closed or open ring of [lon, lat] vertices. */
export type Ring = ReadonlyArray<readonly [number, number]>;

/** Anything carrying a position, a time and optionally a covering set. */
export interface CoveragePoint {
  timestamp: Date;
  latitude: number;
  longitude: number;
  coverage?: readonly string[];
}

export type CoverageEventKind = "entry" | "exit";

export interface CoverageEvent {
  kind: CoverageEventKind;
  satelliteId: string;
  timestamp: Date;
  latitude: number;
  longitude: number;
}

// ─── Point In Polygon ───────────────────────────────────────────────────────

/**
 * Even-odd ray casting. A ray is cast east from the point and the number of
 * edge crossings decides containment.
 */
export function pointInRing(lat: number, lon: number, ring: Ring): boolean {
  let inside = false;
  const n = ring.length;
  for (let i = 0, j = n - 1; i < n; j = i++) {
    const [xi, yi] = ring[i];
    const [xj, yj] = ring[j];
    const crosses = yi > lat !== yj > lat;
    if (crosses && lon < ((xj - xi) * (lat - yi)) / (yj - yi) + xi) {
      inside = !inside;
    }
  }
  return inside;
}

// ─── Dataset Parsing ────────────────────────────────────────────────────────

/**
 * Parse a FeatureCollection into rings per satellite.
 *
 * Throws CoverageDataError when the document is not a FeatureCollection.
 * Individual features that do not validate are skipped.
 */
export function parseCoverageDataset(data: unknown): Map<string, Ring[]> {
  const collection = CoverageFeatureCollectionSchema.safeParse(data);
  if (!collection.success) {
    throw new CoverageDataError("Coverage dataset is not a GeoJSON FeatureCollection", {
      cause: collection.error,
    });
  }

  const rings = new Map<string, Ring[]>();
  collection.data.features.forEach((raw, index) => {
    const feature = CoverageFeatureSchema.safeParse(raw);
    if (!feature.success) {
      console.warn(`[COVERAGE] Skipping feature ${index}: ${feature.error.issues[0]?.message ?? "invalid"}`);
      return;
    }

    const { geometry, properties } = feature.data;
    const polygons = geometry.type === "Polygon" ? [geometry.coordinates] : geometry.coordinates;
    const satelliteRings = rings.get(properties.satellite_id) ?? [];
    for (const polygon of polygons) {
      for (const ring of polygon) {
        satelliteRings.push(ring.map(([lon, lat]) => [lon, lat] as const));
      }
    }
    rings.set(properties.satellite_id, satelliteRings);
  });

  return rings;
}

// ─── Sampler ────────────────────────────────────────────────────────────────

export class CoverageSampler {
  private readonly rings: ReadonlyMap<string, readonly Ring[]>;

  constructor(rings: ReadonlyMap<string, readonly Ring[]>) {
    this.rings = rings;
  }

  /** Build from GeoJSON; malformed data yields an empty sampler. */
  static fromGeoJSON(data: unknown): CoverageSampler {
    try {
      return new CoverageSampler(parseCoverageDataset(data));
    } catch (error) {
      if (error instanceof CoverageDataError) {
        console.warn(`[COVERAGE] ${error.message}; continuing without coverage`);
        return new CoverageSampler(new Map());
      }
      throw error;
    }
  }

  get satelliteIds(): string[] {
    return [...this.rings.keys()].sort();
  }

  get isEmpty(): boolean {
    return this.rings.size === 0;
  }

  /** Satellites covering the point, alphabetically. */
  coverageAt(lat: number, lon: number): string[] {
    const covering: string[] = [];
    for (const [satelliteId, rings] of this.rings) {
      if (rings.some((ring) => pointInRing(lat, lon, ring))) {
        covering.push(satelliteId);
      }
    }
    return covering.sort();
  }

  /** Copies of the samples with their coverage set filled in. */
  annotateSamples<T extends CoveragePoint>(
    samples: readonly T[],
  ): Array<T & { coverage: string[] }> {
    return samples.map((sample) => ({
      ...sample,
      coverage: this.coverageAt(sample.latitude, sample.longitude),
    }));
  }

  /**
   * Entry/exit events wherever the covering set changes between samples.
   * The first sample is compared against an empty set.
   */
  sampleRouteCoverage(samples: readonly CoveragePoint[]): CoverageEvent[] {
    const events: CoverageEvent[] = [];
    let previous = new Set<string>();

    for (const sample of samples) {
      const current = new Set(
        sample.coverage ?? this.coverageAt(sample.latitude, sample.longitude),
      );
      const at = {
        timestamp: sample.timestamp,
        latitude: sample.latitude,
        longitude: sample.longitude,
      };

      for (const satelliteId of [...current].sort()) {
        if (!previous.has(satelliteId)) {
          events.push({ kind: "entry", satelliteId, ...at });
        }
      }
      for (const satelliteId of [...previous].sort()) {
        if (!current.has(satelliteId)) {
          events.push({ kind: "exit", satelliteId, ...at });
        }
      }
      previous = current;
    }

    return events;
  }
}

// ─── Loading ────────────────────────────────────────────────────────────────

/** Read a GeoJSON file; unreadable or malformed files yield an empty sampler. */
export function loadCoverageSampler(path: string): CoverageSampler {
  let data: unknown;
  try {
    data = JSON.parse(readFileSync(path, "utf8"));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.warn(`[COVERAGE] Could not read ${path}: ${message}; continuing without coverage`);
    return new CoverageSampler(new Map());
  }
  return CoverageSampler.fromGeoJSON(data);
}

let cachedSampler: CoverageSampler | null | undefined;

function configuredCoveragePath(env: NodeJS.ProcessEnv): string | null | undefined {
  try {
    return loadEngineConfig(env).coverageGeoJsonPath;
  } catch (error) {
    if (error instanceof ConfigurationError) {
      console.warn(`[COVERAGE] ${error.message}; continuing without coverage`);
      return undefined;
    }
    throw error;
  }
}

/**
 * The process-wide sampler for the configured dataset, loaded on first use.
 * Returns null when no dataset path is configured, and an empty sampler when
 * the engine environment does not validate.
 */
export function getDefaultCoverageSampler(
  env: NodeJS.ProcessEnv = process.env,
): CoverageSampler | null {
  if (cachedSampler === undefined) {
    const path = configuredCoveragePath(env);
    if (path === undefined) {
      cachedSampler = new CoverageSampler(new Map());
    } else {
      cachedSampler = path === null ? null : loadCoverageSampler(path);
    }
  }
  return cachedSampler;
}

export function resetCoverageCache(): void {
  cachedSampler = undefined;
}
