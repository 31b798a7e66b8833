/**
 * Satellite catalog — id → transport and fixed sub-satellite longitude.
 */

import { z } from "zod";
import {
  SatelliteDefinitionSchema,
  type SatelliteDefinition,
  type Transport,
} from "../schemas";

const DEFAULT_SATELLITES: SatelliteDefinition[] = [
  // X longitude is set per mission by the planner.
  { id: "X-1", transport: "X", longitude: null, slot: null },
  { id: "AOR", transport: "Ka", longitude: -30, slot: "Atlantic" },
  { id: "POR", transport: "Ka", longitude: 154, slot: "Pacific" },
  { id: "IOR", transport: "Ka", longitude: 60, slot: "Indian" },
  { id: "Ku-LEO", transport: "Ku", longitude: null, slot: null },
];

export class SatelliteCatalog {
  private readonly satellites = new Map<string, SatelliteDefinition>();

  constructor(definitions: Iterable<SatelliteDefinition> = []) {
    for (const definition of definitions) {
      this.add(definition);
    }
  }

  /** Validate raw definitions (e.g. parsed JSON) into a catalog. */
  static fromDefinitions(data: unknown): SatelliteCatalog {
    return new SatelliteCatalog(z.array(SatelliteDefinitionSchema).parse(data));
  }

  add(definition: SatelliteDefinition): void {
    this.satellites.set(definition.id, { ...definition });
  }

  get(id: string): SatelliteDefinition | undefined {
    return this.satellites.get(id);
  }

  has(id: string): boolean {
    return this.satellites.has(id);
  }

  list(): SatelliteDefinition[] {
    return [...this.satellites.values()];
  }

  listByTransport(transport: Transport): SatelliteDefinition[] {
    return this.list().filter((satellite) => satellite.transport === transport);
  }

  /** Fixed longitude, or null when unknown or not geostationary. */
  longitudeOf(id: string): number | null {
    return this.satellites.get(id)?.longitude ?? null;
  }
}

export function createDefaultSatelliteCatalog(): SatelliteCatalog {
  return new SatelliteCatalog(DEFAULT_SATELLITES);
}
