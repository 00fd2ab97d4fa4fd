import worldAtlas from "world-atlas/countries-110m.json";
import { feature } from "topojson-client";
import type { Feature, Geometry } from "geojson";
import type { GeometryCollection, Topology } from "topojson-specification";

export interface RegionProperties {
  name: string;
}

export type WorldRegion = Feature<Geometry, RegionProperties> & { id: string };

type WorldTopology = Topology<{ countries: GeometryCollection<RegionProperties> }>;

function isWorldTopology(value: unknown): value is WorldTopology {
  if (typeof value !== "object" || value === null) return false;
  if (!("type" in value) || value.type !== "Topology") return false;
  if (!("arcs" in value) || !Array.isArray(value.arcs)) return false;
  if (!("objects" in value) || typeof value.objects !== "object" || value.objects === null) return false;
  const { objects } = value;
  return (
    "countries" in objects &&
    typeof objects.countries === "object" &&
    objects.countries !== null &&
    "type" in objects.countries &&
    objects.countries.type === "GeometryCollection"
  );
}

let regions: WorldRegion[] | null = null;

/** Geometria de paises (ids ISO 3166-1 numericos) para el choropleth. */
export function getWorldRegions(): WorldRegion[] {
  if (regions) return regions;

  const topology: unknown = worldAtlas;
  if (!isWorldTopology(topology)) {
    throw new Error("world-atlas/countries-110m.json no es una topologia de paises");
  }

  // Features sin id (territorios en disputa) no se pueden colorear
  const result: WorldRegion[] = [];
  for (const f of feature(topology, topology.objects.countries).features) {
    if (f.id === undefined) continue;
    result.push({ ...f, id: String(f.id) });
  }
  regions = result;
  return result;
}
