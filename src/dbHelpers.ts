import type { Db } from "./db.js";
import type { Coordinate, Polygon } from "./geodata/format.js";
import type { Region, RegionPayload, RegionRow } from "./types.js";

function isCoordinate(value: unknown): value is Coordinate {
  return (
    Array.isArray(value) &&
    value.length === 2 &&
    typeof value[0] === "number" &&
    typeof value[1] === "number" &&
    Number.isFinite(value[0]) &&
    Number.isFinite(value[1])
  );
}

export function isPolygon(value: unknown): value is Polygon {
  return Array.isArray(value) && value.every(isCoordinate);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function parseStoredPolygon(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return undefined;
  }
}

// Rows whose polygon column no longer parses are skipped, with a warning, rather than compiled.
function toRegion(row: RegionRow): Region | undefined {
  const polygon = parseStoredPolygon(row.polygon);
  if (!isPolygon(polygon)) {
    console.warn(`Skipping region ${row.id} (${row.name}): stored polygon is not a list of [lng, lat] pairs`);
    return undefined;
  }
  return { id: row.id, name: row.name, polygon, createdAt: row.created_at };
}

export function getRegions(db: Db): Region[] {
  const rows = db.prepare("SELECT id, name, polygon, created_at FROM regions ORDER BY id").all() as RegionRow[];
  return rows.flatMap((row) => toRegion(row) ?? []);
}

export function getRegion(db: Db, id: number): Region | undefined {
  const row = db.prepare("SELECT id, name, polygon, created_at FROM regions WHERE id = ?").get(id) as
    | RegionRow
    | undefined;
  return row ? toRegion(row) : undefined;
}

export function insertRegion(db: Db, name: string, polygon: Polygon, now = Date.now()): number {
  const info = db
    .prepare("INSERT INTO regions (name, polygon, created_at) VALUES (?, ?, ?)")
    .run(name, JSON.stringify(polygon), now);
  return Number(info.lastInsertRowid);
}

export function deleteRegion(db: Db, id: number): boolean {
  return db.prepare("DELETE FROM regions WHERE id = ?").run(id).changes > 0;
}

/** Polygons in id order, ready for encoding. */
export function getRegionPolygons(db: Db): Polygon[] {
  return getRegions(db).map((region) => region.polygon);
}

/**
 * Accepts `{ name, polygon: [[lng, lat], ...] }` or a GeoJSON FeatureCollection
 * whose first feature is a Polygon (outer ring only).
 */
export function parsePolygonPayload(body: unknown): RegionPayload | null {
  if (!isRecord(body)) return null;

  let name = typeof body.name === "string" ? body.name : undefined;
  let polygon: unknown = body.polygon;

  // GeoJSON auto-detection
  if (polygon === undefined && body.type === "FeatureCollection" && Array.isArray(body.features)) {
    const feature: unknown = body.features[0];
    if (!isRecord(feature) || !isRecord(feature.geometry) || feature.geometry.type !== "Polygon") return null;

    const rings = feature.geometry.coordinates;
    if (!Array.isArray(rings)) return null;
    polygon = rings[0];

    if (name === undefined && isRecord(feature.properties) && typeof feature.properties.name === "string") {
      name = feature.properties.name;
    }
  }

  if (!name || !isPolygon(polygon)) return null;
  return { name, polygon };
}
