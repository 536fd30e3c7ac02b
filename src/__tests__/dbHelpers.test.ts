import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { openDatabase } from "../db.js";
import type { Db } from "../db.js";
import {
  deleteRegion,
  getRegion,
  getRegionPolygons,
  getRegions,
  insertRegion,
  isPolygon,
  parsePolygonPayload,
} from "../dbHelpers.js";
import type { Polygon } from "../geodata/format.js";

const square: Polygon = [
  [0, 0],
  [0, 1],
  [1, 1],
  [1, 0],
];

describe("region helpers", () => {
  let db: Db;

  beforeEach(() => {
    db = openDatabase(":memory:");
  });

  afterEach(() => {
    db.close();
  });

  it("stores and reads back regions in id order", () => {
    const first = insertRegion(db, "home", square, 1_000);
    const second = insertRegion(db, "empty", [], 2_000);

    expect(getRegions(db)).toEqual([
      { id: first, name: "home", polygon: square, createdAt: 1_000 },
      { id: second, name: "empty", polygon: [], createdAt: 2_000 },
    ]);
    expect(getRegionPolygons(db)).toEqual([square, []]);
  });

  it("looks up a single region", () => {
    const id = insertRegion(db, "home", square, 1_000);
    expect(getRegion(db, id)?.name).toBe("home");
    expect(getRegion(db, id + 1)).toBeUndefined();
  });

  it("skips stored polygons that no longer parse, with a warning", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const insertRaw = db.prepare("INSERT INTO regions (name, polygon, created_at) VALUES (?, ?, 0)");
    const good = insertRegion(db, "home", square, 1_000);
    const broken = Number(insertRaw.run("broken", "not json").lastInsertRowid);
    const short = Number(insertRaw.run("short", "[[0]]").lastInsertRowid);

    expect(getRegionPolygons(db)).toEqual([square]);
    expect(getRegions(db).map((r) => r.id)).toEqual([good]);
    expect(getRegion(db, broken)).toBeUndefined();
    expect(warn).toHaveBeenCalledWith(
      `Skipping region ${short} (short): stored polygon is not a list of [lng, lat] pairs`
    );
    warn.mockRestore();
  });

  it("deletes regions", () => {
    const id = insertRegion(db, "home", square);
    expect(deleteRegion(db, id)).toBe(true);
    expect(deleteRegion(db, id)).toBe(false);
    expect(getRegions(db)).toEqual([]);
  });
});

describe("isPolygon()", () => {
  it("accepts arrays of finite [lng, lat] pairs", () => {
    expect(isPolygon(square)).toBe(true);
    expect(isPolygon([])).toBe(true);
  });

  it("rejects anything else", () => {
    expect(isPolygon([[0, 0, 0]])).toBe(false);
    expect(isPolygon([["0", 0]])).toBe(false);
    expect(isPolygon([[Infinity, 0]])).toBe(false);
    expect(isPolygon({ 0: [0, 0] })).toBe(false);
  });
});

describe("parsePolygonPayload()", () => {
  it("accepts a plain name and polygon", () => {
    expect(parsePolygonPayload({ name: "home", polygon: square })).toEqual({ name: "home", polygon: square });
  });

  it("accepts a GeoJSON FeatureCollection", () => {
    const ring: Polygon = [...square, [0, 0]];
    const body = {
      type: "FeatureCollection",
      features: [{ type: "Feature", properties: { name: "from-props" }, geometry: { type: "Polygon", coordinates: [ring] } }],
    };

    expect(parsePolygonPayload(body)).toEqual({ name: "from-props", polygon: ring });
    expect(parsePolygonPayload({ ...body, name: "explicit" })).toEqual({ name: "explicit", polygon: ring });
  });

  it("rejects invalid payloads", () => {
    expect(parsePolygonPayload(null)).toBeNull();
    expect(parsePolygonPayload({ polygon: square })).toBeNull();
    expect(parsePolygonPayload({ name: "", polygon: square })).toBeNull();
    expect(parsePolygonPayload({ name: "x", polygon: "nope" })).toBeNull();
    expect(
      parsePolygonPayload({
        name: "x",
        type: "FeatureCollection",
        features: [{ geometry: { type: "Point", coordinates: [0, 0] } }],
      })
    ).toBeNull();
  });
});
