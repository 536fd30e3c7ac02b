import fs from "fs";
import os from "os";
import path from "path";
import { afterAll, beforeAll, describe, expect, it, vi } from "vitest";
import { GeoDataStore } from "../geoDataStore.js";
import type { Polygon } from "../geodata/format.js";

const square: Polygon = [
  [0, 0],
  [0, 1],
  [1, 1],
  [1, 0],
];

describe("GeoDataStore", () => {
  let dir: string;

  beforeAll(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "geodata-store-"));
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    vi.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterAll(() => {
    vi.restoreAllMocks();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("starts empty and reports a missing file", () => {
    const store = new GeoDataStore(path.join(dir, "missing.geo"));
    expect(store.reload()?.kind).toBe("IOError");
    expect(store.stats()).toEqual({ path: path.join(dir, "missing.geo"), polygons: 0, bytes: 0, loadedAt: null });
    expect(store.contains(0.5, 0.5)).toBe(false);
  });

  it("rebuilds, serves and keeps the last good set on a failed reload", () => {
    const filePath = path.join(dir, "regions.geo");
    const store = new GeoDataStore(filePath);

    expect(store.rebuild([square])).toBeNull();
    expect(store.stats().polygons).toBe(1);
    expect(store.stats().bytes).toBe(68);
    expect(store.contains(0.5, 0.5)).toBe(true);

    fs.writeFileSync(filePath, "not a geo file");
    expect(store.reload()?.kind).toBe("BadMagic");
    expect(store.contains(0.5, 0.5)).toBe(true);

    store.close();
    expect(store.contains(0.5, 0.5)).toBe(false);
    expect(store.stats().loadedAt).toBeNull();
  });

  it("returns an IOError when the file cannot be written", () => {
    const blocker = path.join(dir, "blocker");
    fs.writeFileSync(blocker, "a regular file");
    const store = new GeoDataStore(path.join(blocker, "regions.geo"));

    const error = store.rebuild([square]);
    expect(error?.kind).toBe("IOError");
    expect(error?.message.startsWith(`Cannot write ${path.join(blocker, "regions.geo")}: `)).toBe(true);
    expect(store.stats().polygons).toBe(0);
  });
});
