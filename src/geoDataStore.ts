import { writeGeoDataFile } from "./geodata/format.js";
import type { Polygon } from "./geodata/format.js";
import { GeoDataError } from "./geodata/errors.js";
import { loadGeoData } from "./geodata/loader.js";
import { PolygonSet, contains } from "./geodata/polygonSet.js";
import type { GeoDataStats } from "./types.js";

/**
 * Owns the currently served PolygonSet. A new set replaces the old one only
 * after it loaded cleanly; the old set is destroyed on swap.
 */
export class GeoDataStore {
  private current = PolygonSet.empty();
  private loadedAt: number | null = null;

  constructor(readonly path: string) {}

  reload(): GeoDataError | null {
    const result = loadGeoData(this.path);
    if (!result.ok) {
      console.warn(`[geodata] load of ${this.path} failed (${result.error.kind}): ${result.error.message}`);
      return result.error;
    }

    const previous = this.current;
    this.current = result.value;
    this.loadedAt = Date.now();
    previous.destroy();

    console.log(`[geodata] loaded ${this.current.count} polygons (${this.current.byteLength} bytes) from ${this.path}`);
    return null;
  }

  /** Write failures come back as an IOError; the served set and file stay as they were. */
  rebuild(polygons: Polygon[]): GeoDataError | null {
    let bytes: number;
    try {
      bytes = writeGeoDataFile(this.path, polygons);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      console.error(`[geodata] write of ${this.path} failed: ${reason}`);
      return new GeoDataError("IOError", `Cannot write ${this.path}: ${reason}`, { cause: err });
    }
    console.log(`[geodata] wrote ${polygons.length} polygons (${bytes} bytes) to ${this.path}`);
    return this.reload();
  }

  contains(lng: number, lat: number): boolean {
    return contains(this.current, lng, lat);
  }

  stats(): GeoDataStats {
    return {
      path: this.path,
      polygons: this.current.count,
      bytes: this.current.byteLength,
      loadedAt: this.loadedAt,
    };
  }

  close(): void {
    this.current.destroy();
    this.loadedAt = null;
  }
}
