import type { Polygon } from "./geodata/format.js";

/** Region as stored in DB — polygon is a JSON array of [lng,lat] pairs */
export interface RegionRow {
  id: number;
  name: string;
  polygon: string;
  created_at: number; // epoch ms
}

export interface Region {
  id: number;
  name: string;
  polygon: Polygon;
  createdAt: number;
}

/** Body accepted by POST /regions once validated */
export interface RegionPayload {
  name: string;
  polygon: Polygon;
}

export interface GeoDataStats {
  path: string;
  polygons: number;
  bytes: number;
  loadedAt: number | null; // epoch ms of last successful load
}
