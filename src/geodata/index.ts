export { MAGIC, HEADER_BYTES, encodeGeoData, writeGeoDataFile } from "./format.js";
export type { Coordinate, Polygon } from "./format.js";
export { GeoDataError } from "./errors.js";
export type { GeoDataErrorKind, Result } from "./errors.js";
export { loadGeoData, loadGeoDataOrThrow, parseGeoData, validatePayload } from "./loader.js";
export type { LoadResult } from "./loader.js";
export { PolygonSet, contains } from "./polygonSet.js";
export { COORDINATE_LIMIT } from "./hitTest.js";
