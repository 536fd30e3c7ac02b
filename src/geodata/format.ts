import fs from "fs";
import path from "path";

// GEO! file layout, all integers little-endian, no padding:
//
//   bytes[4]  magic "GEO!"
//   uint32    polygon count
//   then per polygon: uint32 vertex count, then vertex count × (float64 lng, float64 lat)

export const MAGIC = Buffer.from("GEO!", "ascii");
export const HEADER_BYTES = 8;
export const COUNT_BYTES = 4;
export const COORDINATE_BYTES = 16;

const UINT32_MAX = 0xffffffff;

/** [longitude, latitude] */
export type Coordinate = [lng: number, lat: number];

/** Ordered vertex list; the closing edge from last to first is implicit. */
export type Polygon = Coordinate[];

/** Byte extent of one polygon record. Exact in float64 for every uint32 count. */
export function polygonRecordBytes(vertexCount: number): number {
  return COUNT_BYTES + vertexCount * COORDINATE_BYTES;
}

export function encodeGeoData(polygons: Polygon[]): Buffer {
  if (polygons.length > UINT32_MAX) {
    throw new RangeError(`Too many polygons: ${polygons.length}`);
  }

  const payloadBytes = polygons.reduce((sum, poly) => sum + polygonRecordBytes(poly.length), 0);
  const out = Buffer.alloc(HEADER_BYTES + payloadBytes);

  MAGIC.copy(out, 0);
  out.writeUInt32LE(polygons.length, 4);

  let offset = HEADER_BYTES;
  for (const poly of polygons) {
    out.writeUInt32LE(poly.length, offset);
    offset += COUNT_BYTES;
    for (const [lng, lat] of poly) {
      out.writeDoubleLE(lng, offset);
      out.writeDoubleLE(lat, offset + 8);
      offset += COORDINATE_BYTES;
    }
  }

  return out;
}

/**
 * Writes to a temp file beside the target and renames it into place, so readers
 * see either the old file or the complete new one.
 */
export function writeGeoDataFile(filePath: string, polygons: Polygon[]): number {
  const bytes = encodeGeoData(polygons);
  fs.mkdirSync(path.dirname(filePath), { recursive: true });

  const tmpPath = `${filePath}.${process.pid}.tmp`;
  try {
    fs.writeFileSync(tmpPath, bytes);
    fs.renameSync(tmpPath, filePath);
  } catch (err) {
    fs.rmSync(tmpPath, { force: true });
    throw err;
  }
  return bytes.length;
}
