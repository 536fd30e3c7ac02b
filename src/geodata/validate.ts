import { COUNT_BYTES, polygonRecordBytes } from "./format.js";
import { GeoDataError } from "./errors.js";

/**
 * Walks the polygon records and checks every declared vertex count against the
 * payload length. Nothing is decoded beyond the counts.
 */
export function validatePayload(payload: Buffer, polygonCount: number): GeoDataError | null {
  const payloadLength = payload.length;
  let offset = 0;

  for (let n = 0; n < polygonCount; n++) {
    if (offset + COUNT_BYTES > payloadLength) {
      return new GeoDataError(
        "TruncatedPolygonHeader",
        `Polygon ${n}: vertex count at offset ${offset} runs past payload end (${payloadLength})`,
        { polygonIndex: n, offset }
      );
    }

    const vertexCount = payload.readUInt32LE(offset);
    const recordBytes = polygonRecordBytes(vertexCount);
    if (offset + recordBytes > payloadLength) {
      return new GeoDataError(
        "TruncatedPolygonBody",
        `Polygon ${n}: ${vertexCount} vertices at offset ${offset} need ${recordBytes} bytes, ${payloadLength - offset} left`,
        { polygonIndex: n, offset }
      );
    }

    offset += recordBytes;
  }

  if (offset !== payloadLength) {
    return new GeoDataError(
      "TrailingData",
      `${payloadLength - offset} unexpected bytes after polygon ${polygonCount - 1}`,
      { offset }
    );
  }

  return null;
}
