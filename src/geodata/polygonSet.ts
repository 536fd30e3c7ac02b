import { COORDINATE_BYTES, COUNT_BYTES, polygonRecordBytes } from "./format.js";
import type { Polygon } from "./format.js";
import { fail, ok } from "./errors.js";
import type { Result } from "./errors.js";
import { hitTest, withinCoordinateLimit } from "./hitTest.js";
import { validatePayload } from "./validate.js";

const EMPTY = Buffer.alloc(0);

/**
 * Immutable set of polygons over a single owned payload buffer (everything after
 * the 8-byte file header). Records are decoded lazily at query time.
 *
 * Every set is either empty or built from a payload that passed `validatePayload`,
 * so queries never read out of bounds.
 */
export class PolygonSet {
  private payload: Buffer;
  private polygonCount: number;

  private constructor(payload: Buffer, count: number) {
    this.payload = payload;
    this.polygonCount = count;
  }

  /** Takes ownership of `payload` once its records check out against `count`. */
  static fromPayload(payload: Buffer, count: number): Result<PolygonSet> {
    const invalid = validatePayload(payload, count);
    if (invalid) return fail(invalid);
    return ok(new PolygonSet(payload, count));
  }

  static empty(): PolygonSet {
    return new PolygonSet(EMPTY, 0);
  }

  get count(): number {
    return this.polygonCount;
  }

  /** Bytes held by the set: the file size minus the header, or 0 for an empty set. */
  get byteLength(): number {
    return this.payload.length;
  }

  /** Missing coordinates are treated as out of range. */
  contains(lng?: number, lat?: number): boolean {
    if (lng === undefined || lat === undefined) return false;
    return contains(this, lng, lat);
  }

  /** Raw hit test without the coordinate bound. */
  hitTest(lng: number, lat: number): boolean {
    return hitTest(this.payload, this.polygonCount, lng, lat);
  }

  vertexCounts(): number[] {
    const counts: number[] = [];
    let offset = 0;
    for (let n = 0; n < this.polygonCount; n++) {
      const vertexCount = this.payload.readUInt32LE(offset);
      counts.push(vertexCount);
      offset += polygonRecordBytes(vertexCount);
    }
    return counts;
  }

  *polygons(): Generator<Polygon> {
    let offset = 0;
    for (let n = 0; n < this.polygonCount; n++) {
      const vertexCount = this.payload.readUInt32LE(offset);
      const poly: Polygon = [];
      for (let i = 0; i < vertexCount; i++) {
        const at = offset + COUNT_BYTES + i * COORDINATE_BYTES;
        poly.push([this.payload.readDoubleLE(at), this.payload.readDoubleLE(at + 8)]);
      }
      yield poly;
      offset += polygonRecordBytes(vertexCount);
    }
  }

  /** Drops the buffer. Safe to call more than once. */
  destroy(): void {
    this.payload = EMPTY;
    this.polygonCount = 0;
  }
}

/** True iff (lng, lat) lies inside at least one polygon of the set. */
export function contains(set: PolygonSet, lng: number, lat: number): boolean {
  if (!withinCoordinateLimit(lng, lat)) return false;
  return set.hitTest(lng, lat);
}
