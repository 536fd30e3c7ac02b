import fs from "fs";
import { HEADER_BYTES, MAGIC } from "./format.js";
import { GeoDataError, fail, ok } from "./errors.js";
import type { Result } from "./errors.js";
import { PolygonSet } from "./polygonSet.js";

export { validatePayload } from "./validate.js";

export type LoadResult = Result<PolygonSet>;

function ioError(err: unknown, filePath: string): GeoDataError {
  const reason = err instanceof Error ? err.message : String(err);
  return new GeoDataError("IOError", `Cannot read ${filePath}: ${reason}`, { cause: err });
}

function checkHeader(header: Buffer): Result<number> {
  if (header.length < HEADER_BYTES) {
    return fail(new GeoDataError("TruncatedHeader", `File is ${header.length} bytes, header needs ${HEADER_BYTES}`));
  }
  if (!header.subarray(0, MAGIC.length).equals(MAGIC)) {
    return fail(new GeoDataError("BadMagic", `Bad magic bytes 0x${header.subarray(0, MAGIC.length).toString("hex")}`));
  }
  return ok(header.readUInt32LE(MAGIC.length));
}

/** Parses a complete GEO! file already held in memory. The payload is copied. */
export function parseGeoData(bytes: Uint8Array): LoadResult {
  const file = Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength);

  const header = checkHeader(file.subarray(0, HEADER_BYTES));
  if (!header.ok) return header;

  const polygonCount = header.value;
  if (polygonCount === 0) return ok(PolygonSet.empty());

  return PolygonSet.fromPayload(Buffer.from(file.subarray(HEADER_BYTES)), polygonCount);
}

/**
 * Loads and validates a GEO! file. Without a path the result is an empty set.
 * Never throws for I/O or format problems; the descriptor is always closed.
 */
export function loadGeoData(filePath?: string): LoadResult {
  if (filePath === undefined) return ok(PolygonSet.empty());

  let fd: number;
  try {
    fd = fs.openSync(filePath, "r");
  } catch (err) {
    return fail(ioError(err, filePath));
  }

  try {
    const stat = fs.fstatSync(fd);
    if (!stat.isFile()) {
      return fail(ioError(new Error("not a regular file"), filePath));
    }

    const fileLength = stat.size;
    if (fileLength < HEADER_BYTES) {
      return fail(new GeoDataError("TruncatedHeader", `File is ${fileLength} bytes, header needs ${HEADER_BYTES}`));
    }

    const headerBytes = Buffer.alloc(HEADER_BYTES);
    if (fs.readSync(fd, headerBytes, 0, HEADER_BYTES, 0) !== HEADER_BYTES) {
      return fail(ioError(new Error("short read on header"), filePath));
    }

    const header = checkHeader(headerBytes);
    if (!header.ok) return header;

    const polygonCount = header.value;
    if (polygonCount === 0) return ok(PolygonSet.empty());

    const payloadLength = fileLength - HEADER_BYTES;
    const payload = Buffer.alloc(payloadLength);
    let read = 0;
    while (read < payloadLength) {
      const bytesRead = fs.readSync(fd, payload, read, payloadLength - read, HEADER_BYTES + read);
      if (bytesRead === 0) {
        return fail(ioError(new Error(`short read: ${read} of ${payloadLength} payload bytes`), filePath));
      }
      read += bytesRead;
    }

    return PolygonSet.fromPayload(payload, polygonCount);
  } catch (err) {
    return fail(ioError(err, filePath));
  } finally {
    fs.closeSync(fd);
  }
}

export function loadGeoDataOrThrow(filePath?: string): PolygonSet {
  const result = loadGeoData(filePath);
  if (!result.ok) throw result.error;
  return result.value;
}
