export type GeoDataErrorKind =
  | "IOError"
  | "TruncatedHeader"
  | "BadMagic"
  | "TruncatedPolygonHeader"
  | "TruncatedPolygonBody"
  | "TrailingData";

export interface GeoDataErrorDetails {
  /** Index of the polygon whose record failed validation */
  polygonIndex?: number;
  /** Payload offset (bytes after the 8-byte header) at which the rule failed */
  offset?: number;
  cause?: unknown;
}

export class GeoDataError extends Error {
  readonly kind: GeoDataErrorKind;
  readonly polygonIndex?: number;
  readonly offset?: number;

  constructor(kind: GeoDataErrorKind, message: string, details: GeoDataErrorDetails = {}) {
    super(message, details.cause === undefined ? undefined : { cause: details.cause });
    this.name = "GeoDataError";
    this.kind = kind;
    this.polygonIndex = details.polygonIndex;
    this.offset = details.offset;
  }
}

export type Result<T, E = GeoDataError> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function fail<E>(error: E): Result<never, E> {
  return { ok: false, error };
}
