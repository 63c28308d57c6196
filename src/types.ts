/**
 * @module types
 *
 * Shared type definitions for tileset-client.
 *
 * - **Tile / BBox**: tile addresses and their geographic bounds
 * - **AreaEstimate**: result of the area estimator
 * - **Remote API shapes**: the subset of the tiling service's JSON responses
 *   the client reads fields from
 */

// ─── Tiles ──────────────────────────────────────────────────────────────────

/**
 * A slippy map tile address as an `[x, y, z]` triple.
 *
 * `x` is the column (0 at 180° W), `y` the row (0 at the north edge) and
 * `z` the zoom level, with `0 <= x, y < 2^z`.
 */
export type Tile = [x: number, y: number, z: number];

/**
 * Axis-aligned bounding box.
 *
 * Used for WGS84 tile extents (longitude/latitude).
 */
export interface BBox {
  /** Western longitude. */
  minX: number;
  /** Southern latitude. */
  minY: number;
  /** Eastern longitude. */
  maxX: number;
  /** Northern latitude. */
  maxY: number;
}

// ─── Area estimation ────────────────────────────────────────────────────────

/**
 * Precision tiers understood by the area estimator. Any other string is
 * accepted and treated as the fallback tier.
 */
export type Precision = '10m' | '1m' | '30cm' | '1cm';

/**
 * JSON-serializable result of an area estimate.
 *
 * Field names follow the remote service's estimate payload.
 */
export interface AreaEstimate {
  /** Estimated area, rounded to a whole km², as a decimal string. */
  km2: string;
  /** The precision the estimate was requested at, echoed verbatim. */
  precision: string;
  /** Where the pricing for this estimate is documented. */
  pricing_docs: string;
}

// ─── Remote API ─────────────────────────────────────────────────────────────

/** Condensed status of a tileset, taken from the last job the service lists. */
export interface TilesetStatus {
  id: string;
  latestJob: string;
  status: string;
}

/** One page of the tileset activity report. */
export interface ActivityPage {
  data: unknown;
  /** Pagination key for the next page, when the service reports one. */
  next: string | undefined;
}

/** Any JSON object returned by the service. */
export type JsonObject = Record<string, unknown>;
