/**
 * @module tiles
 *
 * Tile coordinate and tile area utilities.
 *
 * Provides pure-math conversions from slippy map tile coordinates (z/x/y)
 * to WGS84 edges, and the spherical-Earth area of the latitude/longitude
 * cell a tile spans. The area estimator sums {@link tileArea} over a tile
 * cover to price a tileset before it is built.
 *
 * All functions in this module are deterministic and side-effect-free.
 */

import type { BBox, Tile } from './types.js';

const PI = Math.PI;

/** Mean Earth radius in kilometres (IUGG). */
export const EARTH_RADIUS_KM = 6371.0088;

// ─── Tile ID ────────────────────────────────────────────────────────────────

/**
 * Encode tile coordinates into a unique numeric identifier.
 *
 * The tile's position within its zoom level is packed alongside the zoom
 * value into a single integer, the same scheme geojson-vt uses. Unique and
 * exact for every zoom up to {@link MAX_TILE_ZOOM}.
 *
 * @example
 * ```typescript
 * tileId(0, 0, 0); // => 0
 * tileId(2, 3, 1); // => 226
 * ```
 */
export function tileId(z: number, x: number, y: number): number {
  return (((1 << z) * y + x) * 32) + z;
}

/** Highest zoom for which {@link tileId} stays within `Number.MAX_SAFE_INTEGER`. */
export const MAX_TILE_ZOOM = 24;

// ─── Tile → WGS84 ───────────────────────────────────────────────────────────

/**
 * Longitude in degrees of a tile column's west edge.
 *
 * Pass `x + 1` for the east edge.
 */
export function tileLng(x: number, z: number): number {
  return (x / 2 ** z) * 360 - 180;
}

/**
 * Latitude in degrees of a tile row's north edge.
 *
 * Inverse Mercator, written with the hyperbolic sine identity
 * `sinh(n) = (e^n - e^-n) / 2`. Pass `y + 1` for the south edge.
 */
export function tileLat(y: number, z: number): number {
  const n = PI - (2 * PI * y) / 2 ** z;
  return (180 / PI) * Math.atan(0.5 * (Math.exp(n) - Math.exp(-n)));
}

/**
 * Convert slippy map tile coordinates to a WGS84 bounding box.
 *
 * `y = 0` is the north edge of the projection. Longitudes fall in
 * `[-180, 180]` and latitudes within the Web Mercator limits (~±85.051).
 *
 * @example
 * ```typescript
 * const bbox = tileBBox(1, 0, 0);
 * // bbox.minX === -180, bbox.maxX === 0
 * // bbox.minY ≈ 0,     bbox.maxY ≈ 85.051
 * ```
 */
export function tileBBox(z: number, x: number, y: number): BBox {
  return {
    minX: tileLng(x, z),
    minY: tileLat(y + 1, z),
    maxX: tileLng(x + 1, z),
    maxY: tileLat(y, z),
  };
}

/** The four tiles one zoom level below `tile`, in row-major order. */
export function tileChildren([x, y, z]: Tile): [Tile, Tile, Tile, Tile] {
  return [
    [2 * x, 2 * y, z + 1],
    [2 * x + 1, 2 * y, z + 1],
    [2 * x, 2 * y + 1, z + 1],
    [2 * x + 1, 2 * y + 1, z + 1],
  ];
}

// ─── Area ───────────────────────────────────────────────────────────────────

function toRadians(deg: number): number {
  return (deg * PI) / 180;
}

/**
 * Surface area in km² of the latitude/longitude cell covered by a tile.
 *
 * Uses the graticule-cell formula on a sphere of radius
 * {@link EARTH_RADIUS_KM}:
 *
 * ```text
 * area = (π / rad(180)) · R² · |sin(top) − sin(bottom)| · |left − right|
 * ```
 *
 * with all four edges in radians. The leading factor is 1; it is kept so
 * the expression reads as the degree-to-radian scaling of the longitude span.
 * Well defined at the antimeridian and near the poles for every valid tile
 * address.
 */
export function tileArea([x, y, z]: Tile): number {
  const left = toRadians(tileLng(x, z));
  const right = toRadians(tileLng(x + 1, z));
  const top = toRadians(tileLat(y, z));
  const bottom = toRadians(tileLat(y + 1, z));

  return (
    (PI / toRadians(180)) *
    EARTH_RADIUS_KM ** 2 *
    Math.abs(Math.sin(top) - Math.sin(bottom)) *
    Math.abs(left - right)
  );
}

/**
 * Total area in km² of a batch of tiles.
 *
 * Every tile contributes its own {@link tileArea}; overlapping addresses are
 * counted once per occurrence, so pass a deduplicated cover.
 */
export function tilesArea(tiles: Iterable<Tile>): number {
  let total = 0;
  for (const tile of tiles) {
    total += tileArea(tile);
  }
  return total;
}
