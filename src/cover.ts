/**
 * @module cover
 *
 * Tile cover ("burn") of a batch of features at a single zoom level.
 *
 * Rasterization is delegated to `@mapbox/tile-cover`, which returns the
 * tiles each geometry touches (points and lines) or fills (polygons). The
 * per-feature covers are merged into one set of distinct addresses, so
 * overlapping or repeated features do not count twice.
 *
 * Positions are clamped just inside the Web Mercator extent first: a
 * longitude of 180 would wrap to column 0 and a latitude of ±90 has no tile
 * row.
 */

import tileCover from '@mapbox/tile-cover';
import type { Position } from 'geojson';
import type { TileableFeature, TileableGeometry } from './geojson/filter.js';
import { MAX_TILE_ZOOM, tileId } from './tiles.js';
import type { Tile } from './types.js';

/** Northern edge of tile row 0. */
export const MAX_MERCATOR_LAT = 85.0511287798066;

const EPSILON = 1e-10;
const LNG_LIMIT = 180 - EPSILON;
const LAT_LIMIT = MAX_MERCATOR_LAT - EPSILON;

function clamp(value: number, limit: number): number {
  return Math.min(limit, Math.max(-limit, value));
}

function clampPosition([lng, lat, ...rest]: Position): Position {
  return [clamp(lng, LNG_LIMIT), clamp(lat, LAT_LIMIT), ...rest];
}

/** Copy of `geometry` with every position inside the tile grid. */
export function clampGeometry(geometry: TileableGeometry): TileableGeometry {
  switch (geometry.type) {
    case 'Point':
      return { type: 'Point', coordinates: clampPosition(geometry.coordinates) };
    case 'LineString':
      return { type: 'LineString', coordinates: geometry.coordinates.map(clampPosition) };
    case 'Polygon':
      return { type: 'Polygon', coordinates: geometry.coordinates.map(ring => ring.map(clampPosition)) };
  }
}

function compareTiles(a: Tile, b: Tile): number {
  return a[2] - b[2] || a[1] - b[1] || a[0] - b[0];
}

/**
 * Compute the distinct tiles at `zoom` covering every feature.
 *
 * @param features - Single-part features, as produced by `filterFeatures`.
 * @param zoom - Integer zoom level in `[0, MAX_TILE_ZOOM]`.
 * @returns Distinct tiles sorted by zoom, then row, then column.
 * @throws {RangeError} If `zoom` is not an integer in range.
 */
export function burn(features: readonly TileableFeature[], zoom: number): Tile[] {
  if (!Number.isInteger(zoom) || zoom < 0 || zoom > MAX_TILE_ZOOM) {
    throw new RangeError(`Zoom must be an integer between 0 and ${MAX_TILE_ZOOM}, got ${zoom}`);
  }

  const limits = { min_zoom: zoom, max_zoom: zoom };
  const cover = new Map<number, Tile>();

  for (const { geometry } of features) {
    for (const [x, y, z] of tileCover.tiles(clampGeometry(geometry), limits)) {
      const id = tileId(z, x, y);
      if (!cover.has(id)) cover.set(id, [x, y, z]);
    }
  }

  return [...cover.values()].sort(compareTiles);
}
