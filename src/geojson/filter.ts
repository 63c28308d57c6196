/**
 * @module geojson/filter
 *
 * Reduces a stream of features to the ones a tile cover can be computed
 * for.
 *
 * Multi-geometries are exploded into one feature per part, so everything
 * downstream only sees `Point`, `LineString` and `Polygon`. Features with no
 * geometry, a `GeometryCollection`, an unknown type or degenerate
 * coordinates are dropped; a degenerate part of a multi-geometry is dropped
 * on its own while the remaining parts are kept.
 */

import { feature } from '@turf/helpers';
import type { Feature, GeoJsonProperties, LineString, Point, Polygon, Position } from 'geojson';
import { z } from 'zod';

/** Geometry kinds handed to the tile cover. */
export type TileableGeometry = Point | LineString | Polygon;

/** A single-part feature accepted for tiling. */
export type TileableFeature = Feature<TileableGeometry, GeoJsonProperties>;

const position = z.tuple([z.number().finite(), z.number().finite()]).rest(z.number());
const line = z.array(position).min(2);
const ring = z.array(position).min(4);
const polygon = z.array(ring).min(1);

const envelope = z.object({
  geometry: z.object({
    type: z.string(),
    coordinates: z.unknown(),
  }),
  properties: z.record(z.unknown()).nullish(),
});

function parts<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, coordinates: unknown): T[] {
  if (!Array.isArray(coordinates)) return [];
  const kept: T[] = [];
  for (const part of coordinates) {
    const result = schema.safeParse(part);
    if (result.success) kept.push(result.data);
  }
  return kept;
}

const toPoint = (coordinates: Position): Point => ({ type: 'Point', coordinates });
const toLineString = (coordinates: Position[]): LineString => ({ type: 'LineString', coordinates });
const toPolygon = (coordinates: Position[][]): Polygon => ({ type: 'Polygon', coordinates });

/**
 * Split a geometry into its tileable single parts.
 *
 * Returns an empty array for anything that cannot be tiled.
 */
export function explodeGeometry(type: string, coordinates: unknown): TileableGeometry[] {
  switch (type) {
    case 'Point':
      return parts(position, [coordinates]).map(toPoint);
    case 'MultiPoint':
      return parts(position, coordinates).map(toPoint);
    case 'LineString':
      return parts(line, [coordinates]).map(toLineString);
    case 'MultiLineString':
      return parts(line, coordinates).map(toLineString);
    case 'Polygon':
      return parts(polygon, [coordinates]).map(toPolygon);
    case 'MultiPolygon':
      return parts(polygon, coordinates).map(toPolygon);
    default:
      return [];
  }
}

/**
 * Keep the features that can be tiled, in order, as a finite array.
 *
 * Exploded parts inherit the parent feature's properties.
 *
 * @example
 * ```typescript
 * filterFeatures([
 *   { type: 'Feature', properties: {}, geometry: { type: 'MultiPoint', coordinates: [[0, 0], [1, 1]] } },
 *   { type: 'Feature', properties: {}, geometry: null },
 * ]);
 * // => two Point features
 * ```
 */
export function filterFeatures(features: Iterable<unknown>): TileableFeature[] {
  const kept: TileableFeature[] = [];

  for (const item of features) {
    const parsed = envelope.safeParse(item);
    if (!parsed.success) continue;

    const { geometry, properties } = parsed.data;
    for (const part of explodeGeometry(geometry.type, geometry.coordinates)) {
      kept.push(feature(part, properties ?? {}));
    }
  }

  return kept;
}
