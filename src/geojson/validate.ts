/**
 * @module geojson/validate
 *
 * Structural validation of GeoJSON features before upload or tiling.
 *
 * The schema is deliberately shallow: it requires the keys a feature must
 * have and checks their basic JSON types, nothing more. A second pass
 * ({@link geometryIssues}) looks at coordinate shapes and only reports what
 * it finds through the logger.
 */

import { z } from 'zod';
import { InvalidGeoJSON } from '../errors.js';
import { consoleLogger, type Logger } from '../logger.js';

const geometrySchema = z
  .object({
    type: z.string(),
    coordinates: z.array(z.unknown()),
  })
  .passthrough();

/** Shallow GeoJSON feature schema. Unknown keys are kept. */
export const featureSchema = z
  .object({
    type: z.string(),
    geometry: geometrySchema,
    properties: z.record(z.unknown()),
  })
  .passthrough();

/** A value that passed {@link featureSchema}. */
export type ValidFeature = z.infer<typeof featureSchema>;

/** Geometry part of a {@link ValidFeature}. */
export type ValidGeometry = ValidFeature['geometry'];

/**
 * Validate a single feature.
 *
 * @param index - Position of the feature in its batch, used in messages.
 * @param feature - Value purporting to be a GeoJSON Feature.
 * @param logger - Receives the error on failure and geometry warnings.
 * @returns The parsed feature.
 * @throws {InvalidGeoJSON} When the value fails the schema.
 */
export function validateFeature(
  index: number,
  feature: unknown,
  logger: Logger = consoleLogger,
): ValidFeature {
  const result = featureSchema.safeParse(feature);

  if (!result.success) {
    const error = new InvalidGeoJSON(index, feature, { cause: result.error });
    logger.error(`${error.message} ${formatIssues(result.error)}`);
    throw error;
  }

  const issues = geometryIssues(result.data.geometry);
  if (issues.length > 0) {
    logger.warn(`Error in feature number ${index}: ${issues.join('; ')}`);
  }

  return result.data;
}

/**
 * Lazily validate a sequence of features.
 *
 * Each item is checked as it is pulled; iteration stops with
 * {@link InvalidGeoJSON} at the first failure.
 */
export function* validateStream(
  features: Iterable<unknown>,
  logger: Logger = consoleLogger,
): Generator<ValidFeature, void, undefined> {
  let index = 0;
  for (const feature of features) {
    yield validateFeature(index++, feature, logger);
  }
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => `${issue.path.length > 0 ? issue.path.join('.') : '<root>'}: ${issue.message}`)
    .join('; ');
}

// ─── Geometry checks ────────────────────────────────────────────────────────

function isPosition(value: unknown): boolean {
  return (
    Array.isArray(value) &&
    value.length >= 2 &&
    value.every(n => typeof n === 'number' && Number.isFinite(n))
  );
}

function lineIssues(line: unknown, label: string): string[] {
  if (!Array.isArray(line) || !line.every(isPosition)) {
    return [`${label} must be an array of positions`];
  }
  if (line.length < 2) {
    return [`${label} must have at least 2 positions`];
  }
  return [];
}

function ringIssues(ring: unknown, label: string): string[] {
  if (!Array.isArray(ring) || !ring.every(isPosition)) {
    return [`${label} must be an array of positions`];
  }
  if (ring.length < 4) {
    return [`${label} must have at least 4 positions`];
  }
  const first: unknown[] = ring[0];
  const last: unknown[] = ring[ring.length - 1];
  if (first.length !== last.length || first.some((n, i) => n !== last[i])) {
    return [`${label} must be closed`];
  }
  return [];
}

function polygonIssues(rings: unknown, label: string): string[] {
  if (!Array.isArray(rings) || rings.length === 0) {
    return [`${label} must have at least one ring`];
  }
  return rings.flatMap((ring, i) => ringIssues(ring, `${label} ring ${i}`));
}

/**
 * Describe what is wrong with a geometry's coordinates, if anything.
 *
 * Positions must be finite numeric pairs, LineStrings need two positions,
 * polygon rings four and must be closed.
 */
export function geometryIssues(geometry: ValidGeometry): string[] {
  const { type, coordinates } = geometry;

  switch (type) {
    case 'Point':
      return isPosition(coordinates) ? [] : ['Point must be a single position'];
    case 'MultiPoint':
      return coordinates.every(isPosition) ? [] : ['MultiPoint must be an array of positions'];
    case 'LineString':
      return lineIssues(coordinates, 'LineString');
    case 'MultiLineString':
      return coordinates.flatMap((line, i) => lineIssues(line, `MultiLineString part ${i}`));
    case 'Polygon':
      return polygonIssues(coordinates, 'Polygon');
    case 'MultiPolygon':
      return coordinates.flatMap((rings, i) => polygonIssues(rings, `MultiPolygon part ${i}`));
    default:
      return [`"${type}" is not a GeoJSON geometry type with coordinates`];
  }
}
