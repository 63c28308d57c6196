/**
 * @module area
 *
 * Estimates the area a tileset's sources will be billed for.
 *
 * The estimate is the summed geodesic area of the tile cover of the input
 * features at the zoom implied by the requested precision:
 *
 * 1. **Normalize**: a single feature becomes a one-element batch.
 * 2. **Gate**: the restricted `1cm` tier and the fine-precision flag must
 *    agree, otherwise {@link PrecisionError}.
 * 3. **Validate**: each feature against the shallow schema (skippable).
 * 4. **Filter**: keep tileable single-part features, as a finite array.
 * 5. **Cover**: distinct tiles at the tier's zoom.
 * 6. **Sum**: tile areas, rounded to a whole km².
 *
 * Any failure in steps 3–4 surfaces as one {@link FeatureParsingError}
 * with the original error as `cause`.
 */

import { burn } from './cover.js';
import { FeatureParsingError, PrecisionError } from './errors.js';
import { filterFeatures, type TileableFeature } from './geojson/filter.js';
import { loadFeatures, validatePath } from './geojson/load.js';
import { validateStream } from './geojson/validate.js';
import { consoleLogger, type Logger } from './logger.js';
import { isFinePrecision, zoomForPrecision } from './precision.js';
import { tilesArea } from './tiles.js';
import type { AreaEstimate } from './types.js';

/** Pricing reference returned with every estimate. */
export const PRICING_DOCS_URL = 'https://www.mapbox.com/pricing/#tilesets';

/** Options for {@link estimateArea}. */
export interface EstimateAreaOptions {
  /**
   * Skip schema validation, for inputs that already passed it.
   *
   * @defaultValue false
   */
  skipValidation?: boolean;
  /**
   * Enable the restricted `1cm` tier. Must be set exactly when the
   * precision is `1cm`.
   *
   * @defaultValue false
   */
  allowFinePrecision?: boolean;
  /** Receives validation errors and warnings. @defaultValue consoleLogger */
  logger?: Logger;
}

/**
 * Check that the precision tier and the fine-precision flag agree.
 *
 * @throws {PrecisionError}
 */
export function assertPrecisionAllowed(precision: string, allowFinePrecision = false): void {
  if (isFinePrecision(precision) && !allowFinePrecision) {
    throw new PrecisionError(
      'Fine-precision estimation requires explicit enablement: set allowFinePrecision ' +
        'and have the option enabled on your account.',
    );
  }
  if (!isFinePrecision(precision) && allowFinePrecision) {
    throw new PrecisionError(
      `allowFinePrecision is enabled but the precision is ${JSON.stringify(precision)}, not "1cm".`,
    );
  }
}

/**
 * Estimate the billable area of a batch of features.
 *
 * @param features - GeoJSON features.
 * @param precision - Precision tier (`10m`, `1m`, `30cm`, `1cm`); any other
 *   string falls back to the finest zoom.
 * @returns The rounded area and the echoed precision.
 * @throws {PrecisionError} When the tier and `allowFinePrecision` disagree.
 * @throws {FeatureParsingError} When a feature cannot be validated or parsed.
 *
 * @example
 * ```typescript
 * const estimate = estimateArea(features, '10m');
 * // => { km2: '1234', precision: '10m', pricing_docs: 'https://…' }
 * ```
 */
export function estimateArea(
  features: readonly unknown[],
  precision: string,
  options?: EstimateAreaOptions,
): AreaEstimate;

/**
 * Estimate the billable area of a single feature.
 *
 * Convenience overload that wraps the feature in a one-element batch.
 */
export function estimateArea(
  feature: unknown,
  precision: string,
  options?: EstimateAreaOptions,
): AreaEstimate;

// Implementation
export function estimateArea(
  featureOrFeatures: unknown,
  precision: string,
  options: EstimateAreaOptions = {},
): AreaEstimate {
  const { skipValidation = false, allowFinePrecision = false, logger = consoleLogger } = options;
  const features: readonly unknown[] = Array.isArray(featureOrFeatures)
    ? featureOrFeatures
    : [featureOrFeatures];

  assertPrecisionAllowed(precision, allowFinePrecision);

  let tileable: TileableFeature[];
  try {
    tileable = filterFeatures(skipValidation ? features : validateStream(features, logger));
  } catch (err) {
    throw new FeatureParsingError({ cause: err });
  }

  const zoom = zoomForPrecision(precision);
  const tiles = burn(tileable, zoom);
  const km2 = Math.round(tilesArea(tiles));

  logger.debug(
    `Estimated ${km2} km² from ${tiles.length} tiles at zoom ${zoom} ` +
      `(${tileable.length} of ${features.length} features tileable)`,
  );

  return { km2: String(km2), precision, pricing_docs: PRICING_DOCS_URL };
}

/**
 * Estimate the billable area of GeoJSON feature files.
 *
 * Every path is checked for existence before any file is read; a missing
 * path fails with `PathError`. Unreadable or malformed files fail with
 * {@link FeatureParsingError}.
 *
 * @param paths - One path or a list of paths, one feature per file.
 */
export async function estimateAreaFromFiles(
  paths: string | readonly string[],
  precision: string,
  options: EstimateAreaOptions = {},
): Promise<AreaEstimate> {
  const list = typeof paths === 'string' ? [paths] : paths;

  assertPrecisionAllowed(precision, options.allowFinePrecision);
  list.forEach(validatePath);

  let features: unknown[];
  try {
    features = await loadFeatures(list);
  } catch (err) {
    throw new FeatureParsingError({ cause: err });
  }

  return estimateArea(features, precision, options);
}
