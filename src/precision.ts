/**
 * @module precision
 *
 * Maps human-facing precision tiers to the zoom level the tile cover is
 * computed at.
 */

import type { Precision } from './types.js';

/** The restricted tier that requires explicit enablement. */
export const FINE_PRECISION: Precision = '1cm';

/** Zoom used for any precision string not in {@link PRECISION_ZOOMS}. */
export const FALLBACK_ZOOM = 17;

/**
 * Zoom level per recognized precision tier.
 *
 * `1cm` is not computed at a deeper zoom: it maps to 17, the same zoom as
 * {@link FALLBACK_ZOOM}. What sets the tier apart is the
 * `allowFinePrecision` gate the estimator applies to it.
 */
export const PRECISION_ZOOMS: Readonly<Record<Precision, number>> = {
  '10m': 6,
  '1m': 11,
  '30cm': 14,
  '1cm': 17,
};

function isPrecision(value: string): value is Precision {
  return Object.prototype.hasOwnProperty.call(PRECISION_ZOOMS, value);
}

/**
 * Zoom level for a precision tier.
 *
 * Total: unrecognized strings silently map to {@link FALLBACK_ZOOM}.
 *
 * @example
 * ```typescript
 * zoomForPrecision('10m');  // => 6
 * zoomForPrecision('30cm'); // => 14
 * zoomForPrecision('5m');   // => 17
 * ```
 */
export function zoomForPrecision(precision: string): number {
  return isPrecision(precision) ? PRECISION_ZOOMS[precision] : FALLBACK_ZOOM;
}

/** Whether `precision` is the restricted {@link FINE_PRECISION} tier. */
export function isFinePrecision(precision: string): boolean {
  return precision === FINE_PRECISION;
}
