/**
 * @module geojson/load
 *
 * Reading GeoJSON features from the local filesystem.
 */

import { existsSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { PathError } from '../errors.js';

/**
 * Fail fast when `path` does not exist.
 *
 * @throws {PathError}
 */
export function validatePath(path: string): void {
  if (!existsSync(path)) {
    throw new PathError(path);
  }
}

/**
 * Read and parse a UTF-8 JSON file.
 *
 * @throws {PathError} If the file does not exist.
 * @throws {SyntaxError} If the file is not valid JSON.
 */
export async function loadJson(path: string): Promise<unknown> {
  validatePath(path);
  const text = await readFile(resolve(path), 'utf-8');
  return JSON.parse(text);
}

/**
 * Read one GeoJSON feature.
 *
 * The result is unchecked JSON; run it through `validateFeature` before
 * relying on its shape.
 */
export function loadFeature(path: string): Promise<unknown> {
  return loadJson(path);
}

/**
 * Load several documents, in order.
 *
 * Every path is checked before any file is read.
 */
export async function loadFeatures(paths: readonly string[]): Promise<unknown[]> {
  paths.forEach(validatePath);
  const features: unknown[] = [];
  for (const path of paths) {
    features.push(await loadFeature(path));
  }
  return features;
}
