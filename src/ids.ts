/**
 * @module ids
 *
 * Identifier rules of the tiling service.
 */

import { TilesetsError } from './errors.js';

const TILESET_ID = /^[a-z0-9-_]{1,32}\.[a-z0-9-_]{1,32}$/i;
const SOURCE_ID = /^[a-zA-Z0-9-_]{1,32}$/;

/** Compose a tileset ID (`username.handle`). */
export function tilesetIdFor(username: string, handle: string): string {
  return `${username}.${handle}`;
}

/** Whether `id` is a well-formed `username.handle` tileset ID. */
export function validateTilesetId(id: string): boolean {
  return TILESET_ID.test(id);
}

/**
 * Check a source ID: at most 32 characters of `-`, `_` and alphanumerics.
 *
 * @throws {TilesetsError}
 */
export function validateSourceId(id: string): string {
  if (SOURCE_ID.test(id)) return id;
  throw new TilesetsError(
    'Invalid source ID. Max-length: 32 chars and only include "-", "_", and alphanumeric chars.',
  );
}
