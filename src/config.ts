/**
 * @module config
 *
 * Client configuration from environment variables.
 *
 * | Variable | Required | Default |
 * |----------|----------|---------|
 * | `MAPBOX_USER_NAME` | yes | |
 * | `MAPBOX_ACCESS_TOKEN` (or `MapboxAccessToken`) | yes | |
 * | `MAPBOX_API_URL` | no | `https://api.mapbox.com` |
 * | `MAPBOX_REQUEST_TIMEOUT` | no | `30000` (ms) |
 *
 * `.env` files are only read when {@link loadEnv} is called.
 */

import { config as loadDotenv } from 'dotenv';
import { z } from 'zod';
import { TilesetsError } from './errors.js';

export const DEFAULT_API_URL = 'https://api.mapbox.com';
export const DEFAULT_TIMEOUT = 30_000;

/** Everything a handler needs to talk to the tiling service. */
export interface ClientConfig {
  /** Account name; prefixes every tileset handle. */
  username: string;
  accessToken: string;
  /** API origin without a trailing slash. */
  apiUrl: string;
  /** Per-request timeout in milliseconds. */
  timeout: number;
}

const envSchema = z.object({
  MAPBOX_USER_NAME: z.string().min(1),
  MAPBOX_ACCESS_TOKEN: z.string().min(1).optional(),
  MapboxAccessToken: z.string().min(1).optional(),
  MAPBOX_API_URL: z.string().url().default(DEFAULT_API_URL),
  MAPBOX_REQUEST_TIMEOUT: z.coerce.number().int().positive().default(DEFAULT_TIMEOUT),
});

/**
 * Populate `process.env` from a `.env` file.
 *
 * A missing default `.env` is ignored; a missing explicit `path` is an error.
 */
export function loadEnv(path?: string): void {
  const result = loadDotenv(path === undefined ? undefined : { path });
  if (result.error && path !== undefined) {
    throw new TilesetsError(`Unable to load environment file ${path}`, { cause: result.error });
  }
}

/**
 * Build a {@link ClientConfig} from environment variables.
 *
 * @throws {TilesetsError} When the token or user name is missing, or a
 *   value is malformed.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ClientConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const fields = result.error.issues.map(issue => issue.path.join('.')).join(', ');
    throw new TilesetsError(`Invalid client configuration: ${fields}`, { cause: result.error });
  }

  const parsed = result.data;
  const accessToken = parsed.MAPBOX_ACCESS_TOKEN ?? parsed.MapboxAccessToken;
  if (accessToken === undefined) {
    throw new TilesetsError('No access token provided. Please set the MAPBOX_ACCESS_TOKEN env var');
  }

  return {
    username: parsed.MAPBOX_USER_NAME,
    accessToken,
    apiUrl: parsed.MAPBOX_API_URL.replace(/\/+$/, ''),
    timeout: parsed.MAPBOX_REQUEST_TIMEOUT,
  };
}
