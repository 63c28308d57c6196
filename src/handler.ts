/**
 * @module handler
 *
 * Tileset and source operations against the tiling service.
 *
 * A {@link TilesetsHandler} is constructed explicitly with a
 * {@link ClientConfig}; there is no process-wide instance. Each method
 * issues one request (or, for uploads, reads the source files first),
 * checks the response status and resolves with the parsed JSON body.
 *
 * @example
 * ```typescript
 * import { TilesetsHandler, loadConfig } from 'tileset-client';
 *
 * const handler = new TilesetsHandler({
 *   config: loadConfig(),
 *   recipePath: './recipes/default.json',
 * });
 *
 * await handler.uploadSource('roads-src', ['./data/roads.geojson'], { replace: true });
 * await handler.createTileset('roads', 'Roads');
 * await handler.publishTileset('roads');
 * ```
 */

import { z } from 'zod';
import { estimateAreaFromFiles, type EstimateAreaOptions } from './area.js';
import type { ClientConfig } from './config.js';
import { RestrictedError, TilesetsError } from './errors.js';
import { toLineDelimited } from './geojson/ldgeojson.js';
import { loadFeatures, loadJson } from './geojson/load.js';
import { validateFeature } from './geojson/validate.js';
import { HttpClient, expectStatus } from './http.js';
import { tilesetIdFor, validateSourceId, validateTilesetId } from './ids.js';
import { consoleLogger, type Logger } from './logger.js';
import { validateToken } from './token.js';
import type { ActivityPage, AreaEstimate, JsonObject, TilesetStatus } from './types.js';
import {
  UrlBuilder,
  type ActivityQuery,
  type StylesQuery,
  type TilesetJobsQuery,
  type TilesetListQuery,
} from './urls.js';

/** Minimum delay between two deletions of the same kind. */
export const DELETION_COOLDOWN_MS = 20_000;

const jobListSchema = z.array(
  z.object({ id: z.string(), tilesetId: z.string(), stage: z.string() }).passthrough(),
);
const sourceListSchema = z.array(z.object({ id: z.string() }).passthrough());
const jsonObjectSchema = z.record(z.unknown());

export interface TilesetsHandlerOptions {
  config: ClientConfig;
  /** @defaultValue an {@link HttpClient} with `config.timeout` */
  http?: HttpClient;
  /** @defaultValue consoleLogger */
  logger?: Logger;
  /** Recipe used by {@link TilesetsHandler.createTileset} when none is given. */
  recipePath?: string;
  /** Attribution JSON (a string) attached to created and updated tilesets. */
  attribution?: string;
  /** Clock used for the deletion cool-down, in milliseconds. @defaultValue Date.now */
  clock?: () => number;
}

export interface CreateTilesetOptions {
  recipePath?: string;
  description?: string;
  /** @defaultValue false */
  private?: boolean;
}

export interface UpdateTilesetOptions {
  name?: string;
  description?: string;
  private?: boolean;
}

export interface UploadSourceOptions {
  /** Upload without schema validation. */
  skipValidation?: boolean;
  /** Replace an existing source (PUT) instead of appending to it (POST). */
  replace?: boolean;
}

type DeletionKind = 'tileset' | 'source';

export class TilesetsHandler {
  private readonly config: ClientConfig;
  private readonly http: HttpClient;
  private readonly urls: UrlBuilder;
  private readonly logger: Logger;
  private readonly recipePath: string | undefined;
  private readonly attribution: string | undefined;
  private readonly clock: () => number;
  private readonly lastDeletion = new Map<DeletionKind, number>();

  constructor(options: TilesetsHandlerOptions) {
    this.config = options.config;
    this.http = options.http ?? new HttpClient({ timeout: options.config.timeout });
    this.urls = new UrlBuilder(options.config);
    this.logger = options.logger ?? consoleLogger;
    this.recipePath = options.recipePath;
    this.attribution = options.attribution;
    this.clock = options.clock ?? Date.now;
  }

  /** `username.handle` for one of the account's tilesets. */
  tilesetId(handle: string): string {
    return tilesetIdFor(this.config.username, handle);
  }

  // ─── Tilesets ────────────────────────────────────────────────────────

  /**
   * Create a tileset from a recipe file.
   *
   * @throws {TilesetsError} If no recipe is available or the request fails.
   */
  async createTileset(handle: string, name: string, options: CreateTilesetOptions = {}): Promise<JsonObject> {
    const id = this.tilesetId(handle);
    if (!validateTilesetId(id)) {
      this.logger.error(`Invalid tileset ID: ${id}`);
    }

    const recipePath = options.recipePath ?? this.recipePath;
    if (recipePath === undefined) {
      throw new TilesetsError('No recipe provided and no default recipe configured');
    }

    const body: JsonObject = {
      name,
      description: options.description ?? '',
      private: options.private ?? false,
      recipe: await loadJson(recipePath),
      ...this.attributionField(),
    };

    const response = await this.http.post(this.urls.tileset(id), body);
    await expectStatus(response, 200, 201);
    return readObject(response);
  }

  /** Queue a publish job. Resolves with the job response and a link to follow it. */
  async publishTileset(handle: string): Promise<JsonObject & { studioUrl: string }> {
    const id = this.tilesetId(handle);
    const response = await this.http.post(this.urls.tileset(id, { publish: true }));
    await expectStatus(response, 200);

    const studioUrl = `https://studio.mapbox.com/tilesets/${id}`;
    this.logger.info(`Tileset job received. Visit ${studioUrl} to view the status of your tileset.`);
    return { ...(await readObject(response)), studioUrl };
  }

  /** Update a tileset's name, description or visibility. */
  async updateTileset(handle: string, options: UpdateTilesetOptions): Promise<void> {
    const body: JsonObject = { ...this.attributionField() };
    if (options.name !== undefined) body.name = options.name;
    if (options.description !== undefined) body.description = options.description;
    if (options.private !== undefined) body.private = options.private;

    const response = await this.http.patch(this.urls.tileset(this.tilesetId(handle)), body);
    await expectStatus(response, 204);
  }

  /**
   * Delete a tileset.
   *
   * @throws {RestrictedError} When another tileset was deleted less than
   *   {@link DELETION_COOLDOWN_MS} ago.
   */
  async deleteTileset(handle: string): Promise<void> {
    this.checkDeletionCooldown('tileset');
    const response = await this.http.delete(this.urls.tileset(this.tilesetId(handle)));
    this.lastDeletion.set('tileset', this.clock());
    await expectStatus(response, 200, 204);
    this.logger.info(`Tileset ${handle} deleted.`);
  }

  /** Status of the last job listed for a tileset. */
  async tilesetStatus(handle: string): Promise<TilesetStatus> {
    const id = this.tilesetId(handle);
    const response = await this.http.get(this.urls.tilesetJobs(id));
    await expectStatus(response, 200);

    const jobs = await readBody(response, jobListSchema);
    const latest = jobs.at(-1);
    if (latest === undefined) {
      throw new TilesetsError(`No jobs found for tileset ${id}`);
    }
    return { id: latest.tilesetId, latestJob: latest.id, status: latest.stage };
  }

  /** TileJSON for one or several of the account's tilesets. */
  async tileJSON(handles: string | readonly string[], secure = true): Promise<JsonObject> {
    const list = typeof handles === 'string' ? [handles] : handles;
    const response = await this.http.get(this.urls.tileJSON(list, secure));
    await expectStatus(response, 200);
    return readObject(response);
  }

  async listJobs(handle: string, query?: TilesetJobsQuery): Promise<unknown> {
    const response = await this.http.get(this.urls.tilesetJobs(this.tilesetId(handle), query));
    await expectStatus(response, 200);
    return response.json();
  }

  async getJob(handle: string, jobId: string): Promise<JsonObject> {
    const response = await this.http.get(this.urls.tilesetJob(this.tilesetId(handle), jobId));
    await expectStatus(response, 200);
    return readObject(response);
  }

  async listTilesets(query?: TilesetListQuery): Promise<unknown> {
    const response = await this.http.get(this.urls.tilesetList(query));
    await expectStatus(response, 200);
    return response.json();
  }

  // ─── Recipes ─────────────────────────────────────────────────────────

  /** Ask the service to validate a recipe file. Resolves with its verdict. */
  async validateRecipe(path: string): Promise<JsonObject> {
    const recipe = await loadJson(path);
    const response = await this.http.put(this.urls.validateRecipe(), recipe);
    await expectStatus(response, 200);
    return readObject(response);
  }

  async getRecipe(handle: string): Promise<JsonObject> {
    const response = await this.http.get(this.urls.recipe(this.tilesetId(handle)));
    await expectStatus(response, 200);
    return readObject(response);
  }

  async updateRecipe(handle: string, path: string): Promise<void> {
    const recipe = await loadJson(path);
    const response = await this.http.patch(this.urls.recipe(this.tilesetId(handle)), recipe);
    await expectStatus(response, 201, 204);
    this.logger.info(`Updated recipe of ${handle}.`);
  }

  // ─── Sources ─────────────────────────────────────────────────────────

  /**
   * Validate source files locally: every path must exist and hold a
   * feature passing the schema.
   *
   * @throws {PathError | InvalidGeoJSON} On the first failure.
   */
  async validateSource(paths: string | readonly string[]): Promise<true> {
    const features = await loadFeatures(typeof paths === 'string' ? [paths] : paths);
    features.forEach((feature, index) => validateFeature(index, feature, this.logger));
    return true;
  }

  /**
   * Upload features as a tileset source, in line-delimited GeoJSON.
   *
   * @throws {TilesetsError} If the source ID or the access token is
   *   invalid, or the request fails.
   */
  async uploadSource(
    sourceId: string,
    paths: string | readonly string[],
    options: UploadSourceOptions = {},
  ): Promise<JsonObject> {
    validateSourceId(sourceId);
    validateToken(this.config.username, this.config.accessToken);

    const features = await loadFeatures(typeof paths === 'string' ? [paths] : paths);
    if (!options.skipValidation) {
      features.forEach((feature, index) => validateFeature(index, feature, this.logger));
    }

    const form = new FormData();
    form.append('file', new Blob([toLineDelimited(features)]), 'file');

    const response = await this.http.upload(this.urls.source(sourceId), form, options.replace ? 'PUT' : 'POST');
    await expectStatus(response, 200);
    return readObject(response);
  }

  async getSource(sourceId: string): Promise<JsonObject> {
    const response = await this.http.get(this.urls.source(sourceId));
    await expectStatus(response, 200);
    return readObject(response);
  }

  /**
   * Delete a source.
   *
   * @throws {RestrictedError} When another source was deleted less than
   *   {@link DELETION_COOLDOWN_MS} ago.
   */
  async deleteSource(sourceId: string): Promise<void> {
    this.checkDeletionCooldown('source');
    const response = await this.http.delete(this.urls.source(sourceId));
    this.lastDeletion.set('source', this.clock());
    await expectStatus(response, 204);
    this.logger.info(`Source ${sourceId} deleted.`);
  }

  /** IDs of the account's sources. */
  async listSources(): Promise<string[]> {
    const response = await this.http.get(this.urls.sourceList());
    await expectStatus(response, 200);
    const sources = await readBody(response, sourceListSchema);
    return sources.map(source => source.id);
  }

  /** Estimate the billable area of source files; see `estimateArea`. */
  estimateArea(
    paths: string | readonly string[],
    precision: string,
    options: EstimateAreaOptions = {},
  ): Promise<AreaEstimate> {
    return estimateAreaFromFiles(paths, precision, { logger: this.logger, ...options });
  }

  // ─── Account ─────────────────────────────────────────────────────────

  /**
   * One page of the tileset activity report.
   *
   * `next` is the pagination key from the `Link` response header, or the
   * requested `start` when the service sends none.
   */
  async listActivity(query: ActivityQuery = {}): Promise<ActivityPage> {
    const response = await this.http.get(this.urls.activity(query));
    await expectStatus(response, 200);

    const data: unknown = await response.json();
    return { data, next: nextPageKey(response.headers.get('link'), this.config.apiUrl) ?? query.start };
  }

  async listStyles(query?: StylesQuery): Promise<unknown> {
    const response = await this.http.get(this.urls.styles(query));
    await expectStatus(response, 200);
    return response.json();
  }

  // ─── Internal ──────────────────────────────────────────────────────────

  private attributionField(): JsonObject {
    if (this.attribution === undefined) return {};
    try {
      return { attribution: JSON.parse(this.attribution) };
    } catch (err) {
      throw new TilesetsError('Unable to parse attribution JSON', { cause: err });
    }
  }

  private checkDeletionCooldown(kind: DeletionKind): void {
    const last = this.lastDeletion.get(kind);
    if (last !== undefined && this.clock() - last < DELETION_COOLDOWN_MS) {
      throw new RestrictedError('deletion');
    }
  }
}

async function readBody<T>(response: Response, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
  const result = schema.safeParse(await response.json());
  if (!result.success) {
    throw new TilesetsError('Unexpected response body', { cause: result.error, status: response.status });
  }
  return result.data;
}

function readObject(response: Response): Promise<JsonObject> {
  return readBody(response, jsonObjectSchema);
}

/**
 * `start` query parameter of the URL in a `Link: <url>; rel="next"` header.
 * Relative URLs are resolved against `base`.
 */
export function nextPageKey(link: string | null, base: string): string | undefined {
  const match = link?.match(/<([^>]*)>;/);
  if (!match) return undefined;
  return new URL(match[1], base).searchParams.get('start') ?? undefined;
}
