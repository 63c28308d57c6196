/**
 * @module urls
 *
 * Request URLs for the tiling service's REST resources.
 *
 * Every URL carries the access token as its first query parameter. Optional
 * parameters left `undefined` (or empty) are omitted; the rest keep their
 * declaration order.
 *
 * @example
 * ```typescript
 * const urls = new UrlBuilder({ username: 'jane', accessToken: 'test-token', apiUrl: 'https://api.mapbox.com' });
 *
 * urls.tileset('jane.roads');
 * // => 'https://api.mapbox.com/tilesets/v1/jane.roads?access_token=test-token'
 * urls.activity();
 * // => 'https://api.mapbox.com/activity/v1/jane/tilesets?access_token=test-token&sortby=requests&orderby=desc&limit=100'
 * ```
 */

import type { ClientConfig } from './config.js';
import { InvalidTilesetId } from './errors.js';
import { tilesetIdFor, validateTilesetId } from './ids.js';

type QueryValue = string | number | undefined;

export interface TilesetJobsQuery {
  /** Only list jobs in this stage (`processing`, `queued`, `success`, `failed`). */
  stage?: string;
  /** @defaultValue 100 */
  limit?: number;
}

export interface TilesetListQuery {
  /** `vector` or `raster`. */
  type?: string;
  /** Max 500. @defaultValue 100 */
  limit?: number;
  /** `public` or `private`. */
  visibility?: string;
  /** `created` or `modified`. */
  sortby?: string;
}

export interface ActivityQuery {
  /** `requests` or `modified`. @defaultValue 'requests' */
  sortby?: string;
  /** `desc` or `asc`. @defaultValue 'desc' */
  orderby?: string;
  /** @defaultValue 100 */
  limit?: number;
  /** Pagination key from a previous page. */
  start?: string;
}

export interface StylesQuery {
  /** List draft styles instead of published ones. */
  draft?: boolean;
  limit?: number;
  /** Pagination key (style ID to start after). */
  startId?: string;
}

export class UrlBuilder {
  private readonly username: string;
  private readonly accessToken: string;
  private readonly tilesetsApi: string;
  private readonly api: string;

  constructor(config: Pick<ClientConfig, 'username' | 'accessToken' | 'apiUrl'>) {
    this.username = config.username;
    this.accessToken = config.accessToken;
    this.api = config.apiUrl;
    this.tilesetsApi = `${config.apiUrl}/tilesets/v1`;
  }

  /** Most tileset operations, or its publish endpoint. */
  tileset(tilesetId: string, options?: { publish?: boolean }): string {
    const suffix = options?.publish ? '/publish' : '';
    return `${this.tilesetsApi}/${tilesetId}${suffix}?${this.query()}`;
  }

  tilesetJobs(tilesetId: string, { stage, limit = 100 }: TilesetJobsQuery = {}): string {
    return `${this.tilesetsApi}/${tilesetId}/jobs?${this.query({ stage, limit })}`;
  }

  tilesetJob(tilesetId: string, jobId: string): string {
    return `${this.tilesetsApi}/${tilesetId}/jobs/${jobId}?${this.query()}`;
  }

  /**
   * TileJSON for one or more of the account's tilesets.
   *
   * @param handles - Tileset handles; each is prefixed with the user name.
   * @param secure - Ask for HTTPS tile URLs.
   * @throws {InvalidTilesetId} If a composed ID is malformed.
   */
  tileJSON(handles: readonly string[], secure: boolean): string {
    const ids = handles.map(handle => {
      const id = tilesetIdFor(this.username, handle);
      if (!validateTilesetId(id)) throw new InvalidTilesetId(id);
      return id;
    });

    const url = `${this.api}/v4/${ids.join(',')}.json?${this.query()}`;
    return secure ? `${url}&secure` : url;
  }

  tilesetList({ type, limit = 100, visibility, sortby }: TilesetListQuery = {}): string {
    return `${this.tilesetsApi}/${this.username}?${this.query({ type, limit, visibility, sortby })}`;
  }

  recipe(tilesetId: string): string {
    return `${this.tilesetsApi}/${tilesetId}/recipe?${this.query()}`;
  }

  validateRecipe(): string {
    return `${this.tilesetsApi}/validateRecipe?${this.query()}`;
  }

  source(sourceId: string): string {
    return `${this.tilesetsApi}/sources/${this.username}/${sourceId}?${this.query()}`;
  }

  sourceList(): string {
    return `${this.tilesetsApi}/sources/${this.username}?${this.query()}`;
  }

  activity({ sortby = 'requests', orderby = 'desc', limit = 100, start }: ActivityQuery = {}): string {
    return `${this.api}/activity/v1/${this.username}/tilesets?${this.query({ sortby, orderby, limit, start })}`;
  }

  styles({ draft = false, limit, startId }: StylesQuery = {}): string {
    const draftSuffix = draft ? '/draft' : '';
    return `${this.api}/styles/v1/${this.username}${draftSuffix}?${this.query({ limit, start: startId })}`;
  }

  private query(params: Record<string, QueryValue> = {}): string {
    const search = new URLSearchParams({ access_token: this.accessToken });
    for (const [key, value] of Object.entries(params)) {
      if (value === undefined || value === '') continue;
      search.append(key, String(value));
    }
    return search.toString();
  }
}
