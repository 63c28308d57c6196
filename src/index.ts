/**
 * @module tileset-client
 *
 * Public API surface for the tileset-client library.
 *
 * tileset-client drives a remote map-tiling service: it uploads GeoJSON
 * sources, manages the tileset lifecycle (create, update, publish, delete)
 * and estimates the area a tileset's sources will be billed for before any
 * job runs.
 *
 * ---
 *
 * ### Entry points
 *
 * | Export | State | Use case |
 * |--------|-------|----------|
 * | {@link TilesetsHandler} | Config, HTTP client, deletion cool-down | Every remote operation: sources, tilesets, recipes, activity. |
 * | {@link estimateArea} | None | Local, synchronous area estimate of in-memory features. |
 * | {@link estimateAreaFromFiles} | None | The same, reading features from files. |
 *
 * ---
 *
 * ### Area estimation building blocks
 *
 * - {@link validateFeature} / {@link validateStream} -- shallow GeoJSON schema.
 * - {@link filterFeatures} -- tileable single-part features.
 * - {@link zoomForPrecision} -- precision tier to zoom level.
 * - {@link burn} -- distinct tile cover at one zoom.
 * - {@link tileArea} / {@link tilesArea} -- spherical area of tiles in km².
 */

// ─── Entry points ───────────────────────────────────────────────────────────

export { TilesetsHandler, DELETION_COOLDOWN_MS } from './handler.js';
export { estimateArea, estimateAreaFromFiles, assertPrecisionAllowed, PRICING_DOCS_URL } from './area.js';
export { loadConfig, loadEnv, DEFAULT_API_URL, DEFAULT_TIMEOUT } from './config.js';
export { HttpClient, expectStatus, redactToken } from './http.js';
export { UrlBuilder } from './urls.js';

// ─── Area estimation ────────────────────────────────────────────────────────

export { validateFeature, validateStream, geometryIssues, featureSchema } from './geojson/validate.js';
export { filterFeatures, explodeGeometry } from './geojson/filter.js';
export { loadFeature, loadFeatures, loadJson, validatePath } from './geojson/load.js';
export { toLineDelimited } from './geojson/ldgeojson.js';
export { zoomForPrecision, isFinePrecision, PRECISION_ZOOMS, FALLBACK_ZOOM, FINE_PRECISION } from './precision.js';
export { burn, clampGeometry, MAX_MERCATOR_LAT } from './cover.js';
export {
  tileArea,
  tilesArea,
  tileBBox,
  tileChildren,
  tileId,
  tileLat,
  tileLng,
  EARTH_RADIUS_KM,
  MAX_TILE_ZOOM,
} from './tiles.js';

// ─── Identifiers, errors, logging ───────────────────────────────────────────

export { tilesetIdFor, validateSourceId, validateTilesetId } from './ids.js';
export { validateToken } from './token.js';
export {
  TilesetsError,
  InvalidTilesetId,
  InvalidGeoJSON,
  PrecisionError,
  FeatureParsingError,
  PathError,
  RestrictedError,
} from './errors.js';
export { consoleLogger, silentLogger } from './logger.js';

// ─── Types ──────────────────────────────────────────────────────────────────

export type { Logger } from './logger.js';
export type { ClientConfig } from './config.js';
export type { EstimateAreaOptions } from './area.js';
export type { HttpClientOptions, UploadMethod } from './http.js';
export type {
  TilesetsHandlerOptions,
  CreateTilesetOptions,
  UpdateTilesetOptions,
  UploadSourceOptions,
} from './handler.js';
export type { ActivityQuery, StylesQuery, TilesetJobsQuery, TilesetListQuery } from './urls.js';
export type { ValidFeature, ValidGeometry } from './geojson/validate.js';
export type { TileableFeature, TileableGeometry } from './geojson/filter.js';
export type {
  Tile,
  BBox,
  Precision,
  AreaEstimate,
  TilesetStatus,
  ActivityPage,
  JsonObject,
} from './types.js';
