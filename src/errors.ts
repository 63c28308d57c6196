/**
 * @module errors
 *
 * Error hierarchy for tileset-client.
 *
 * Every error raised by the library extends {@link TilesetsError}, so callers
 * can catch the whole family with a single `instanceof` check and narrow
 * further where they care. Underlying failures (parser errors, I/O errors)
 * are attached through the standard `cause` property instead of being
 * re-exposed directly.
 */

/**
 * Base error for all tileset-client failures.
 *
 * When the error originates from a remote API response, {@link status}
 * carries the HTTP status code and the message is the response body.
 */
export class TilesetsError extends Error {
  /** HTTP status of the response that produced this error, if any. */
  readonly status: number | undefined;

  constructor(message: string, options?: ErrorOptions & { status?: number }) {
    super(message, options);
    this.name = 'TilesetsError';
    this.status = options?.status;
  }
}

/** A composed tileset ID (`username.handle`) does not match the accepted pattern. */
export class InvalidTilesetId extends TilesetsError {
  constructor(readonly tilesetId: string) {
    super(`Invalid Tileset ID: ${tilesetId}`);
    this.name = 'InvalidTilesetId';
  }
}

/**
 * A value failed structural GeoJSON feature validation.
 *
 * Carries the offending value and its position in the batch it came from.
 */
export class InvalidGeoJSON extends TilesetsError {
  constructor(
    readonly index: number,
    readonly feature: unknown,
    options?: ErrorOptions,
  ) {
    super(`Feature at index ${index} is not valid GeoJSON data.`, options);
    this.name = 'InvalidGeoJSON';
  }
}

/** Precision tier and fine-precision flag disagree. */
export class PrecisionError extends TilesetsError {
  constructor(message: string) {
    super(message);
    this.name = 'PrecisionError';
  }
}

/** Features could not be parsed or validated during area estimation. */
export class FeatureParsingError extends TilesetsError {
  constructor(options?: ErrorOptions) {
    super(
      'Error with feature parsing. Ensure that feature inputs are valid and formatted correctly.',
      options,
    );
    this.name = 'FeatureParsingError';
  }
}

/** A referenced file does not exist. */
export class PathError extends TilesetsError {
  constructor(readonly path: string) {
    super(`Input should be a valid path: ${path}`);
    this.name = 'PathError';
  }
}

/** An operation was refused because it was repeated too soon. */
export class RestrictedError extends TilesetsError {
  constructor(readonly operation: string) {
    super(`Operation "${operation}" is temporarily restricted. Try again later.`);
    this.name = 'RestrictedError';
  }
}
