import { describe, it, expect } from 'vitest';
import {
  FeatureParsingError,
  InvalidGeoJSON,
  InvalidTilesetId,
  PathError,
  PrecisionError,
  RestrictedError,
  TilesetsError,
} from '../src/errors.js';

describe('errors', () => {
  it('should all extend TilesetsError and carry their own name', () => {
    const errors = [
      new InvalidTilesetId('tester.bad id'),
      new InvalidGeoJSON(0, null),
      new PrecisionError('too fine'),
      new FeatureParsingError(),
      new PathError('/nowhere'),
      new RestrictedError('deletion'),
    ];

    expect(errors.map(err => err instanceof TilesetsError)).toEqual([true, true, true, true, true, true]);
    expect(errors.map(err => err.name)).toEqual([
      'InvalidTilesetId',
      'InvalidGeoJSON',
      'PrecisionError',
      'FeatureParsingError',
      'PathError',
      'RestrictedError',
    ]);
  });

  it('should keep the status and cause of a failed request', () => {
    const cause = new Error('socket hang up');
    const err = new TilesetsError('Not Found', { status: 404, cause });
    expect(err.status).toBe(404);
    expect(err.cause).toBe(cause);
    expect(new TilesetsError('plain').status).toBeUndefined();
  });

  it('should name the offending value in the message', () => {
    expect(new InvalidTilesetId('tester.bad id').message).toBe('Invalid Tileset ID: tester.bad id');
    expect(new PathError('/nowhere').message).toBe('Input should be a valid path: /nowhere');
  });
});
