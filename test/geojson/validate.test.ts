import { describe, it, expect } from 'vitest';
import { InvalidGeoJSON } from '../../src/errors.js';
import { geometryIssues, validateFeature, validateStream } from '../../src/geojson/validate.js';
import { spyLogger } from '../helpers/logger.js';

const line = {
  type: 'Feature',
  properties: { name: 'a line' },
  geometry: {
    type: 'LineString',
    coordinates: [
      [45.6, 42.53],
      [49.758, 48],
    ],
  },
};

describe('validateFeature', () => {
  it('should return a valid feature unchanged', () => {
    const logger = spyLogger();
    expect(validateFeature(0, line, logger)).toEqual(line);
    expect(logger.warn).not.toHaveBeenCalled();
    expect(logger.error).not.toHaveBeenCalled();
  });

  it('should keep unknown keys', () => {
    const feature = { ...line, id: 7, bbox: [0, 0, 1, 1] };
    expect(validateFeature(0, feature)).toEqual(feature);
  });

  it('should reject a feature without geometry and report its index', () => {
    const logger = spyLogger();
    const feature = { type: 'Feature', properties: {} };

    let caught: unknown;
    try {
      validateFeature(3, feature, logger);
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(InvalidGeoJSON);
    if (!(caught instanceof InvalidGeoJSON)) return;
    expect(caught.message).toBe('Feature at index 3 is not valid GeoJSON data.');
    expect(caught.index).toBe(3);
    expect(caught.feature).toBe(feature);
    expect(logger.error).toHaveBeenCalledWith(
      'Feature at index 3 is not valid GeoJSON data. geometry: Required',
    );
  });

  it('should reject values that are not objects', () => {
    const logger = spyLogger();
    expect(() => validateFeature(0, 'nope', logger)).toThrow(InvalidGeoJSON);
    expect(logger.error).toHaveBeenCalledWith(
      'Feature at index 0 is not valid GeoJSON data. <root>: Expected object, received string',
    );
  });

  it('should reject null properties and non-array coordinates', () => {
    const logger = spyLogger();
    expect(() => validateFeature(0, { ...line, properties: null }, logger)).toThrow(InvalidGeoJSON);
    expect(() =>
      validateFeature(1, { ...line, geometry: { type: 'Point', coordinates: 'x' } }, logger),
    ).toThrow(InvalidGeoJSON);
  });

  it('should warn about malformed coordinates without failing', () => {
    const logger = spyLogger();
    const openRing = {
      type: 'Feature',
      properties: {},
      geometry: {
        type: 'Polygon',
        coordinates: [
          [
            [0, 0],
            [1, 0],
            [1, 1],
            [0, 1],
          ],
        ],
      },
    };

    expect(validateFeature(4, openRing, logger)).toEqual(openRing);
    expect(logger.warn).toHaveBeenCalledWith('Error in feature number 4: Polygon ring 0 must be closed');
  });
});

describe('validateStream', () => {
  it('should validate lazily and stop at the first failure', () => {
    const logger = spyLogger();
    const stream = validateStream([line, { type: 'Feature' }, line], logger);

    expect(stream.next()).toEqual({ value: line, done: false });
    expect(logger.error).not.toHaveBeenCalled();
    expect(() => stream.next()).toThrow('Feature at index 1 is not valid GeoJSON data.');
  });

  it('should yield every feature of a valid batch', () => {
    expect([...validateStream([line, line])]).toEqual([line, line]);
  });
});

describe('geometryIssues', () => {
  it('should accept well-formed geometries', () => {
    expect(geometryIssues({ type: 'Point', coordinates: [1, 2] })).toEqual([]);
    expect(geometryIssues({ type: 'MultiPoint', coordinates: [[1, 2], [3, 4, 5]] })).toEqual([]);
    expect(geometryIssues(line.geometry)).toEqual([]);
  });

  it('should describe short lines and rings', () => {
    expect(geometryIssues({ type: 'LineString', coordinates: [[0, 0]] })).toEqual([
      'LineString must have at least 2 positions',
    ]);
    expect(
      geometryIssues({
        type: 'MultiPolygon',
        coordinates: [[[[0, 0], [1, 1], [0, 0]]]],
      }),
    ).toEqual(['MultiPolygon part 0 ring 0 must have at least 4 positions']);
  });

  it('should describe non-numeric positions', () => {
    expect(geometryIssues({ type: 'Point', coordinates: ['a', 'b'] })).toEqual([
      'Point must be a single position',
    ]);
    expect(geometryIssues({ type: 'MultiLineString', coordinates: [[[0, 0], [1, 1]], 'x'] })).toEqual([
      'MultiLineString part 1 must be an array of positions',
    ]);
  });

  it('should describe unknown geometry types', () => {
    expect(geometryIssues({ type: 'Circle', coordinates: [] })).toEqual([
      '"Circle" is not a GeoJSON geometry type with coordinates',
    ]);
  });
});
