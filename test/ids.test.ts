import { describe, it, expect } from 'vitest';
import { tilesetIdFor, validateSourceId, validateTilesetId } from '../src/ids.js';

describe('validateTilesetId', () => {
  it('should accept username.handle', () => {
    expect(validateTilesetId(tilesetIdFor('tester', 'roads_2024-v1'))).toBe(true);
    expect(validateTilesetId('Tester.Roads')).toBe(true);
  });

  it('should reject malformed IDs', () => {
    expect(validateTilesetId('roads')).toBe(false);
    expect(validateTilesetId('tester.roads.extra')).toBe(false);
    expect(validateTilesetId('tester.bad handle')).toBe(false);
    expect(validateTilesetId(`tester.${'a'.repeat(33)}`)).toBe(false);
  });
});

describe('validateSourceId', () => {
  it('should return valid IDs', () => {
    expect(validateSourceId('roads-src_1')).toBe('roads-src_1');
    expect(validateSourceId('a'.repeat(32))).toBe('a'.repeat(32));
  });

  it('should reject long IDs and other characters', () => {
    const message =
      'Invalid source ID. Max-length: 32 chars and only include "-", "_", and alphanumeric chars.';
    expect(() => validateSourceId('a'.repeat(33))).toThrow(message);
    expect(() => validateSourceId('roads.src')).toThrow(message);
    expect(() => validateSourceId('')).toThrow(message);
  });
});
