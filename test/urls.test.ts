import { describe, it, expect } from 'vitest';
import { InvalidTilesetId } from '../src/errors.js';
import { UrlBuilder } from '../src/urls.js';

const API = 'https://api.example.com';
const urls = new UrlBuilder({ username: 'tester', accessToken: 'test-secret', apiUrl: API });

describe('UrlBuilder', () => {
  it('should build tileset URLs', () => {
    expect(urls.tileset('tester.roads')).toBe(`${API}/tilesets/v1/tester.roads?access_token=test-secret`);
    expect(urls.tileset('tester.roads', { publish: true })).toBe(
      `${API}/tilesets/v1/tester.roads/publish?access_token=test-secret`,
    );
    expect(urls.recipe('tester.roads')).toBe(`${API}/tilesets/v1/tester.roads/recipe?access_token=test-secret`);
    expect(urls.validateRecipe()).toBe(`${API}/tilesets/v1/validateRecipe?access_token=test-secret`);
  });

  it('should build job URLs with optional filters', () => {
    expect(urls.tilesetJobs('tester.roads')).toBe(
      `${API}/tilesets/v1/tester.roads/jobs?access_token=test-secret&limit=100`,
    );
    expect(urls.tilesetJobs('tester.roads', { stage: 'success', limit: 10 })).toBe(
      `${API}/tilesets/v1/tester.roads/jobs?access_token=test-secret&stage=success&limit=10`,
    );
    expect(urls.tilesetJob('tester.roads', 'job-1')).toBe(
      `${API}/tilesets/v1/tester.roads/jobs/job-1?access_token=test-secret`,
    );
  });

  it('should list tilesets with only the given filters', () => {
    expect(urls.tilesetList({ visibility: 'private', sortby: '' })).toBe(
      `${API}/tilesets/v1/tester?access_token=test-secret&limit=100&visibility=private`,
    );
  });

  it('should build source URLs', () => {
    expect(urls.source('roads-src')).toBe(`${API}/tilesets/v1/sources/tester/roads-src?access_token=test-secret`);
    expect(urls.sourceList()).toBe(`${API}/tilesets/v1/sources/tester?access_token=test-secret`);
  });

  it('should join several tilesets into one TileJSON URL', () => {
    expect(urls.tileJSON(['roads', 'rivers'], true)).toBe(
      `${API}/v4/tester.roads,tester.rivers.json?access_token=test-secret&secure`,
    );
    expect(urls.tileJSON(['roads'], false)).toBe(`${API}/v4/tester.roads.json?access_token=test-secret`);
  });

  it('should reject malformed tileset IDs in TileJSON URLs', () => {
    expect(() => urls.tileJSON(['roads', 'bad handle'], true)).toThrow(InvalidTilesetId);
  });

  it('should apply activity defaults and pagination', () => {
    expect(urls.activity()).toBe(
      `${API}/activity/v1/tester/tilesets?access_token=test-secret&sortby=requests&orderby=desc&limit=100`,
    );
    expect(urls.activity({ sortby: 'modified', orderby: 'asc', limit: 5, start: 'page-2' })).toBe(
      `${API}/activity/v1/tester/tilesets?access_token=test-secret&sortby=modified&orderby=asc&limit=5&start=page-2`,
    );
  });

  it('should build style URLs', () => {
    expect(urls.styles()).toBe(`${API}/styles/v1/tester?access_token=test-secret`);
    expect(urls.styles({ draft: true, limit: 10, startId: 'style-1' })).toBe(
      `${API}/styles/v1/tester/draft?access_token=test-secret&limit=10&start=style-1`,
    );
  });

  it('should encode query values', () => {
    const builder = new UrlBuilder({ username: 'tester', accessToken: 'a b&c', apiUrl: API });
    expect(builder.sourceList()).toBe(`${API}/tilesets/v1/sources/tester?access_token=a+b%26c`);
  });
});
