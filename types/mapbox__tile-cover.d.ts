declare module '@mapbox/tile-cover' {
  import type { Geometry } from 'geojson';

  interface Limits {
    min_zoom: number;
    max_zoom: number;
  }

  interface TileCover {
    /** Tiles as `[x, y, z]` triples. */
    tiles(geom: Geometry, limits: Limits): Array<[number, number, number]>;
  }

  const tileCover: TileCover;
  export = tileCover;
}
