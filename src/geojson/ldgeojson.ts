/**
 * @module geojson/ldgeojson
 *
 * Line-delimited GeoJSON, the format tileset sources are uploaded in: one
 * compact JSON document per line, each line terminated by `\n`.
 */

export function toLineDelimited(features: Iterable<unknown>): string {
  let out = '';
  for (const feature of features) {
    out += `${JSON.stringify(feature)}\n`;
  }
  return out;
}
