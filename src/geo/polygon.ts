import { booleanIntersects } from '@turf/turf';
import type { Geometry, Polygon } from 'geojson';
import type { LonLat, LonLatBoundingBox } from '../types';

/**
 * Build a GeoJSON polygon from a closed `[lon, lat]` ring.
 */
export function toGeoJsonPolygon(ring: LonLat[]): Polygon {
  return {
    type: 'Polygon',
    coordinates: [ring.map(([lon, lat]) => [lon, lat])],
  };
}

/**
 * Calculate the bounding box of a `[lon, lat]` ring.
 *
 * @returns `[minLon, minLat, maxLon, maxLat]`
 */
export function getRingBoundingBox(ring: LonLat[]): LonLatBoundingBox {
  let minLon = Infinity;
  let minLat = Infinity;
  let maxLon = -Infinity;
  let maxLat = -Infinity;

  for (const [lon, lat] of ring) {
    minLon = Math.min(minLon, lon);
    minLat = Math.min(minLat, lat);
    maxLon = Math.max(maxLon, lon);
    maxLat = Math.max(maxLat, lat);
  }

  return [minLon, minLat, maxLon, maxLat];
}

/**
 * Format a bounding box as the `ext_bbox` parameter of a CKAN spatial search.
 */
export function formatBoundingBox(box: LonLatBoundingBox): string {
  return box.join(',');
}

/**
 * Exact test of whether a dataset footprint touches or overlaps the search ring.
 */
export function footprintIntersects(footprint: Geometry, ring: LonLat[]): boolean {
  return booleanIntersects(footprint, toGeoJsonPolygon(ring));
}
