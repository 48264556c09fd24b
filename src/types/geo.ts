/**
 * Represents a geographic coordinate with latitude and longitude in degrees.
 */
export interface GeoCoordinate {
  latitude: number;
  longitude: number;
}

/**
 * A coordinate pair in GeoJSON axis order: `[longitude, latitude]`.
 */
export type LonLat = [longitude: number, latitude: number];

/**
 * Inclusive range of values.
 */
export interface NumericRange {
  min: number;
  max: number;
}

/**
 * Region that every entered coordinate must fall inside.
 */
export interface BoundingRegion {
  /** Name shown in range errors, e.g. "Queensland" */
  name: string;
  latitude: NumericRange;
  longitude: NumericRange;
}

/**
 * Axis-aligned box in GeoJSON order: `[minLon, minLat, maxLon, maxLat]`.
 */
export type LonLatBoundingBox = [number, number, number, number];

/**
 * Polygon produced by the coordinate parser.
 */
export interface ParsedPolygon {
  /** Closed ring in latitude-longitude order (first vertex repeated last) */
  coordinates: GeoCoordinate[];
  /** The same ring in longitude-latitude order */
  lonLat: LonLat[];
  /** Number of vertices, not counting the closing one */
  vertexCount: number;
}
