import type { BoundingRegion, GeoCoordinate, LonLat, ParsedPolygon } from '../types';
import { CoordinateParseError } from '../errors';
import { QUEENSLAND_BOUNDS, isInRange } from './bounds';

/**
 * Separator between latitude and longitude on a line.
 */
export const COORDINATE_SEPARATOR = ',';

/**
 * Fewest coordinates accepted for a polygon.
 */
export const MIN_POLYGON_COORDINATES = 3;

const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

function parseDecimal(token: string): number | undefined {
  const trimmed = token.trim();
  if (!DECIMAL_PATTERN.test(trimmed)) {
    return undefined;
  }
  const value = Number(trimmed);
  return Number.isFinite(value) ? value : undefined;
}

function parseLine(line: string, lineNumber: number, bounds: BoundingRegion): GeoCoordinate {
  if (!line.includes(COORDINATE_SEPARATOR)) {
    throw new CoordinateParseError(
      'INVALID_FORMAT',
      `Invalid format: ${line}. Use latitude,longitude`,
      { line, lineNumber }
    );
  }

  const tokens = line.split(COORDINATE_SEPARATOR);
  if (tokens.length !== 2) {
    throw new CoordinateParseError(
      'PARSE_ERROR',
      `Error parsing line '${line}': expected exactly one '${COORDINATE_SEPARATOR}'`,
      { line, lineNumber }
    );
  }

  const [latToken, lonToken] = tokens;
  const latitude = parseDecimal(latToken);
  const longitude = parseDecimal(lonToken);

  if (latitude === undefined || longitude === undefined) {
    const bad = latitude === undefined ? latToken.trim() : lonToken.trim();
    throw new CoordinateParseError(
      'PARSE_ERROR',
      `Error parsing line '${line}': '${bad}' is not a number`,
      { line, lineNumber }
    );
  }

  if (!isInRange(latitude, bounds.latitude)) {
    throw new CoordinateParseError(
      'LATITUDE_OUT_OF_RANGE',
      `Latitude ${latitude} outside ${bounds.name} range (${bounds.latitude.min} to ${bounds.latitude.max})`,
      { line, lineNumber, field: 'latitude', value: latitude }
    );
  }

  if (!isInRange(longitude, bounds.longitude)) {
    throw new CoordinateParseError(
      'LONGITUDE_OUT_OF_RANGE',
      `Longitude ${longitude} outside ${bounds.name} range (${bounds.longitude.min} to ${bounds.longitude.max})`,
      { line, lineNumber, field: 'longitude', value: longitude }
    );
  }

  return { latitude, longitude };
}

function sameCoordinate(a: GeoCoordinate, b: GeoCoordinate): boolean {
  return a.latitude === b.latitude && a.longitude === b.longitude;
}

/**
 * Parse `latitude,longitude` lines into a closed polygon ring.
 *
 * Blank lines are skipped. The ring is closed by repeating the first
 * coordinate unless the input already ends where it starts.
 *
 * @param text - Raw text, one coordinate per line
 * @param bounds - Region every coordinate must fall inside
 * @throws CoordinateParseError describing the first offending line
 */
export function parseCoordinates(
  text: string,
  bounds: BoundingRegion = QUEENSLAND_BOUNDS
): ParsedPolygon {
  if (text.trim().length === 0) {
    throw new CoordinateParseError('NO_COORDINATES', 'No coordinates entered');
  }

  const coordinates: GeoCoordinate[] = [];
  const lines = text.split('\n');

  lines.forEach((rawLine, index) => {
    const line = rawLine.trim();
    if (line.length === 0) {
      return;
    }
    coordinates.push(parseLine(line, index + 1, bounds));
  });

  if (coordinates.length < MIN_POLYGON_COORDINATES) {
    throw new CoordinateParseError(
      'TOO_FEW_COORDINATES',
      `Need at least ${MIN_POLYGON_COORDINATES} coordinates`
    );
  }

  const first = coordinates[0];
  if (!sameCoordinate(first, coordinates[coordinates.length - 1])) {
    coordinates.push({ ...first });
  }

  return {
    coordinates,
    lonLat: toLonLat(coordinates),
    vertexCount: coordinates.length - 1,
  };
}

/**
 * Swap each coordinate into `[longitude, latitude]` order.
 */
export function toLonLat(coordinates: GeoCoordinate[]): LonLat[] {
  return coordinates.map((c) => [c.longitude, c.latitude]);
}

/**
 * Render coordinates as `latitude,longitude` lines.
 */
export function formatCoordinates(coordinates: GeoCoordinate[]): string {
  return coordinates.map((c) => `${c.latitude}${COORDINATE_SEPARATOR}${c.longitude}`).join('\n');
}
