import type { BoundingRegion, NumericRange } from '../types';

/**
 * Queensland bounds accepted by the GSQ catalogue front end.
 */
export const QUEENSLAND_BOUNDS: BoundingRegion = {
  name: 'Queensland',
  latitude: { min: -29, max: -10 },
  longitude: { min: 138, max: 154 },
};

/**
 * Check whether a value lies within an inclusive range.
 */
export function isInRange(value: number, range: NumericRange): boolean {
  return value >= range.min && value <= range.max;
}

/**
 * Human-readable description of a region's bounds, used in form hints.
 */
export function describeBounds(bounds: BoundingRegion): string {
  return (
    `${bounds.name} range: Latitude ${bounds.latitude.min} to ${bounds.latitude.max}, ` +
    `Longitude ${bounds.longitude.min} to ${bounds.longitude.max}`
  );
}
