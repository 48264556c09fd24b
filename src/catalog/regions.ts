import type { GeoCoordinate } from '../types';

/**
 * A selectable search region.
 */
export interface RegionDefinition {
  description: string;
  /** Closed ring in latitude-longitude order; null for a user-drawn polygon */
  coordinates: GeoCoordinate[] | null;
}

/**
 * Name of the region entry that leaves the coordinates to the user.
 */
export const CUSTOM_REGION = 'Custom Polygon';

/**
 * Name of the region selected when the form opens.
 */
export const DEFAULT_REGION = 'Mount Isa Mineral Province';

function ring(...pairs: Array<[number, number]>): GeoCoordinate[] {
  return pairs.map(([latitude, longitude]) => ({ latitude, longitude }));
}

/**
 * Predefined Queensland search regions, keyed by display name.
 */
export const REGIONS: Record<string, RegionDefinition> = {
  'Mount Isa Mineral Province': {
    description: 'Major copper, lead, zinc mining region',
    coordinates: ring([-21.0, 139.0], [-21.0, 141.0], [-20.0, 141.0], [-20.0, 139.0], [-21.0, 139.0]),
  },
  'Bowen Basin Coal Region': {
    description: 'Major coal mining and sedimentary basin',
    coordinates: ring([-23.0, 147.0], [-23.0, 150.5], [-20.0, 150.5], [-20.0, 147.0], [-23.0, 147.0]),
  },
  'Brisbane Metropolitan Region': {
    description: 'Urban geology and environmental data',
    coordinates: ring([-27.8, 152.5], [-27.8, 153.5], [-27.0, 153.5], [-27.0, 152.5], [-27.8, 152.5]),
  },
  'Cairns Region': {
    description: 'Tropical geology and mineral exploration',
    coordinates: ring([-17.2, 145.0], [-17.2, 146.0], [-16.5, 146.0], [-16.5, 145.0], [-17.2, 145.0]),
  },
  'Great Barrier Reef Catchment': {
    description: 'Environmental and marine geological data',
    coordinates: ring([-25.0, 145.0], [-25.0, 154.0], [-10.0, 154.0], [-10.0, 145.0], [-25.0, 145.0]),
  },
  [CUSTOM_REGION]: {
    description: 'Enter your own coordinates',
    coordinates: null,
  },
};

/**
 * Coordinates loaded by the "Load Example" action.
 */
export const EXAMPLE_COORDINATES: GeoCoordinate[] = ring(
  [-21.0, 139.0],
  [-21.0, 141.0],
  [-20.0, 141.0],
  [-20.0, 139.0],
  [-21.0, 139.0]
);
