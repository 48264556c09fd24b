import { describe, expect, it } from 'vitest';
import type { LonLat } from '../types';
import {
  footprintIntersects,
  formatBoundingBox,
  getRingBoundingBox,
  toGeoJsonPolygon,
} from './polygon';

const RING: LonLat[] = [
  [139, -21],
  [141, -21],
  [141, -20],
  [139, -20],
  [139, -21],
];

describe('toGeoJsonPolygon', () => {
  it('wraps the ring as a single-ring polygon', () => {
    expect(toGeoJsonPolygon(RING)).toEqual({
      type: 'Polygon',
      coordinates: [RING],
    });
  });
});

describe('getRingBoundingBox', () => {
  it('returns min and max longitude and latitude', () => {
    expect(getRingBoundingBox(RING)).toEqual([139, -21, 141, -20]);
  });

  it('formats as an ext_bbox value', () => {
    expect(formatBoundingBox(getRingBoundingBox(RING))).toBe('139,-21,141,-20');
  });
});

describe('footprintIntersects', () => {
  it('matches a point inside the ring', () => {
    expect(footprintIntersects({ type: 'Point', coordinates: [140, -20.5] }, RING)).toBe(true);
  });

  it('rejects a point outside the ring', () => {
    expect(footprintIntersects({ type: 'Point', coordinates: [150, -25] }, RING)).toBe(false);
  });

  it('matches an overlapping polygon', () => {
    const footprint = {
      type: 'Polygon' as const,
      coordinates: [
        [
          [140.5, -20.5],
          [142, -20.5],
          [142, -19],
          [140.5, -19],
          [140.5, -20.5],
        ],
      ],
    };

    expect(footprintIntersects(footprint, RING)).toBe(true);
  });

  it('rejects a polygon whose bounding box overlaps but whose shape does not', () => {
    // Triangle in the corner of the ring's box, outside a diagonal search ring
    const diagonal: LonLat[] = [
      [139, -21],
      [141, -21],
      [139, -20],
      [139, -21],
    ];
    const footprint = {
      type: 'Polygon' as const,
      coordinates: [
        [
          [140.8, -20.2],
          [141, -20.2],
          [141, -20],
          [140.8, -20.2],
        ],
      ],
    };

    expect(footprintIntersects(footprint, diagonal)).toBe(false);
  });
});
