export { QUEENSLAND_BOUNDS, isInRange, describeBounds } from './bounds';

export {
  COORDINATE_SEPARATOR,
  MIN_POLYGON_COORDINATES,
  parseCoordinates,
  toLonLat,
  formatCoordinates,
} from './coordinates';

export {
  toGeoJsonPolygon,
  getRingBoundingBox,
  formatBoundingBox,
  footprintIntersects,
} from './polygon';
