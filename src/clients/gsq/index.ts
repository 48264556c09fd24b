export { GsqPolygonClient } from './gsq-polygon.client';
export type { GsqPolygonClientConfig } from './gsq-polygon.client';
