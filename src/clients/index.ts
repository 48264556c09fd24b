// Collaborator contract
export type {
  PolygonSearchClient,
  PolygonSearchRequest,
  PolygonDownloadRequest,
} from './polygon-client';

// Base client for building custom clients
export { BaseClient } from './base-client';
export type { BaseClientConfig } from './base-client';

// GSQ open data portal
export { GsqPolygonClient } from './gsq';
export type { GsqPolygonClientConfig } from './gsq';
