// Geo types
export type {
  GeoCoordinate,
  LonLat,
  NumericRange,
  BoundingRegion,
  LonLatBoundingBox,
  ParsedPolygon,
} from './geo';

// Dataset types
export type {
  DatasetResource,
  DatasetRecord,
  SearchResultSet,
  ResourceFailure,
  DownloadReport,
} from './dataset';

// Form types
export type { SearchMode, FormState } from './form';
export { SEARCH_MODES, MIN_MAX_DATASETS, MAX_MAX_DATASETS, DEFAULT_MAX_DATASETS } from './form';

// Job types
export type { JobOutcome, JobStatus, JobEvent } from './job';

// Config types
export type { DownloaderConfig } from './config';
export { DEFAULT_CONFIG } from './config';
