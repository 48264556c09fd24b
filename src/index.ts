// Presenter and job runner
export { DownloaderController, DownloadJobRunner } from './core';
export type {
  Notifier,
  DirectoryPicker,
  FolderOpener,
  ViewState,
  DownloaderControllerOptions,
  JobContext,
  JobTask,
  JobListener,
  JobPlan,
  SummaryOptions,
} from './core';

// Search request building, summaries and result text
export {
  buildJobPlan,
  toSearchRequest,
  executeJobPlan,
  MATCH_ALL_QUERY,
  buildSearchQuery,
  describeSearchTerms,
  buildFilters,
  resolveResourceFormats,
  summarizeConfiguration,
  describeCoordinates,
  formatPreviewResults,
  formatDownloadReport,
  formatJobOutcome,
  formatJobError,
} from './core';

// Types
export type {
  // Geo types
  GeoCoordinate,
  LonLat,
  NumericRange,
  BoundingRegion,
  LonLatBoundingBox,
  ParsedPolygon,
  // Dataset types
  DatasetResource,
  DatasetRecord,
  SearchResultSet,
  ResourceFailure,
  DownloadReport,
  // Form and job types
  SearchMode,
  FormState,
  JobOutcome,
  JobStatus,
  JobEvent,
  // Config types
  DownloaderConfig,
} from './types';

// Type constants
export {
  SEARCH_MODES,
  MIN_MAX_DATASETS,
  MAX_MAX_DATASETS,
  DEFAULT_MAX_DATASETS,
  DEFAULT_CONFIG,
} from './types';

// Catalogs
export {
  REGIONS,
  CUSTOM_REGION,
  DEFAULT_REGION,
  EXAMPLE_COORDINATES,
  DATA_TYPES,
  DEFAULT_DATA_TYPE,
  REPORT_TYPE_FILTER,
  FILE_FORMATS,
  DEFAULT_FILE_FORMAT,
  getRegion,
  getDataType,
  getFileFormats,
} from './catalog';
export type { RegionDefinition, DataTypeDefinition } from './catalog';

// Schemas
export {
  SearchModeSchema,
  MaxDatasetsSchema,
  JobSettingsSchema,
  FootprintSchema,
  PackageSearchResponseSchema,
  EnvironmentSchema,
} from './schemas';

// Errors
export {
  ClientError,
  SearchError,
  DownloadError,
  ValidationError,
  CoordinateParseError,
  FetchError,
  JobInProgressError,
  JobCancelledError,
} from './errors';
export type { ValidationIssue, CoordinateErrorCode } from './errors';

// Geo utilities
export {
  QUEENSLAND_BOUNDS,
  describeBounds,
  parseCoordinates,
  toLonLat,
  formatCoordinates,
  toGeoJsonPolygon,
  getRingBoundingBox,
  footprintIntersects,
} from './geo';

// Clients
export { BaseClient, GsqPolygonClient } from './clients';
export type {
  PolygonSearchClient,
  PolygonSearchRequest,
  PolygonDownloadRequest,
  BaseClientConfig,
  GsqPolygonClientConfig,
} from './clients';

// Configuration
export { loadConfig } from './config';

// File helpers
export { ensureDirectory, directoryExists, openInFileBrowser } from './utils';
