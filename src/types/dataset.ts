import type { Geometry } from 'geojson';

/**
 * A downloadable file attached to a dataset.
 */
export interface DatasetResource {
  id: string;
  name: string;
  url: string;
  /** Upper-case format tag, e.g. "PDF"; empty when the catalogue has none */
  format: string;
}

/**
 * A dataset record returned by a polygon search.
 */
export interface DatasetRecord {
  id: string;
  /** URL-safe dataset name, used as the download sub-directory */
  name: string;
  title: string;
  /** Dataset type tag, e.g. "report" */
  type?: string;
  resources: DatasetResource[];
  /** Spatial footprint, when the catalogue publishes one */
  footprint?: Geometry;
}

/**
 * Datasets matched by a search.
 */
export interface SearchResultSet {
  results: DatasetRecord[];
  /** Number of matches the catalogue reported before polygon filtering */
  count: number;
}

/**
 * A resource that could not be saved.
 */
export interface ResourceFailure {
  datasetName: string;
  resourceName: string;
  url: string;
  error: string;
  /** HTTP status of the failed request, if the server answered */
  statusCode?: number;
}

/**
 * Summary of a search-and-download run.
 */
export interface DownloadReport {
  totalDatasets: number;
  /** Resources selected for download after the format filter */
  totalResources: number;
  successfulDownloads: number;
  downloadDirectory: string;
  searchResults: SearchResultSet;
  failures: ResourceFailure[];
}
