import type { DownloadReport, LonLat, SearchResultSet } from '../types';

/**
 * Parameters of a polygon-constrained dataset search.
 */
export interface PolygonSearchRequest {
  /** Closed ring in `[longitude, latitude]` order */
  polygon: LonLat[];
  /** Solr query text, e.g. `geology OR mining` or `*:*` */
  query: string;
  /** Solr filter queries, combined with AND */
  filters: string[];
  /** Maximum number of datasets to return */
  maxResults: number;
  /** Run an exact footprint/polygon intersection test on every candidate */
  preciseFiltering: boolean;
  /** Aborting this signal stops the request at the next await point */
  signal?: AbortSignal;
}

/**
 * Parameters of a search followed by a bulk resource download.
 */
export interface PolygonDownloadRequest extends PolygonSearchRequest {
  /** Directory the resources are saved under (created when missing) */
  destinationDirectory: string;
  /** Upper-case resource formats to download; null downloads every format */
  resourceFormats: string[] | null;
}

/**
 * Collaborator that performs polygon searches and downloads.
 *
 * Either call resolves with a complete payload or rejects; there is no
 * partial-progress contract.
 */
export interface PolygonSearchClient {
  /** Identifier used in error messages */
  readonly id: string;

  /**
   * Find datasets inside the polygon without downloading anything.
   */
  search(request: PolygonSearchRequest): Promise<SearchResultSet>;

  /**
   * Find datasets inside the polygon and save their resources.
   */
  searchAndDownload(request: PolygonDownloadRequest): Promise<DownloadReport>;
}
