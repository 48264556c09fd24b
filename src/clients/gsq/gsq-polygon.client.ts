import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';
import type {
  DatasetRecord,
  DatasetResource,
  DownloadReport,
  LonLat,
  ResourceFailure,
  SearchResultSet,
} from '../../types';
import type { CkanPackage, Footprint } from '../../schemas';
import { FootprintSchema, PackageSearchResponseSchema } from '../../schemas';
import { DownloadError, FetchError, JobCancelledError, SearchError } from '../../errors';
import { footprintIntersects, formatBoundingBox, getRingBoundingBox } from '../../geo';
import { ensureDirectory, fileNameFromUrl, sanitizeFileName } from '../../utils';
import { BaseClient } from '../base-client';
import type { BaseClientConfig } from '../base-client';
import type { PolygonDownloadRequest, PolygonSearchRequest } from '../polygon-client';

/**
 * GSQ polygon client configuration.
 */
export interface GsqPolygonClientConfig extends BaseClientConfig {
  /** Catalogue base URL. Default: https://geoscience.data.qld.gov.au */
  apiUrl?: string;
  /** Rows requested per `package_search` page. Default: 100 */
  pageSize?: number;
}

const DEFAULT_API_URL = 'https://geoscience.data.qld.gov.au';
const DEFAULT_PAGE_SIZE = 100;
const PACKAGE_SEARCH_PATH = '/api/3/action/package_search';

/**
 * Read the footprint a package publishes, either as a top-level `spatial`
 * field or as a `spatial` extra.
 */
function readFootprint(pkg: CkanPackage): Footprint | undefined {
  const raw = pkg.spatial ?? pkg.extras?.find((extra) => extra.key === 'spatial')?.value;
  if (!raw) {
    return undefined;
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    return undefined;
  }

  const parsed = FootprintSchema.safeParse(json);
  return parsed.success ? parsed.data : undefined;
}

function toDatasetRecord(pkg: CkanPackage): DatasetRecord {
  const resources: DatasetResource[] = pkg.resources.map((resource) => ({
    id: resource.id,
    name: resource.name?.trim() || fileNameFromUrl(resource.url, resource.id),
    url: resource.url,
    format: (resource.format ?? '').trim().toUpperCase(),
  }));

  return {
    id: pkg.id,
    name: pkg.name,
    title: pkg.title?.trim() || pkg.name,
    type: pkg.type ?? undefined,
    resources,
    footprint: readFootprint(pkg),
  };
}

/**
 * Client for the Geological Survey of Queensland open data portal.
 *
 * The portal is a CKAN catalogue with the spatial extension: `ext_bbox`
 * narrows results to datasets whose extent overlaps the polygon's bounding
 * box, and precise filtering then tests each footprint against the polygon
 * itself.
 *
 * @see https://geoscience.data.qld.gov.au/
 */
export class GsqPolygonClient extends BaseClient {
  readonly id = 'gsq-ckan';

  private readonly apiUrl: string;
  private readonly pageSize: number;

  constructor(config?: GsqPolygonClientConfig) {
    super(config);
    this.apiUrl = (config?.apiUrl ?? DEFAULT_API_URL).replace(/\/+$/, '');
    this.pageSize = config?.pageSize ?? DEFAULT_PAGE_SIZE;
  }

  async search(request: PolygonSearchRequest): Promise<SearchResultSet> {
    const { polygon, maxResults, preciseFiltering, signal } = request;
    const bbox = formatBoundingBox(getRingBoundingBox(polygon));

    const results: DatasetRecord[] = [];
    let count = 0;
    let start = 0;

    while (results.length < maxResults) {
      this.throwIfCancelled(signal);

      // Without precise filtering every row is kept, so don't over-fetch
      const rows = preciseFiltering
        ? this.pageSize
        : Math.min(this.pageSize, maxResults - results.length);

      const page = await this.fetchPage(request, bbox, start, rows);
      count = page.count;

      for (const pkg of page.results) {
        const record = toDatasetRecord(pkg);
        if (preciseFiltering && !this.footprintMatches(record, polygon)) {
          continue;
        }
        results.push(record);
        if (results.length >= maxResults) {
          break;
        }
      }

      start += page.results.length;
      if (page.results.length === 0 || start >= page.count) {
        break;
      }
    }

    return { results, count };
  }

  async searchAndDownload(request: PolygonDownloadRequest): Promise<DownloadReport> {
    const searchResults = await this.search(request);
    const { signal } = request;
    const downloadDirectory = await ensureDirectory(request.destinationDirectory);
    const formats = request.resourceFormats?.map((f) => f.toUpperCase()) ?? null;

    let totalResources = 0;
    let successfulDownloads = 0;
    const failures: ResourceFailure[] = [];

    for (const dataset of searchResults.results) {
      const selected = dataset.resources.filter(
        (resource) => formats === null || formats.includes(resource.format)
      );
      if (selected.length === 0) {
        continue;
      }

      totalResources += selected.length;
      const datasetDirectory = path.join(downloadDirectory, sanitizeFileName(dataset.name));
      await mkdir(datasetDirectory, { recursive: true });
      const usedNames = new Set<string>();

      for (const resource of selected) {
        this.throwIfCancelled(signal);

        let fileName = fileNameFromUrl(resource.url, resource.name);
        if (usedNames.has(fileName)) {
          fileName = sanitizeFileName(`${resource.id}-${fileName}`);
        }
        usedNames.add(fileName);

        try {
          const bytes = await this.fetchBytes(resource.url, signal);
          await writeFile(path.join(datasetDirectory, fileName), bytes);
          successfulDownloads++;
        } catch (error) {
          if (error instanceof JobCancelledError) {
            throw error;
          }
          const cause = error instanceof Error ? error : new Error(String(error));
          console.warn(
            'GSQ resource skipped:',
            new DownloadError(this.id, resource.url, cause.message, cause)
          );
          failures.push({
            datasetName: dataset.name,
            resourceName: resource.name,
            url: resource.url,
            error: cause.message,
            statusCode: error instanceof FetchError ? error.statusCode : undefined,
          });
        }
      }
    }

    return {
      totalDatasets: searchResults.results.length,
      totalResources,
      successfulDownloads,
      downloadDirectory,
      searchResults,
      failures,
    };
  }

  private footprintMatches(record: DatasetRecord, polygon: LonLat[]): boolean {
    if (!record.footprint) {
      return false;
    }
    try {
      return footprintIntersects(record.footprint, polygon);
    } catch (error) {
      console.warn(`GSQ footprint of ${record.name} ignored:`, error);
      return false;
    }
  }

  /**
   * Build the `package_search` URL for one page.
   */
  buildSearchUrl(
    request: Pick<PolygonSearchRequest, 'query' | 'filters'>,
    bbox: string,
    start: number,
    rows: number
  ): string {
    const params = new URLSearchParams({
      q: request.query,
      rows: String(rows),
      start: String(start),
      ext_bbox: bbox,
    });
    if (request.filters.length > 0) {
      params.set('fq', request.filters.join(' AND '));
    }
    return `${this.apiUrl}${PACKAGE_SEARCH_PATH}?${params.toString()}`;
  }

  private async fetchPage(
    request: PolygonSearchRequest,
    bbox: string,
    start: number,
    rows: number
  ): Promise<{ count: number; results: CkanPackage[] }> {
    const url = this.buildSearchUrl(request, bbox, start, rows);
    const body = await this.fetchJson(url, request.signal);

    const parsed = PackageSearchResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new SearchError(this.id, 'unexpected response from catalogue');
    }

    const { success, result, error } = parsed.data;
    if (!success || !result) {
      throw new SearchError(this.id, error?.message ?? 'catalogue reported an error');
    }

    return result;
  }
}
