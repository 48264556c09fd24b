import type { BoundingRegion, FormState, JobOutcome, ParsedPolygon } from '../types';
import type { PolygonSearchClient, PolygonSearchRequest } from '../clients';
import { JobSettingsSchema } from '../schemas';
import { ValidationError } from '../errors';
import { QUEENSLAND_BOUNDS, parseCoordinates } from '../geo';
import { buildFilters, buildSearchQuery, resolveResourceFormats } from './search-request';
import type { JobContext } from './download-job';

/**
 * Everything a background job needs, resolved from the form.
 */
export interface JobPlan {
  polygon: ParsedPolygon;
  query: string;
  filters: string[];
  resourceFormats: string[] | null;
  maxResults: number;
  outputDirectory: string;
  preciseFiltering: boolean;
  previewMode: boolean;
}

/**
 * Validate the form and resolve it into a job plan.
 *
 * Coordinates are checked first, then the numeric settings and the
 * catalog selections.
 *
 * @throws CoordinateParseError for bad coordinate text
 * @throws ValidationError for bad settings or unknown catalog entries
 */
export function buildJobPlan(form: FormState, bounds: BoundingRegion = QUEENSLAND_BOUNDS): JobPlan {
  const polygon = parseCoordinates(form.coordinatesText, bounds);

  const settings = JobSettingsSchema.safeParse({
    maxDatasets: form.maxDatasets,
    outputDirectory: form.outputDirectory,
  });
  if (!settings.success) {
    throw ValidationError.fromZodError(settings.error);
  }

  return {
    polygon,
    query: buildSearchQuery(form.searchMode, form.dataType, form.customTerms),
    filters: buildFilters(form.dataType),
    resourceFormats: resolveResourceFormats(form.fileFormat),
    maxResults: settings.data.maxDatasets,
    outputDirectory: settings.data.outputDirectory,
    preciseFiltering: form.preciseFiltering,
    previewMode: form.previewMode,
  };
}

/**
 * Build the collaborator search request for a plan.
 */
export function toSearchRequest(plan: JobPlan, signal?: AbortSignal): PolygonSearchRequest {
  return {
    polygon: plan.polygon.lonLat,
    query: plan.query,
    filters: plan.filters,
    maxResults: plan.maxResults,
    preciseFiltering: plan.preciseFiltering,
    signal,
  };
}

/**
 * Run a plan against the collaborator: a search in preview mode, otherwise a
 * search followed by a download.
 */
export async function executeJobPlan(
  client: PolygonSearchClient,
  plan: JobPlan,
  context: JobContext
): Promise<JobOutcome> {
  context.reportProgress('Preparing download...');
  const request = toSearchRequest(plan, context.signal);

  context.reportProgress('Searching for datasets...');
  if (plan.previewMode) {
    const searchResults = await client.search(request);
    return { kind: 'preview', searchResults };
  }

  const report = await client.searchAndDownload({
    ...request,
    destinationDirectory: plan.outputDirectory,
    resourceFormats: plan.resourceFormats,
  });
  return { kind: 'download', report };
}
