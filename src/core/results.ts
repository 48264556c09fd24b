import path from 'node:path';
import type { DownloadReport, JobOutcome, SearchResultSet } from '../types';
import { heading, truncate } from '../utils';

/** Datasets listed in a preview. */
export const PREVIEW_LIMIT = 10;
/** Datasets listed after a download. */
export const SAMPLE_LIMIT = 5;
/** Failed resources listed after a download. */
export const FAILURE_LIMIT = 10;

/**
 * Render the datasets found by a preview search.
 */
export function formatPreviewResults(searchResults: SearchResultSet): string {
  const datasets = searchResults.results;
  let text = `${heading('PREVIEW RESULTS')}\n\n`;
  text += `Found ${datasets.length} datasets matching your criteria:\n\n`;

  datasets.slice(0, PREVIEW_LIMIT).forEach((dataset, index) => {
    text += `${index + 1}. ${truncate(dataset.title, 80)}\n`;
    text += `   Resources: ${dataset.resources.length}\n`;
    text += `   Type: ${dataset.type ?? 'unknown'}\n\n`;
  });

  if (datasets.length > PREVIEW_LIMIT) {
    text += `... and ${datasets.length - PREVIEW_LIMIT} more datasets\n\n`;
  }

  text += 'To download these datasets, disable Preview Mode and run again.';
  return text;
}

/**
 * Render the outcome of a search-and-download run.
 */
export function formatDownloadReport(report: DownloadReport): string {
  let text = `${heading('DOWNLOAD COMPLETE!')}\n\n`;
  text += 'Summary:\n';
  text += `   Datasets found: ${report.totalDatasets}\n`;
  text += `   Resources downloaded: ${report.successfulDownloads}/${report.totalResources}\n`;
  text += `   Output directory: ${report.downloadDirectory}\n\n`;

  if (report.totalDatasets > 0) {
    text += 'Sample datasets downloaded:\n';
    report.searchResults.results.slice(0, SAMPLE_LIMIT).forEach((dataset, index) => {
      text += `   ${index + 1}. ${truncate(dataset.title, 60)}\n`;
      text += `      Resources: ${dataset.resources.length}\n`;
    });
    text += `\nFiles saved to: ${path.resolve(report.downloadDirectory)}`;
  }

  if (report.failures.length > 0) {
    text += `\n\nFailed resources (${report.failures.length}):\n`;
    text += report.failures
      .slice(0, FAILURE_LIMIT)
      .map((failure) => `   - ${failure.resourceName}: ${failure.error}`)
      .join('\n');
  }

  return text.trimEnd();
}

/**
 * Render any job outcome.
 */
export function formatJobOutcome(outcome: JobOutcome): string {
  return outcome.kind === 'preview'
    ? formatPreviewResults(outcome.searchResults)
    : formatDownloadReport(outcome.report);
}

/**
 * Render a job failure.
 */
export function formatJobError(message: string): string {
  return `Error: ${message}`;
}
