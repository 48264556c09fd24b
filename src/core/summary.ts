import type { BoundingRegion, FormState } from '../types';
import { CoordinateParseError } from '../errors';
import { QUEENSLAND_BOUNDS, parseCoordinates } from '../geo';
import { heading, yesNo } from '../utils';
import { describeSearchTerms } from './search-request';

/**
 * Options for building the configuration summary.
 */
export interface SummaryOptions {
  /** Region coordinates are validated against (default: Queensland) */
  bounds?: BoundingRegion;
}

/**
 * Describe the coordinate text as a polygon status line.
 */
export function describeCoordinates(
  text: string,
  bounds: BoundingRegion = QUEENSLAND_BOUNDS
): string {
  try {
    const polygon = parseCoordinates(text, bounds);
    return `Valid polygon with ${polygon.vertexCount} vertices`;
  } catch (error) {
    if (error instanceof CoordinateParseError) {
      return 'Invalid or missing coordinates';
    }
    throw error;
  }
}

/**
 * Render a human-readable preview of the current form selections.
 *
 * Never throws: coordinate problems are reported in the text, and any other
 * failure is rendered as an "Error updating summary" line.
 */
export function summarizeConfiguration(form: FormState, options: SummaryOptions = {}): string {
  try {
    const terms = describeSearchTerms(form.searchMode, form.dataType, form.customTerms);
    const coordinates = describeCoordinates(form.coordinatesText, options.bounds);

    return [
      heading('DOWNLOAD CONFIGURATION'),
      '',
      `Search Area: ${form.region}`,
      `   Coordinates: ${coordinates}`,
      '',
      `Data Type: ${form.dataType}`,
      `   Search Terms: ${terms}`,
      `   File Formats: ${form.fileFormat}`,
      '',
      'Settings:',
      `   Max Datasets: ${form.maxDatasets}`,
      `   Output Directory: ${form.outputDirectory}`,
      `   Precise Filtering: ${yesNo(form.preciseFiltering)}`,
      `   Preview Mode: ${yesNo(form.previewMode)}`,
      '',
      `Status: ${form.previewMode ? 'Ready for preview' : 'Ready for download'}`,
    ].join('\n');
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return `Error updating summary: ${message}`;
  }
}
