/**
 * How the search query text is built.
 * - suggested: the data type's suggested terms
 * - custom: terms typed by the user
 * - all: match everything
 */
export type SearchMode = 'suggested' | 'custom' | 'all';

/**
 * All search modes.
 */
export const SEARCH_MODES: SearchMode[] = ['suggested', 'custom', 'all'];

/**
 * Current selections of the downloader form.
 */
export interface FormState {
  /** Name of the selected region in the region catalog */
  region: string;
  /** Raw coordinate text, one `latitude,longitude` pair per line */
  coordinatesText: string;
  /** Name of the selected data type in the data type catalog */
  dataType: string;
  searchMode: SearchMode;
  customTerms: string;
  /** Name of the selected entry in the file format catalog */
  fileFormat: string;
  /** Maximum datasets exactly as typed */
  maxDatasets: string;
  outputDirectory: string;
  preciseFiltering: boolean;
  previewMode: boolean;
}

/**
 * Lowest and highest accepted maximum dataset count.
 */
export const MIN_MAX_DATASETS = 1;
export const MAX_MAX_DATASETS = 1000;

/**
 * Default maximum dataset count shown in the form.
 */
export const DEFAULT_MAX_DATASETS = 20;
