import type { SearchMode } from '../types';
import { REPORT_TYPE_FILTER, SUGGESTED_TERM_COUNT, getDataType, getFileFormats } from '../catalog';

/**
 * Solr query that matches every dataset.
 */
export const MATCH_ALL_QUERY = '*:*';

const TERM_JOINER = ' OR ';

function splitTerms(text: string): string[] {
  return text.trim().split(/\s+/).filter((term) => term.length > 0);
}

/**
 * Build the Solr query text for a search.
 *
 * - suggested: the data type's first suggested terms joined with OR
 * - custom: the typed terms joined with OR, or match-all when none were typed
 * - all: match-all
 *
 * @throws ValidationError if `suggested` is used with an unknown data type
 */
export function buildSearchQuery(mode: SearchMode, dataType: string, customTerms: string): string {
  switch (mode) {
    case 'suggested':
      return getDataType(dataType).terms.slice(0, SUGGESTED_TERM_COUNT).join(TERM_JOINER);
    case 'custom': {
      const terms = splitTerms(customTerms);
      return terms.length > 0 ? terms.join(TERM_JOINER) : MATCH_ALL_QUERY;
    }
    case 'all':
      return MATCH_ALL_QUERY;
  }
}

/**
 * Describe the search terms for display in the configuration summary.
 *
 * Same as {@link buildSearchQuery} except that an empty custom search reads
 * "No terms" and match-all reads "*:* (everything)".
 */
export function describeSearchTerms(mode: SearchMode, dataType: string, customTerms: string): string {
  if (mode === 'all') {
    return `${MATCH_ALL_QUERY} (everything)`;
  }
  if (mode === 'custom' && splitTerms(customTerms).length === 0) {
    return 'No terms';
  }
  return buildSearchQuery(mode, dataType, customTerms);
}

/**
 * Build the filter queries for a data type: its category filter (if any),
 * followed by the report type filter.
 *
 * @throws ValidationError if the data type is unknown
 */
export function buildFilters(dataType: string): string[] {
  const { filter } = getDataType(dataType);
  return filter ? [filter, REPORT_TYPE_FILTER] : [REPORT_TYPE_FILTER];
}

/**
 * Resolve the resource formats for a file format entry (null = all formats).
 *
 * @throws ValidationError if the entry is unknown
 */
export function resolveResourceFormats(fileFormat: string): string[] | null {
  const formats = getFileFormats(fileFormat);
  return formats ? [...formats] : null;
}
