import { describe, expect, it } from 'vitest';
import {
  MATCH_ALL_QUERY,
  buildFilters,
  buildSearchQuery,
  describeSearchTerms,
  resolveResourceFormats,
} from './search-request';

describe('buildSearchQuery', () => {
  it('uses the first three suggested terms of the data type', () => {
    expect(buildSearchQuery('suggested', 'Geochemistry Data', '')).toBe(
      'geochemistry OR chemical analysis OR assay'
    );
    expect(buildSearchQuery('suggested', 'All Data Types (Recommended)', 'ignored')).toBe(
      'geology OR mining OR exploration'
    );
  });

  it('joins custom terms with OR', () => {
    expect(buildSearchQuery('custom', 'Mining Data', '  copper   gold\tmining ')).toBe(
      'copper OR gold OR mining'
    );
  });

  it('matches everything when custom terms are empty', () => {
    expect(buildSearchQuery('custom', 'Mining Data', '   ')).toBe(MATCH_ALL_QUERY);
  });

  it('matches everything in all mode', () => {
    expect(buildSearchQuery('all', 'Mining Data', 'copper')).toBe('*:*');
  });
});

describe('describeSearchTerms', () => {
  it('describes each mode', () => {
    expect(describeSearchTerms('all', 'Mining Data', '')).toBe('*:* (everything)');
    expect(describeSearchTerms('custom', 'Mining Data', '')).toBe('No terms');
    expect(describeSearchTerms('custom', 'Mining Data', 'zinc lead')).toBe('zinc OR lead');
    expect(describeSearchTerms('suggested', 'Hydrogeology Data', '')).toBe(
      'hydrogeology OR groundwater OR aquifer'
    );
  });
});

describe('buildFilters', () => {
  it('adds the category filter before the report filter', () => {
    expect(buildFilters('Geological Data')).toEqual([
      'earth_science_data_category:geology',
      'type:report',
    ]);
  });

  it('uses only the report filter for all data types', () => {
    expect(buildFilters('All Data Types (Recommended)')).toEqual(['type:report']);
  });

  it('rejects unknown data types', () => {
    expect(() => buildFilters('Unknown')).toThrow('Unknown data type: Unknown');
  });
});

describe('resolveResourceFormats', () => {
  it('returns a copy of the catalog entry', () => {
    const formats = resolveResourceFormats('CSV Data Files');
    formats?.push('XLS');

    expect(resolveResourceFormats('CSV Data Files')).toEqual(['CSV']);
  });

  it('returns null for all formats', () => {
    expect(resolveResourceFormats('All Formats (Recommended)')).toBeNull();
  });
});
