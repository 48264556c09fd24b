/**
 * A selectable data type category.
 */
export interface DataTypeDefinition {
  /** Solr filter query restricting the category, or null for all data */
  filter: string | null;
  /** Suggested search terms, most relevant first */
  terms: string[];
}

/**
 * Name of the data type selected when the form opens.
 */
export const DEFAULT_DATA_TYPE = 'All Data Types (Recommended)';

/**
 * Number of suggested terms used to build a query.
 */
export const SUGGESTED_TERM_COUNT = 3;

/**
 * Filter added to every search so only report datasets are returned.
 */
export const REPORT_TYPE_FILTER = 'type:report';

export const DATA_TYPES: Record<string, DataTypeDefinition> = {
  'All Data Types (Recommended)': {
    filter: null,
    terms: ['geology', 'mining', 'exploration', 'geochemistry', 'geophysics'],
  },
  'Geochemistry Data': {
    filter: 'earth_science_data_category:geochemistry',
    terms: ['geochemistry', 'chemical analysis', 'assay', 'elements'],
  },
  'Geophysics Data': {
    filter: 'earth_science_data_category:geophysics',
    terms: ['geophysics', 'magnetic', 'gravity', 'seismic'],
  },
  'Geological Data': {
    filter: 'earth_science_data_category:geology',
    terms: ['geology', 'geological', 'structure', 'stratigraphy'],
  },
  'Mining Data': {
    filter: 'earth_science_data_category:mining',
    terms: ['mining', 'exploration', 'resource', 'reserve'],
  },
  'Hydrogeology Data': {
    filter: 'earth_science_data_category:hydrogeology',
    terms: ['hydrogeology', 'groundwater', 'aquifer', 'water'],
  },
};
