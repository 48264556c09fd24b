export {
  REGIONS,
  CUSTOM_REGION,
  DEFAULT_REGION,
  EXAMPLE_COORDINATES,
} from './regions';
export type { RegionDefinition } from './regions';

export {
  DATA_TYPES,
  DEFAULT_DATA_TYPE,
  SUGGESTED_TERM_COUNT,
  REPORT_TYPE_FILTER,
} from './data-types';
export type { DataTypeDefinition } from './data-types';

export { FILE_FORMATS, DEFAULT_FILE_FORMAT } from './file-formats';

export { getRegion, getDataType, getFileFormats } from './lookup';
