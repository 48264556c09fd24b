/**
 * Name of the file format entry selected when the form opens.
 */
export const DEFAULT_FILE_FORMAT = 'All Formats (Recommended)';

/**
 * Resource format filters keyed by display name. `null` keeps every format.
 */
export const FILE_FORMATS: Record<string, string[] | null> = {
  'All Formats (Recommended)': null,
  'PDF Reports': ['PDF'],
  'CSV Data Files': ['CSV'],
  'Excel Spreadsheets': ['XLSX'],
  'ZIP Archives': ['ZIP'],
  Shapefiles: ['SHP'],
  'GeoTIFF Images': ['TIF'],
  'Text Files': ['TXT'],
};
