import { ValidationError } from '../errors';
import { REGIONS } from './regions';
import type { RegionDefinition } from './regions';
import { DATA_TYPES } from './data-types';
import type { DataTypeDefinition } from './data-types';
import { FILE_FORMATS } from './file-formats';

function lookup<T>(table: Record<string, T>, name: string, label: string): T {
  if (!Object.prototype.hasOwnProperty.call(table, name)) {
    throw new ValidationError(`Unknown ${label}: ${name}`, [
      { path: label, message: `Unknown ${label}: ${name}`, code: 'unknown_option' },
    ]);
  }
  return table[name];
}

/**
 * Get a region by display name.
 *
 * @throws ValidationError if the region is not in the catalog
 */
export function getRegion(name: string): RegionDefinition {
  return lookup(REGIONS, name, 'region');
}

/**
 * Get a data type by display name.
 *
 * @throws ValidationError if the data type is not in the catalog
 */
export function getDataType(name: string): DataTypeDefinition {
  return lookup(DATA_TYPES, name, 'data type');
}

/**
 * Get the resource formats for a file format entry (null = all formats).
 *
 * @throws ValidationError if the entry is not in the catalog
 */
export function getFileFormats(name: string): string[] | null {
  return lookup(FILE_FORMATS, name, 'file format');
}
