// Form schemas
export { SearchModeSchema, MaxDatasetsSchema, JobSettingsSchema } from './form.schema';
export type { JobSettings } from './form.schema';

// Catalogue response schemas
export {
  PositionSchema,
  FootprintSchema,
  CkanResourceSchema,
  CkanExtraSchema,
  CkanPackageSchema,
  PackageSearchResponseSchema,
} from './ckan.schema';
export type { CkanResource, CkanPackage, PackageSearchResponse, Footprint } from './ckan.schema';

// Configuration schema
export { EnvironmentSchema } from './config.schema';
export type { EnvironmentSchemaType } from './config.schema';
