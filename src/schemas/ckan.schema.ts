import { z } from 'zod';

/**
 * Schema for a GeoJSON position (extra ordinates allowed).
 */
export const PositionSchema = z.tuple([z.number(), z.number()]).rest(z.number());

const LineSchema = z.array(PositionSchema).min(2);
const LinearRingSchema = z.array(PositionSchema).min(4);
const PolygonRingsSchema = z.array(LinearRingSchema).min(1);

/**
 * Schema for the dataset footprint geometries the catalogue publishes.
 * Empty geometries are rejected.
 */
export const FootprintSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('Point'), coordinates: PositionSchema }),
  z.object({ type: z.literal('MultiPoint'), coordinates: z.array(PositionSchema).min(1) }),
  z.object({ type: z.literal('LineString'), coordinates: LineSchema }),
  z.object({ type: z.literal('Polygon'), coordinates: PolygonRingsSchema }),
  z.object({ type: z.literal('MultiPolygon'), coordinates: z.array(PolygonRingsSchema).min(1) }),
]);

/**
 * Schema for a CKAN resource.
 */
export const CkanResourceSchema = z.object({
  id: z.string(),
  name: z.string().nullish(),
  url: z.string(),
  format: z.string().nullish(),
});

/**
 * Schema for a CKAN "extra" key/value pair.
 */
export const CkanExtraSchema = z.object({
  key: z.string(),
  value: z.string(),
});

/**
 * Schema for a CKAN package (dataset).
 */
export const CkanPackageSchema = z.object({
  id: z.string(),
  name: z.string(),
  title: z.string().nullish(),
  type: z.string().nullish(),
  spatial: z.string().nullish(),
  extras: z.array(CkanExtraSchema).optional(),
  resources: z.array(CkanResourceSchema).default([]),
});

/**
 * Schema for the `package_search` action response.
 */
export const PackageSearchResponseSchema = z.object({
  success: z.boolean(),
  result: z
    .object({
      count: z.number().int().nonnegative(),
      results: z.array(CkanPackageSchema),
    })
    .optional(),
  error: z
    .object({
      message: z.string().optional(),
      __type: z.string().optional(),
    })
    .passthrough()
    .optional(),
});

export type CkanResource = z.infer<typeof CkanResourceSchema>;
export type CkanPackage = z.infer<typeof CkanPackageSchema>;
export type PackageSearchResponse = z.infer<typeof PackageSearchResponseSchema>;
export type Footprint = z.infer<typeof FootprintSchema>;
