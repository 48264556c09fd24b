import { z } from 'zod';
import { DEFAULT_CONFIG } from '../types';

const blankToUndefined = (value: unknown) =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

/**
 * Schema for the environment variables the downloader reads.
 */
export const EnvironmentSchema = z.object({
  GSQ_API_URL: z.preprocess(blankToUndefined, z.string().url().default(DEFAULT_CONFIG.apiUrl)),
  GSQ_USER_AGENT: z.preprocess(
    blankToUndefined,
    z.string().min(1).default(DEFAULT_CONFIG.userAgent)
  ),
  GSQ_PAGE_SIZE: z.preprocess(
    blankToUndefined,
    z.coerce.number().int().min(1).max(1000).default(DEFAULT_CONFIG.pageSize)
  ),
  GSQ_OUTPUT_DIR: z.preprocess(blankToUndefined, z.string().optional()),
});

/**
 * Type inferred from the EnvironmentSchema.
 */
export type EnvironmentSchemaType = z.infer<typeof EnvironmentSchema>;
