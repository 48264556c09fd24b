import { z } from 'zod';
import { MAX_MAX_DATASETS, MIN_MAX_DATASETS } from '../types';

const MAX_DATASETS_MESSAGE = `Maximum datasets must be a whole number from ${MIN_MAX_DATASETS} to ${MAX_MAX_DATASETS}`;

/**
 * Schema for search modes.
 */
export const SearchModeSchema = z.enum(['suggested', 'custom', 'all']);

/**
 * Schema for the maximum dataset count as typed into the form.
 */
export const MaxDatasetsSchema = z
  .string()
  .trim()
  .regex(/^\d+$/, MAX_DATASETS_MESSAGE)
  .transform((value) => Number(value))
  .pipe(
    z
      .number()
      .int()
      .min(MIN_MAX_DATASETS, MAX_DATASETS_MESSAGE)
      .max(MAX_MAX_DATASETS, MAX_DATASETS_MESSAGE)
  );

/**
 * Schema for the job settings read from the form before a job starts.
 */
export const JobSettingsSchema = z.object({
  maxDatasets: MaxDatasetsSchema,
  outputDirectory: z.string().trim().min(1, 'Please select an output directory'),
});

/**
 * Type inferred from the JobSettingsSchema.
 */
export type JobSettings = z.infer<typeof JobSettingsSchema>;
