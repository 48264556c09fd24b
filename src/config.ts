import path from 'node:path';
import type { DownloaderConfig } from './types';
import { DEFAULT_CONFIG } from './types';
import { EnvironmentSchema } from './schemas';
import { ValidationError } from './errors';

/**
 * Load the downloader configuration from environment variables.
 *
 * - `GSQ_API_URL`: catalogue base URL
 * - `GSQ_USER_AGENT`: User-Agent header
 * - `GSQ_PAGE_SIZE`: rows per search page (1-1000)
 * - `GSQ_OUTPUT_DIR`: default output directory
 *
 * @throws ValidationError if a variable is set to an invalid value
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
  cwd: string = process.cwd()
): DownloaderConfig {
  const parsed = EnvironmentSchema.safeParse(env);
  if (!parsed.success) {
    throw ValidationError.fromZodError(parsed.error);
  }

  const { GSQ_API_URL, GSQ_USER_AGENT, GSQ_PAGE_SIZE, GSQ_OUTPUT_DIR } = parsed.data;

  return {
    apiUrl: GSQ_API_URL.replace(/\/+$/, ''),
    userAgent: GSQ_USER_AGENT,
    pageSize: GSQ_PAGE_SIZE,
    outputDirectory: path.resolve(cwd, GSQ_OUTPUT_DIR ?? DEFAULT_CONFIG.outputDirectoryName),
  };
}
