import type { DownloadReport, SearchResultSet } from './dataset';

/**
 * Result of a finished background job.
 */
export type JobOutcome =
  | { kind: 'preview'; searchResults: SearchResultSet }
  | { kind: 'download'; report: DownloadReport };

/**
 * Lifecycle state of the job runner.
 */
export type JobStatus = 'idle' | 'running';

/**
 * Events delivered to job listeners.
 */
export type JobEvent<T> =
  | { type: 'started'; jobId: number }
  | { type: 'progress'; jobId: number; message: string }
  | { type: 'completed'; jobId: number; result: T }
  | { type: 'failed'; jobId: number; error: Error }
  | { type: 'cancelled'; jobId: number };
