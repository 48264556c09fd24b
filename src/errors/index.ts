export { ClientError, SearchError, DownloadError } from './client-error';

export { ValidationError } from './validation-error';
export type { ValidationIssue } from './validation-error';

export { CoordinateParseError } from './coordinate-error';
export type { CoordinateErrorCode } from './coordinate-error';

export { FetchError } from './fetch-error';

export { JobInProgressError, JobCancelledError } from './job-error';
