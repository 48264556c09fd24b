export { DownloaderController } from './downloader-controller';
export type {
  Notifier,
  DirectoryPicker,
  FolderOpener,
  ViewState,
  DownloaderControllerOptions,
} from './downloader-controller';

export { DownloadJobRunner } from './download-job';
export type { JobContext, JobTask, JobListener } from './download-job';

export { buildJobPlan, toSearchRequest, executeJobPlan } from './job-plan';
export type { JobPlan } from './job-plan';

export {
  MATCH_ALL_QUERY,
  buildSearchQuery,
  describeSearchTerms,
  buildFilters,
  resolveResourceFormats,
} from './search-request';

export { summarizeConfiguration, describeCoordinates } from './summary';
export type { SummaryOptions } from './summary';

export {
  PREVIEW_LIMIT,
  SAMPLE_LIMIT,
  FAILURE_LIMIT,
  formatPreviewResults,
  formatDownloadReport,
  formatJobOutcome,
  formatJobError,
} from './results';
