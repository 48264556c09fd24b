/**
 * Error thrown when a job is started while another is still running.
 */
export class JobInProgressError extends Error {
  readonly code = 'JOB_IN_PROGRESS';
  readonly runningJobId: number;

  constructor(runningJobId: number) {
    super(`Job ${runningJobId} is still running`);
    this.name = 'JobInProgressError';
    this.runningJobId = runningJobId;
    Object.setPrototypeOf(this, JobInProgressError.prototype);
  }
}

/**
 * Error thrown by a job that observed its cancellation signal.
 */
export class JobCancelledError extends Error {
  readonly code = 'JOB_CANCELLED';

  constructor(message = 'Operation cancelled') {
    super(message);
    this.name = 'JobCancelledError';
    Object.setPrototypeOf(this, JobCancelledError.prototype);
  }
}
