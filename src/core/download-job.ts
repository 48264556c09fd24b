import type { JobEvent, JobStatus } from '../types';
import { JobInProgressError } from '../errors';

/**
 * Handle given to a running job.
 */
export interface JobContext {
  jobId: number;
  /** Aborted when the job is cancelled */
  signal: AbortSignal;
  /** Post a progress message to listeners */
  reportProgress(message: string): void;
}

/**
 * Work performed by a job.
 */
export type JobTask<T> = (context: JobContext) => Promise<T>;

/**
 * Receives job lifecycle events.
 */
export type JobListener<T> = (event: JobEvent<T>) => void;

interface RunningJob {
  id: number;
  controller: AbortController;
  settled: Promise<void>;
}

/**
 * Runs at most one background job at a time.
 *
 * Listeners are the only channel from a job back to its owner: results,
 * failures and progress all arrive as events after the job's own awaits,
 * so the owner applies them from the event loop rather than from inside the
 * task. Cancelling aborts the job's signal and detaches it immediately;
 * whatever the detached task eventually produces is discarded.
 */
export class DownloadJobRunner<T> {
  private nextJobId = 1;
  private current?: RunningJob;
  private lastSettled: Promise<void> = Promise.resolve();
  private listeners = new Set<JobListener<T>>();

  /**
   * Whether a job is currently attached.
   */
  get status(): JobStatus {
    return this.current ? 'running' : 'idle';
  }

  /**
   * Identifier of the attached job, if any.
   */
  get currentJobId(): number | undefined {
    return this.current?.id;
  }

  /**
   * Subscribe to job events.
   *
   * @returns A function that removes the listener
   */
  subscribe(listener: JobListener<T>): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Start a job.
   *
   * @returns The new job's identifier
   * @throws JobInProgressError if a job is already running
   */
  start(task: JobTask<T>): number {
    if (this.current) {
      throw new JobInProgressError(this.current.id);
    }

    const id = this.nextJobId++;
    const controller = new AbortController();
    const job: RunningJob = { id, controller, settled: Promise.resolve() };
    this.current = job;

    this.emit({ type: 'started', jobId: id });
    job.settled = this.run(job, task);
    this.lastSettled = job.settled;

    return id;
  }

  /**
   * Cancel the running job.
   *
   * @returns true if a job was cancelled
   */
  cancel(): boolean {
    const job = this.current;
    if (!job) {
      return false;
    }

    this.current = undefined;
    job.controller.abort();
    this.emit({ type: 'cancelled', jobId: job.id });
    return true;
  }

  /**
   * Resolve once the most recently started job has settled, including a
   * cancelled job that is still unwinding.
   */
  waitForIdle(): Promise<void> {
    return this.lastSettled;
  }

  private async run(job: RunningJob, task: JobTask<T>): Promise<void> {
    const context: JobContext = {
      jobId: job.id,
      signal: job.controller.signal,
      reportProgress: (message) => {
        if (this.isCurrent(job.id)) {
          this.emit({ type: 'progress', jobId: job.id, message });
        }
      },
    };

    try {
      const result = await task(context);
      if (this.isCurrent(job.id)) {
        this.current = undefined;
        this.emit({ type: 'completed', jobId: job.id, result });
      }
    } catch (error) {
      // A detached job already reported its cancellation
      if (!this.isCurrent(job.id)) {
        return;
      }
      this.current = undefined;
      this.emit({
        type: 'failed',
        jobId: job.id,
        error: error instanceof Error ? error : new Error(String(error)),
      });
    }
  }

  private isCurrent(jobId: number): boolean {
    return this.current?.id === jobId;
  }

  private emit(event: JobEvent<T>): void {
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (error) {
        console.error(`Job listener failed on "${event.type}" event:`, error);
      }
    }
  }
}
