import type { BoundingRegion, FormState, JobEvent, JobOutcome, ParsedPolygon } from '../types';
import { DEFAULT_MAX_DATASETS } from '../types';
import type { PolygonSearchClient } from '../clients';
import {
  CUSTOM_REGION,
  DEFAULT_DATA_TYPE,
  DEFAULT_FILE_FORMAT,
  DEFAULT_REGION,
  EXAMPLE_COORDINATES,
  getRegion,
} from '../catalog';
import { QUEENSLAND_BOUNDS, formatCoordinates, parseCoordinates } from '../geo';
import { directoryExists, openInFileBrowser } from '../utils';
import { DownloadJobRunner } from './download-job';
import { buildJobPlan, executeJobPlan } from './job-plan';
import { summarizeConfiguration } from './summary';
import { formatJobError, formatJobOutcome } from './results';

/**
 * Modal notifications shown to the user.
 */
export interface Notifier {
  info(title: string, message: string): void;
  warning(title: string, message: string): void;
  error(title: string, message: string): void;
}

/**
 * Lets the user choose an output directory.
 */
export interface DirectoryPicker {
  /**
   * @returns The chosen directory, or null if the user dismissed the picker
   */
  pickDirectory(initialDirectory: string): Promise<string | null>;
}

/**
 * Opens a directory in the host's file browser.
 */
export interface FolderOpener {
  exists(directory: string): Promise<boolean>;
  open(directory: string): Promise<void>;
}

/**
 * Everything a view renders.
 */
export interface ViewState {
  /** Status bar text */
  status: string;
  /** Progress line shown above the progress indicator */
  progress: string;
  /** Whether a job is running (progress indicator animating) */
  running: boolean;
  canStart: boolean;
  canCancel: boolean;
  regionDescription: string;
  summary: string;
  results: string;
}

/**
 * Options for creating a DownloaderController.
 */
export interface DownloaderControllerOptions {
  client: PolygonSearchClient;
  notifier: Notifier;
  directoryPicker?: DirectoryPicker;
  folderOpener?: FolderOpener;
  /** Region coordinates must fall inside (default: Queensland) */
  bounds?: BoundingRegion;
  /** Initial output directory */
  outputDirectory?: string;
  /** Overrides applied on top of the default form */
  initialForm?: Partial<FormState>;
}

const READY_STATUS = 'Ready to download geological data';
const READY_PROGRESS = 'Ready to start download';

const defaultFolderOpener: FolderOpener = {
  exists: directoryExists,
  open: (directory) => openInFileBrowser(directory),
};

/**
 * Presentation logic of the downloader window, independent of any UI toolkit.
 *
 * A view renders {@link ViewState}, forwards user input through the action
 * methods and re-renders on change notifications. Search and download work
 * runs as a background job; its events are the only path by which results
 * reach the view state.
 */
export class DownloaderController {
  private form: FormState;
  private view: ViewState;
  private readonly runner = new DownloadJobRunner<JobOutcome>();
  private readonly listeners = new Set<(view: Readonly<ViewState>) => void>();
  private readonly client: PolygonSearchClient;
  private readonly notifier: Notifier;
  private readonly directoryPicker?: DirectoryPicker;
  private readonly folderOpener: FolderOpener;
  private readonly bounds: BoundingRegion;
  private lastOutcome?: JobOutcome;

  constructor(options: DownloaderControllerOptions) {
    this.client = options.client;
    this.notifier = options.notifier;
    this.directoryPicker = options.directoryPicker;
    this.folderOpener = options.folderOpener ?? defaultFolderOpener;
    this.bounds = options.bounds ?? QUEENSLAND_BOUNDS;

    this.form = {
      region: DEFAULT_REGION,
      coordinatesText: '',
      dataType: DEFAULT_DATA_TYPE,
      searchMode: 'suggested',
      customTerms: 'copper gold mining',
      fileFormat: DEFAULT_FILE_FORMAT,
      maxDatasets: String(DEFAULT_MAX_DATASETS),
      outputDirectory: options.outputDirectory ?? '',
      preciseFiltering: true,
      previewMode: false,
    };
    this.view = {
      status: READY_STATUS,
      progress: READY_PROGRESS,
      running: false,
      canStart: true,
      canCancel: false,
      regionDescription: '',
      summary: '',
      results: '',
    };

    this.runner.subscribe((event) => this.handleJobEvent(event));

    const { coordinatesText, ...initial } = options.initialForm ?? {};
    this.form = { ...this.form, ...initial };
    this.applyRegion(this.form.region);
    if (coordinatesText !== undefined) {
      this.form.coordinatesText = coordinatesText;
    }
    this.refreshSummary();
  }

  getForm(): Readonly<FormState> {
    return this.form;
  }

  getView(): Readonly<ViewState> {
    return this.view;
  }

  /**
   * Outcome of the last job that completed, cleared when a new job starts.
   */
  getLastOutcome(): JobOutcome | undefined {
    return this.lastOutcome;
  }

  /**
   * Subscribe to view changes.
   *
   * @returns A function that removes the listener
   */
  onChange(listener: (view: Readonly<ViewState>) => void): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Apply edits to the form. Changing the region behaves like selecting it;
   * coordinate text given alongside it wins over the region's coordinates.
   *
   * @throws ValidationError if the region is not in the catalog, before any
   * edit is applied
   */
  update(changes: Partial<FormState>): void {
    const { region, coordinatesText, ...rest } = changes;
    if (region !== undefined && region !== this.form.region) {
      this.applyRegion(region);
    }
    this.form = { ...this.form, ...rest };
    if (coordinatesText !== undefined) {
      this.form.coordinatesText = coordinatesText;
    }
    this.refreshSummary();
  }

  /**
   * Select a region. Predefined regions replace the coordinate text; the
   * custom entry leaves it untouched.
   *
   * @throws ValidationError if the region is not in the catalog
   */
  selectRegion(name: string): void {
    this.applyRegion(name);
    this.refreshSummary();
  }

  loadExampleCoordinates(): void {
    this.form.coordinatesText = formatCoordinates(EXAMPLE_COORDINATES);
    this.refreshSummary();
  }

  clearCoordinates(): void {
    this.form.coordinatesText = '';
    this.refreshSummary();
  }

  /**
   * Validate the coordinate text and report the result to the user.
   *
   * @returns The parsed polygon, or null if the text is invalid
   */
  validateCoordinates(): ParsedPolygon | null {
    try {
      const polygon = parseCoordinates(this.form.coordinatesText, this.bounds);
      this.notifier.info('Validation', `Valid polygon with ${polygon.vertexCount} vertices`);
      return polygon;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.notifier.error('Validation Error', `Invalid coordinates: ${message}`);
      return null;
    }
  }

  /**
   * Rebuild the configuration summary.
   */
  updateSummary(): string {
    this.refreshSummary();
    return this.view.summary;
  }

  /**
   * Ask the directory picker for an output directory. A dismissed picker
   * keeps the current value.
   */
  async browseOutputDirectory(): Promise<void> {
    if (!this.directoryPicker) {
      return;
    }
    const directory = await this.directoryPicker.pickDirectory(this.form.outputDirectory);
    if (directory) {
      this.update({ outputDirectory: directory });
    }
  }

  /**
   * Validate the form and start the background job.
   *
   * @returns The job identifier, or null if the job did not start
   */
  startDownload(): number | null {
    try {
      const plan = buildJobPlan(this.form, this.bounds);
      return this.runner.start((context) => executeJobPlan(this.client, plan, context));
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.notifier.error('Error', `Failed to start download: ${message}`);
      if (this.runner.status === 'idle') {
        this.resetControls();
        this.notify();
      }
      return null;
    }
  }

  /**
   * Cancel the running job. The job's signal is aborted and the controls
   * return to ready at once; the collaborator stops at its next checkpoint.
   */
  cancelDownload(): void {
    const cancelled = this.runner.cancel();
    if (cancelled) {
      this.notifier.warning(
        'Cancel',
        'Download cancellation requested. Requests in flight are being aborted.'
      );
    }
    this.resetControls();
    this.view.progress = 'Download cancelled';
    this.notify();
  }

  /**
   * Resolve once the current or most recently cancelled job has settled.
   */
  waitForJob(): Promise<void> {
    return this.runner.waitForIdle();
  }

  /**
   * Open the output directory in the file browser.
   */
  async openOutputFolder(): Promise<void> {
    const directory = this.form.outputDirectory;
    if (!(await this.folderOpener.exists(directory))) {
      this.notifier.warning('Folder Not Found', `Output directory does not exist: ${directory}`);
      return;
    }
    await this.folderOpener.open(directory);
  }

  private applyRegion(name: string): void {
    const region = getRegion(name);
    this.form.region = name;
    this.view.regionDescription = region.description;
    if (name !== CUSTOM_REGION && region.coordinates) {
      this.form.coordinatesText = formatCoordinates(region.coordinates);
    }
  }

  private handleJobEvent(event: JobEvent<JobOutcome>): void {
    switch (event.type) {
      case 'started':
        this.view.running = true;
        this.view.canStart = false;
        this.view.canCancel = true;
        this.view.results = '';
        this.lastOutcome = undefined;
        break;
      case 'progress':
        this.view.progress = event.message;
        break;
      case 'completed':
        this.resetControls();
        this.lastOutcome = event.result;
        this.view.results = formatJobOutcome(event.result);
        if (event.result.kind === 'preview') {
          this.view.progress = 'Preview completed successfully!';
          this.view.status = `Preview found ${event.result.searchResults.results.length} datasets`;
        } else {
          this.view.progress = 'Download completed successfully!';
          this.view.status = `Downloaded ${event.result.report.successfulDownloads} resources`;
        }
        this.notify();
        this.notifier.info('Success', 'Download completed! Check the results for details.');
        return;
      case 'failed':
        this.resetControls();
        this.view.results = formatJobError(event.error.message);
        this.view.progress = `Error: ${event.error.message}`;
        this.notify();
        this.notifier.error('Download Error', `Download failed: ${event.error.message}`);
        return;
      case 'cancelled':
        break;
    }
    this.notify();
  }

  private resetControls(): void {
    this.view.running = false;
    this.view.canStart = true;
    this.view.canCancel = false;
  }

  private refreshSummary(): void {
    this.view.summary = summarizeConfiguration(this.form, { bounds: this.bounds });
    this.notify();
  }

  private notify(): void {
    const snapshot = { ...this.view };
    for (const listener of this.listeners) {
      listener(snapshot);
    }
  }
}
