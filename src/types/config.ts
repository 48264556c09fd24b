/**
 * Runtime configuration of the downloader.
 */
export interface DownloaderConfig {
  /** Base URL of the CKAN catalogue */
  apiUrl: string;
  /** User-Agent header sent with every request */
  userAgent: string;
  /** Rows requested per search page */
  pageSize: number;
  /** Default output directory */
  outputDirectory: string;
}

/**
 * Default configuration values (the output directory is resolved at load time).
 */
export const DEFAULT_CONFIG: Omit<DownloaderConfig, 'outputDirectory'> & {
  outputDirectoryName: string;
} = {
  apiUrl: 'https://geoscience.data.qld.gov.au',
  userAgent: 'GSQPolygonDownloader/1.0',
  pageSize: 100,
  outputDirectoryName: 'gsq_polygon_data',
};
