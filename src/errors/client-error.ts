/**
 * Base error class for search/download client errors.
 */
export class ClientError extends Error {
  readonly clientId: string;
  readonly code: string;

  constructor(message: string, clientId: string, code = 'CLIENT_ERROR') {
    super(message);
    this.name = 'ClientError';
    this.clientId = clientId;
    this.code = code;
    Object.setPrototypeOf(this, ClientError.prototype);
  }
}

/**
 * Error thrown when the catalogue search fails or returns an unusable response.
 */
export class SearchError extends ClientError {
  readonly cause?: Error;

  constructor(clientId: string, message: string, cause?: Error) {
    super(`Search failed: ${message}`, clientId, 'SEARCH_ERROR');
    this.name = 'SearchError';
    this.cause = cause;
    Object.setPrototypeOf(this, SearchError.prototype);
  }
}

/**
 * Error raised for a single resource that could not be saved.
 */
export class DownloadError extends ClientError {
  readonly url: string;
  readonly cause?: Error;

  constructor(clientId: string, url: string, message: string, cause?: Error) {
    super(`Download of ${url} failed: ${message}`, clientId, 'DOWNLOAD_ERROR');
    this.name = 'DownloadError';
    this.url = url;
    this.cause = cause;
    Object.setPrototypeOf(this, DownloadError.prototype);
  }
}
