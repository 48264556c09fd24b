/**
 * Error thrown when an HTTP fetch operation fails.
 */
export class FetchError extends Error {
  readonly code = 'FETCH_ERROR';
  readonly url: string;
  readonly statusCode?: number;
  readonly statusText?: string;
  readonly cause?: Error;

  constructor(
    message: string,
    url: string,
    options?: {
      statusCode?: number;
      statusText?: string;
      cause?: Error;
    }
  ) {
    super(message);
    this.name = 'FetchError';
    this.url = url;
    this.statusCode = options?.statusCode;
    this.statusText = options?.statusText;
    this.cause = options?.cause;
    Object.setPrototypeOf(this, FetchError.prototype);
  }

  /**
   * Create a FetchError from a failed Response object.
   */
  static fromResponse(url: string, response: Response): FetchError {
    return new FetchError(`HTTP ${response.status}: ${response.statusText}`, url, {
      statusCode: response.status,
      statusText: response.statusText,
    });
  }

  /**
   * Create a FetchError from a network error.
   */
  static fromNetworkError(url: string, error: Error): FetchError {
    return new FetchError(`Network error: ${error.message}`, url, {
      cause: error,
    });
  }
}
