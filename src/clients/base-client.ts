import type { DownloadReport, SearchResultSet } from '../types';
import { FetchError, JobCancelledError } from '../errors';
import type {
  PolygonDownloadRequest,
  PolygonSearchClient,
  PolygonSearchRequest,
} from './polygon-client';

/**
 * Configuration for base client.
 */
export interface BaseClientConfig {
  /** User-Agent header for HTTP requests */
  userAgent?: string;
}

/**
 * Abstract base class for search/download clients.
 *
 * Provides common functionality for:
 * - HTTP fetching with cancellation
 * - Mapping network and abort failures to typed errors
 */
export abstract class BaseClient implements PolygonSearchClient {
  abstract readonly id: string;

  protected config: Required<BaseClientConfig>;

  constructor(config?: BaseClientConfig) {
    this.config = {
      userAgent: config?.userAgent ?? 'GSQPolygonDownloader/1.0',
    };
  }

  abstract search(request: PolygonSearchRequest): Promise<SearchResultSet>;

  abstract searchAndDownload(request: PolygonDownloadRequest): Promise<DownloadReport>;

  /**
   * Fetch JSON data from a URL. The body is returned unvalidated.
   */
  protected async fetchJson(url: string, signal?: AbortSignal): Promise<unknown> {
    const response = await this.request(url, 'application/json', signal);
    return this.readBody(url, signal, () => response.json());
  }

  /**
   * Fetch a binary body from a URL.
   */
  protected async fetchBytes(url: string, signal?: AbortSignal): Promise<Uint8Array> {
    const response = await this.request(url, '*/*', signal);
    const body = await this.readBody(url, signal, () => response.arrayBuffer());
    return new Uint8Array(body);
  }

  /**
   * Throw JobCancelledError if the signal has been aborted.
   */
  protected throwIfCancelled(signal?: AbortSignal): void {
    if (signal?.aborted) {
      throw new JobCancelledError();
    }
  }

  private async readBody<T>(
    url: string,
    signal: AbortSignal | undefined,
    read: () => Promise<T>
  ): Promise<T> {
    try {
      return await read();
    } catch (error) {
      this.throwIfCancelled(signal);
      const cause = error instanceof Error ? error : new Error(String(error));
      throw new FetchError(`Could not read response body: ${cause.message}`, url, { cause });
    }
  }

  private async request(url: string, accept: string, signal?: AbortSignal): Promise<Response> {
    this.throwIfCancelled(signal);

    let response: Response;
    try {
      response = await fetch(url, {
        headers: {
          'User-Agent': this.config.userAgent,
          Accept: accept,
        },
        signal,
      });
    } catch (error) {
      if (signal?.aborted) {
        throw new JobCancelledError();
      }
      throw FetchError.fromNetworkError(
        url,
        error instanceof Error ? error : new Error(String(error))
      );
    }

    if (!response.ok) {
      throw FetchError.fromResponse(url, response);
    }

    return response;
  }
}
