import { describe, expect, it } from 'vitest';
import { z } from 'zod';
import { CoordinateParseError } from './coordinate-error';
import { DownloadError, SearchError } from './client-error';
import { FetchError } from './fetch-error';
import { JobCancelledError, JobInProgressError } from './job-error';
import { ValidationError } from './validation-error';

describe('ValidationError', () => {
  it('lists every zod issue in its message', () => {
    const schema = z.object({ name: z.string().min(1, 'Required'), size: z.number() });
    const result = schema.safeParse({ name: '', size: 'big' });
    if (result.success) {
      throw new Error('expected parse to fail');
    }

    const error = ValidationError.fromZodError(result.error);

    expect(error.message).toBe('name: Required; size: Expected number, received string');
    expect(error.getFormattedIssues()).toBe(
      '  - name: Required\n  - size: Expected number, received string'
    );
    expect(error.toJSON().code).toBe('VALIDATION_ERROR');
  });
});

describe('CoordinateParseError', () => {
  it('is a ValidationError carrying the offending line', () => {
    const error = new CoordinateParseError('INVALID_FORMAT', 'Invalid format: x. Use latitude,longitude', {
      line: 'x',
      lineNumber: 3,
    });

    expect(error).toBeInstanceOf(ValidationError);
    expect(error.code).toBe('INVALID_FORMAT');
    expect(error.issues).toEqual([
      { path: 'line 3', message: 'Invalid format: x. Use latitude,longitude', code: 'INVALID_FORMAT' },
    ]);
  });
});

describe('client errors', () => {
  it('prefix their messages', () => {
    expect(new SearchError('gsq-ckan', 'boom').message).toBe('Search failed: boom');
    expect(new DownloadError('gsq-ckan', 'https://files.test/a.pdf', 'HTTP 404: Not Found').message).toBe(
      'Download of https://files.test/a.pdf failed: HTTP 404: Not Found'
    );
  });
});

describe('FetchError', () => {
  it('keeps the status of a failed response', () => {
    const notFound = FetchError.fromResponse(
      'https://files.test/a.pdf',
      new Response('', { status: 404, statusText: 'Not Found' })
    );

    expect(notFound.message).toBe('HTTP 404: Not Found');
    expect(notFound.statusCode).toBe(404);
    expect(notFound.statusText).toBe('Not Found');
  });

  it('wraps network errors', () => {
    const cause = new TypeError('fetch failed');
    const error = FetchError.fromNetworkError('https://files.test/a.pdf', cause);

    expect(error.message).toBe('Network error: fetch failed');
    expect(error.cause).toBe(cause);
    expect(error.statusCode).toBeUndefined();
  });
});

describe('job errors', () => {
  it('describe the conflicting or cancelled job', () => {
    expect(new JobInProgressError(4).message).toBe('Job 4 is still running');
    expect(new JobCancelledError()).toBeInstanceOf(Error);
    expect(new JobCancelledError().message).toBe('Operation cancelled');
  });
});
