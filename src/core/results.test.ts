import path from 'node:path';
import { describe, expect, it } from 'vitest';
import type { DatasetRecord, DownloadReport } from '../types';
import {
  formatDownloadReport,
  formatJobError,
  formatJobOutcome,
  formatPreviewResults,
} from './results';

const RULE = '='.repeat(50);

function dataset(index: number, overrides: Partial<DatasetRecord> = {}): DatasetRecord {
  return {
    id: `id-${index}`,
    name: `dataset-${index}`,
    title: `Dataset ${index}`,
    type: 'report',
    resources: [{ id: `r-${index}`, name: 'report.pdf', url: 'https://example.test/r.pdf', format: 'PDF' }],
    ...overrides,
  };
}

function report(overrides: Partial<DownloadReport> = {}): DownloadReport {
  const results = [dataset(1), dataset(2)];
  return {
    totalDatasets: results.length,
    totalResources: 2,
    successfulDownloads: 2,
    downloadDirectory: '/data/gsq',
    searchResults: { results, count: 2 },
    failures: [],
    ...overrides,
  };
}

describe('formatPreviewResults', () => {
  it('lists each dataset', () => {
    const text = formatPreviewResults({
      results: [dataset(1), dataset(2, { type: undefined, resources: [] })],
      count: 2,
    });

    expect(text).toBe(
      'PREVIEW RESULTS\n' +
        `${RULE}\n\n` +
        'Found 2 datasets matching your criteria:\n\n' +
        '1. Dataset 1\n   Resources: 1\n   Type: report\n\n' +
        '2. Dataset 2\n   Resources: 0\n   Type: unknown\n\n' +
        'To download these datasets, disable Preview Mode and run again.'
    );
  });

  it('lists at most ten datasets and counts the rest', () => {
    const results = Array.from({ length: 13 }, (_, i) => dataset(i + 1));
    const text = formatPreviewResults({ results, count: 40 });

    expect(text).toContain('Found 13 datasets matching your criteria:');
    expect(text).toContain('10. Dataset 10\n');
    expect(text).not.toContain('11. Dataset 11');
    expect(text).toContain('... and 3 more datasets\n\n');
  });

  it('truncates long titles to 80 characters', () => {
    const title = 'x'.repeat(90);
    const text = formatPreviewResults({ results: [dataset(1, { title })], count: 1 });

    expect(text).toContain(`1. ${'x'.repeat(80)}...\n`);
  });
});

describe('formatDownloadReport', () => {
  it('summarizes a completed download', () => {
    expect(formatDownloadReport(report())).toBe(
      'DOWNLOAD COMPLETE!\n' +
        `${RULE}\n\n` +
        'Summary:\n' +
        '   Datasets found: 2\n' +
        '   Resources downloaded: 2/2\n' +
        '   Output directory: /data/gsq\n\n' +
        'Sample datasets downloaded:\n' +
        '   1. Dataset 1\n      Resources: 1\n' +
        '   2. Dataset 2\n      Resources: 1\n' +
        `\nFiles saved to: ${path.resolve('/data/gsq')}`
    );
  });

  it('omits the sample section when nothing was found', () => {
    const text = formatDownloadReport(
      report({ totalDatasets: 0, totalResources: 0, successfulDownloads: 0, searchResults: { results: [], count: 0 } })
    );

    expect(text.endsWith('   Output directory: /data/gsq')).toBe(true);
    expect(text).not.toContain('Sample datasets downloaded');
  });

  it('lists failed resources', () => {
    const text = formatDownloadReport(
      report({
        successfulDownloads: 1,
        failures: [
          {
            datasetName: 'dataset-2',
            resourceName: 'report.pdf',
            url: 'https://example.test/r.pdf',
            error: 'HTTP 404: Not Found',
          },
        ],
      })
    );

    expect(text).toContain('   Resources downloaded: 1/2\n');
    expect(text.endsWith('\n\nFailed resources (1):\n   - report.pdf: HTTP 404: Not Found')).toBe(true);
  });
});

describe('formatJobOutcome', () => {
  it('dispatches on the outcome kind', () => {
    const searchResults = { results: [dataset(1)], count: 1 };

    expect(formatJobOutcome({ kind: 'preview', searchResults })).toBe(
      formatPreviewResults(searchResults)
    );
    expect(formatJobOutcome({ kind: 'download', report: report() })).toBe(
      formatDownloadReport(report())
    );
  });
});

describe('formatJobError', () => {
  it('prefixes the message', () => {
    expect(formatJobError('Search failed: boom')).toBe('Error: Search failed: boom');
  });
});
