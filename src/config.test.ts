import path from 'node:path';
import { describe, expect, it } from 'vitest';
import { loadConfig } from './config';
import { ValidationError } from './errors';

const CWD = path.resolve('/work');

describe('loadConfig', () => {
  it('uses defaults when nothing is set', () => {
    expect(loadConfig({}, CWD)).toEqual({
      apiUrl: 'https://geoscience.data.qld.gov.au',
      userAgent: 'GSQPolygonDownloader/1.0',
      pageSize: 100,
      outputDirectory: path.join(CWD, 'gsq_polygon_data'),
    });
  });

  it('reads environment overrides', () => {
    const config = loadConfig(
      {
        GSQ_API_URL: 'https://catalogue.test//',
        GSQ_USER_AGENT: 'test-agent',
        GSQ_PAGE_SIZE: '25',
        GSQ_OUTPUT_DIR: 'downloads',
      },
      CWD
    );

    expect(config).toEqual({
      apiUrl: 'https://catalogue.test',
      userAgent: 'test-agent',
      pageSize: 25,
      outputDirectory: path.join(CWD, 'downloads'),
    });
  });

  it('treats blank values as unset', () => {
    const config = loadConfig({ GSQ_API_URL: '  ', GSQ_PAGE_SIZE: '', GSQ_OUTPUT_DIR: '' }, CWD);

    expect(config.apiUrl).toBe('https://geoscience.data.qld.gov.au');
    expect(config.pageSize).toBe(100);
    expect(config.outputDirectory).toBe(path.join(CWD, 'gsq_polygon_data'));
  });

  it('keeps an absolute output directory', () => {
    const absolute = path.resolve('/data/gsq');

    expect(loadConfig({ GSQ_OUTPUT_DIR: absolute }, CWD).outputDirectory).toBe(absolute);
  });

  it('rejects an invalid URL', () => {
    expect(() => loadConfig({ GSQ_API_URL: 'not a url' }, CWD)).toThrow('GSQ_API_URL: Invalid url');
  });

  it.each(['0', '1001', '2.5', 'many'])('rejects page size %j', (size) => {
    expect(() => loadConfig({ GSQ_PAGE_SIZE: size }, CWD)).toThrow(ValidationError);
  });
});
