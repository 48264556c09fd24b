import { describe, expect, it } from 'vitest';
import type { FormState } from '../types';
import { describeCoordinates, summarizeConfiguration } from './summary';

const RULE = '='.repeat(50);

function form(overrides: Partial<FormState> = {}): FormState {
  return {
    region: 'Mount Isa Mineral Province',
    coordinatesText: '-21,139\n-21,141\n-20,141\n-20,139\n-21,139',
    dataType: 'Geophysics Data',
    searchMode: 'suggested',
    customTerms: 'copper gold mining',
    fileFormat: 'PDF Reports',
    maxDatasets: '20',
    outputDirectory: '/data/gsq',
    preciseFiltering: true,
    previewMode: false,
    ...overrides,
  };
}

describe('describeCoordinates', () => {
  it('reports the vertex count of a valid polygon', () => {
    expect(describeCoordinates('-21,139\n-21,141\n-20,141')).toBe('Valid polygon with 3 vertices');
  });

  it('reports invalid or missing coordinates', () => {
    expect(describeCoordinates('')).toBe('Invalid or missing coordinates');
    expect(describeCoordinates('-40,139\n-21,141\n-20,141')).toBe('Invalid or missing coordinates');
  });
});

describe('summarizeConfiguration', () => {
  it('renders every selection', () => {
    expect(summarizeConfiguration(form())).toBe(
      [
        'DOWNLOAD CONFIGURATION',
        RULE,
        '',
        'Search Area: Mount Isa Mineral Province',
        '   Coordinates: Valid polygon with 4 vertices',
        '',
        'Data Type: Geophysics Data',
        '   Search Terms: geophysics OR magnetic OR gravity',
        '   File Formats: PDF Reports',
        '',
        'Settings:',
        '   Max Datasets: 20',
        '   Output Directory: /data/gsq',
        '   Precise Filtering: Yes',
        '   Preview Mode: No',
        '',
        'Status: Ready for download',
      ].join('\n')
    );
  });

  it('reflects preview mode and custom terms', () => {
    const lines = summarizeConfiguration(
      form({ previewMode: true, preciseFiltering: false, searchMode: 'custom', customTerms: '' })
    ).split('\n');

    expect(lines).toContain('   Search Terms: No terms');
    expect(lines).toContain('   Precise Filtering: No');
    expect(lines).toContain('   Preview Mode: Yes');
    expect(lines[lines.length - 1]).toBe('Status: Ready for preview');
  });

  it('shows invalid coordinates without failing', () => {
    const lines = summarizeConfiguration(form({ coordinatesText: 'not a polygon' })).split('\n');

    expect(lines[4]).toBe('   Coordinates: Invalid or missing coordinates');
  });

  it('reports other failures as an error line', () => {
    expect(summarizeConfiguration(form({ dataType: 'Moon Rocks' }))).toBe(
      'Error updating summary: Unknown data type: Moon Rocks'
    );
  });

  it('validates coordinates against the given bounds', () => {
    const bounds = {
      name: 'Nowhere',
      latitude: { min: 0, max: 1 },
      longitude: { min: 0, max: 1 },
    };
    const lines = summarizeConfiguration(form(), { bounds }).split('\n');

    expect(lines[4]).toBe('   Coordinates: Invalid or missing coordinates');
  });
});
