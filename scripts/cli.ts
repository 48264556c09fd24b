#!/usr/bin/env node
/**
 * Command-line front end for the GSQ polygon downloader.
 *
 * Usage:
 *   npx tsx scripts/cli.ts regions
 *   npx tsx scripts/cli.ts validate --coords "-21,139;-21,141;-20,141;-20,139"
 *   npx tsx scripts/cli.ts summary --region "Bowen Basin Coal Region"
 *   npx tsx scripts/cli.ts search --region "Cairns Region" --data-type "Geophysics Data"
 *   npx tsx scripts/cli.ts download --coords-file area.txt --format "PDF Reports" --output ./gsq
 */

import fs from 'node:fs';
import yargs from 'yargs';
import type { Argv } from 'yargs';
import { hideBin } from 'yargs/helpers';
import {
  CUSTOM_REGION,
  DATA_TYPES,
  DEFAULT_DATA_TYPE,
  DEFAULT_FILE_FORMAT,
  DEFAULT_MAX_DATASETS,
  DEFAULT_REGION,
  DownloaderController,
  FILE_FORMATS,
  GsqPolygonClient,
  QUEENSLAND_BOUNDS,
  REGIONS,
  SEARCH_MODES,
  describeBounds,
  loadConfig,
} from '../src';
import type { FormState, Notifier } from '../src';

const consoleNotifier: Notifier = {
  info: (_title, message) => console.log(message),
  warning: (title, message) => console.warn(`${title}: ${message}`),
  error: (title, message) => console.error(`${title}: ${message}`),
};

function withFormOptions<T>(y: Argv<T>) {
  return y
    .option('region', {
      type: 'string',
      choices: Object.keys(REGIONS),
      default: DEFAULT_REGION,
      desc: 'Predefined search region',
    })
    .option('coords', {
      type: 'string',
      desc: 'Polygon as "lat,lon" pairs separated by ";" or new lines (overrides --region)',
    })
    .option('coords-file', {
      type: 'string',
      desc: 'File with one "lat,lon" pair per line (overrides --region)',
    })
    .option('data-type', {
      type: 'string',
      choices: Object.keys(DATA_TYPES),
      default: DEFAULT_DATA_TYPE,
    })
    .option('search-mode', {
      type: 'string',
      choices: SEARCH_MODES,
      default: 'suggested' as const,
    })
    .option('terms', {
      type: 'string',
      default: 'copper gold mining',
      desc: 'Custom search terms (with --search-mode custom)',
    })
    .option('format', {
      type: 'string',
      choices: Object.keys(FILE_FORMATS),
      default: DEFAULT_FILE_FORMAT,
    })
    .option('max-datasets', {
      type: 'string',
      default: String(DEFAULT_MAX_DATASETS),
      desc: 'Maximum datasets (1-1000)',
    })
    .option('output', {
      type: 'string',
      desc: 'Output directory (default: $GSQ_OUTPUT_DIR or ./gsq_polygon_data)',
    })
    .option('precise', {
      type: 'boolean',
      default: true,
      desc: 'Exact polygon filtering (--no-precise for bounding box only)',
    })
    .option('json', { type: 'boolean', default: false, desc: 'Output as JSON' });
}

interface FormArgs {
  region: string;
  coords?: string;
  'coords-file'?: string;
  'data-type': string;
  'search-mode': string;
  terms: string;
  format: string;
  'max-datasets': string;
  output?: string;
  precise: boolean;
  json: boolean;
}

function readCoordinates(args: FormArgs): string | undefined {
  if (args['coords-file']) {
    return fs.readFileSync(args['coords-file'], 'utf8');
  }
  if (args.coords) {
    return args.coords.split(';').join('\n');
  }
  return undefined;
}

function createController(args: FormArgs, previewMode: boolean): DownloaderController {
  const config = loadConfig();
  const coordinatesText = readCoordinates(args);
  const searchMode = SEARCH_MODES.find((mode) => mode === args['search-mode']) ?? 'suggested';

  const initialForm: Partial<FormState> = {
    region: coordinatesText === undefined ? args.region : CUSTOM_REGION,
    dataType: args['data-type'],
    searchMode,
    customTerms: args.terms,
    fileFormat: args.format,
    maxDatasets: args['max-datasets'],
    outputDirectory: args.output ?? config.outputDirectory,
    preciseFiltering: args.precise,
    previewMode,
  };
  if (coordinatesText !== undefined) {
    initialForm.coordinatesText = coordinatesText;
  }

  return new DownloaderController({
    client: new GsqPolygonClient({
      apiUrl: config.apiUrl,
      userAgent: config.userAgent,
      pageSize: config.pageSize,
    }),
    notifier: consoleNotifier,
    initialForm,
  });
}

async function runJob(args: FormArgs, previewMode: boolean, open: boolean): Promise<void> {
  const controller = createController(args, previewMode);

  let lastProgress = controller.getView().progress;
  controller.onChange((view) => {
    if (view.running && view.progress !== lastProgress) {
      lastProgress = view.progress;
      console.error(view.progress);
    }
  });

  if (controller.startDownload() === null) {
    process.exitCode = 1;
    return;
  }

  const onInterrupt = () => controller.cancelDownload();
  process.once('SIGINT', onInterrupt);
  try {
    await controller.waitForJob();
  } finally {
    process.removeListener('SIGINT', onInterrupt);
  }

  const outcome = controller.getLastOutcome();
  if (!outcome) {
    process.exitCode = 1;
    return;
  }

  if (args.json) {
    console.log(JSON.stringify(outcome, null, 2));
  } else {
    console.log(controller.getView().results);
  }

  if (open && outcome.kind === 'download') {
    await controller.openOutputFolder();
  }
}

async function main() {
  await yargs(hideBin(process.argv))
    .scriptName('gsq-downloader')
    .command(
      'regions',
      'List predefined regions, data types and file formats',
      (y) => y,
      () => {
        console.log(describeBounds(QUEENSLAND_BOUNDS));
        console.log();
        console.log('Regions:');
        for (const [name, region] of Object.entries(REGIONS)) {
          console.log(`  ${name} - ${region.description}`);
        }
        console.log();
        console.log('Data types:');
        for (const [name, dataType] of Object.entries(DATA_TYPES)) {
          console.log(`  ${name} (${dataType.filter ?? 'no filter'})`);
        }
        console.log();
        console.log('File formats:');
        for (const [name, formats] of Object.entries(FILE_FORMATS)) {
          console.log(`  ${name} (${formats?.join(', ') ?? 'all'})`);
        }
      }
    )
    .command(
      'validate',
      'Validate polygon coordinates',
      (y) => withFormOptions(y),
      (args) => {
        const controller = createController(args, true);
        const polygon = controller.validateCoordinates();
        if (!polygon) {
          process.exitCode = 1;
          return;
        }
        if (args.json) {
          console.log(JSON.stringify(polygon, null, 2));
        } else {
          console.log(polygon.lonLat.map(([lon, lat]) => `  [${lon}, ${lat}]`).join('\n'));
        }
      }
    )
    .command(
      'summary',
      'Show the search configuration',
      (y) => withFormOptions(y).option('preview', { type: 'boolean', default: false }),
      (args) => {
        console.log(createController(args, args.preview).updateSummary());
      }
    )
    .command(
      'search',
      'Search without downloading (preview mode)',
      (y) => withFormOptions(y),
      (args) => runJob(args, true, false)
    )
    .command(
      'download',
      'Search and download matching resources',
      (y) =>
        withFormOptions(y).option('open', {
          type: 'boolean',
          default: false,
          desc: 'Open the output folder when finished',
        }),
      (args) => runJob(args, false, args.open)
    )
    .demandCommand(1)
    .strict()
    .help()
    .parseAsync();
}

main().catch((err) => {
  console.error('Error:', err instanceof Error ? err.message : err);
  process.exit(1);
});
