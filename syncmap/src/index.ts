#!/usr/bin/env node

import { realpathSync } from 'node:fs';
import { resolve } from 'node:path';
import { fileURLToPath, pathToFileURL } from 'node:url';
import { Command } from 'commander';
import {
  PARAM_OUTPUT_FORMAT,
  PARAM_SMIL_AUDIO_REF,
  PARAM_SMIL_PAGE_REF,
  PARAM_SYNCMAP_LANGUAGE,
  parseParameters,
  parseRunConfiguration,
} from './config.js';
import { createSyncMapContext } from './context.js';
import { summarizeSyncMap } from './inspect.js';
import { SyncMap } from './syncmap.js';
import { timeToSsmmm } from './time.js';
import type { SyncMapParameters } from './types.js';

interface ConvertOptions {
  input: string;
  inputFormat: string;
  output: string;
  outputFormat: string;
  language?: string;
  parameter: string[];
  runtimeConfiguration?: string;
}

interface TuneOptions {
  input: string;
  inputFormat: string;
  audio: string;
  output: string;
  outputFormat?: string;
  smilAudioRef?: string;
  smilPageRef?: string;
  parameter: string[];
  runtimeConfiguration?: string;
}

interface InspectOptions {
  input: string;
  inputFormat: string;
  runtimeConfiguration?: string;
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

/**
 * Build the command line program. Each call returns a fresh command tree.
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('syncmap')
    .description('Read, convert and fine tune synchronization maps')
    .version('0.1.0');

  program
    .command('convert')
    .description('Convert a sync map from one format to another')
    .requiredOption('-i, --input <path>', 'Input sync map path')
    .requiredOption('-f, --input-format <format>', 'Input sync map format')
    .requiredOption('-o, --output <path>', 'Output sync map path')
    .requiredOption('-t, --output-format <format>', 'Output sync map format')
    .option('-l, --language <code>', 'Overwrite the language of every fragment')
    .option('-p, --parameter <key=value>', 'Codec parameter (repeatable)', collect, [])
    .option('-r, --runtime-configuration <config>', 'Run configuration, e.g. "verbose=true"')
    .action((options: ConvertOptions) => {
      try {
        const syncMap = createSyncMap(options.runtimeConfiguration);
        const parameters = withOptionalParameters(parseParameters(options.parameter), {
          [PARAM_SYNCMAP_LANGUAGE]: options.language,
        });

        syncMap.read(options.inputFormat, resolve(options.input), parameters);
        console.log(`Read ${syncMap.length} fragments from ${options.input}`);

        syncMap.write(options.outputFormat, resolve(options.output), parameters);
        console.log(`Sync map written to: ${options.output}`);
      } catch (err) {
        console.error('Conversion failed:', err);
        process.exit(1);
      }
    });

  program
    .command('tune')
    .description('Generate an HTML page for fine tuning a sync map against its audio')
    .requiredOption('-i, --input <path>', 'Input sync map path')
    .requiredOption('-f, --input-format <format>', 'Input sync map format')
    .requiredOption('-a, --audio <path>', 'Audio file the sync map refers to')
    .requiredOption('-o, --output <path>', 'Output HTML path')
    .option('--output-format <format>', 'Export format preselected in the page')
    .option('--smil-audio-ref <ref>', 'SMIL audio reference (with --output-format smil)')
    .option('--smil-page-ref <ref>', 'SMIL page reference (with --output-format smil)')
    .option('-p, --parameter <key=value>', 'Codec parameter (repeatable)', collect, [])
    .option('-r, --runtime-configuration <config>', 'Run configuration, e.g. "verbose=true"')
    .action((options: TuneOptions) => {
      try {
        const syncMap = createSyncMap(options.runtimeConfiguration);
        const parameters = withOptionalParameters(parseParameters(options.parameter), {
          [PARAM_OUTPUT_FORMAT]: options.outputFormat,
          [PARAM_SMIL_AUDIO_REF]: options.smilAudioRef,
          [PARAM_SMIL_PAGE_REF]: options.smilPageRef,
        });

        syncMap.read(options.inputFormat, resolve(options.input), parameters);
        syncMap.outputHtmlForTuning(options.audio, resolve(options.output), parameters);
        console.log(`Tuning page generated: ${options.output}`);
      } catch (err) {
        console.error('Tuning page generation failed:', err);
        process.exit(1);
      }
    });

  program
    .command('inspect')
    .description('Inspect a sync map and print its shape and timing stats')
    .requiredOption('-i, --input <path>', 'Input sync map path')
    .requiredOption('-f, --input-format <format>', 'Input sync map format')
    .option('-r, --runtime-configuration <config>', 'Run configuration, e.g. "verbose=true"')
    .action((options: InspectOptions) => {
      try {
        const syncMap = createSyncMap(options.runtimeConfiguration);
        syncMap.read(options.inputFormat, resolve(options.input));
        printSummary(options.input, syncMap);
      } catch (err) {
        console.error('Inspection failed:', err);
        process.exit(1);
      }
    });

  program
    .command('formats')
    .description('List the formats with a registered codec')
    .action(() => {
      const { registry } = createSyncMapContext();
      for (const format of registry.formats) {
        console.log(format);
      }
    });

  return program;
}

/**
 * True when this module is the script node was started with, also through
 * a symlinked wrapper such as an npm bin entry
 */
export function isCliEntrypoint(
  argv: readonly string[] = process.argv,
  moduleUrl: string = import.meta.url,
): boolean {
  const entrypointArg = argv[1];
  if (!entrypointArg) {
    return false;
  }

  try {
    const entrypointPath = realpathSync(entrypointArg);
    const modulePath = realpathSync(fileURLToPath(moduleUrl));
    return entrypointPath === modulePath;
  } catch {
    return pathToFileURL(entrypointArg).href === moduleUrl;
  }
}

if (isCliEntrypoint()) {
  createProgram().parse();
}

/**
 * Options given on the command line win over -p entries; unset options leave them alone
 */
function withOptionalParameters(
  parameters: SyncMapParameters,
  options: SyncMapParameters,
): SyncMapParameters {
  const merged: Record<string, string | undefined> = { ...parameters };
  for (const [key, value] of Object.entries(options)) {
    if (value !== undefined) {
      merged[key] = value;
    }
  }
  return merged;
}

function createSyncMap(runtimeConfiguration?: string): SyncMap {
  const config = parseRunConfiguration(runtimeConfiguration);
  return new SyncMap(createSyncMapContext({ config }));
}

function printSummary(path: string, syncMap: SyncMap): void {
  const summary = summarizeSyncMap(syncMap);
  const formatSeconds = (seconds: number | null) =>
    seconds === null ? 'n/a' : `${timeToSsmmm(seconds)}s`;

  console.log('Sync map inspection');
  console.log('===================');
  console.log(`Path: ${path}`);
  console.log(`Top-level fragments: ${summary.topLevelFragments}`);
  console.log(`Total fragments: ${summary.totalFragments}`);
  console.log(`Tree height: ${summary.height}`);
  console.log(`Single level: ${summary.singleLevel ? 'yes' : 'no'}`);
  console.log(`Languages: ${summary.languages.length ? summary.languages.join(', ') : 'n/a'}`);

  if (summary.totalFragments === 0) {
    return;
  }

  const gapTotal = summary.gaps.reduce((sum, gap) => sum + gap.seconds, 0);
  const largestGap = summary.gaps.reduce(
    (best, gap) => (gap.seconds > best.seconds ? gap : best),
    { seconds: 0, fromId: '', toId: '' },
  );

  console.log('');
  console.log('Timing stats');
  console.log('------------');
  console.log(`First begin: ${formatSeconds(summary.firstBegin)}`);
  console.log(`Last end: ${formatSeconds(summary.lastEnd)}`);
  console.log(
    `Fragment duration min/avg/max: ${timeToSsmmm(summary.durationMin)} / ${timeToSsmmm(summary.durationAvg)} / ${timeToSsmmm(summary.durationMax)} s`,
  );
  console.log(`Total gap time: ${formatSeconds(gapTotal)} (${summary.gaps.length} gaps)`);
  if (largestGap.seconds > 0) {
    console.log(
      `Largest gap: ${formatSeconds(largestGap.seconds)} between ${largestGap.fromId} -> ${largestGap.toId}`,
    );
  }
  console.log(`Overlapping fragments: ${summary.overlaps}`);
}
