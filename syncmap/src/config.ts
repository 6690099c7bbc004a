import { fileURLToPath } from 'node:url';
import { InvalidArgumentError } from './errors.js';
import type { RunConfiguration, SyncMapParameters } from './types.js';

/** Parameter overriding the language of every fragment after a read */
export const PARAM_SYNCMAP_LANGUAGE = 'language';
/** Output format preselected in the tuning page */
export const PARAM_OUTPUT_FORMAT = 'os_task_file_format';
export const PARAM_SMIL_AUDIO_REF = 'os_task_file_smil_audio_ref';
export const PARAM_SMIL_PAGE_REF = 'os_task_file_smil_page_ref';

export const DEFAULT_TUNING_TEMPLATE_PATH = fileURLToPath(
  new URL('../res/finetuneas.html', import.meta.url),
);

export const defaultRunConfiguration: RunConfiguration = {
  verbose: false,
  tuningTemplatePath: DEFAULT_TUNING_TEMPLATE_PATH,
};

const RUN_CONFIGURATION_KEYS = ['verbose', 'tuning_template'] as const;

const TRUE_VALUES = new Set(['true', '1', 'yes']);
const FALSE_VALUES = new Set(['false', '0', 'no']);

/**
 * Parse a run configuration string of the form "verbose=true|tuning_template=/x.html".
 * Keys that are not given keep their default value.
 */
export function parseRunConfiguration(input?: string): RunConfiguration {
  const config: RunConfiguration = { ...defaultRunConfiguration };
  if (!input) {
    return config;
  }

  for (const entry of input.split('|')) {
    if (!entry.trim()) {
      continue;
    }
    const [key, value] = splitKeyValue(entry);

    switch (key) {
      case 'verbose':
        config.verbose = parseBoolean(key, value);
        break;
      case 'tuning_template':
        config.tuningTemplatePath = value;
        break;
      default:
        throw new InvalidArgumentError(
          `Unknown run configuration key: ${key}. Available: ${RUN_CONFIGURATION_KEYS.join(', ')}`,
        );
    }
  }

  return config;
}

/**
 * Build a parameter set from "key=value" entries. Later entries win.
 */
export function parseParameters(entries: readonly string[]): SyncMapParameters {
  const parameters: Record<string, string> = {};
  for (const entry of entries) {
    const [key, value] = splitKeyValue(entry);
    parameters[key] = value;
  }
  return parameters;
}

function splitKeyValue(entry: string): [string, string] {
  const separator = entry.indexOf('=');
  const key = separator > 0 ? entry.slice(0, separator).trim() : '';
  if (!key) {
    throw new InvalidArgumentError(`Expected key=value, got '${entry}'`);
  }
  return [key, entry.slice(separator + 1).trim()];
}

function parseBoolean(key: string, value: string): boolean {
  const normalized = value.toLowerCase();
  if (TRUE_VALUES.has(normalized)) return true;
  if (FALSE_VALUES.has(normalized)) return false;
  throw new InvalidArgumentError(`Invalid boolean for ${key}: '${value}'`);
}
