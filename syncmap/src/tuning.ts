/**
 * Fine-tuning page generation by literal placeholder substitution.
 *
 * The template is a standalone HTML page. Blocks between the COMMENT markers
 * are only meant for the standalone page and get commented out; blocks between
 * the UNCOMMENT markers are only meant for generated pages and get enabled.
 * The four marker replacements must run in the order listed.
 */

import { PARAM_OUTPUT_FORMAT, PARAM_SMIL_AUDIO_REF, PARAM_SMIL_PAGE_REF } from './config.js';
import type { SyncMapParameters } from './types.js';

export const TUNING_REPLACEMENTS: ReadonlyArray<readonly [find: string, replace: string]> = [
  ['<!-- TUNING_REPLACE_COMMENT_BEGIN -->', '<!-- TUNING_REPLACE_COMMENT_BEGIN'],
  ['<!-- TUNING_REPLACE_COMMENT_END -->', 'TUNING_REPLACE_COMMENT_END -->'],
  ['<!-- TUNING_REPLACE_UNCOMMENT_BEGIN', '<!-- TUNING_REPLACE_UNCOMMENT_BEGIN -->'],
  ['TUNING_REPLACE_UNCOMMENT_END -->', '<!-- TUNING_REPLACE_UNCOMMENT_END -->'],
  ['// TUNING_REPLACE_SHOW_ID', 'showID = true;'],
  ['// TUNING_REPLACE_ALIGN_TEXT', 'alignText = "left"'],
  ['// TUNING_REPLACE_CONTINUOUS_PLAY', 'continuousPlay = true;'],
  ['// TUNING_REPLACE_TIME_FORMAT', 'timeFormatHHMMSSmmm = true;'],
];

export const TUNING_PLACEHOLDER_AUDIO_FILE_PATH = '// TUNING_REPLACE_AUDIOFILEPATH';
export const TUNING_PLACEHOLDER_FRAGMENTS = '// TUNING_REPLACE_FRAGMENTS';
export const TUNING_PLACEHOLDER_OUTPUT_FORMAT = '// TUNING_REPLACE_OUTPUT_FORMAT';
export const TUNING_PLACEHOLDER_SMIL_AUDIO_REF = '// TUNING_REPLACE_SMIL_AUDIOREF';
export const TUNING_PLACEHOLDER_SMIL_PAGE_REF = '// TUNING_REPLACE_SMIL_PAGEREF';

/** Output formats the tuning page can export */
export const TUNING_ALLOWED_FORMATS: readonly string[] = [
  'csv',
  'json',
  'smil',
  'srt',
  'ssv',
  'ttml',
  'tsv',
  'txt',
  'vtt',
  'xml',
];

export interface TuningPageInput {
  /** Absolute audio file path with forward slashes */
  audioFilePath: string;
  /** JSON projection of the sync map */
  json: string;
  parameters: SyncMapParameters;
}

/**
 * Substitute every placeholder of `template`
 */
export function renderTuningPage(template: string, input: TuningPageInput): string {
  let page = template;

  for (const [find, replace] of TUNING_REPLACEMENTS) {
    page = replaceLiteral(page, find, replace);
  }

  page = replaceLiteral(
    page,
    TUNING_PLACEHOLDER_AUDIO_FILE_PATH,
    `audioFilePath = "file://${input.audioFilePath}";`,
  );
  // "</" inside the inline script would close it early
  const json = replaceLiteral(input.json, '</', '<\\/');
  page = replaceLiteral(page, TUNING_PLACEHOLDER_FRAGMENTS, `fragments = (${json}).fragments;`);

  const outputFormat = input.parameters[PARAM_OUTPUT_FORMAT];
  if (outputFormat === undefined || !TUNING_ALLOWED_FORMATS.includes(outputFormat)) {
    return page;
  }

  page = replaceLiteral(page, TUNING_PLACEHOLDER_OUTPUT_FORMAT, `outputFormat = "${outputFormat}";`);

  if (outputFormat === 'smil') {
    const smilReplacements: [key: string, placeholder: string, variable: string][] = [
      [PARAM_SMIL_AUDIO_REF, TUNING_PLACEHOLDER_SMIL_AUDIO_REF, 'audioref'],
      [PARAM_SMIL_PAGE_REF, TUNING_PLACEHOLDER_SMIL_PAGE_REF, 'pageref'],
    ];
    for (const [key, placeholder, variable] of smilReplacements) {
      const value = input.parameters[key];
      if (value !== undefined) {
        page = replaceLiteral(page, placeholder, `${variable} = "${value}";`);
      }
    }
  }

  return page;
}

/**
 * Replace every occurrence of `find`; `$` sequences in `replace` are inserted as is
 */
export function replaceLiteral(text: string, find: string, replace: string): string {
  return text.split(find).join(replace);
}
