/**
 * Core TypeScript interfaces for syncmap
 */

import type { FormatRegistry } from './formats/registry.js';
import type { Logger } from './log.js';
import type { SyncMap } from './syncmap.js';

/**
 * Identifiers of the sync map formats known to the registry
 */
export const SYNC_MAP_FORMATS = [
  'aud',
  'csv',
  'csvh',
  'csvm',
  'eaf',
  'json',
  'rbse',
  'sbv',
  'smil',
  'smilh',
  'smilm',
  'srt',
  'ssv',
  'ssvh',
  'ssvm',
  'sub',
  'tab',
  'textgrid',
  'textgrid_short',
  'tsv',
  'tsvh',
  'tsvm',
  'ttml',
  'txt',
  'txth',
  'txtm',
  'vtt',
  'xml',
  'xml_legacy',
] as const;

export type SyncMapFormat = (typeof SYNC_MAP_FORMATS)[number];

/**
 * Open set of string parameters. Keys the core does not recognize are
 * handed to codecs untouched.
 */
export type SyncMapParameters = Readonly<Record<string, string | undefined>>;

/**
 * Run configuration carried by every sync map
 */
export interface RunConfiguration {
  verbose: boolean;
  tuningTemplatePath: string;
}

/**
 * Explicit context passed to sync maps instead of global state
 */
export interface SyncMapContext {
  config: RunConfiguration;
  logger: Logger;
  registry: FormatRegistry;
}

/**
 * A reader and/or writer bound to one format
 */
export interface SyncMapCodec {
  /** Populate `syncMap` from `inputText` */
  parse?(inputText: string, syncMap: SyncMap): void;
  /** Serialize the whole tree of `syncMap` */
  format?(syncMap: SyncMap): string;
}

export interface CodecOptions {
  variant: SyncMapFormat;
  parameters: SyncMapParameters;
  config: RunConfiguration;
  logger: Logger;
}

export type CodecFactoryResult =
  | { ok: true; codec: SyncMapCodec }
  | { ok: false; missingParameters: string[] };

export type SyncMapCodecFactory = (options: CodecOptions) => CodecFactoryResult;

/**
 * One element of the JSON projection. Keys are listed in the order they are emitted.
 */
export interface SyncMapJsonFragment {
  begin: string;
  children: SyncMapJsonFragment[];
  end: string;
  id: string;
  language: string | null;
  lines: string[];
}

export interface SyncMapJsonDocument {
  fragments: SyncMapJsonFragment[];
}
