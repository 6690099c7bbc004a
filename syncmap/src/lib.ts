export {
  DEFAULT_TUNING_TEMPLATE_PATH,
  PARAM_OUTPUT_FORMAT,
  PARAM_SMIL_AUDIO_REF,
  PARAM_SMIL_PAGE_REF,
  PARAM_SYNCMAP_LANGUAGE,
  defaultRunConfiguration,
  parseParameters,
  parseRunConfiguration,
} from './config.js';
export { createSyncMapContext } from './context.js';
export {
  FragmentTypeError,
  InvalidArgumentError,
  MissingParameterError,
  PermissionError,
  SyncMapError,
  SyncMapParseError,
} from './errors.js';
export { createJsonCodec } from './formats/json.js';
export {
  FormatRegistry,
  createDefaultRegistry,
  isSyncMapFormat,
  requireParameters,
} from './formats/registry.js';
export { SyncMapFragment } from './fragment.js';
export { type SyncMapGap, type SyncMapSummary, summarizeSyncMap } from './inspect.js';
export { type Logger, type LoggerOptions, createLogger, silentLogger } from './log.js';
export { SyncMap } from './syncmap.js';
export { TextFragment } from './text-fragment.js';
export { parseTimeValue, timeToSsmmm } from './time.js';
export { Tree } from './tree.js';
export { TUNING_ALLOWED_FORMATS, renderTuningPage } from './tuning.js';
export {
  type CodecFactoryResult,
  type CodecOptions,
  type RunConfiguration,
  type SyncMapCodec,
  type SyncMapCodecFactory,
  type SyncMapContext,
  type SyncMapFormat,
  type SyncMapJsonDocument,
  type SyncMapJsonFragment,
  type SyncMapParameters,
  SYNC_MAP_FORMATS,
} from './types.js';
