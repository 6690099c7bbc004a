import {
  type CodecFactoryResult,
  type CodecOptions,
  type SyncMapCodec,
  type SyncMapCodecFactory,
  type SyncMapFormat,
  type SyncMapParameters,
  SYNC_MAP_FORMATS,
} from '../types.js';
import { createJsonCodec } from './json.js';

/**
 * Registry of codec factories, keyed by format identifier
 */
export class FormatRegistry {
  private readonly factories = new Map<SyncMapFormat, SyncMapCodecFactory>();

  register(format: SyncMapFormat, factory: SyncMapCodecFactory): this {
    this.factories.set(format, factory);
    return this;
  }

  /**
   * True if `format` is a known identifier with a registered codec
   */
  has(format: string): format is SyncMapFormat {
    return isSyncMapFormat(format) && this.factories.has(format);
  }

  get formats(): SyncMapFormat[] {
    return SYNC_MAP_FORMATS.filter((format) => this.factories.has(format));
  }

  create(options: CodecOptions): CodecFactoryResult {
    const factory = this.factories.get(options.variant);
    if (!factory) {
      throw new Error(
        `Unknown sync map format: ${options.variant}. Available: ${this.formats.join(', ')}`,
      );
    }
    return factory(options);
  }
}

export function isSyncMapFormat(value: string): value is SyncMapFormat {
  return SYNC_MAP_FORMATS.some((format) => format === value);
}

/**
 * Build a codec only when every key in `keys` is present in `parameters`
 */
export function requireParameters(
  parameters: SyncMapParameters,
  keys: readonly string[],
  build: () => SyncMapCodec,
): CodecFactoryResult {
  const missingParameters = keys.filter((key) => parameters[key] === undefined);
  if (missingParameters.length > 0) {
    return { ok: false, missingParameters };
  }
  return { ok: true, codec: build() };
}

/**
 * Registry with the built-in codecs
 */
export function createDefaultRegistry(): FormatRegistry {
  return new FormatRegistry().register('json', createJsonCodec);
}
