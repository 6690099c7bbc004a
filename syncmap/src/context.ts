import { defaultRunConfiguration } from './config.js';
import { createDefaultRegistry } from './formats/registry.js';
import { createLogger } from './log.js';
import type { SyncMapContext } from './types.js';

/**
 * Assemble the context a sync map runs with. Missing pieces get defaults:
 * the default run configuration, a console logger honoring `config.verbose`,
 * and the registry of built-in codecs.
 */
export function createSyncMapContext(overrides: Partial<SyncMapContext> = {}): SyncMapContext {
  const config = overrides.config ?? defaultRunConfiguration;
  return {
    config,
    logger: overrides.logger ?? createLogger('SyncMap', { verbose: config.verbose }),
    registry: overrides.registry ?? createDefaultRegistry(),
  };
}
