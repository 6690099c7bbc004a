import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import {
  type SyncMapCodecFactory,
  type SyncMapContext,
  SyncMap,
  SyncMapFragment,
  TextFragment,
  createDefaultRegistry,
  createSyncMapContext,
  silentLogger,
} from '../src/lib.js';

export const NESTED_FIXTURE = fileURLToPath(new URL('./fixtures/nested.json', import.meta.url));

export async function withTempDir(run: (dir: string) => Promise<void> | void): Promise<void> {
  const dir = await mkdtemp(join(tmpdir(), 'syncmap-test-'));

  try {
    await run(dir);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
}

export function makeFragment(
  id: string,
  begin: number,
  end: number,
  lines: string[] = [`text of ${id}`],
  language: string | null = null,
): SyncMapFragment {
  return new SyncMapFragment(new TextFragment(id, language, lines), begin, end);
}

export function makeSyncMap(overrides: Partial<SyncMapContext> = {}): SyncMap {
  return new SyncMap(createSyncMapContext({ logger: silentLogger, ...overrides }));
}

/**
 * Codec for a throwaway "id begin end text" line format, tagging every fragment with `language`
 */
export function createLineCodec(language: string | null = 'en'): SyncMapCodecFactory {
  return () => ({
    ok: true,
    codec: {
      parse(inputText: string, syncMap: SyncMap): void {
        for (const line of inputText.split('\n')) {
          if (!line.trim()) continue;
          const [id, begin, end, ...words] = line.split(' ');
          syncMap.addFragment(makeFragment(id, Number(begin), Number(end), [words.join(' ')], language));
        }
      },
      format(syncMap: SyncMap): string {
        return `${syncMap.toString()}\n`;
      },
    },
  });
}

export function makeRegistry() {
  return createDefaultRegistry().register('txt', createLineCodec());
}
