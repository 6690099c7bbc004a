import { type Static, Type } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';
import { SyncMapParseError } from '../errors.js';
import { SyncMapFragment } from '../fragment.js';
import type { SyncMap } from '../syncmap.js';
import { TextFragment } from '../text-fragment.js';
import { parseTimeValue } from '../time.js';
import { Tree } from '../tree.js';
import type { CodecFactoryResult, CodecOptions } from '../types.js';

const TimeValueSchema = Type.Union([Type.String(), Type.Number()]);

/**
 * Accepted shape of one fragment. Looser than the projection we emit:
 * times may be numbers, and language/children may be left out.
 */
const JsonFragmentSchema = Type.Recursive((Self) =>
  Type.Object({
    id: Type.String(),
    language: Type.Optional(Type.Union([Type.String(), Type.Null()])),
    lines: Type.Array(Type.String()),
    begin: TimeValueSchema,
    end: TimeValueSchema,
    children: Type.Optional(Type.Array(Self)),
  }),
);

const JsonDocumentSchema = Type.Object({
  fragments: Type.Array(JsonFragmentSchema),
});

type JsonFragmentInput = Static<typeof JsonFragmentSchema>;

/**
 * Codec for the canonical JSON projection of a sync map
 */
export function createJsonCodec({ logger }: CodecOptions): CodecFactoryResult {
  return {
    ok: true,
    codec: {
      parse(inputText: string, syncMap: SyncMap): void {
        let data: unknown;
        try {
          data = JSON.parse(inputText);
        } catch (err) {
          const message = err instanceof Error ? err.message : String(err);
          throw new SyncMapParseError(`Invalid JSON: ${message}`, 'json');
        }

        if (!Value.Check(JsonDocumentSchema, data)) {
          const first = Value.Errors(JsonDocumentSchema, data).First();
          const location = first?.path || '/';
          throw new SyncMapParseError(`${location}: ${first?.message ?? 'invalid document'}`, 'json');
        }

        for (const entry of data.fragments) {
          syncMap.fragmentsTree.addChild(buildNode(entry));
        }
        logger.debug(`Parsed ${data.fragments.length} top-level JSON fragments`);
      },

      format(syncMap: SyncMap): string {
        return syncMap.jsonString;
      },
    },
  };
}

function buildNode(entry: JsonFragmentInput): Tree<SyncMapFragment> {
  const text = new TextFragment(entry.id, entry.language ?? null, entry.lines);
  const node = new Tree(
    new SyncMapFragment(text, readTime(entry, 'begin'), readTime(entry, 'end')),
  );

  for (const child of entry.children ?? []) {
    node.addChild(buildNode(child));
  }

  return node;
}

function readTime(entry: JsonFragmentInput, key: 'begin' | 'end'): number {
  const seconds = parseTimeValue(entry[key]);
  if (seconds === null) {
    throw new SyncMapParseError(`Fragment '${entry.id}' has an invalid ${key}: '${entry[key]}'`, 'json');
  }
  return seconds;
}
