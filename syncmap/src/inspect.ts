import type { SyncMapFragment } from './fragment.js';
import type { SyncMap } from './syncmap.js';

export interface SyncMapGap {
  seconds: number;
  fromId: string;
  toId: string;
}

/**
 * Statistics over a sync map, computed on the fragments in document order
 */
export interface SyncMapSummary {
  topLevelFragments: number;
  totalFragments: number;
  height: number;
  singleLevel: boolean;
  languages: string[];
  firstBegin: number | null;
  lastEnd: number | null;
  durationMin: number;
  durationAvg: number;
  durationMax: number;
  /** Positive distances between the end of a fragment and the begin of the next one */
  gaps: SyncMapGap[];
  /** Consecutive fragments where the next one begins before the previous ends */
  overlaps: number;
}

/**
 * Summarize the leaves of the tree (the finest level of detail) plus tree shape
 */
export function summarizeSyncMap(syncMap: SyncMap): SyncMapSummary {
  const tree = syncMap.fragmentsTree;
  const leaves: SyncMapFragment[] = [];
  const languages = new Set<string>();
  let totalFragments = 0;

  for (const node of tree.preOrder()) {
    const fragment = node.value;
    if (!fragment) {
      continue;
    }
    totalFragments++;
    if (fragment.language !== null) {
      languages.add(fragment.language);
    }
    if (node.childrenNotEmpty.length === 0) {
      leaves.push(fragment);
    }
  }

  let durationTotal = 0;
  let durationMin = Number.POSITIVE_INFINITY;
  let durationMax = Number.NEGATIVE_INFINITY;

  const gaps: SyncMapGap[] = [];
  let overlaps = 0;
  let prev: SyncMapFragment | undefined;
  for (const next of leaves) {
    durationTotal += next.length;
    durationMin = Math.min(durationMin, next.length);
    durationMax = Math.max(durationMax, next.length);
    if (prev) {
      const gap = next.begin - prev.end;
      if (gap > 0) {
        gaps.push({ seconds: gap, fromId: prev.identifier, toId: next.identifier });
      } else if (gap < 0) {
        overlaps++;
      }
    }
    prev = next;
  }

  return {
    topLevelFragments: syncMap.length,
    totalFragments,
    height: tree.height,
    singleLevel: syncMap.isSingleLevel,
    languages: [...languages].sort(),
    firstBegin: leaves.at(0)?.begin ?? null,
    lastEnd: leaves.at(-1)?.end ?? null,
    durationMin: leaves.length ? durationMin : 0,
    durationAvg: leaves.length ? durationTotal / leaves.length : 0,
    durationMax: leaves.length ? durationMax : 0,
    gaps,
    overlaps,
  };
}
