/**
 * Context packing
 * Deduplicates, prioritises and bounds the final chunk set, then returns it
 * in document order for the downstream reader.
 */

import { ChunkRecord } from './types';
import { isRecommendationLike } from './tagging';
import { normalizeForDedup, queryTerms, termOverlap } from './text';

export interface PackingOptions {
  packedMin: number;
  packedMax: number;
  perSectionCap?: number;
}

export const DEFAULT_SECTION_CAP = 3;

interface RankedRecord {
  record: ChunkRecord;
  typePriority: number;
  overlap: number;
}

function compareRanked(a: RankedRecord, b: RankedRecord): number {
  return (b.typePriority - a.typePriority) ||
    (b.overlap - a.overlap) ||
    (b.record.score - a.record.score);
}

export function clampTarget(targetN: number, options: PackingOptions): number {
  return Math.max(options.packedMin, Math.min(options.packedMax, targetN));
}

export function packContext(
  query: string,
  pool: ChunkRecord[],
  targetN: number,
  options: PackingOptions
): ChunkRecord[] {
  const target = clampTarget(targetN, options);
  const cap = options.perSectionCap ?? DEFAULT_SECTION_CAP;
  const terms = queryTerms(query);

  const seenText = new Set<string>();
  const ranked: RankedRecord[] = [];
  for (const record of pool) {
    const normalized = normalizeForDedup(record.content);
    if (seenText.has(normalized)) {
      continue;
    }
    seenText.add(normalized);
    ranked.push({
      record,
      typePriority: isRecommendationLike(record.chunkType) ? 2 : 0,
      overlap: termOverlap(terms, record.content)
    });
  }

  ranked.sort(compareRanked);

  const packed: ChunkRecord[] = [];
  const skipped: ChunkRecord[] = [];
  const perSection = new Map<string, number>();

  for (const { record } of ranked) {
    if (packed.length >= target) {
      break;
    }
    const count = perSection.get(record.sectionPath) ?? 0;
    // A capped section may only take the last slot
    if (count >= cap && packed.length < target - 1) {
      skipped.push(record);
      continue;
    }
    packed.push(record);
    perSection.set(record.sectionPath, count + 1);
  }

  // Section-sparse pools: fill up to the minimum from what the cap held back
  const floor = Math.min(options.packedMin, target);
  for (const record of skipped) {
    if (packed.length >= floor) {
      break;
    }
    packed.push(record);
  }

  return packed.sort((a, b) => (a.pageStart - b.pageStart) || (a.order - b.order));
}
