/**
 * Graph expansion
 * Pulls in chunks related to the reranked seeds, in priority order:
 * 1. neighbours in the seed's section, closest first
 * 2. chunks mentioning the seeds' capitalised terms
 * 3. chunks backing the same recommendations as a seed
 * Each source only runs while budget remains.
 */

import { ChunkRecord, ChunkSource } from './types';
import { ChunkQueries } from './storage';
import { capitalisedTerms } from './tagging';
import { logger } from './logger';

export const NEIGHBORS_PER_SEED = 3;
export const TERMS_PER_SEED = 3;

export interface ExpansionResult {
  chunkIds: string[];
  sources: Map<string, ChunkSource>;
}

export async function expandGraph(
  store: ChunkQueries,
  docId: string,
  seedIds: string[],
  budget: number
): Promise<ExpansionResult> {
  const seedSet = new Set(seedIds);
  const sources = new Map<string, ChunkSource>();
  const remaining = (): number => budget - sources.size;

  const take = (records: ChunkRecord[], source: ChunkSource, cap: number = Infinity): void => {
    let taken = 0;
    for (const record of records) {
      if (remaining() <= 0 || taken >= cap) {
        break;
      }
      if (seedSet.has(record.chunkId) || sources.has(record.chunkId)) {
        continue;
      }
      sources.set(record.chunkId, source);
      taken++;
    }
  };

  if (budget <= 0 || seedIds.length === 0) {
    return { chunkIds: [], sources };
  }

  const seeds = await store.fetchByIds(docId, seedIds);

  for (const seed of seeds) {
    if (remaining() <= 0) {
      break;
    }
    // One extra: the seed itself is the closest chunk of its section
    const neighbors = await store.fetchSectionNeighbors(
      docId,
      seed.sectionPath,
      seed.order,
      NEIGHBORS_PER_SEED + 1
    );
    take(neighbors, 'structural', Math.min(NEIGHBORS_PER_SEED, remaining()));
  }

  if (remaining() > 0) {
    const terms = Array.from(new Set(
      seeds.flatMap(seed => capitalisedTerms(seed.content).slice(0, TERMS_PER_SEED))
    ));
    if (terms.length > 0) {
      const byEntity = await store.fetchByEntityMentions(docId, terms, remaining() + seedSet.size + sources.size);
      take(byEntity, 'entity');
    }
  }

  if (remaining() > 0) {
    const linked = await store.fetchRecommendationLinked(docId, seedIds, remaining() + seedSet.size + sources.size);
    take(linked, 'recommendation');
  }

  logger.debug(`Graph expansion for ${docId}: ${sources.size} of budget ${budget}`);
  return { chunkIds: Array.from(sources.keys()), sources };
}
