/**
 * Section chunking module
 * Splits section text into chunks within a token band:
 * - Paragraphs are grouped into blocks that start at structural markers
 *   (recommendations, algorithms, tables, criteria, appendices)
 * - Blocks are merged until the band is reached
 * - Oversized structural blocks are kept whole rather than split
 */

import { Chunk, ChunkingConfig, PageText, Section } from './types';
import { classifyChunkType, extractEntityMentions } from './tagging';
import { estimateTokens, normalizeSpace, stableHash } from './text';
import { logger } from './logger';

export const DEFAULT_CHUNKING_CONFIG: ChunkingConfig = {
  minTokens: 500,
  maxTokens: 1200
};

const STRUCTURAL_START = new RegExp(
  '(?<![\\p{L}\\p{N}_])(?:' +
    'recommendations?|algorithms?|tables?|criteria|criterion|appendix|appendices' +
    ')(?![\\p{L}\\p{N}_])' +
    '|(?<![\\p{L}\\p{N}_])(?:рекомендац|алгоритм|таблиц|критери|приложени)',
  'iu'
);

export function isStructuralStart(text: string): boolean {
  return STRUCTURAL_START.test(text);
}

/**
 * Group paragraphs into blocks; a structural paragraph always opens a new block
 */
function groupIntoBlocks(paragraphs: string[]): string[] {
  const blocks: string[] = [];
  let carry: string[] = [];

  for (const para of paragraphs) {
    if (isStructuralStart(para) && carry.length > 0) {
      blocks.push(carry.join('\n\n'));
      carry = [para];
    } else {
      carry.push(para);
    }
  }

  if (carry.length > 0) {
    blocks.push(carry.join('\n\n'));
  }

  return blocks;
}

/**
 * Split one section's text into chunk texts
 *
 * Chunks aim at `maxTokens` but may exceed it in two cases: a single block
 * larger than the maximum is never split, and a block is still added when the
 * chunk built so far has not reached `minTokens`.
 */
export function splitIntoChunks(
  text: string,
  config: ChunkingConfig = DEFAULT_CHUNKING_CONFIG
): string[] {
  const { minTokens, maxTokens } = config;

  const paragraphs = text
    .split(/\n\s*\n/)
    .map(p => p.trim())
    .filter(p => p.length > 0);

  if (paragraphs.length === 0) {
    return [];
  }

  const chunks: string[] = [];
  let current: string[] = [];
  let tokens = 0;

  const flush = (): void => {
    if (current.length > 0) {
      chunks.push(current.join('\n\n'));
    }
    current = [];
    tokens = 0;
  };

  for (const block of groupIntoBlocks(paragraphs)) {
    const blockTokens = estimateTokens(block);

    // Never fracture a self-contained recommendation or table
    if (blockTokens > maxTokens && isStructuralStart(block)) {
      flush();
      chunks.push(block);
      continue;
    }

    if (tokens + blockTokens > maxTokens && tokens >= minTokens) {
      flush();
    }

    current.push(block);
    tokens += blockTokens;
  }

  flush();

  return chunks.filter(chunk => chunk.trim().length > 0);
}

/**
 * Chunk every section of a document and tag the results
 */
export function chunkSections(
  docId: string,
  pages: PageText[],
  sections: Section[],
  config: ChunkingConfig = DEFAULT_CHUNKING_CONFIG
): Chunk[] {
  const textByPage = new Map<number, string>(pages.map(p => [p.page, p.text]));
  const chunks: Chunk[] = [];

  for (const section of sections) {
    const sectionText: string[] = [];
    for (let page = section.pageStart; page <= section.pageEnd; page++) {
      sectionText.push(textByPage.get(page) ?? '');
    }

    const joined = sectionText.join('\n\n').trim();
    if (!joined) {
      logger.debug(`Section "${section.path}" has no text; no chunks`);
      continue;
    }

    for (const raw of splitIntoChunks(joined, config)) {
      const content = normalizeSpace(raw);
      if (!content) {
        continue;
      }

      chunks.push({
        docId,
        sectionPath: section.path,
        pageStart: section.pageStart,
        pageEnd: section.pageEnd,
        content,
        chunkType: classifyChunkType(content, section.path),
        tokenCount: estimateTokens(content),
        chunkHash: stableHash(`${docId}|${section.path}|${content}`),
        order: chunks.length,
        entityMentions: extractEntityMentions(content)
      });
    }
  }

  logger.debug(`Chunked ${sections.length} sections of ${docId} into ${chunks.length} chunks`);
  return chunks;
}
