/**
 * Unit tests for chunking module
 */

import { chunkSections, isStructuralStart, splitIntoChunks } from '../src/chunking';
import { ChunkingConfig, Section } from '../src/types';
import { estimateTokens, stableHash } from '../src/text';
import { createPages, words } from './test-helpers';

describe('Chunking Module', () => {
  const smallBand: ChunkingConfig = { minTokens: 10, maxTokens: 20 };

  describe('Structural markers', () => {
    it('should match whole English words', () => {
      expect(isStructuralStart('Recommendations for adult patients')).toBe(true);
      expect(isStructuralStart('These criteria apply to adults')).toBe(true);
      expect(isStructuralStart('Appendix 2')).toBe(true);
      expect(isStructuralStart('Tablets should be swallowed whole')).toBe(false);
    });

    it('should match Russian word stems', () => {
      expect(isStructuralStart('Рекомендации по лечению')).toBe(true);
      expect(isStructuralStart('Приложение А')).toBe(true);
    });
  });

  describe('Splitting', () => {
    const intro = words(10, 'intro');
    const recommendation = `Recommendation 1 ${words(8, 'rec')}`;
    const table = `Table 2 ${words(8, 'cell')}`;
    const text = [intro, recommendation, table].join('\n\n');

    it('should keep short text in one chunk', () => {
      expect(splitIntoChunks('First paragraph.\n\nSecond paragraph.')).toEqual([
        'First paragraph.\n\nSecond paragraph.'
      ]);
    });

    it('should flush at structural blocks once the minimum is reached', () => {
      expect(splitIntoChunks(text, smallBand)).toEqual([intro, recommendation, table]);
    });

    it('should keep accumulating below the minimum', () => {
      expect(splitIntoChunks(text, { minTokens: 100, maxTokens: 20 })).toEqual([text]);
    });

    it('should emit an oversized structural block whole', () => {
      const lead = words(5, 'intro');
      const algorithm = `Algorithm ${words(29, 'step')}`;
      const tail = words(5, 'tail');

      const chunks = splitIntoChunks([lead, algorithm, tail].join('\n\n'), smallBand);

      expect(chunks).toEqual([lead, `${algorithm}\n\n${tail}`]);
    });

    it('should emit an oversized plain paragraph as its own chunk', () => {
      const plain = words(20, 'plain');
      const table = `Table ${words(4, 'cell')}`;

      expect(splitIntoChunks([plain, table].join('\n\n'), smallBand)).toEqual([plain, table]);
    });

    it('should let a block tip an accumulation still under the minimum past the maximum', () => {
      const lead = words(5, 'intro');
      const recommendation = `Recommendation ${words(15, 'rec')}`;
      const table = `Table ${words(4, 'cell')}`;

      const chunks = splitIntoChunks([lead, recommendation, table].join('\n\n'), smallBand);

      expect(chunks).toEqual([`${lead}\n\n${recommendation}`, table]);
      expect(estimateTokens(chunks[0])).toBe(27);
    });

    it('should keep every chunk inside the band except where a flush is not allowed', () => {
      const band: ChunkingConfig = { minTokens: 20, maxTokens: 40 };
      let seed = 7;
      const next = (bound: number): number => {
        seed = (seed * 48271) % 2147483647;
        return seed % bound;
      };

      const paragraphs: string[] = [];
      for (let i = 0; i < 200; i++) {
        const marker = ['', '', '', 'Table ', 'Recommendation '][next(5)];
        paragraphs.push(`${marker}${words(1 + next(45), `p${i}w`)}`);
      }

      const chunks = splitIntoChunks(paragraphs.join('\n\n'), band);

      expect(chunks.join('\n\n')).toBe(paragraphs.join('\n\n'));
      for (const chunk of chunks) {
        // Blocks inside a chunk start at its first paragraph and at every structural one
        const blocks: string[][] = [];
        for (const para of chunk.split('\n\n')) {
          if (blocks.length === 0 || isStructuralStart(para)) {
            blocks.push([para]);
          } else {
            blocks[blocks.length - 1].push(para);
          }
        }
        const blockTokens = blocks.map(block => estimateTokens(block.join('\n\n')));
        const total = blockTokens.reduce((sum, t) => sum + t, 0);
        const beforeLast = total - blockTokens[blockTokens.length - 1];

        expect(total).toBeGreaterThanOrEqual(1);
        // Over the maximum only as one oversized block, or when the blocks before
        // the last one had not reached the minimum
        if (total > band.maxTokens) {
          expect(blocks.length === 1 || beforeLast < band.minTokens).toBe(true);
        }
      }
    });

    it('should return nothing for blank text', () => {
      expect(splitIntoChunks(' \n\n  ')).toEqual([]);
    });
  });

  describe('Section chunking', () => {
    const pages = createPages([
      'General text about hypertension',
      'Recommendation: Start ACE inhibitors in Diabetes',
      '   '
    ]);
    const sections: Section[] = [
      { docId: 'doc-1', path: '1 Overview', order: 0, level: 1, pageStart: 1, pageEnd: 1 },
      { docId: 'doc-1', path: '2 Treatment', order: 1, level: 1, pageStart: 2, pageEnd: 2 },
      { docId: 'doc-1', path: '3 Annex', order: 2, level: 1, pageStart: 3, pageEnd: 3 }
    ];

    it('should tag, hash and order chunks', () => {
      const chunks = chunkSections('doc-1', pages, sections);

      expect(chunks).toEqual([
        {
          docId: 'doc-1',
          sectionPath: '1 Overview',
          pageStart: 1,
          pageEnd: 1,
          content: 'General text about hypertension',
          chunkType: 'other',
          tokenCount: 5,
          chunkHash: stableHash('doc-1|1 Overview|General text about hypertension'),
          order: 0,
          entityMentions: ['General']
        },
        {
          docId: 'doc-1',
          sectionPath: '2 Treatment',
          pageStart: 2,
          pageEnd: 2,
          content: 'Recommendation: Start ACE inhibitors in Diabetes',
          chunkType: 'recommendation',
          tokenCount: 7,
          chunkHash: stableHash('doc-1|2 Treatment|Recommendation: Start ACE inhibitors in Diabetes'),
          order: 1,
          entityMentions: ['Recommendation', 'Start', 'Diabetes']
        }
      ]);
    });

    it('should join the pages of a section and normalise whitespace', () => {
      const chunks = chunkSections('doc-1', createPages(['page one text', 'page two text']), [
        { docId: 'doc-1', path: 'document', order: 0, level: 1, pageStart: 1, pageEnd: 2 }
      ]);

      expect(chunks.map(c => c.content)).toEqual(['page one text page two text']);
    });
  });
});
