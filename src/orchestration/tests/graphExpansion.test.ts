/**
 * Unit tests for graph expansion
 */

import { expandGraph } from '../src/graphExpansion';
import { InMemoryGraphStore } from '../src/vectorStore';
import { createChunk } from './test-helpers';

describe('Graph Expansion Module', () => {
  let store: InMemoryGraphStore;
  const id: { [name: string]: string } = {};

  beforeEach(async () => {
    store = new InMemoryGraphStore();

    const sectionA = ['a0', 'a1', 'a2', 'a3', 'a4'];
    for (let i = 0; i < sectionA.length; i++) {
      const name = sectionA[i];
      const content = name === 'a2' ? 'Metformin is first line' : `plain text of ${name}`;
      const entityMentions = name === 'a2' ? ['Metformin'] : [];
      id[name] = await store.upsertChunk(createChunk(content, i, { sectionPath: 'A', entityMentions }), null);
    }
    id.b0 = await store.upsertChunk(
      createChunk('Metformin dosing in renal impairment', 5, { sectionPath: 'B', entityMentions: ['Metformin'] }),
      null
    );
    id.b1 = await store.upsertChunk(createChunk('plain text of b1', 6, { sectionPath: 'B' }), null);

    const recommendationId = await store.upsertRecommendation({ statement: 'Start metformin' }, 'doc-1');
    await store.linkRecommendationToChunk(recommendationId, id.a2);
    await store.linkRecommendationToChunk(recommendationId, id.b1);
  });

  it('should draw from neighbours, then entities, then recommendations', async () => {
    const expansion = await expandGraph(store, 'doc-1', [id.a2], 8);

    expect(expansion.chunkIds).toEqual([id.a1, id.a3, id.a0, id.b0, id.b1]);
    expect(Array.from(expansion.sources.values())).toEqual([
      'structural',
      'structural',
      'structural',
      'entity',
      'recommendation'
    ]);
  });

  it('should stop at the budget', async () => {
    const expansion = await expandGraph(store, 'doc-1', [id.a2], 2);
    expect(expansion.chunkIds).toEqual([id.a1, id.a3]);
  });

  it('should never return a seed', async () => {
    const expansion = await expandGraph(store, 'doc-1', [id.a1, id.a2], 8);

    expect(expansion.chunkIds).toEqual([id.a0, id.a3, id.b0, id.b1]);
  });

  it('should return nothing without seeds or budget', async () => {
    expect((await expandGraph(store, 'doc-1', [], 8)).chunkIds).toEqual([]);
    expect((await expandGraph(store, 'doc-1', [id.a2], 0)).chunkIds).toEqual([]);
  });

  it('should fill the budget when entity hits overlap structural neighbours', async () => {
    const local = new InMemoryGraphStore();
    const names = ['seed', 'n1', 'n2', 'n3', 'e1', 'e2'];
    const ids: string[] = [];
    for (let i = 0; i < names.length; i++) {
      const sectionPath = names[i].startsWith('e') ? 'B' : 'A';
      const content = `Metformin note ${names[i]}`;
      ids.push(await local.upsertChunk(createChunk(content, i, { sectionPath, entityMentions: ['Metformin'] }), null));
    }

    const expansion = await expandGraph(local, 'doc-1', [ids[0]], 5);

    expect(expansion.chunkIds).toEqual(ids.slice(1));
    expect(expansion.sources.get(ids[4])).toBe('entity');
    expect(expansion.sources.get(ids[5])).toBe('entity');
  });

  it('should stay inside the document', async () => {
    const expansion = await expandGraph(store, 'doc-2', [id.a2], 8);
    expect(expansion.chunkIds).toEqual([]);
  });
});
