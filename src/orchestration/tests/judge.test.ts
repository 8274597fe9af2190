/**
 * Unit tests for the verdict judge
 */

import Groq from 'groq-sdk';
import {
  ChatClient,
  GroqVerdictModel,
  parseJudgeAnswer,
  VerdictJudge,
  VerdictModel,
  verdictSubqueries
} from '../src/judge';
import { RetrievalService } from '../src/retrieval';
import { InMemoryGraphStore } from '../src/vectorStore';
import { LocalEmbeddingProvider } from '../src/embeddings';
import { BackendUnavailableError } from '../src/errors';
import { silentObserver } from '../src/observer';
import { GroqConfig } from '../src/types';
import { createRecord } from './test-helpers';

const ANSWER = [
  '```json',
  '{"verdict": "correct", "explanation": "Matches the guideline",',
  '"citations": [{"chunk_id": "a", "section_path": "1 Overview", "pages": "2-2"}, {"bad": 1}],',
  '"missing_info": [], "recommended_action": "Continue"}',
  '```'
].join('\n');

function fakeModel(answer: string): VerdictModel & { complete: jest.Mock } {
  return {
    modelName: 'fake-model',
    complete: jest.fn(async () => answer)
  };
}

describe('Judge Module', () => {
  describe('verdictSubqueries', () => {
    it('should take capitalised terms of four or more letters', () => {
      expect(verdictSubqueries('Start Metformin for Diabetes')).toEqual(['Start', 'Metformin', 'Diabetes']);
    });

    it('should keep at most four', () => {
      expect(verdictSubqueries('Aspirin Heparin Warfarin Insulin Statin')).toEqual([
        'Aspirin',
        'Heparin',
        'Warfarin',
        'Insulin'
      ]);
    });
  });

  describe('parseJudgeAnswer', () => {
    it('should read the object out of surrounding text', () => {
      expect(parseJudgeAnswer(ANSWER, ['a'])).toEqual({
        verdict: 'correct',
        explanation: 'Matches the guideline',
        citations: [{ chunkId: 'a', sectionPath: '1 Overview', pages: '2-2' }],
        missingInfo: [],
        recommendedAction: 'Continue',
        chunkIds: ['a']
      });
    });

    it('should map an unknown label to insufficient_info', () => {
      expect(parseJudgeAnswer('{"verdict": "maybe"}', [])?.verdict).toBe('insufficient_info');
    });

    it('should return null for non-JSON answers', () => {
      expect(parseJudgeAnswer('I cannot tell', [])).toBeNull();
      expect(parseJudgeAnswer('{ broken', [])).toBeNull();
      expect(parseJudgeAnswer('{"verdict": "correct"', [])).toBeNull();
    });
  });

  describe('VerdictJudge', () => {
    let store: InMemoryGraphStore;
    let retrieval: RetrievalService;

    beforeEach(() => {
      store = new InMemoryGraphStore();
      retrieval = new RetrievalService(store, new LocalEmbeddingProvider(), undefined, silentObserver);
    });

    it('should retrieve for the verdict and each subquery, then store the evaluation', async () => {
      const first = createRecord('a', { pageStart: 2, pageEnd: 2, order: 1, content: 'Metformin is first line', score: 0.4 });
      const spy = jest.spyOn(retrieval, 'retrieveContext')
        .mockResolvedValueOnce([first, createRecord('x', { docId: 'doc-2' })])
        .mockResolvedValueOnce([createRecord('b'), { ...first, score: 0.9 }])
        .mockResolvedValue([]);
      const model = fakeModel(ANSWER);
      const judge = new VerdictJudge(retrieval, store, model);

      const result = await judge.evaluateVerdict('doc-1', 'Start Metformin for Diabetes');

      expect(spy.mock.calls.map(call => call[1])).toEqual([
        'Start Metformin for Diabetes',
        'Start',
        'Metformin',
        'Diabetes'
      ]);
      expect(result.verdict).toBe('correct');
      expect(result.chunkIds).toEqual(['b', 'a']);

      const prompt: string = model.complete.mock.calls[0][0];
      expect(prompt).toContain('Verdict: Start Metformin for Diabetes');
      expect(prompt).toContain('[chunk_id=a] [section=1 Overview] [pages=2-2] [type=other]\nMetformin is first line');
      expect(prompt).not.toContain('chunk_id=x');

      const [evaluation] = store.getEvaluations('doc-1');
      expect(evaluation).toMatchObject({
        docId: 'doc-1',
        verdictText: 'Start Metformin for Diabetes',
        retrievedChunkIds: ['b', 'a'],
        modelName: 'fake-model',
        output: result
      });
    });

    it('should fall back to insufficient_info when the model answer is not JSON', async () => {
      jest.spyOn(retrieval, 'retrieveContext').mockResolvedValue([createRecord('a')]);
      const judge = new VerdictJudge(retrieval, store, fakeModel('no idea'));

      const result = await judge.evaluateVerdict('doc-1', 'treat early');

      expect(result).toEqual({
        verdict: 'insufficient_info',
        explanation: 'The model did not return a structured answer',
        citations: [],
        missingInfo: ['structured_json_response'],
        recommendedAction: null,
        chunkIds: ['a']
      });
      expect(store.getEvaluations('doc-1')).toHaveLength(1);
    });
  });

  describe('GroqVerdictModel', () => {
    const config: GroqConfig = { apiKey: 'test-secret', model: 'test-model', temperature: 0, maxTokens: 256 };

    it('should request a JSON object and return the message content', async () => {
      const create = jest.fn(async (_body: unknown) => ({ choices: [{ message: { content: '{"verdict": "incorrect"}' } }] }));
      const client: ChatClient = { chat: { completions: { create } } };

      const answer = await new GroqVerdictModel(config, client).complete('prompt text');

      expect(answer).toBe('{"verdict": "incorrect"}');
      expect(create).toHaveBeenCalledWith(expect.objectContaining({
        model: 'test-model',
        temperature: 0,
        max_tokens: 256,
        response_format: { type: 'json_object' }
      }));
    });

    it('should return an empty answer when there are no choices', async () => {
      const client: ChatClient = { chat: { completions: { create: async () => ({ choices: [] }) } } };

      expect(await new GroqVerdictModel(config, client).complete('prompt')).toBe('');
    });

    it('should report API errors as an unavailable backend', async () => {
      const client: ChatClient = {
        chat: {
          completions: {
            create: async () => {
              throw new Groq.APIConnectionError({ message: 'Connection error.' });
            }
          }
        }
      };
      const model = new GroqVerdictModel(config, client);

      await expect(model.complete('prompt')).rejects.toThrow(BackendUnavailableError);
      await expect(model.complete('prompt')).rejects.toThrow('groq unavailable: Connection error.');
    });
  });
});
