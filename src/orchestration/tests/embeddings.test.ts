/**
 * Unit tests for embedding providers
 */

import axios from 'axios';
import { cosineSimilarity, LocalEmbeddingProvider, OllamaEmbeddingProvider } from '../src/embeddings';
import { BackendUnavailableError } from '../src/errors';

jest.mock('axios');
const mockedPost = jest.mocked(axios.post);
const mockedIsAxiosError = jest.mocked(axios.isAxiosError);

describe('Embeddings Module', () => {
  describe('Cosine similarity', () => {
    it('should score orthogonal and parallel vectors', () => {
      expect(cosineSimilarity([1, 0], [0, 1])).toBe(0);
      expect(cosineSimilarity([1, 2], [2, 4])).toBeCloseTo(1);
    });

    it('should return 0 for a zero vector', () => {
      expect(cosineSimilarity([0, 0], [1, 1])).toBe(0);
    });

    it('should reject vectors of different length', () => {
      expect(() => cosineSimilarity([1], [1, 2])).toThrow('Vectors must have same length');
    });
  });

  describe('Local provider', () => {
    const provider = new LocalEmbeddingProvider();

    it('should produce deterministic unit vectors', async () => {
      const first = await provider.embed('ACE inhibitors for hypertension');
      const second = await provider.embed('ACE inhibitors for hypertension');

      expect(first).toHaveLength(300);
      expect(first).toEqual(second);
      expect(Math.sqrt(first.reduce((sum, v) => sum + v * v, 0))).toBeCloseTo(1);
    });

    it('should place related texts closer than unrelated ones', async () => {
      const query = await provider.embed('ACE inhibitor dosing');
      const related = await provider.embed('Dosing of ACE inhibitors in adults');
      const unrelated = await provider.embed('Vaccination schedule for children');

      expect(cosineSimilarity(query, related)).toBeGreaterThan(cosineSimilarity(query, unrelated));
    });

    it('should return a zero vector for text without words', async () => {
      const embedding = await provider.embed('  ...  ');
      expect(embedding.every(v => v === 0)).toBe(true);
    });
  });

  describe('Ollama provider', () => {
    const provider = new OllamaEmbeddingProvider({
      baseUrl: 'http://localhost:11434/',
      model: 'nomic-embed-text'
    });

    beforeEach(() => {
      jest.clearAllMocks();
      mockedIsAxiosError.mockReturnValue(false);
    });

    it('should post the prompt to the embeddings endpoint', async () => {
      mockedPost.mockResolvedValue({ data: { embedding: [0.1, 0.2, 0.3] } });

      const embedding = await provider.embed('hello');

      expect(embedding).toEqual([0.1, 0.2, 0.3]);
      expect(mockedPost).toHaveBeenCalledWith('http://localhost:11434/api/embeddings', {
        model: 'nomic-embed-text',
        prompt: 'hello'
      });
    });

    it('should report an unreachable server as backend unavailable', async () => {
      mockedIsAxiosError.mockReturnValue(true);
      mockedPost.mockRejectedValue(Object.assign(new Error('connect ECONNREFUSED'), { code: 'ECONNREFUSED' }));

      const attempt = provider.embed('hello');

      await expect(attempt).rejects.toThrow(BackendUnavailableError);
      await expect(attempt).rejects.toThrow('ollama unavailable: ECONNREFUSED');
      expect(mockedPost).toHaveBeenCalledTimes(1);
    });

    it('should reject an empty embedding', async () => {
      mockedPost.mockResolvedValue({ data: { embedding: [] } });

      await expect(provider.embed('hello')).rejects.toThrow(
        'ollama unavailable: no embedding returned by model nomic-embed-text'
      );
    });
  });
});
