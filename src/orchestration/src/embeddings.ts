/**
 * Embedding providers
 * - LocalEmbeddingProvider: hashed term/character frequency vectors, no network
 * - OllamaEmbeddingProvider: an Ollama server's /api/embeddings endpoint
 */

import axios from 'axios';
import { BackendUnavailableError } from './errors';
import { logger } from './logger';

export interface EmbeddingProvider {
  readonly name: string;
  embed(text: string): Promise<number[]>;
}

/**
 * Cosine similarity of two equal-length vectors; 0 when either is all zeros
 */
export function cosineSimilarity(vec1: number[], vec2: number[]): number {
  if (vec1.length !== vec2.length) {
    throw new Error('Vectors must have same length');
  }

  let dotProduct = 0;
  let norm1 = 0;
  let norm2 = 0;

  for (let i = 0; i < vec1.length; i++) {
    dotProduct += vec1[i] * vec2[i];
    norm1 += vec1[i] * vec1[i];
    norm2 += vec2[i] * vec2[i];
  }

  if (norm1 === 0 || norm2 === 0) {
    return 0;
  }

  return dotProduct / (Math.sqrt(norm1) * Math.sqrt(norm2));
}

function bucketOf(token: string, dimensions: number): number {
  let hash = 0;
  for (let i = 0; i < token.length; i++) {
    hash = (hash * 31 + token.charCodeAt(i)) >>> 0;
  }
  return hash % dimensions;
}

/**
 * Deterministic embedding from word and character-trigram frequencies.
 * Good enough for tests and offline runs; swap in a model for real use.
 */
export class LocalEmbeddingProvider implements EmbeddingProvider {
  readonly name = 'local';
  private dimensions: number;

  constructor(dimensions: number = 300) {
    this.dimensions = dimensions;
  }

  async embed(text: string): Promise<number[]> {
    const embedding = new Array<number>(this.dimensions).fill(0);
    const words = text.toLowerCase().match(/[\p{L}\p{N}]+/gu) ?? [];

    for (const word of words) {
      embedding[bucketOf(word, this.dimensions)] += 1;
      const padded = ` ${word} `;
      for (let i = 0; i + 3 <= padded.length; i++) {
        embedding[bucketOf(padded.slice(i, i + 3), this.dimensions)] += 0.5;
      }
    }

    const magnitude = Math.sqrt(embedding.reduce((sum, val) => sum + val * val, 0));
    return magnitude > 0 ? embedding.map(val => val / magnitude) : embedding;
  }
}

export interface OllamaEmbeddingConfig {
  baseUrl: string;
  model: string;
}

interface OllamaEmbeddingResponse {
  embedding?: number[];
}

export class OllamaEmbeddingProvider implements EmbeddingProvider {
  readonly name = 'ollama';
  private config: OllamaEmbeddingConfig;

  constructor(config: OllamaEmbeddingConfig) {
    this.config = config;
  }

  async embed(text: string): Promise<number[]> {
    const url = `${this.config.baseUrl.replace(/\/+$/, '')}/api/embeddings`;

    try {
      const response = await axios.post<OllamaEmbeddingResponse>(url, {
        model: this.config.model,
        prompt: text
      });

      const embedding = response.data.embedding;
      if (!Array.isArray(embedding) || embedding.length === 0) {
        throw new BackendUnavailableError('ollama', `no embedding returned by model ${this.config.model}`);
      }

      return embedding;
    } catch (error) {
      if (axios.isAxiosError(error)) {
        const detail = error.response
          ? `HTTP ${error.response.status}`
          : error.code || error.message;
        logger.error(`Ollama embedding request failed (${url})`, detail);
        throw new BackendUnavailableError('ollama', detail, { cause: error });
      }
      throw error;
    }
  }
}
