/**
 * Runtime settings, read from environment variables.
 * The CLI loads a .env file first; library callers pass their own env.
 */

import { ChunkingConfig, GroqConfig, RetrievalConfig } from './types';
import { DEFAULT_CHUNKING_CONFIG } from './chunking';
import { DEFAULT_RETRIEVAL_CONFIG } from './retrieval';
import { InvalidInputError } from './errors';

export type EmbeddingProviderName = 'local' | 'ollama';

export interface Settings {
  storePath: string;
  checkpointFile: string;
  embeddingProvider: EmbeddingProviderName;
  ollama: {
    baseUrl: string;
    model: string;
  };
  groq: GroqConfig;
  chunking: ChunkingConfig;
  retrieval: RetrievalConfig;
}

type Env = { [name: string]: string | undefined };

function parseProvider(value: string | undefined): EmbeddingProviderName {
  const name = (value || 'local').trim().toLowerCase();
  if (name === 'local' || name === 'ollama') {
    return name;
  }
  throw new InvalidInputError(`Unknown EMBEDDING_PROVIDER "${value}" (expected local or ollama)`);
}

export function loadSettings(env: Env = process.env): Settings {
  return {
    storePath: env.STORE_PATH || './data/graph-store.json',
    checkpointFile: env.INGEST_CHECKPOINT_FILE || '.ingest_checkpoint.json',
    embeddingProvider: parseProvider(env.EMBEDDING_PROVIDER),
    ollama: {
      baseUrl: env.OLLAMA_BASE_URL || 'http://localhost:11434',
      model: env.OLLAMA_EMBED_MODEL || 'nomic-embed-text'
    },
    groq: {
      apiKey: env.GROQ_API_KEY || '',
      model: env.GROQ_MODEL || 'llama-3.3-70b-versatile',
      temperature: 0,
      maxTokens: 1024
    },
    chunking: { ...DEFAULT_CHUNKING_CONFIG },
    retrieval: { ...DEFAULT_RETRIEVAL_CONFIG }
  };
}
