#!/usr/bin/env node
/**
 * Main entry point for the guideline knowledge base CLI
 * Commands: ingest, query, judge, delete. Results are printed as JSON.
 */

import 'dotenv/config';
import { ChunkType, CHUNK_TYPES, RetrievalFilters } from './types';
import { loadSettings, Settings } from './config';
import { InMemoryGraphStore } from './vectorStore';
import { EmbeddingProvider, LocalEmbeddingProvider, OllamaEmbeddingProvider } from './embeddings';
import { IngestionService } from './ingestion';
import { RetrievalService } from './retrieval';
import { GroqVerdictModel, VerdictJudge } from './judge';
import { InvalidInputError } from './errors';
import { LoggingObserver } from './observer';
import { logger } from './logger';

export type Command = 'ingest' | 'query' | 'judge' | 'delete';

export interface CliArgs {
  command: Command;
  input?: string;
  manifest?: string;
  checkpoint?: string;
  docId?: string;
  text?: string;
  verdict?: string;
  filters: RetrievalFilters;
}

const USAGE = `
Guideline knowledge base

Usage:
  npm start -- <command> [options]

Commands:
  ingest   --input <dir> --manifest <file> [--checkpoint <file>]
  query    --doc_id <id> --text <question> [--section_prefix <path>]
           [--chunk_types recommendation,algorithm] [--page_start <n> --page_end <m>]
  judge    --doc_id <id> --verdict <text>
  delete   --doc_id <id>

Environment Variables:
  STORE_PATH                Store snapshot file (default: ./data/graph-store.json)
  EMBEDDING_PROVIDER        local or ollama (default: local)
  OLLAMA_BASE_URL           Ollama server for embeddings (default: http://localhost:11434)
  OLLAMA_EMBED_MODEL        Embedding model (default: nomic-embed-text)
  GROQ_API_KEY              Groq API key, required by judge
  GROQ_MODEL                Chat model used by judge
  INGEST_CHECKPOINT_FILE    Batch checkpoint (default: .ingest_checkpoint.json)
`;

function isCommand(value: string): value is Command {
  return value === 'ingest' || value === 'query' || value === 'judge' || value === 'delete';
}

function isChunkType(value: string): value is ChunkType {
  return CHUNK_TYPES.some(type => type === value);
}

function parsePage(flag: string, value: string): number {
  const page = parseInt(value, 10);
  if (!Number.isInteger(page) || page < 1) {
    throw new InvalidInputError(`${flag} must be a positive page number, got "${value}"`);
  }
  return page;
}

function required(value: string | undefined, flag: string): string {
  if (!value) {
    throw new InvalidInputError(`${flag} is required`);
  }
  return value;
}

/**
 * Parse command line arguments (without the node and script entries)
 */
export function parseCliArgs(args: string[]): CliArgs {
  const [command, ...rest] = args;
  if (!command || !isCommand(command)) {
    throw new InvalidInputError(`Unknown command "${command ?? ''}"`);
  }

  const parsed: CliArgs = { command, filters: {} };
  let pageStart: number | undefined;
  let pageEnd: number | undefined;

  for (let i = 0; i < rest.length; i += 2) {
    const key = rest[i];
    const value = rest[i + 1];
    if (value === undefined) {
      throw new InvalidInputError(`Missing value for ${key}`);
    }

    switch (key) {
      case '--input':
        parsed.input = value;
        break;
      case '--manifest':
        parsed.manifest = value;
        break;
      case '--checkpoint':
        parsed.checkpoint = value;
        break;
      case '--doc_id':
        parsed.docId = value;
        break;
      case '--text':
        parsed.text = value;
        break;
      case '--verdict':
        parsed.verdict = value;
        break;
      case '--section_prefix':
        parsed.filters.sectionPrefix = value;
        break;
      case '--chunk_types': {
        const types = value.split(',').map(t => t.trim()).filter(t => t.length > 0);
        const unknown = types.filter(t => !isChunkType(t));
        if (unknown.length > 0) {
          throw new InvalidInputError(`Unknown chunk types: ${unknown.join(', ')}`);
        }
        parsed.filters.chunkTypes = types.filter(isChunkType);
        break;
      }
      case '--page_start':
        pageStart = parsePage(key, value);
        break;
      case '--page_end':
        pageEnd = parsePage(key, value);
        break;
      default:
        throw new InvalidInputError(`Unknown option ${key}`);
    }
  }

  if (pageStart !== undefined || pageEnd !== undefined) {
    const start = pageStart ?? 1;
    const end = pageEnd ?? Number.MAX_SAFE_INTEGER;
    if (start > end) {
      throw new InvalidInputError(`--page_start ${start} is after --page_end ${end}`);
    }
    parsed.filters.pageRange = { start, end };
  }

  return parsed;
}

function createEmbeddings(settings: Settings): EmbeddingProvider {
  return settings.embeddingProvider === 'ollama'
    ? new OllamaEmbeddingProvider(settings.ollama)
    : new LocalEmbeddingProvider();
}

async function run(cli: CliArgs, settings: Settings): Promise<unknown> {
  const store = InMemoryGraphStore.loadSnapshot(settings.storePath);
  const embeddings = createEmbeddings(settings);
  const observer = new LoggingObserver();
  const retrieval = new RetrievalService(store, embeddings, settings.retrieval, observer);

  switch (cli.command) {
    case 'ingest': {
      const ingestion = new IngestionService(
        store,
        embeddings,
        { chunking: settings.chunking, checkpointFile: cli.checkpoint ?? settings.checkpointFile },
        observer
      );
      const summary = await ingestion.ingestBatch(required(cli.input, '--input'), required(cli.manifest, '--manifest'));
      store.saveSnapshot(settings.storePath);
      return summary;
    }
    case 'query':
      return retrieval.retrieveContext(required(cli.docId, '--doc_id'), required(cli.text, '--text'), cli.filters);
    case 'judge': {
      if (!settings.groq.apiKey) {
        throw new InvalidInputError('GROQ_API_KEY is required for judge');
      }
      const judge = new VerdictJudge(
        retrieval,
        store,
        new GroqVerdictModel(settings.groq),
        settings.retrieval.packedMax
      );
      const result = await judge.evaluateVerdict(required(cli.docId, '--doc_id'), required(cli.verdict, '--verdict'));
      store.saveSnapshot(settings.storePath);
      return result;
    }
    case 'delete': {
      const summary = await store.deleteByDocId(required(cli.docId, '--doc_id'));
      store.saveSnapshot(settings.storePath);
      return summary;
    }
  }
}

/**
 * Main function
 */
async function main(): Promise<void> {
  const args = process.argv.slice(2);
  if (args.length === 0 || args.includes('--help') || args.includes('-h')) {
    console.log(USAGE);
    return;
  }

  try {
    const output = await run(parseCliArgs(args), loadSettings());
    console.log(JSON.stringify(output, null, 2));
  } catch (error) {
    logger.error('Command failed', error);
    process.exitCode = 1;
  } finally {
    logger.close();
  }
}

// Run main
if (require.main === module) {
  main().catch(error => {
    logger.error('Fatal error', error);
    process.exit(1);
  });
}
