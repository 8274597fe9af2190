/**
 * Verdict judge
 * Checks a clinician's verdict against the guideline context of one document:
 * 1. Retrieve context for the verdict and for its key capitalised terms
 * 2. Merge and pack the results
 * 3. Ask the chat model for a structured JSON verdict
 * 4. Store the evaluation
 */

import Groq from 'groq-sdk';
import {
  ChunkRecord,
  Citation,
  GroqConfig,
  JudgeResult,
  VerdictEvaluation,
  VerdictLabel
} from './types';
import { EvaluationWriter } from './storage';
import { RetrievalService } from './retrieval';
import { capitalisedTerms } from './tagging';
import { BackendUnavailableError } from './errors';
import { stableHash } from './text';
import { logger } from './logger';

export const MAX_SUBQUERIES = 4;

const VERDICT_LABELS: readonly VerdictLabel[] = ['correct', 'partially_correct', 'incorrect', 'insufficient_info'];

export interface VerdictModel {
  readonly modelName: string;
  complete(prompt: string): Promise<string>;
}

interface ChatRequest {
  model: string;
  messages: Array<{ role: 'system' | 'user'; content: string }>;
  temperature?: number;
  max_tokens?: number;
  response_format?: { type: 'json_object' };
}

interface ChatResponse {
  choices: Array<{ message?: { content?: string | null } }>;
}

/** The part of the Groq client the judge talks to */
export interface ChatClient {
  chat: {
    completions: {
      create(body: ChatRequest): PromiseLike<ChatResponse>;
    };
  };
}

export class GroqVerdictModel implements VerdictModel {
  readonly modelName: string;
  private config: GroqConfig;
  private client: ChatClient;

  constructor(config: GroqConfig, client?: ChatClient) {
    this.config = config;
    this.modelName = config.model;
    this.client = client ?? new Groq({ apiKey: config.apiKey });
  }

  async complete(prompt: string): Promise<string> {
    try {
      const response = await this.client.chat.completions.create({
        model: this.config.model,
        messages: [
          {
            role: 'system',
            content: 'You review clinical verdicts against guideline excerpts and answer with a single JSON object.'
          },
          { role: 'user', content: prompt }
        ],
        temperature: this.config.temperature,
        max_tokens: this.config.maxTokens,
        response_format: { type: 'json_object' }
      });

      return response.choices[0]?.message?.content || '';
    } catch (error) {
      if (error instanceof Groq.APIError) {
        const detail = error.status ? `HTTP ${error.status}` : error.message;
        logger.error('Groq completion request failed', detail);
        throw new BackendUnavailableError('groq', detail, { cause: error });
      }
      throw error;
    }
  }
}

/**
 * Up to MAX_SUBQUERIES capitalised terms of the verdict, in order of appearance
 */
export function verdictSubqueries(verdictText: string): string[] {
  return capitalisedTerms(verdictText).slice(0, MAX_SUBQUERIES);
}

export function buildJudgePrompt(docId: string, verdictText: string, chunks: ChunkRecord[]): string {
  const context = chunks
    .map(c =>
      `[chunk_id=${c.chunkId}] [section=${c.sectionPath}] [pages=${c.pageStart}-${c.pageEnd}] [type=${c.chunkType}]\n${c.content}`
    )
    .join('\n\n');

  return `Assess the clinician's verdict using only the guideline excerpts below.
If the excerpts do not contain enough information, answer insufficient_info. Do not use outside knowledge.

doc_id: ${docId}
Verdict: ${verdictText}

Guideline excerpts:
${context}

Answer with a JSON object only:
{"verdict": "correct|partially_correct|incorrect|insufficient_info",
"explanation": "short explanation",
"citations": [{"chunk_id": "...", "section_path": "...", "pages": "x-y"}],
"missing_info": ["..."],
"recommended_action": "recommended action"}`;
}

type JsonObject = { [key: string]: unknown };

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isVerdictLabel(value: unknown): value is VerdictLabel {
  return VERDICT_LABELS.some(label => label === value);
}

function parseCitations(value: unknown): Citation[] {
  if (!Array.isArray(value)) {
    return [];
  }
  const citations: Citation[] = [];
  for (const item of value) {
    if (isObject(item) && typeof item.chunk_id === 'string') {
      citations.push({
        chunkId: item.chunk_id,
        sectionPath: typeof item.section_path === 'string' ? item.section_path : '',
        pages: typeof item.pages === 'string' ? item.pages : ''
      });
    }
  }
  return citations;
}

/**
 * Parse the model answer; null when it is not a JSON object.
 * An unknown verdict label reads as insufficient_info.
 */
export function parseJudgeAnswer(raw: string, chunkIds: string[]): JudgeResult | null {
  const start = raw.indexOf('{');
  const end = raw.lastIndexOf('}');
  if (start < 0 || end <= start) {
    return null;
  }

  let payload: unknown;
  try {
    payload = JSON.parse(raw.slice(start, end + 1));
  } catch (error) {
    logger.warn('Judge answer is not valid JSON', error instanceof Error ? error.message : error);
    return null;
  }
  if (!isObject(payload)) {
    return null;
  }

  return {
    verdict: isVerdictLabel(payload.verdict) ? payload.verdict : 'insufficient_info',
    explanation: typeof payload.explanation === 'string' ? payload.explanation : '',
    citations: parseCitations(payload.citations),
    missingInfo: Array.isArray(payload.missing_info)
      ? payload.missing_info.filter((item): item is string => typeof item === 'string')
      : [],
    recommendedAction: typeof payload.recommended_action === 'string' ? payload.recommended_action : null,
    chunkIds
  };
}

export class VerdictJudge {
  private retrieval: RetrievalService;
  private store: EvaluationWriter;
  private model: VerdictModel;
  private packedMax: number;

  constructor(retrieval: RetrievalService, store: EvaluationWriter, model: VerdictModel, packedMax: number = 12) {
    this.retrieval = retrieval;
    this.store = store;
    this.model = model;
    this.packedMax = packedMax;
  }

  async evaluateVerdict(docId: string, verdictText: string): Promise<JudgeResult> {
    logger.info(`Verdict evaluation started doc_id=${docId} verdict_len=${verdictText.length}`);

    const queries = [verdictText, ...verdictSubqueries(verdictText)];
    const merged = new Map<string, ChunkRecord>();
    for (const query of queries) {
      for (const record of await this.retrieval.retrieveContext(docId, query)) {
        if (record.docId !== docId) {
          continue;
        }
        const existing = merged.get(record.chunkId);
        if (!existing || record.score > existing.score) {
          merged.set(record.chunkId, record);
        }
      }
    }

    const packed = this.retrieval.packContext(verdictText, Array.from(merged.values()), this.packedMax);
    const chunkIds = packed.map(c => c.chunkId);

    const raw = await this.model.complete(buildJudgePrompt(docId, verdictText, packed));
    logger.debug(`Judge raw answer: ${raw.slice(0, 600)}`);

    const result: JudgeResult = parseJudgeAnswer(raw, chunkIds) ?? {
      verdict: 'insufficient_info',
      explanation: 'The model did not return a structured answer',
      citations: [],
      missingInfo: ['structured_json_response'],
      recommendedAction: null,
      chunkIds
    };

    const createdAt = new Date().toISOString();
    const evaluation: VerdictEvaluation = {
      evaluationId: stableHash(`${docId}|${verdictText}|${createdAt}`),
      docId,
      verdictText,
      retrievedChunkIds: chunkIds,
      output: result,
      modelName: this.model.modelName,
      createdAt
    };
    await this.store.storeVerdictEvaluation(evaluation);

    logger.info(
      `Verdict evaluation finished doc_id=${docId} verdict=${result.verdict} citations=${result.citations.length}`
    );
    return result;
  }
}
