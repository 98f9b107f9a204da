import { Inject, Injectable, Logger } from '@nestjs/common';

import type {
  ChunkStore,
  CompletionService,
  EmbeddingService,
} from '../ai/capabilities';
import { GenerationError, RetrievalError } from '../common/errors';
import { withTimeout } from '../common/timeout';
import {
  APP_CONFIG,
  CHUNK_STORE,
  COMPLETION_SERVICE,
  EMBEDDING_SERVICE,
} from '../common/tokens';
import type { AppConfig } from '../config/env';
import type { ChunkMatch, DocumentResult } from '../query/types';

const GROUNDING_SYSTEM_PROMPT = [
  'You are a strict document assistant.',
  'Answer only from the document excerpts supplied by the user.',
  'If the excerpts do not contain the answer, say clearly that the documents do not cover it.',
  'Never add facts, figures or names that are not present in the excerpts.',
  'Cite the excerpts you rely on as [1], [2].',
].join(' ');

export function buildGroundingPrompt(question: string, chunks: ChunkMatch[]) {
  const contextBlock = chunks
    .map(
      (chunk, idx) =>
        `[${idx + 1}] source=${chunk.filename}#${chunk.chunk_index}\n${chunk.content}`,
    )
    .join('\n\n');

  return `Question:\n${question}\n\nContext:\n${contextBlock}\n\nAnswer using only the context above and cite like [1], [2].`;
}

@Injectable()
export class DocumentAnswerService {
  private readonly logger = new Logger(DocumentAnswerService.name);

  constructor(
    @Inject(EMBEDDING_SERVICE) private readonly embedder: EmbeddingService,
    @Inject(CHUNK_STORE) private readonly store: ChunkStore,
    @Inject(COMPLETION_SERVICE) private readonly llm: CompletionService,
    @Inject(APP_CONFIG) private readonly config: AppConfig,
  ) {}

  async answerDocument(question: string, k: number): Promise<DocumentResult> {
    if (!Number.isInteger(k) || k <= 0) {
      throw new RangeError(`k must be a positive integer, got ${k}`);
    }
    if (!question.trim()) {
      throw new RetrievalError('The question is empty; nothing to retrieve');
    }

    const chunks = await this.retrieve(question, k);
    if (!chunks.length) {
      throw new RetrievalError('No document chunks matched the question');
    }
    this.logger.log(
      `Retrieved ${chunks.length} chunk(s): ${chunks
        .map((c) => `${c.filename}#${c.chunk_index}`)
        .join(', ')}`,
    );

    let answer: string;
    try {
      answer = await withTimeout(
        this.llm.complete({
          task: 'answer',
          system: GROUNDING_SYSTEM_PROMPT,
          user: buildGroundingPrompt(question, chunks),
        }),
        this.config.timeouts.completionMs,
        'Answer generation',
      );
    } catch (err) {
      throw new GenerationError('Answer generation failed', { cause: err });
    }

    answer = answer.trim();
    if (!answer) {
      throw new GenerationError('The model returned an empty answer');
    }

    return {
      answer,
      sources: chunks.map((c) => ({
        doc_id: c.doc_id,
        filename: c.filename,
        chunk_index: c.chunk_index,
        distance: c.distance,
      })),
    };
  }

  private async retrieve(question: string, k: number): Promise<ChunkMatch[]> {
    let vector: number[];
    try {
      vector = await withTimeout(
        this.embedder.embed(question),
        this.config.timeouts.embeddingMs,
        'Question embedding',
      );
    } catch (err) {
      throw new RetrievalError('Embedding the question failed', { cause: err });
    }

    try {
      const matches = await withTimeout(
        this.store.search(vector, k),
        this.config.timeouts.searchMs,
        'Similarity search',
      );
      return matches.slice(0, k);
    } catch (err) {
      if (err instanceof RetrievalError) throw err;
      throw new RetrievalError('Similarity search failed', { cause: err });
    }
  }
}
