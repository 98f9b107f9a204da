import { Inject, Injectable, Logger } from '@nestjs/common';

import { describeError } from '../common/errors';
import { APP_CONFIG } from '../common/tokens';
import type { AppConfig } from '../config/env';
import { DocumentAnswerService } from '../rag/document-answer.service';
import { QueryClassifierService } from '../router/query-classifier.service';
import { SchemaCatalogService } from '../sql/schema-catalog.service';
import { StructuredAnswerService } from '../sql/structured-answer.service';
import { combine } from './response-combiner';
import type {
  AnswerSide,
  CombinedResponse,
  HalfFailure,
  StructuredResult,
} from './types';

export interface ProcessOptions {
  /** Chunks to retrieve for document answers; defaults to RAG_TOP_K. */
  k?: number;
}

@Injectable()
export class OrchestratorService {
  private readonly logger = new Logger(OrchestratorService.name);

  constructor(
    private readonly classifier: QueryClassifierService,
    private readonly catalog: SchemaCatalogService,
    private readonly structured: StructuredAnswerService,
    private readonly documents: DocumentAnswerService,
    @Inject(APP_CONFIG) private readonly config: AppConfig,
  ) {}

  async process(
    question: string,
    options: ProcessOptions = {},
  ): Promise<CombinedResponse> {
    const k = options.k ?? this.config.ragTopK;
    if (!Number.isInteger(k) || k <= 0) {
      throw new RangeError(`k must be a positive integer, got ${k}`);
    }

    const classification = await this.classifier.classify(question);
    const maxRows = this.config.maxRenderedRows;

    switch (classification.route) {
      case 'STRUCTURED': {
        const structured = await this.answerStructured(question);
        return combine(classification, structured, undefined, [], maxRows);
      }

      case 'DOCUMENT': {
        const document = await this.documents.answerDocument(question, k);
        return combine(classification, undefined, document, [], maxRows);
      }

      case 'BOTH': {
        const [structured, document] = await Promise.allSettled([
          this.answerStructured(question),
          this.documents.answerDocument(question, k),
        ]);

        const failures: HalfFailure[] = [];
        if (structured.status === 'rejected') {
          failures.push(this.toFailure('structured', structured.reason));
        }
        if (document.status === 'rejected') {
          failures.push(this.toFailure('document', document.reason));
        }

        return combine(
          classification,
          structured.status === 'fulfilled' ? structured.value : undefined,
          document.status === 'fulfilled' ? document.value : undefined,
          failures,
          maxRows,
        );
      }
    }
  }

  private async answerStructured(question: string): Promise<StructuredResult> {
    const schema = await this.catalog.getSchemaContext();
    return this.structured.answerStructured(question, schema);
  }

  private toFailure(side: AnswerSide, reason: unknown): HalfFailure {
    const { name, message } = describeError(reason);
    this.logger.warn(`Hybrid query: ${side} half failed (${name}: ${message})`);
    return { side, error: name, message };
  }
}
