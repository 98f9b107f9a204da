import {
  Controller,
  Get,
  Inject,
  ServiceUnavailableException,
} from '@nestjs/common';

import type { Route } from '../ai/schemas';
import { APP_CONFIG } from '../common/tokens';
import type { AppConfig } from '../config/env';
import type { Classification } from '../query/types';
import { QueryClassifierService } from '../router/query-classifier.service';

// Routing smoke test: classification only, no backend is queried.
@Controller('eval')
export class EvalController {
  constructor(
    private readonly classifier: QueryClassifierService,
    @Inject(APP_CONFIG) private readonly config: AppConfig,
  ) {}

  private ensureDev() {
    if (!this.config.devMode) {
      throw new ServiceUnavailableException('DEV_MODE is off.');
    }
  }

  readonly questions = [
    'What are the top 5 customers by total order value?',
    'Show me all products in the database',
    'What does the sustainability report say about carbon emissions?',
    'What are the key findings in the PDF documents?',
    'Compare our sales data with what the earnings call transcript mentions',
  ];

  @Get()
  async run() {
    this.ensureDev();

    const byRoute: Record<Route, number> = { STRUCTURED: 0, DOCUMENT: 0, BOTH: 0 };
    let fallbacks = 0;
    const results: Array<{ question: string } & Classification> = [];

    for (const q of this.questions) {
      const out = await this.classifier.classify(q);
      byRoute[out.route]++;
      if (out.strategy !== 'model') fallbacks++;
      results.push({ question: q, ...out });
    }

    return {
      total: this.questions.length,
      by_route: byRoute,
      fallbacks,
      results,
    };
  }
}
