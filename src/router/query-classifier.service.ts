import { Inject, Injectable, Logger } from '@nestjs/common';
import { StructuredOutputParser } from '@langchain/core/output_parsers';
import { PromptTemplate } from '@langchain/core/prompts';
import type { z } from 'zod';

import type { CompletionService } from '../ai/capabilities';
import { RoutingDecisionSchema, type RoutingDecision } from '../ai/schemas';
import { ClassificationFallback } from '../common/errors';
import { withTimeout } from '../common/timeout';
import { APP_CONFIG, COMPLETION_SERVICE } from '../common/tokens';
import type { AppConfig } from '../config/env';
import type { Classification } from '../query/types';
import { classifyByKeywords } from './keywords';

export const EMPTY_QUESTION_CONFIDENCE = 0.2;

const routingDecisionType: z.ZodType<RoutingDecision> = RoutingDecisionSchema;

const ROUTING_SYSTEM_PROMPT =
  'You are a query routing assistant. Respond only with valid JSON.';

@Injectable()
export class QueryClassifierService {
  private readonly logger = new Logger(QueryClassifierService.name);

  // Plain ZodType: inferring through the full object schema hits TS2589
  private readonly parser: StructuredOutputParser<
    z.ZodType<RoutingDecision>
  > = StructuredOutputParser.fromZodSchema(routingDecisionType);

  constructor(
    @Inject(COMPLETION_SERVICE) private readonly llm: CompletionService,
    @Inject(APP_CONFIG) private readonly config: AppConfig,
  ) {}

  private routingPrompt() {
    // NOTE: PromptTemplate uses f-string style, so no literal braces in the template.
    return new PromptTemplate({
      template: `
Decide which system should answer the user question.

Available systems:
1. STRUCTURED - analytical questions over warehouse tables (orders, customers, products, payments, order items).
   Examples:
   - "What are the top 5 customers by revenue?"
   - "Show me sales by product category"
   - "What's the total revenue this month?"
2. DOCUMENT - questions about documents, PDFs, reports, filings, transcripts.
   Examples:
   - "What does the sustainability report say about carbon emissions?"
   - "Summarize the construction cost report"
   - "What did the earnings call mention about guidance?"
3. BOTH - questions that need warehouse numbers and document content together.
   Examples:
   - "Compare our sales data with what the report says about market trends"
   - "Do the figures in our filings match the numbers in our database?"

Give a one-sentence reasoning and a confidence between 0 and 1.

IMPORTANT OUTPUT RULES:
- Return ONLY valid JSON for this schema (no markdown, no extra keys):
{format_instructions}

User question:
<<<{question}>>>
`,
      inputVariables: ['question', 'format_instructions'],
    });
  }

  async classify(question: string): Promise<Classification> {
    if (!question.trim()) {
      return {
        route: 'DOCUMENT',
        reasoning: 'Empty question; nothing to analyse, defaulting to documents',
        confidence: EMPTY_QUESTION_CONFIDENCE,
        strategy: 'default',
      };
    }

    try {
      const decision = await this.classifyWithModel(question);
      this.logger.log(
        `Route ${decision.route} (${decision.confidence}): ${decision.reasoning}`,
      );
      return decision;
    } catch (err) {
      const fallback =
        err instanceof ClassificationFallback
          ? err
          : new ClassificationFallback('Routing model failed', { cause: err });
      const cause =
        fallback.cause instanceof Error ? `: ${fallback.cause.message}` : '';
      this.logger.warn(`${fallback.message}${cause}; using keyword rule`);

      return classifyByKeywords(question);
    }
  }

  private async classifyWithModel(question: string): Promise<Classification> {
    const prompt = await this.routingPrompt().format({
      question,
      format_instructions: this.parser.getFormatInstructions(),
    });

    const reply = await withTimeout(
      this.llm.complete({
        task: 'route',
        system: ROUTING_SYSTEM_PROMPT,
        user: prompt,
      }),
      this.config.timeouts.classifierMs,
      'Query classification',
    );

    try {
      const decision = await this.parser.parse(reply);
      return { ...decision, strategy: 'model' };
    } catch (err) {
      throw new ClassificationFallback('Unparseable routing decision', {
        cause: err,
      });
    }
  }
}
