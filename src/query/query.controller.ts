import { BadRequestException, Body, Controller, Post } from '@nestjs/common';
import type { ZodType, ZodTypeDef } from 'zod';

import { ClassifyRequestSchema, QueryRequestSchema } from '../ai/schemas';
import { QueryClassifierService } from '../router/query-classifier.service';
import { OrchestratorService } from './orchestrator.service';

function parseBody<T>(
  schema: ZodType<T, ZodTypeDef, unknown>,
  body: unknown,
): T {
  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    throw new BadRequestException(
      parsed.error.issues.map((i) => `${i.path.join('.') || 'body'}: ${i.message}`),
    );
  }
  return parsed.data;
}

@Controller('query')
export class QueryController {
  constructor(
    private readonly orchestrator: OrchestratorService,
    private readonly classifier: QueryClassifierService,
  ) {}

  @Post()
  async ask(@Body() body: unknown) {
    const { question, k } = parseBody(QueryRequestSchema, body);
    return this.orchestrator.process(question, { k });
  }

  @Post('classify')
  async classify(@Body() body: unknown) {
    const { question } = parseBody(ClassifyRequestSchema, body);
    return this.classifier.classify(question);
  }
}
