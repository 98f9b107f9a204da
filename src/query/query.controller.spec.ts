import { BadRequestException } from '@nestjs/common';
import { Test } from '@nestjs/testing';

import { QueryClassifierService } from '../router/query-classifier.service';
import { OrchestratorService } from './orchestrator.service';
import { QueryController } from './query.controller';
import type { Classification, CombinedResponse } from './types';

const classification: Classification = {
  route: 'DOCUMENT',
  reasoning: 'test',
  confidence: 0.8,
  strategy: 'model',
};

const response: CombinedResponse = {
  classification,
  document: { answer: 'ok', sources: [] },
  final_answer: 'ok',
  failures: [],
};

async function setup() {
  const answer = jest.fn(
    async (_question: string, _options: { k?: number }) => response,
  );
  const classify = jest.fn(async (_question: string) => classification);

  const moduleRef = await Test.createTestingModule({
    controllers: [QueryController],
    providers: [
      { provide: OrchestratorService, useValue: { process: answer } },
      { provide: QueryClassifierService, useValue: { classify } },
    ],
  }).compile();

  return { controller: moduleRef.get(QueryController), answer, classify };
}

describe('QueryController', () => {
  it('passes the question and k to the orchestrator', async () => {
    const { controller, answer } = await setup();

    await expect(controller.ask({ question: 'Why?', k: 2 })).resolves.toBe(
      response,
    );
    expect(answer).toHaveBeenCalledWith('Why?', { k: 2 });
  });

  it.each([
    [{}],
    [{ question: 42 }],
    [{ question: 'Why?', k: 0 }],
    [{ question: 'Why?', k: 1.5 }],
  ])('rejects the body %p', async (body) => {
    const { controller, answer } = await setup();

    await expect(controller.ask(body)).rejects.toThrow(BadRequestException);
    expect(answer).not.toHaveBeenCalled();
  });

  it('classifies without answering', async () => {
    const { controller, classify, answer } = await setup();

    await expect(controller.classify({ question: 'Why?' })).resolves.toBe(
      classification,
    );
    expect(classify).toHaveBeenCalledWith('Why?');
    expect(answer).not.toHaveBeenCalled();
  });
});
