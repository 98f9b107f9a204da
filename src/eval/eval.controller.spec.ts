import { ServiceUnavailableException } from '@nestjs/common';
import { Test } from '@nestjs/testing';

import { FakeCompletionService, testConfig } from '../../test/fakes';
import { APP_CONFIG, COMPLETION_SERVICE } from '../common/tokens';
import { QueryClassifierService } from '../router/query-classifier.service';
import { EvalController } from './eval.controller';

async function setup(devMode: string) {
  const moduleRef = await Test.createTestingModule({
    controllers: [EvalController],
    providers: [
      QueryClassifierService,
      { provide: APP_CONFIG, useValue: testConfig({ DEV_MODE: devMode }) },
      {
        provide: COMPLETION_SERVICE,
        useValue: FakeCompletionService.byTask({}),
      },
    ],
  }).compile();
  return moduleRef.get(EvalController);
}

describe('EvalController', () => {
  it('is unavailable outside dev mode', async () => {
    const controller = await setup('false');

    await expect(controller.run()).rejects.toThrow(ServiceUnavailableException);
  });

  it('tallies routes from the keyword fallback when the model is down', async () => {
    const controller = await setup('true');

    const report = await controller.run();

    expect(report.total).toBe(5);
    expect(report.fallbacks).toBe(5);
    expect(report.by_route).toEqual({ STRUCTURED: 2, DOCUMENT: 2, BOTH: 1 });
    expect(report.results.every((r) => r.strategy === 'keywords')).toBe(true);
  });
});
