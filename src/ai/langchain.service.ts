import { Inject, Injectable } from '@nestjs/common';
import { ChatBedrockConverse } from '@langchain/aws';
import { HumanMessage, SystemMessage } from '@langchain/core/messages';
import { StringOutputParser } from '@langchain/core/output_parsers';

import { APP_CONFIG } from '../common/tokens';
import type { AppConfig } from '../config/env';
import type {
  CompletionRequest,
  CompletionService,
  CompletionTask,
} from './capabilities';

@Injectable()
export class LangchainService implements CompletionService {
  private readonly models = new Map<string, ChatBedrockConverse>();

  constructor(@Inject(APP_CONFIG) private readonly config: AppConfig) {}

  modelFor(task: CompletionTask) {
    const modelId = this.config.models[task];
    let llm = this.models.get(modelId);
    if (!llm) {
      llm = new ChatBedrockConverse({
        model: modelId,
        region: this.config.awsRegion ?? undefined,
        temperature: 0,
        maxRetries: this.config.llmMaxRetries,
      });
      this.models.set(modelId, llm);
    }
    return llm;
  }

  async complete(request: CompletionRequest): Promise<string> {
    const chain = this.modelFor(request.task).pipe(new StringOutputParser());
    const text = await chain.invoke([
      new SystemMessage(request.system),
      new HumanMessage(request.user),
    ]);
    return text.trim();
  }
}
