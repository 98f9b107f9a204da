import { Inject, Injectable } from '@nestjs/common';
import {
  BedrockRuntimeClient,
  InvokeModelCommand,
} from '@aws-sdk/client-bedrock-runtime';
import { z } from 'zod';

import type { EmbeddingService } from '../ai/capabilities';
import { APP_CONFIG } from '../common/tokens';
import type { AppConfig } from '../config/env';

const TitanEmbeddingSchema = z.object({
  embedding: z.array(z.number()).min(1),
});

@Injectable()
export class BedrockService implements EmbeddingService {
  private readonly client: BedrockRuntimeClient;

  constructor(@Inject(APP_CONFIG) private readonly config: AppConfig) {
    this.client = new BedrockRuntimeClient({
      region: config.awsRegion ?? undefined,
    });
  }

  async embed(text: string): Promise<number[]> {
    const cmd = new InvokeModelCommand({
      modelId: this.config.models.embedding,
      contentType: 'application/json',
      accept: 'application/json',
      body: JSON.stringify({
        inputText: text,
        dimensions: this.config.vectorDimension,
        normalize: true,
      }),
    });

    const res = await this.client.send(cmd);
    const body: unknown = JSON.parse(new TextDecoder().decode(res.body));
    const parsed = TitanEmbeddingSchema.safeParse(body);
    if (!parsed.success) {
      throw new Error(
        'Unexpected embedding response: ' + JSON.stringify(body).slice(0, 500),
      );
    }
    return parsed.data.embedding;
  }
}
