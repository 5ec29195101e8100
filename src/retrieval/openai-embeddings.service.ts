// src/retrieval/openai-embeddings.service.ts
import { Injectable, Logger } from '@nestjs/common';
import { OpenAI } from 'openai';

import { AiUsageService } from '../ai/ai-usage.service';
import { errorMessage } from '../shared/errors';

@Injectable()
export class OpenAiEmbeddingsService {
  private readonly logger = new Logger(OpenAiEmbeddingsService.name);
  private readonly model = process.env.EMBEDDING_MODEL || 'text-embedding-3-small';
  private readonly maxRetries = +(process.env.EMBED_MAX_RETRIES || 3);
  private readonly baseSleepMs = +(process.env.EMBED_RETRY_SLEEP_MS || 500);

  constructor(
    private readonly openai: OpenAI,
    private readonly aiUsage: AiUsageService,
  ) {}

  /** Embedding of one query text, retried with linear backoff. */
  async embedOne(text: string): Promise<number[]> {
    const input = text.trim();
    if (!input) return [];

    let lastErr: unknown;

    for (let attempt = 1; attempt <= this.maxRetries; attempt++) {
      try {
        const resp = await this.openai.embeddings.create({ model: this.model, input });

        const inputTokens = resp.usage?.prompt_tokens ?? 0;
        await this.aiUsage.record({
          kind: 'embedding',
          model: this.model,
          inputTokens,
          outputTokens: 0,
          totalTokens: resp.usage?.total_tokens ?? inputTokens,
          costUsd: this.aiUsage.computeCostUsd(this.model, inputTokens, 0),
          extra: { chars: input.length, attempt },
        });

        return resp.data[0]?.embedding ?? [];
      } catch (e) {
        lastErr = e;

        await this.aiUsage.record({
          kind: 'embedding_error',
          model: this.model,
          inputTokens: 0,
          outputTokens: 0,
          totalTokens: 0,
          costUsd: null,
          extra: { attempt, message: errorMessage(e).slice(0, 500) },
        });

        if (attempt < this.maxRetries) {
          await new Promise((r) => setTimeout(r, this.baseSleepMs * attempt));
        }
      }
    }

    this.logger.error(`embedOne failed after ${this.maxRetries} attempts: ${errorMessage(lastErr)}`);
    throw lastErr;
  }
}
