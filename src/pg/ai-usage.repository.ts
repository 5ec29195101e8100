import { Inject, Injectable, Logger } from '@nestjs/common';
import { Pool } from 'pg';

import { errorMessage } from '../shared/errors';

export type AiUsageKind = 'generate' | 'generate_stream' | 'embedding' | 'embedding_error';

export interface AiUsageLogInput {
  kind: AiUsageKind;
  model: string;
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
  costUsd?: number | null;
  extra?: Record<string, unknown>;
}

@Injectable()
export class AiUsageRepository {
  private readonly logger = new Logger(AiUsageRepository.name);

  constructor(
    @Inject('PG_POOL')
    private readonly pool: Pool,
  ) {}

  async create(data: AiUsageLogInput): Promise<void> {
    try {
      await this.pool.query(
        `INSERT INTO ai_usage_logs
           (kind, model, input_tokens, output_tokens, total_tokens, cost_usd, extra, created_at)
         VALUES ($1,   $2,    $3,           $4,            $5,            $6,       $7,    NOW())`,
        [
          data.kind,
          data.model,
          data.inputTokens,
          data.outputTokens,
          data.totalTokens,
          data.costUsd ?? null,
          data.extra ? JSON.stringify(data.extra) : null,
        ],
      );
    } catch (e) {
      this.logger.warn(`Failed to insert AI usage log: ${errorMessage(e)}`);
    }
  }
}
