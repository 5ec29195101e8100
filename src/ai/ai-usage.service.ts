// src/ai/ai-usage.service.ts
import { Injectable, Logger } from '@nestjs/common';

import { AiUsageLogInput, AiUsageRepository } from '../pg/ai-usage.repository';
import { errorMessage } from '../shared/errors';

/** USD per 1M tokens. */
const PRICING_PER_1M: Record<string, { input: number; output: number }> = {
  'gpt-4o-mini': { input: 0.15, output: 0.6 },
  'gpt-4.1-mini': { input: 0.4, output: 1.6 },
  'text-embedding-3-small': { input: 0.02, output: 0 },
  'text-embedding-3-large': { input: 0.13, output: 0 },
};
const DEFAULT_PRICING = { input: 0.15, output: 0.6 };

@Injectable()
export class AiUsageService {
  private readonly logger = new Logger(AiUsageService.name);

  constructor(private readonly repo: AiUsageRepository) {}

  /**
   * Rough pricing calculator; update the table when prices change.
   * Null when there is nothing to bill.
   */
  computeCostUsd(model: string, inputTokens: number, outputTokens: number): number | null {
    const p = PRICING_PER_1M[model] ?? DEFAULT_PRICING;

    const inputCost = (inputTokens / 1_000_000) * p.input;
    const outputCost = (outputTokens / 1_000_000) * p.output;

    const total = inputCost + outputCost;
    if (!isFinite(total) || total === 0) return null;
    return Number(total.toFixed(6));
  }

  /** Never throws: metering must not fail a request. */
  async record(input: AiUsageLogInput): Promise<void> {
    try {
      await this.repo.create(input);
    } catch (e) {
      this.logger.warn(`Failed to record AI usage: ${errorMessage(e)}`);
    }
  }
}
