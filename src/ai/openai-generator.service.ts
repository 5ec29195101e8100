// src/ai/openai-generator.service.ts
import { Injectable, Logger } from '@nestjs/common';
import { OpenAI } from 'openai';
import type { ChatCompletionMessageParam } from 'openai/resources/chat/completions';

import { errorMessage, errorStack } from '../shared/errors';
import { AiUsageService } from './ai-usage.service';
import type {
  GenerationResult,
  GenerationStreamEvent,
  Generator,
  HistoryMessage,
} from './generator.types';

const MODEL_CONFIDENCE: Record<string, number> = {
  'gpt-4o': 0.95,
  'gpt-4o-mini': 0.9,
  'gpt-4.1-mini': 0.9,
  'gpt-3.5-turbo': 0.75,
};
const DEFAULT_MODEL_CONFIDENCE = 0.8;

interface Usage {
  prompt_tokens?: number;
  completion_tokens?: number;
  total_tokens?: number;
}

/** Model base confidence adjusted by answer length and chars per token. */
export function computeConfidence(model: string, text: string, tokensUsed: number): number {
  let confidence = MODEL_CONFIDENCE[model] ?? DEFAULT_MODEL_CONFIDENCE;

  if (text.length > 200) confidence += 0.05;
  else if (text.length < 50) confidence -= 0.1;

  if (tokensUsed > 0) {
    const efficiency = text.length / tokensUsed;
    if (efficiency > 0.5) confidence += 0.05;
    else if (efficiency < 0.3) confidence -= 0.05;
  }

  return Math.min(Math.max(confidence, 0), 1);
}

@Injectable()
export class OpenAiGenerator implements Generator {
  private readonly logger = new Logger(OpenAiGenerator.name);
  private readonly model = process.env.OPENAI_MODEL || 'gpt-4o-mini';
  private readonly temperature = +(process.env.OPENAI_TEMPERATURE || 0.25);

  constructor(
    private readonly openai: OpenAI,
    private readonly aiUsage: AiUsageService,
  ) {}

  async generate(
    systemPrompt: string,
    userPrompt: string,
    history: readonly HistoryMessage[] = [],
  ): Promise<GenerationResult> {
    if (!process.env.OPENAI_API_KEY) {
      return this.failed('OPENAI_API_KEY is not set');
    }

    const messages: ChatCompletionMessageParam[] = [
      { role: 'system', content: systemPrompt },
      ...history.map(
        (h): ChatCompletionMessageParam =>
          h.role === 'user'
            ? { role: 'user', content: h.content }
            : { role: 'assistant', content: h.content },
      ),
      { role: 'user', content: userPrompt },
    ];

    try {
      const res = await this.openai.chat.completions.create({
        model: this.model,
        messages,
        temperature: this.temperature,
      });

      const text = res.choices[0]?.message?.content ?? '';
      const tokensUsed = await this.meter('generate', res.usage, {
        promptChars: userPrompt.length,
        historyCount: history.length,
      });

      if (!text.trim()) return this.failed('Model returned an empty answer');

      return {
        text,
        confidence: computeConfidence(this.model, text, tokensUsed),
        tokensUsed,
        status: 'success',
      };
    } catch (error) {
      this.logger.error(
        `Error while calling OpenAI (generate): ${errorMessage(error)}`,
        errorStack(error),
      );
      return this.failed(errorMessage(error));
    }
  }

  async *generateStream(
    systemPrompt: string,
    userPrompt: string,
    signal?: AbortSignal,
  ): AsyncGenerator<GenerationStreamEvent> {
    if (!process.env.OPENAI_API_KEY) {
      yield { type: 'error', error: 'OPENAI_API_KEY is not set' };
      return;
    }

    let text = '';
    let usage: Usage | undefined;

    try {
      const stream = await this.openai.chat.completions.create(
        {
          model: this.model,
          messages: [
            { role: 'system', content: systemPrompt },
            { role: 'user', content: userPrompt },
          ],
          temperature: this.temperature,
          stream: true,
          stream_options: { include_usage: true },
        },
        { signal },
      );

      for await (const chunk of stream) {
        if (chunk.usage) usage = chunk.usage;
        const delta = chunk.choices[0]?.delta?.content;
        if (delta) {
          text += delta;
          yield { type: 'content', text: delta };
        }
      }
    } catch (error) {
      if (signal?.aborted) {
        yield { type: 'error', error: 'aborted' };
        return;
      }
      this.logger.error(
        `Error while calling OpenAI (generateStream): ${errorMessage(error)}`,
        errorStack(error),
      );
      yield { type: 'error', error: errorMessage(error) };
      return;
    }

    const tokensUsed = await this.meter('generate_stream', usage, {
      promptChars: userPrompt.length,
    });
    yield {
      type: 'complete',
      text,
      tokensUsed,
      confidence: computeConfidence(this.model, text, tokensUsed),
    };
  }

  /** Records usage and returns the total token count. */
  private async meter(
    kind: 'generate' | 'generate_stream',
    usage: Usage | null | undefined,
    extra: Record<string, unknown>,
  ): Promise<number> {
    if (!usage) return 0;

    const promptTokens = usage.prompt_tokens ?? 0;
    const completionTokens = usage.completion_tokens ?? 0;
    const totalTokens = usage.total_tokens ?? promptTokens + completionTokens;

    await this.aiUsage.record({
      kind,
      model: this.model,
      inputTokens: promptTokens,
      outputTokens: completionTokens,
      totalTokens,
      costUsd: this.aiUsage.computeCostUsd(this.model, promptTokens, completionTokens),
      extra,
    });

    return totalTokens;
  }

  private failed(error: string): GenerationResult {
    return { text: '', confidence: 0, tokensUsed: 0, status: 'error', error };
  }
}
