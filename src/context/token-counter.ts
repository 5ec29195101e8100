// src/context/token-counter.ts
import { Logger } from '@nestjs/common';
import { getEncoding, Tiktoken } from 'js-tiktoken';
import type { TokenizerMode } from '../config/pipeline.config';
import { errorMessage } from '../shared/errors';

export const TOKEN_COUNTER = 'TOKEN_COUNTER';

export interface TokenCounter {
  /** true when counts come from a real tokenizer */
  readonly exact: boolean;
  count(text: string): number;
  /** Shortens `text` so that `count(result) <= maxTokens`, marking the cut with "...". */
  truncate(text: string, maxTokens: number): string;
}

const CHARS_PER_TOKEN = 4;
const ELLIPSIS = '...';

/**
 * len/4 estimate. Deterministic across environments, which keeps packing
 * decisions stable where no tokenizer is installed.
 */
export class EstimatingTokenCounter implements TokenCounter {
  readonly exact = false;

  count(text: string): number {
    return Math.floor(text.length / CHARS_PER_TOKEN);
  }

  truncate(text: string, maxTokens: number): string {
    const budget = maxTokens * CHARS_PER_TOKEN;
    if (text.length <= budget) return text;

    let cut = text.slice(0, budget);
    const lastSpace = lastWhitespaceIndex(cut);
    if (lastSpace > budget * 0.8) {
      cut = cut.slice(0, lastSpace);
    }
    return cut.trimEnd() + ELLIPSIS;
  }
}

export class TiktokenTokenCounter implements TokenCounter {
  readonly exact = true;

  constructor(private readonly encoding: Tiktoken) {}

  count(text: string): number {
    return this.encoding.encode(text).length;
  }

  truncate(text: string, maxTokens: number): string {
    const tokens = this.encoding.encode(text);
    if (tokens.length <= maxTokens) return text;
    // one token is left for the ellipsis
    const kept = this.encoding.decode(tokens.slice(0, Math.max(0, maxTokens - 1)));
    return kept.trimEnd() + ELLIPSIS;
  }
}

function lastWhitespaceIndex(text: string): number {
  for (let i = text.length - 1; i >= 0; i--) {
    if (/\s/.test(text[i])) return i;
  }
  return -1;
}

export function createTokenCounter(mode: TokenizerMode): TokenCounter {
  if (mode === 'tiktoken') {
    try {
      return new TiktokenTokenCounter(getEncoding('cl100k_base'));
    } catch (e) {
      new Logger('TokenCounter').warn(
        `tiktoken unavailable, falling back to estimate: ${errorMessage(e)}`,
      );
    }
  }
  return new EstimatingTokenCounter();
}
