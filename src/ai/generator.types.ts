// src/ai/generator.types.ts

export const GENERATOR = 'GENERATOR';

export interface HistoryMessage {
  role: 'user' | 'assistant';
  content: string;
}

export interface GenerationResult {
  text: string;
  /** [0, 1] */
  confidence: number;
  tokensUsed: number;
  status: 'success' | 'error';
  error?: string;
}

export type GenerationStreamEvent =
  | { type: 'content'; text: string }
  | { type: 'complete'; text: string; tokensUsed: number; confidence: number }
  | { type: 'error'; error: string };

/**
 * Produces answer text from a system and user prompt. `generate` reports
 * failures in the result instead of throwing; a stream ends with exactly one
 * `complete` or `error` event.
 */
export interface Generator {
  generate(
    systemPrompt: string,
    userPrompt: string,
    history?: readonly HistoryMessage[],
  ): Promise<GenerationResult>;
  generateStream(
    systemPrompt: string,
    userPrompt: string,
    signal?: AbortSignal,
  ): AsyncIterable<GenerationStreamEvent>;
}
