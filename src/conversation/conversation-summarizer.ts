// src/conversation/conversation-summarizer.ts
import type { ActiveCaseContext, ConversationTurnRecord } from './conversation.types';

const QUERY_PREVIEW_CHARS = 120;

const TOPIC_RULES: ReadonlyArray<[RegExp, string]> = [
  [/summary/, 'summary'],
  [/advocat|lawyer|counsel/, 'advocates'],
  [/order/, 'court order'],
  [/\bfir\b/, 'fir info'],
];

export interface SummaryOptions {
  maxTurns: number;
  maxWords: number;
}

/**
 * Deterministic rolling summary used to disambiguate follow-ups. Empty when
 * there is neither history nor a locked case.
 */
export function summarizeConversation(
  turns: readonly Pick<ConversationTurnRecord, 'query'>[],
  activeCase: Pick<ActiveCaseContext, 'caseNumber' | 'caseTitle'> | null,
  options: SummaryOptions,
): string {
  const caseLabel = activeCase?.caseNumber || activeCase?.caseTitle || null;

  if (!turns.length) {
    return caseLabel ? `User is discussing case ${caseLabel}.` : '';
  }

  const queries = turns
    .slice(-options.maxTurns)
    .map((t) => (t.query ?? '').trim())
    .filter(Boolean);

  const topics: string[] = [];
  for (const query of queries) {
    const lower = query.toLowerCase();
    const rule = TOPIC_RULES.find(([pattern]) => pattern.test(lower));
    if (rule && !topics.includes(rule[1])) topics.push(rule[1]);
  }

  const parts: string[] = [];
  if (caseLabel) parts.push(`Active case: ${caseLabel}`);
  if (queries.length) {
    parts.push(`Recent questions: ${queries.map((q) => q.slice(0, QUERY_PREVIEW_CHARS)).join(' | ')}`);
  }
  if (topics.length) parts.push(`Topics: ${topics.join(', ')}`);

  const words = parts.join('. ').split(/\s+/).filter(Boolean);
  return words.slice(0, options.maxWords).join(' ');
}
