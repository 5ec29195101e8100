// src/conversation/follow-up-detector.ts
import type { FollowUpIndicator } from './conversation.types';

const PRONOUN_RE = /\b(?:it|its|this|that|these|those|he|she|they|them|his|her|their|same one)\b/;
const FOLLOW_UP_PHRASES = [
  'what about',
  'how about',
  'what if',
  'can you explain more',
  'tell me more',
  'give me more details',
  'elaborate',
  'what else',
  'anything else',
  'further information',
];
const QUESTION_OPENER_RE = /^(?:what|how|when|where|why|who)\b/;
const COMPARATIVE_RE = /\b(?:compare|comparison|difference|similar|versus|vs)\b/;

export function hasPronounReference(query: string): boolean {
  return PRONOUN_RE.test(query.toLowerCase());
}

export function detectFollowUpIndicators(query: string): FollowUpIndicator[] {
  const lower = (query ?? '').toLowerCase().trim();
  const indicators: FollowUpIndicator[] = [];

  if (PRONOUN_RE.test(lower)) indicators.push('pronoun_reference');
  if (FOLLOW_UP_PHRASES.some((p) => lower.includes(p))) indicators.push('follow_up_phrase');
  if (QUESTION_OPENER_RE.test(lower) && lower.split(/\s+/).length < 5) {
    indicators.push('incomplete_question');
  }
  if (COMPARATIVE_RE.test(lower)) indicators.push('comparative_question');

  return indicators;
}
