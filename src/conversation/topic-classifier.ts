// src/conversation/topic-classifier.ts
import type { TopicDecision } from './conversation.types';

const DIFFERENT_CASE_MARKERS = [' vs ', ' v. ', '/', ' crim ', ' crl ', ' misc ', ' ta ', ' c.o. ', ' writ '];
const NEW_TOPIC_PHRASES = ['new query', 'new topic', 'another case', 'different case', 'switch case', 'move to'];

/**
 * Biased towards 'same': only an explicit marker of a different case or an
 * explicit new-topic phrase starts a new topic.
 */
export function classifyTopic(
  query: string,
  activeCaseNumber: string | null,
): TopicDecision {
  const q = ` ${(query ?? '').toLowerCase().trim()} `;
  if (!q.trim()) return 'same';

  if (DIFFERENT_CASE_MARKERS.some((marker) => q.includes(marker))) {
    if (activeCaseNumber && q.includes(activeCaseNumber.toLowerCase())) return 'same';
    return 'new';
  }

  if (NEW_TOPIC_PHRASES.some((phrase) => q.includes(phrase))) return 'new';

  return 'same';
}
