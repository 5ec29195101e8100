// src/context/chunk-deduplicator.ts
import type { ClassifiedChunk } from './context.types';

/** Descending by (priority, score). */
export function compareChunks(a: ClassifiedChunk, b: ClassifiedChunk): number {
  if (b.priority !== a.priority) return b.priority - a.priority;
  return b.score - a.score;
}

/**
 * One survivor per contentId: the greatest (priority, score). On a tie the
 * first one seen stays. Survivors keep first-seen order.
 */
export function deduplicateChunks(chunks: readonly ClassifiedChunk[]): ClassifiedChunk[] {
  const best = new Map<string, ClassifiedChunk>();
  for (const chunk of chunks) {
    const current = best.get(chunk.contentId);
    if (!current || compareChunks(current, chunk) > 0) {
      best.set(chunk.contentId, chunk);
    }
  }
  return [...best.values()];
}

/** Stable, so equal keys keep their input order. */
export function rankChunks(chunks: readonly ClassifiedChunk[]): ClassifiedChunk[] {
  return [...chunks].sort(compareChunks);
}
