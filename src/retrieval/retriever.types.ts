// src/retrieval/retriever.types.ts
import type { RawPassage } from '../context/context.types';

export const RETRIEVER = 'RETRIEVER';

export interface RetrievalFilters {
  court?: string;
  legalDomain?: string;
  yearFrom?: number;
  yearTo?: number;
}

/**
 * Source of candidate passages. Implementations may throw; callers wrap
 * every call in a timeout and treat failures as upstream errors.
 */
export interface Retriever {
  search(query: string, topK: number, filters?: RetrievalFilters): Promise<RawPassage[]>;
  getByCaseId(caseId: string): Promise<RawPassage[]>;
  /** Exact lookup by case number or title; empty when nothing matches. */
  findExactCase(reference: string): Promise<RawPassage[]>;
}
