// src/conversation/query-rewriter.ts

const CASE_PRONOUN_PHRASES = ['this case', 'that case', 'this matter', 'that matter', 'same one'];
const SHORT_QUERY_WORDS = 8;

export interface RewriteInput {
  query: string;
  /** case number or title of the locked case */
  caseReference: string | null;
  shortSummary: string;
  previousQuery: string | null;
  maxChars: number;
}

export function normalizeQuery(query: string, maxChars?: number): string {
  const collapsed = (query ?? '').replace(/\s+/g, ' ').trim();
  if (maxChars === undefined || collapsed.length <= maxChars) return collapsed;
  return collapsed.slice(0, maxChars).trimEnd();
}

/**
 * Turns a follow-up into a standalone retrieval string. With a case reference
 * the pronoun phrases are replaced by it; without one the rolling summary and
 * then the previous question are added for disambiguation.
 */
export function rewriteQuery(input: RewriteInput): string {
  const current = normalizeQuery(input.query);
  let rewritten = current;

  if (input.caseReference) {
    const reference = input.caseReference;
    for (const phrase of CASE_PRONOUN_PHRASES) {
      rewritten = rewritten.replace(new RegExp(`\\b${phrase}\\b`, 'gi'), reference);
    }
    const replaced = rewritten !== current;
    if (
      !replaced &&
      current.split(' ').length <= SHORT_QUERY_WORDS &&
      /\bit\b/i.test(current)
    ) {
      rewritten = `${rewritten} ${reference}`;
    }
  } else {
    if (input.shortSummary) {
      rewritten = `${rewritten} (context: ${input.shortSummary})`;
    }
    const previous = normalizeQuery(input.previousQuery ?? '');
    if (previous && previous.toLowerCase() !== current.toLowerCase()) {
      rewritten = `${previous} THEN: ${rewritten}`;
    }
  }

  return normalizeQuery(rewritten, input.maxChars);
}
