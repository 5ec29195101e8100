// src/pipeline/citation-formatter.ts
import type { SourceReference, SourceType } from '../context/context.types';

export interface FormattedCitation {
  title: string;
  caseNumber: string;
  court: string;
  date: string;
  judge: string;
  relevanceScore: number;
  sourceType: SourceType;
  caseId: string | null;
  contentId: string;
  formattedCitation: string;
}

export function formatCitation(source: SourceReference): FormattedCitation {
  const title = source.caseTitle || 'Unknown Case';
  const caseNumber = source.caseNumber || 'N/A';
  const court = source.court || 'Unknown Court';
  const date = source.dateDecided || 'N/A';

  return {
    title,
    caseNumber,
    court,
    date,
    judge: source.judgeName || 'Unknown Judge',
    relevanceScore: Math.round(source.score * 1000) / 1000,
    sourceType: source.sourceType,
    caseId: source.caseId ?? null,
    contentId: source.contentId,
    formattedCitation: `${title}, ${caseNumber} (${court} ${date})`,
  };
}

/** One citation per distinct source, in the order given. */
export function formatCitations(sources: readonly SourceReference[]): FormattedCitation[] {
  const seen = new Set<string>();
  const citations: FormattedCitation[] = [];
  for (const source of sources) {
    if (seen.has(source.contentId)) continue;
    seen.add(source.contentId);
    citations.push(formatCitation(source));
  }
  return citations;
}
