// src/conversation/active-case.ts
import { computeContentId, inferSourceType } from '../context/chunk-classifier.service';
import type { RawPassage, SourceReference } from '../context/context.types';
import type { ActiveCaseContext } from './conversation.types';
import type { CaseReference } from './case-reference';

function splitList(value: string | undefined): string[] {
  if (!value) return [];
  return value
    .split(/[;,\n]/)
    .map((v) => v.trim())
    .filter(Boolean);
}

function firstOf(passages: readonly RawPassage[], key: string): string | undefined {
  for (const passage of passages) {
    const value = passage.metadata[key];
    if (value) return value;
  }
  return undefined;
}

export function passageToSource(passage: RawPassage): SourceReference {
  const m = passage.metadata;
  return {
    contentId: computeContentId(passage.text, m),
    sourceType: inferSourceType(passage.text, m),
    score: passage.score,
    caseId: m.caseId,
    caseNumber: m.caseNumber,
    caseTitle: m.caseTitle,
    court: m.court,
    dateDecided: m.dateDecided,
    judgeName: m.judgeName,
  };
}

/**
 * Snapshot of a case from the passages an exact lookup returned. Fields come
 * from the first passage that carries them.
 */
export function buildActiveCase(
  passages: readonly RawPassage[],
  reference: CaseReference,
): ActiveCaseContext {
  const caseNumber =
    firstOf(passages, 'caseNumber') ?? (reference.kind === 'number' ? reference.value : undefined);
  const caseTitle =
    firstOf(passages, 'caseTitle') ?? (reference.kind === 'title' ? reference.value : undefined);

  return {
    caseId: firstOf(passages, 'caseId') ?? caseNumber ?? reference.value,
    caseNumber,
    caseTitle,
    court: firstOf(passages, 'court'),
    bench: firstOf(passages, 'bench'),
    status: firstOf(passages, 'status'),
    advocatesPetitioner: splitList(firstOf(passages, 'advocatesPetitioner')),
    advocatesRespondent: splitList(firstOf(passages, 'advocatesRespondent')),
    shortOrder: firstOf(passages, 'shortOrder'),
    summary: firstOf(passages, 'summary'),
    sources: passages.map(passageToSource),
  };
}

export function caseLabel(activeCase: ActiveCaseContext | null): string | null {
  return activeCase?.caseNumber || activeCase?.caseTitle || null;
}
