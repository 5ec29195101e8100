// src/guardrails/quality-scorer.ts
import type { SourceReference, SourceType } from '../context/context.types';
import { GUARDRAIL_LEXICON, GuardrailLexicon } from './guardrail-lexicon';
import type { QualityMetrics } from './guardrail.types';

const WEIGHTS = {
  relevance: 0.25,
  completeness: 0.2,
  accuracy: 0.25,
  citationQuality: 0.15,
  legalAccuracy: 0.15,
} as const;

// reliability of the material a source came from
const OFFICIAL_TYPES: ReadonlySet<SourceType> = new Set(['judgment', 'order']);
const LEGAL_TEXT_TYPES: ReadonlySet<SourceType> = new Set([
  'case_metadata',
  'statute',
  'constitutional_article',
]);

function mentions(haystack: string, value: string | undefined): boolean {
  return !!value && haystack.includes(value.toLowerCase());
}

/** Share of sources the answer refers to by case number, court or judge. */
export function scoreRelevance(answer: string, sources: readonly SourceReference[]): number {
  if (!sources.length) return 0;
  const lower = answer.toLowerCase();
  let references = 0;
  for (const source of sources) {
    if (mentions(lower, source.caseNumber)) references += 1;
    if (mentions(lower, source.court)) references += 1;
    if (mentions(lower, source.judgeName)) references += 1;
  }
  return Math.min(references / sources.length, 1);
}

export function scoreCompleteness(answer: string): number {
  const lower = answer.toLowerCase();
  let score = 0.5;

  if (answer.length > 500) score += 0.2;
  else if (answer.length > 200) score += 0.1;

  if (answer.includes('1.') && answer.includes('2.')) score += 0.1;
  if (lower.includes('based on') || lower.includes('according to')) score += 0.1;
  if (lower.includes('however') || lower.includes('furthermore')) score += 0.1;

  return Math.min(score, 1);
}

export function scoreAccuracy(sources: readonly SourceReference[]): number {
  if (!sources.length) return 0.5;
  const total = sources.reduce((sum, source) => {
    if (OFFICIAL_TYPES.has(source.sourceType)) return sum + 0.9;
    if (LEGAL_TEXT_TYPES.has(source.sourceType)) return sum + 0.8;
    return sum + 0.7;
  }, 0);
  return total / sources.length;
}

export function scoreCitationQuality(
  answer: string,
  sources: readonly SourceReference[],
  lexicon: GuardrailLexicon = GUARDRAIL_LEXICON,
): number {
  if (!sources.length) return 0;
  const lower = answer.toLowerCase();
  const indicators = lexicon.citationIndicators.filter((t) => t.pattern.test(answer)).length;
  const references = sources.filter((s) => mentions(lower, s.caseNumber)).length;
  return Math.min(
    (indicators + references) / (lexicon.citationIndicators.length + sources.length),
    1,
  );
}

export function scoreLegalAccuracy(
  answer: string,
  lexicon: GuardrailLexicon = GUARDRAIL_LEXICON,
): number {
  const lower = answer.toLowerCase();
  const terms = lexicon.legalTerms.filter((t) => t.pattern.test(answer)).length;
  let score = 0.7;

  if (terms > 5) score += 0.2;
  else if (terms > 3) score += 0.1;

  if (lower.includes('based on') || lower.includes('according to')) score += 0.1;

  return Math.min(score, 1);
}

export function scoreQuality(
  answer: string,
  sources: readonly SourceReference[],
  lexicon: GuardrailLexicon = GUARDRAIL_LEXICON,
): QualityMetrics {
  const relevance = scoreRelevance(answer, sources);
  const completeness = scoreCompleteness(answer);
  const accuracy = scoreAccuracy(sources);
  const citationQuality = scoreCitationQuality(answer, sources, lexicon);
  const legalAccuracy = scoreLegalAccuracy(answer, lexicon);

  return {
    relevance,
    completeness,
    accuracy,
    citationQuality,
    legalAccuracy,
    overall:
      relevance * WEIGHTS.relevance +
      completeness * WEIGHTS.completeness +
      accuracy * WEIGHTS.accuracy +
      citationQuality * WEIGHTS.citationQuality +
      legalAccuracy * WEIGHTS.legalAccuracy,
  };
}
