// src/guardrails/hallucination-detector.ts
import type { SourceReference } from '../context/context.types';
import { GUARDRAIL_LEXICON, GuardrailLexicon } from './guardrail-lexicon';
import type { HallucinationReport } from './guardrail.types';

const HIGH_RISK_SCORE = 0.5;
const MIN_SUPPORTING_SOURCES = 2;

const WEIGHT = {
  uncertainty: 0.1,
  unsupportedClaim: 0.2,
  contradiction: 0.3,
  fakeCitation: 0.4,
  overconfidence: 0.2,
} as const;

function sourceHaystack(sources: readonly SourceReference[], contextTexts: readonly string[]): string {
  return sources
    .flatMap((s) => [s.contentId, s.caseId, s.caseNumber, s.caseTitle, s.court, s.judgeName])
    .concat(contextTexts)
    .filter((v): v is string => !!v)
    .join(' ')
    .toLowerCase();
}

/**
 * Heuristic hallucination score for an answer against the sources it was
 * generated from. Each finding adds a fixed weight; the total is clamped.
 * A citation counts as grounded when it appears in the source metadata or
 * in one of `contextTexts`, the passages the model was shown.
 */
export function detectHallucination(
  answer: string,
  sources: readonly SourceReference[],
  lexicon: GuardrailLexicon = GUARDRAIL_LEXICON,
  contextTexts: readonly string[] = [],
): HallucinationReport {
  const lower = answer.toLowerCase();
  const indicators: string[] = [];
  let score = 0;

  for (const { term, pattern } of lexicon.uncertaintyPhrases) {
    if (pattern.test(answer)) {
      indicators.push(`Contains uncertainty indicator: '${term}'`);
      score += WEIGHT.uncertainty;
    }
  }

  const cited = sources.some((s) => !!s.caseNumber && lower.includes(s.caseNumber.toLowerCase()));
  if (!cited) {
    for (const { term, pattern } of lexicon.absoluteTerms) {
      if (pattern.test(answer)) {
        indicators.push(`Absolute statement '${term}' without citation`);
        score += WEIGHT.unsupportedClaim;
      }
    }
  }

  for (const [positive, negative] of lexicon.contradictionPairs) {
    if (positive.pattern.test(answer) && negative.pattern.test(answer)) {
      indicators.push(`Contradictory statements: '${positive.term}' and '${negative.term}'`);
      score += WEIGHT.contradiction;
    }
  }

  const haystack = sourceHaystack(sources, contextTexts);
  for (const pattern of lexicon.citationPatterns) {
    for (const match of answer.match(pattern) ?? []) {
      if (!haystack.includes(match.toLowerCase())) {
        indicators.push(`Potential fake citation: ${match}`);
        score += WEIGHT.fakeCitation;
      }
    }
  }

  if (sources.length < MIN_SUPPORTING_SOURCES) {
    for (const { term, pattern } of lexicon.overconfidentPhrases) {
      if (pattern.test(answer)) {
        indicators.push(`Overconfident statement without sufficient support: '${term}'`);
        score += WEIGHT.overconfidence;
      }
    }
  }

  return { score: Math.min(score, 1), isHighRisk: score > HIGH_RISK_SCORE, indicators };
}
