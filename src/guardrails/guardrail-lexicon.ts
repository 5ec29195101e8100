// src/guardrails/guardrail-lexicon.ts
import raw from './guardrail-lexicon.json';

export interface Term {
  term: string;
  pattern: RegExp;
}

export interface GuardrailLexicon {
  highRiskTopics: Term[];
  piiPatterns: RegExp[];
  inappropriatePatterns: { category: string; pattern: RegExp }[];
  legalAdviceRequestPhrases: Term[];
  uncertaintyPhrases: Term[];
  absoluteTerms: Term[];
  contradictionPairs: [Term, Term][];
  citationPatterns: RegExp[];
  overconfidentPhrases: Term[];
  citationIndicators: Term[];
  legalTerms: Term[];
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/** Whole-word, case-insensitive match of a word or phrase. */
export function toTerm(term: string): Term {
  return { term, pattern: new RegExp(`\\b${escapeRegExp(term)}\\b`, 'i') };
}

function pairOf(pair: string[]): [Term, Term] {
  if (pair.length !== 2) {
    throw new Error(`Contradiction pair must have two terms: ${JSON.stringify(pair)}`);
  }
  return [toTerm(pair[0]), toTerm(pair[1])];
}

export function compileLexicon(source: typeof raw): GuardrailLexicon {
  return {
    highRiskTopics: source.highRiskTopics.map(toTerm),
    piiPatterns: source.piiPatterns.map((p) => new RegExp(p, 'i')),
    inappropriatePatterns: Object.entries(source.inappropriatePatterns).map(
      ([category, pattern]) => ({ category, pattern: new RegExp(pattern, 'i') }),
    ),
    legalAdviceRequestPhrases: source.legalAdviceRequestPhrases.map(toTerm),
    uncertaintyPhrases: source.uncertaintyPhrases.map(toTerm),
    absoluteTerms: source.absoluteTerms.map(toTerm),
    contradictionPairs: source.contradictionPairs.map(pairOf),
    // global: every citation-shaped string in an answer is checked
    citationPatterns: source.citationPatterns.map((p) => new RegExp(p, 'gi')),
    overconfidentPhrases: source.overconfidentPhrases.map(toTerm),
    citationIndicators: source.citationIndicators.map(toTerm),
    legalTerms: source.legalTerms.map(toTerm),
  };
}

export const GUARDRAIL_LEXICON: GuardrailLexicon = compileLexicon(raw);
