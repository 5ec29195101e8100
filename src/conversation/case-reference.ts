// src/conversation/case-reference.ts
//
// Recognises case numbers such as "Crl. A. 45/2021 Lahore (LHC)",
// "W.P. 1234/2019" or "Case No. 12/2020", and "X vs Y" style titles.

const CASE_NUMBER_RE =
  /\b[A-Z][A-Za-z]{0,5}\.?(?:\s*[A-Z][A-Za-z]{0,5}\.?)?\s*(?:No\.\s*)?\d+\/\d{2,4}(?:\s+[A-Z][A-Za-z]+)?(?:\s*\([A-Z]+\))?/;

const TITLE_WORD = "[A-Z][\\w.&'-]*";
const CASE_TITLE_RE = new RegExp(
  `\\b(${TITLE_WORD}(?:\\s+${TITLE_WORD}){0,5})\\s+(?:vs\\.?|v\\.|versus)\\s+(${TITLE_WORD}(?:\\s+${TITLE_WORD}){0,5})`,
);

// Capitalised sentence openers that the patterns above would otherwise swallow.
const LEADING_FILLERS = new Set([
  'about',
  'and',
  'did',
  'does',
  'explain',
  'for',
  'from',
  'give',
  'has',
  'in',
  'is',
  'of',
  'on',
  'see',
  'show',
  'summarize',
  'tell',
  'the',
  'was',
  'what',
  'who',
  'with',
]);

export type CaseReference =
  | { kind: 'number'; value: string }
  | { kind: 'title'; value: string };

function stripLeadingFillers(value: string): string {
  const words = value.split(/\s+/);
  while (words.length > 1 && LEADING_FILLERS.has(words[0].toLowerCase())) {
    words.shift();
  }
  return words.join(' ');
}

export function extractCaseNumber(text: string): string | null {
  const match = CASE_NUMBER_RE.exec(text ?? '');
  if (!match) return null;
  return stripLeadingFillers(match[0].trim());
}

export function containsCaseNumber(text: string): boolean {
  return CASE_NUMBER_RE.test(text ?? '');
}

export function extractCaseTitle(text: string): string | null {
  const match = CASE_TITLE_RE.exec(text ?? '');
  if (!match) return null;
  const left = stripLeadingFillers(match[1]);
  return `${left} vs ${match[2]}`;
}

/** Case number first, then title. */
export function extractCaseReference(text: string): CaseReference | null {
  const number = extractCaseNumber(text);
  if (number) return { kind: 'number', value: number };

  const title = extractCaseTitle(text);
  if (title) return { kind: 'title', value: title };

  return null;
}
