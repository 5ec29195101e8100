// src/pipeline/answer-post-processor.ts
import { LEGAL_DISCLAIMER } from '../shared/disclaimer';
import { Result, safeSync } from '../shared/result';

const LEADING_FILLER_RE =
  /^\s*(?:as an ai(?: language model| assistant)?|as a language model|i am not a lawyer,? but)\s*,?\s*/i;
const DISCLAIMER_RE = /\bnot legal advice\b/i;

function capitalizeFirst(text: string): string {
  return text.charAt(0).toUpperCase() + text.slice(1);
}

/**
 * Tone adjustment applied to generated answers: drops a leading
 * "As an AI language model," style opener, squeezes blank-line runs and
 * appends the legal-information disclaimer unless the answer already has one.
 */
export function adjustAnswer(text: string): string {
  let answer = text.trim();

  const stripped = answer.replace(LEADING_FILLER_RE, '');
  if (stripped !== answer && stripped.length > 0) answer = capitalizeFirst(stripped);

  answer = answer.replace(/\n{3,}/g, '\n\n');

  if (!DISCLAIMER_RE.test(answer)) answer = `${answer}\n\n${LEGAL_DISCLAIMER}`;
  return answer;
}

export function postProcessAnswer(text: string): Result<string, Error> {
  return safeSync(() => adjustAnswer(text));
}
