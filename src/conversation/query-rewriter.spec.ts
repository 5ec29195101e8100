import { normalizeQuery, rewriteQuery } from './query-rewriter';

describe('rewriteQuery', () => {
  const base = { shortSummary: '', previousQuery: null, maxChars: 350 };

  it('replaces case pronoun phrases with the case reference', () => {
    expect(
      rewriteQuery({ ...base, query: 'Who argued this case?', caseReference: 'Crl. A. 45/2021' }),
    ).toBe('Who argued Crl. A. 45/2021?');
  });

  it('appends the reference to short questions about "it"', () => {
    expect(
      rewriteQuery({ ...base, query: 'Is it still pending?', caseReference: 'Crl. A. 45/2021' }),
    ).toBe('Is it still pending? Crl. A. 45/2021');
  });

  it('adds the summary and the previous question when no case is known', () => {
    expect(
      rewriteQuery({
        query: 'And for minors?',
        caseReference: null,
        shortSummary: 'Recent questions: What is bail?',
        previousQuery: 'What is bail?',
        maxChars: 350,
      }),
    ).toBe('What is bail? THEN: And for minors? (context: Recent questions: What is bail?)');
  });

  it('returns the query unchanged without any context', () => {
    expect(
      rewriteQuery({ ...base, query: 'What about this case?', caseReference: null }),
    ).toBe('What about this case?');
  });

  it('does not repeat an identical previous question', () => {
    expect(
      rewriteQuery({
        ...base,
        query: 'what is bail?',
        caseReference: null,
        previousQuery: 'What is bail?',
      }),
    ).toBe('what is bail?');
  });

  it('caps the rewrite length', () => {
    const rewritten = rewriteQuery({ ...base, query: 'a '.repeat(400), caseReference: null });
    expect(rewritten).toHaveLength(349);
    expect(rewritten.endsWith('a')).toBe(true);
  });
});

describe('normalizeQuery', () => {
  it('collapses whitespace', () => {
    expect(normalizeQuery('  bail   after\n arrest ')).toBe('bail after arrest');
  });
});
