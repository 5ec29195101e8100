import type { SourceReference } from '../context/context.types';
import { detectHallucination } from './hallucination-detector';

const judgment: SourceReference = {
  contentId: 'c1',
  sourceType: 'judgment',
  score: 0.9,
  caseNumber: 'Crl. A. 45/2021',
  court: 'High Court',
};

describe('detectHallucination', () => {
  it('finds nothing in a grounded answer', () => {
    expect(detectHallucination('The High Court granted bail in Crl. A. 45/2021.', [judgment])).toEqual({
      score: 0,
      isHighRisk: false,
      indicators: [],
    });
  });

  it('flags a citation that no source contains', () => {
    const report = detectHallucination('The rule appears in PLD 2099 XX 9999.', [judgment]);

    expect(report.score).toBeCloseTo(0.4);
    expect(report.indicators).toEqual(['Potential fake citation: PLD 2099 XX 9999']);
  });

  it('accepts a citation found in the sources', () => {
    const reported: SourceReference = { ...judgment, caseTitle: 'State vs Ali PLD 2019 SC 123' };

    expect(detectHallucination('See PLD 2019 SC 123.', [reported]).score).toBe(0);
  });

  it('accepts a citation found only in the passage text', () => {
    const answer = 'See PLD 2019 SC 123.';

    expect(detectHallucination(answer, [judgment], undefined, ['As held in PLD 2019 SC 123, bail follows.']).score).toBe(0);
    expect(detectHallucination(answer, [judgment]).score).toBeCloseTo(0.4);
  });

  it('flags absolute claims only when no source is cited', () => {
    expect(detectHallucination('Bail is always granted.', []).score).toBeCloseTo(0.2);
    expect(detectHallucination('Bail is always granted in Crl. A. 45/2021.', [judgment]).score).toBe(0);
  });

  it('adds up contradictions and unsupported claims', () => {
    const report = detectHallucination('Bail is always granted and never refused.', []);

    expect(report.score).toBeCloseTo(0.7);
    expect(report.isHighRisk).toBe(true);
    expect(report.indicators).toEqual([
      "Absolute statement 'always' without citation",
      "Absolute statement 'never' without citation",
      "Contradictory statements: 'always' and 'never'",
    ]);
  });

  it('flags overconfidence with fewer than two sources', () => {
    expect(detectHallucination('It is clear that bail applies.', [judgment]).score).toBeCloseTo(0.2);
    expect(
      detectHallucination('It is clear that bail applies.', [judgment, { ...judgment, contentId: 'c2' }])
        .score,
    ).toBe(0);
  });

  it('clamps the score', () => {
    const report = detectHallucination('PLD 2001 AB 1, PLD 2002 AB 2 and PLD 2003 AB 3.', []);

    expect(report.score).toBe(1);
    expect(report.indicators).toHaveLength(3);
  });
});
