import type { SourceReference } from '../context/context.types';
import {
  scoreAccuracy,
  scoreCitationQuality,
  scoreCompleteness,
  scoreLegalAccuracy,
  scoreQuality,
  scoreRelevance,
} from './quality-scorer';

const judgment: SourceReference = {
  contentId: 'c1',
  sourceType: 'judgment',
  score: 0.9,
  caseNumber: 'Crl. A. 45/2021',
  court: 'High Court',
  judgeName: 'Justice Rahman',
};
const statute: SourceReference = { contentId: 'c2', sourceType: 'statute', score: 0.7 };

describe('quality scorer', () => {
  it('scores relevance by references to the sources', () => {
    expect(scoreRelevance('The High Court allowed the appeal.', [judgment, statute])).toBe(0.5);
    expect(scoreRelevance('Anything', [])).toBe(0);
  });

  it('rewards length and structure for completeness', () => {
    expect(scoreCompleteness('Short.')).toBe(0.5);
    expect(
      scoreCompleteness('Based on the record: 1. bail 2. surety. However, conditions apply.'),
    ).toBeCloseTo(0.8);
    expect(scoreCompleteness('x'.repeat(600))).toBeCloseTo(0.7);
  });

  it('averages source reliability for accuracy', () => {
    expect(scoreAccuracy([judgment, statute])).toBeCloseTo(0.85);
    expect(scoreAccuracy([{ contentId: 'c3', sourceType: 'general', score: 0.5 }])).toBeCloseTo(0.7);
    expect(scoreAccuracy([])).toBe(0.5);
  });

  it('normalises citation indicators by indicator and source count', () => {
    expect(scoreCitationQuality('The court cited section 5.', [judgment])).toBeCloseTo(2 / 13);
    expect(scoreCitationQuality('The court cited section 5.', [])).toBe(0);
  });

  it('counts whole legal terms', () => {
    expect(scoreLegalAccuracy('Short.')).toBe(0.7);
    expect(
      scoreLegalAccuracy('The court heard the appeal on bail and the writ petition under section 5.'),
    ).toBeCloseTo(0.9);
  });

  it('combines the sub-scores with fixed weights', () => {
    const quality = scoreQuality('Short.', []);

    expect(quality.relevance).toBe(0);
    expect(quality.citationQuality).toBe(0);
    expect(quality.overall).toBeCloseTo(0.33);
  });
});
