import {
  containsCaseNumber,
  extractCaseNumber,
  extractCaseReference,
  extractCaseTitle,
} from './case-reference';

describe('case-reference', () => {
  describe('extractCaseNumber', () => {
    it('reads an abbreviated case number with city and court', () => {
      expect(extractCaseNumber('Summarize Crl. A. 45/2021 Lahore (LHC) please')).toBe(
        'Crl. A. 45/2021 Lahore (LHC)',
      );
    });

    it('drops a capitalised sentence opener in front of the number', () => {
      expect(extractCaseNumber('In Case No. 12/2020 the petitioner appeared')).toBe(
        'Case No. 12/2020',
      );
    });

    it('returns null for statute citations', () => {
      expect(extractCaseNumber('Section 302 PPC bail principles')).toBeNull();
    });
  });

  describe('containsCaseNumber', () => {
    it('detects a number embedded in running text', () => {
      expect(containsCaseNumber('see W.P. 1234/2019 for details')).toBe(true);
      expect(containsCaseNumber('no reference here')).toBe(false);
    });
  });

  describe('extractCaseTitle', () => {
    it('reads a "vs" title', () => {
      expect(extractCaseTitle('What did the court decide in State vs Ahmad Khan')).toBe(
        'State vs Ahmad Khan',
      );
    });

    it('returns null without a versus marker', () => {
      expect(extractCaseTitle('State and Ahmad Khan')).toBeNull();
    });
  });

  describe('extractCaseReference', () => {
    it('prefers the case number over the title', () => {
      expect(extractCaseReference('State vs Ahmad Khan, Crl. A. 45/2021')).toEqual({
        kind: 'number',
        value: 'Crl. A. 45/2021',
      });
    });

    it('falls back to the title', () => {
      expect(extractCaseReference('Tell me about State vs Ahmad Khan')).toEqual({
        kind: 'title',
        value: 'State vs Ahmad Khan',
      });
    });

    it('returns null for plain questions', () => {
      expect(extractCaseReference('What about this case?')).toBeNull();
    });
  });
});
