import { loadPipelineConfig } from '../config/pipeline.config';
import {
  ChunkClassifierService,
  computeContentId,
  inferSourceType,
} from './chunk-classifier.service';
import { ClassifiedChunk, RawPassage } from './context.types';
import { EstimatingTokenCounter } from './token-counter';

describe('ChunkClassifierService', () => {
  const config = loadPipelineConfig({});
  const service = new ChunkClassifierService(config, new EstimatingTokenCounter());
  const now = new Date('2024-06-01T00:00:00Z');

  const classify = (raw: RawPassage): ClassifiedChunk => {
    const result = service.classifyAndScore(raw, now);
    if (!result.ok) throw new Error(`unexpected rejection: ${result.error.reason}`);
    return result.value;
  };

  describe('inferSourceType', () => {
    it.each([
      ['Section 302 PPC bail principles', 'statute'],
      ['In Case No. 12/2020 the petitioner sought bail', 'case_law'],
      ['The petitioner challenged Section 9 of the Act', 'case_law'],
      ['The Constitution guarantees freedom of movement', 'constitutional_article'],
      ['The court held that the delay was fatal', 'judgment'],
      ['The court directed the police to appear', 'order'],
      ['The doctrine of laches bars stale claims', 'legal_principle'],
      ['Explain how to file an appeal', 'procedural_guidance'],
      ['Weather was pleasant today', 'general'],
    ])('classifies "%s" as %s', (text, expected) => {
      expect(inferSourceType(text, {})).toBe(expected);
    });

    it('treats an explicit case id as case law', () => {
      expect(inferSourceType('Section 5 applies here', { caseId: 'c-1' })).toBe('case_law');
    });

    it('maps content and document type labels', () => {
      expect(inferSourceType('Some neutral passage text', { contentType: 'case_metadata' })).toBe(
        'case_metadata',
      );
      expect(
        inferSourceType('Some neutral passage text', { documentType: 'Constitutional Articles' }),
      ).toBe('constitutional_article');
      expect(inferSourceType('Some neutral passage text', { contentType: 'law' })).toBe('statute');
    });
  });

  describe('classifyAndScore', () => {
    it('scores the base priority plus the relevance bonus', () => {
      const chunk = classify({ text: 'Section 302 PPC bail principles', score: 0.9, metadata: {} });

      expect(chunk.sourceType).toBe('statute');
      expect(chunk.priority).toBe(13);
      expect(chunk.tokenCount).toBe(7);
    });

    it('adds recency, court and completeness bonuses', () => {
      const chunk = classify({
        text: 'The court held that ' + 'x'.repeat(200),
        score: 0.7,
        metadata: { dateDecided: '2021-03-15', court: 'Supreme Court of Pakistan' },
      });

      // judgment 7 + relevance 2 + recency 2 + court 3 + completeness 1
      expect(chunk.priority).toBe(15);
    });

    it('gives smaller bonuses to older high court decisions', () => {
      const chunk = classify({
        text: 'The court held that bail was rightly refused',
        score: 0.5,
        metadata: { dateDecided: '2016', court: 'Lahore High Court' },
      });

      // judgment 7 + relevance 1 + recency 1 + court 2
      expect(chunk.priority).toBe(11);
    });

    it('clamps the priority to 20', () => {
      const boosted = new ChunkClassifierService(
        { ...config, priorities: { ...config.priorities, statute: 19 } },
        new EstimatingTokenCounter(),
      );
      const result = boosted.classifyAndScore(
        { text: 'Section 9 of the Act governs limitation', score: 0.95, metadata: {} },
        now,
      );

      expect(result.ok && result.value.priority).toBe(20);
    });

    it('rejects passages shorter than ten characters', () => {
      expect(service.classifyAndScore({ text: '  short  ', score: 1, metadata: {} })).toEqual({
        ok: false,
        error: { reason: 'text_too_short', length: 5 },
      });
    });

    it('builds content ids that ignore surrounding and repeated whitespace', () => {
      const a = computeContentId('  bail   is granted ', { caseId: 'c1' });
      const b = computeContentId('bail is granted', { caseId: 'c1' });

      expect(a).toBe(b);
      expect(a).toMatch(/^c1_unknown_[0-9a-f]{8}$/);
    });
  });

  describe('classifyAll', () => {
    it('skips rejected passages and keeps the rest', () => {
      const chunks = service.classifyAll(
        [
          { text: 'tiny', score: 0.9, metadata: {} },
          { text: 'The doctrine of laches bars stale claims', score: 0.5, metadata: {} },
        ],
        now,
      );

      expect(chunks.map((c) => c.sourceType)).toEqual(['legal_principle']);
    });
  });
});
