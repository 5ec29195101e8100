import { Test } from '@nestjs/testing';

import { loadPipelineConfig, PIPELINE_CONFIG } from '../config/pipeline.config';
import { RETRIEVER, Retriever } from '../retrieval/retriever.types';
import { CaseResolverService, tokenOverlap } from './case-resolver.service';
import type { ActiveCaseContext, ConversationTurnRecord } from './conversation.types';

const caseA: ActiveCaseContext = {
  caseId: 'case-A',
  caseNumber: 'Crl. A. 45/2021',
  advocatesPetitioner: [],
  advocatesRespondent: [],
  sources: [],
};

function turn(query: string, resolvedCaseId: string | null): ConversationTurnRecord {
  return {
    sessionId: 's1',
    query,
    standaloneQuery: query,
    answer: 'answer',
    status: 'success',
    confidence: 0.8,
    sources: [],
    resolvedCaseId,
    createdAt: new Date('2024-01-01T00:00:00Z'),
  };
}

describe('CaseResolverService', () => {
  let resolver: CaseResolverService;
  let retriever: jest.Mocked<Retriever>;

  beforeEach(async () => {
    retriever = {
      search: jest.fn(),
      getByCaseId: jest.fn(),
      findExactCase: jest.fn().mockResolvedValue([]),
    };

    const module = await Test.createTestingModule({
      providers: [
        CaseResolverService,
        { provide: PIPELINE_CONFIG, useValue: loadPipelineConfig({ RETRIEVER_TIMEOUT_MS: '20' }) },
        { provide: RETRIEVER, useValue: retriever },
      ],
    }).compile();

    resolver = module.get(CaseResolverService);
  });

  it('leaves a vague question alone when nothing is known', async () => {
    const result = await resolver.resolve({
      query: 'What about this case?',
      activeCase: null,
      recentTurns: [],
    });

    expect(result.lockState).toEqual({ kind: 'unlocked' });
    expect(result.standaloneQuery).toBe('What about this case?');
    expect(result.reason).toBe('no_case_context');
    expect(result.followUpIndicators).toEqual([
      'pronoun_reference',
      'follow_up_phrase',
      'incomplete_question',
    ]);
  });

  it('does not lock procedural questions even with an active case', async () => {
    const result = await resolver.resolve({
      query: 'How do I file an appeal in this case?',
      activeCase: caseA,
      recentTurns: [],
    });

    expect(result.lockState).toEqual({ kind: 'unlocked' });
    expect(result.reason).toBe('procedural_override');
    expect(result.activeCaseAction).toBe('keep');
    expect(result.standaloneQuery).toBe('How do I file an appeal in this case?');
    expect(retriever.findExactCase).not.toHaveBeenCalled();
  });

  it('does not lock opinion questions', async () => {
    const result = await resolver.resolve({
      query: 'What do you think about the verdict?',
      activeCase: caseA,
      recentTurns: [],
    });

    expect(result.reason).toBe('opinion_override');
    expect(result.isGeneralOpinion).toBe(true);
  });

  it('switches the lock to an explicitly named case', async () => {
    retriever.findExactCase.mockResolvedValue([
      {
        text: 'Petition allowed.',
        score: 1,
        metadata: { caseId: 'case-B', caseNumber: 'W.P. 1234/2019', court: 'High Court' },
      },
    ]);

    const result = await resolver.resolve({
      query: 'Summarize W.P. 1234/2019 Lahore (LHC)',
      activeCase: caseA,
      recentTurns: [],
    });

    expect(retriever.findExactCase).toHaveBeenCalledWith('W.P. 1234/2019 Lahore (LHC)');
    expect(result.lockState).toEqual({ kind: 'locked', caseId: 'case-B' });
    expect(result.activeCaseAction).toBe('set');
    expect(result.explicitReference).toBe('W.P. 1234/2019 Lahore (LHC)');
    expect(result.resolvedCase?.caseNumber).toBe('W.P. 1234/2019');
    expect(result.resolvedCase?.court).toBe('High Court');
    expect(result.reason).toBe('explicit_reference_resolved');
  });

  it('drops the old lock when a named case cannot be found', async () => {
    const result = await resolver.resolve({
      query: 'Summarize W.P. 1234/2019 Lahore (LHC)',
      activeCase: caseA,
      recentTurns: [],
    });

    expect(result.lockState).toEqual({ kind: 'unlocked' });
    expect(result.activeCaseAction).toBe('clear');
    expect(result.reason).toBe('explicit_reference_unresolved');
    expect(result.standaloneQuery).toBe('Summarize W.P. 1234/2019 Lahore (LHC)');
  });

  it('treats a failing lookup as unresolved', async () => {
    retriever.findExactCase.mockRejectedValue(new Error('connection refused'));

    const result = await resolver.resolve({
      query: 'Summarize W.P. 1234/2019',
      activeCase: null,
      recentTurns: [],
    });

    expect(result.reason).toBe('explicit_reference_unresolved');
    expect(result.lockState).toEqual({ kind: 'unlocked' });
  });

  it('treats a slow lookup as unresolved', async () => {
    retriever.findExactCase.mockReturnValue(new Promise(() => undefined));

    const result = await resolver.resolve({
      query: 'Summarize W.P. 1234/2019',
      activeCase: null,
      recentTurns: [],
    });

    expect(result.reason).toBe('explicit_reference_unresolved');
  });

  it('keeps the active case on the same topic', async () => {
    const result = await resolver.resolve({
      query: 'Who were the advocates in this case?',
      activeCase: caseA,
      recentTurns: [turn('Summarize Crl. A. 45/2021', 'case-A')],
    });

    expect(result.lockState).toEqual({ kind: 'locked', caseId: 'case-A' });
    expect(result.activeCaseAction).toBe('keep');
    expect(result.reason).toBe('same_topic');
    expect(result.standaloneQuery).toBe('Who were the advocates in Crl. A. 45/2021?');
  });

  it('clears the active case on a topic shift', async () => {
    const result = await resolver.resolve({
      query: 'Let us move to another matter about land',
      activeCase: caseA,
      recentTurns: [],
    });

    expect(result.topic).toBe('new');
    expect(result.lockState).toEqual({ kind: 'unlocked' });
    expect(result.activeCaseAction).toBe('clear');
    expect(result.reason).toBe('topic_shift');
  });

  it('inherits the case of the previous explicit question', async () => {
    const result = await resolver.resolve({
      query: 'Who were the advocates for it?',
      activeCase: null,
      recentTurns: [turn('Summarize Crl. A. 45/2021', 'case-A')],
    });

    expect(result.lockState).toEqual({ kind: 'locked', caseId: 'case-A' });
    expect(result.activeCaseAction).toBe('set');
    expect(result.resolvedCase?.caseNumber).toBe('Crl. A. 45/2021');
    expect(result.reason).toBe('follow_up_of_previous_case');
    expect(result.standaloneQuery).toBe('Who were the advocates for it? Crl. A. 45/2021');
  });

  it('stays unlocked for an unrelated question and adds context instead', async () => {
    const result = await resolver.resolve({
      query: 'Explain bail conditions under the penal statute',
      activeCase: null,
      recentTurns: [turn('Summarize Crl. A. 45/2021', 'case-A')],
    });

    expect(result.lockState).toEqual({ kind: 'unlocked' });
    expect(result.reason).toBe('no_case_context');
    expect(result.standaloneQuery).toBe(
      'Summarize Crl. A. 45/2021 THEN: Explain bail conditions under the penal statute ' +
        '(context: Recent questions: Summarize Crl. A. 45/2021)',
    );
  });
});

describe('tokenOverlap', () => {
  it('counts shared content words of the current query', () => {
    expect(tokenOverlap('bail conditions for minors', 'bail conditions in general')).toBe(2 / 3);
    expect(tokenOverlap('the and', 'anything')).toBe(0);
  });
});
