import { Test, TestingModule } from '@nestjs/testing';
import { getModelToken } from '@nestjs/mongoose';

import type { NewConversationTurn } from './conversation.types';
import { ConversationTurn } from './schemas/conversation-turn.schema';
import { TurnRepository } from './turn.repository';

describe('TurnRepository', () => {
  let repository: TurnRepository;
  let query: { sort: jest.Mock; limit: jest.Mock; lean: jest.Mock; exec: jest.Mock };
  let model: { find: jest.Mock; create: jest.Mock };

  const row = (q: string, second: number) => ({
    sessionId: 's1',
    query: q,
    standaloneQuery: q,
    answer: `answer to ${q}`,
    status: 'success' as const,
    confidence: 0.8,
    sources: [],
    resolvedCaseId: null,
    createdAt: new Date(Date.UTC(2024, 0, 1, 0, 0, second)),
  });

  beforeEach(async () => {
    query = {
      sort: jest.fn().mockReturnThis(),
      limit: jest.fn().mockReturnThis(),
      lean: jest.fn().mockReturnThis(),
      exec: jest.fn(),
    };
    model = { find: jest.fn().mockReturnValue(query), create: jest.fn() };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        TurnRepository,
        { provide: getModelToken(ConversationTurn.name), useValue: model },
      ],
    }).compile();

    repository = module.get<TurnRepository>(TurnRepository);
  });

  it('returns the most recent turns oldest first', async () => {
    query.exec.mockResolvedValue([row('newer', 2), row('older', 1)]);

    const turns = await repository.listRecent('s1', 5);

    expect(model.find).toHaveBeenCalledWith({ sessionId: 's1' });
    expect(query.sort).toHaveBeenCalledWith({ createdAt: -1 });
    expect(query.limit).toHaveBeenCalledWith(5);
    expect(turns.map((t) => t.query)).toEqual(['older', 'newer']);
  });

  it('maps the stored document on append', async () => {
    const stored = { ...row('What is bail?', 1), resolvedCaseId: undefined };
    model.create.mockResolvedValue({ toObject: () => stored });

    const turn: NewConversationTurn = {
      sessionId: 's1',
      query: 'What is bail?',
      standaloneQuery: 'What is bail?',
      answer: 'answer to What is bail?',
      status: 'success',
      confidence: 0.8,
      sources: [],
      resolvedCaseId: null,
    };
    const saved = await repository.append(turn);

    expect(model.create).toHaveBeenCalledWith(turn);
    expect(saved.resolvedCaseId).toBeNull();
    expect(saved.createdAt).toEqual(new Date(Date.UTC(2024, 0, 1, 0, 0, 1)));
  });
});
