import { NotFoundException, ValidationPipe } from '@nestjs/common';
import { Test } from '@nestjs/testing';

import { loadPipelineConfig, PIPELINE_CONFIG } from '../config/pipeline.config';
import { ConversationStoreService } from '../conversation/conversation-store.service';
import {
  createInMemoryConversationStore,
  InMemoryConversationStore,
} from '../conversation/testing/in-memory-conversation.repositories';
import { PipelineOrchestratorService } from '../pipeline/pipeline-orchestrator.service';
import type { PipelineResult, PipelineStreamEvent } from '../pipeline/pipeline.types';
import { AskQuestionDto } from './dto/ask-question.dto';
import { EventStreamResponse, LegalChatController } from './legal-chat.controller';
import { LegalChatService } from './legal-chat.service';

const result: PipelineResult = {
  answer: 'Bail may be granted.',
  confidence: 0.8,
  sources: [],
  status: 'success',
  sessionId: 'sess-1',
  metadata: { timings: { totalMs: 12 } },
};

function fakeResponse() {
  return {
    status: jest.fn(),
    setHeader: jest.fn(),
    flushHeaders: jest.fn(),
    write: jest.fn(),
    end: jest.fn(),
    on: jest.fn(),
    off: jest.fn(),
  } satisfies EventStreamResponse;
}

describe('LegalChatController', () => {
  let controller: LegalChatController;
  let mem: InMemoryConversationStore;
  let orchestrator: { answer: jest.Mock; answerStream: jest.Mock };

  async function createController(env: Record<string, string> = {}): Promise<LegalChatController> {
    const module = await Test.createTestingModule({
      controllers: [LegalChatController],
      providers: [
        LegalChatService,
        { provide: ConversationStoreService, useValue: mem.store },
        { provide: PipelineOrchestratorService, useValue: orchestrator },
        { provide: PIPELINE_CONFIG, useValue: loadPipelineConfig(env) },
      ],
    }).compile();

    return module.get(LegalChatController);
  }

  beforeEach(async () => {
    mem = await createInMemoryConversationStore();
    orchestrator = { answer: jest.fn().mockResolvedValue(result), answerStream: jest.fn() };
    controller = await createController();
  });

  it('starts a session and returns it with its turns', async () => {
    const session = await controller.startSession({ userId: 'u1', title: 'Bail' });
    await mem.store.recordTurn({
      sessionId: session.sessionId,
      query: 'q',
      standaloneQuery: 'q',
      answer: 'a',
      status: 'success',
      confidence: 0.5,
      sources: [],
      resolvedCaseId: null,
    });

    const loaded = await controller.getSession(session.sessionId);

    expect(loaded.title).toBe('Bail');
    expect(loaded.userId).toBe('u1');
    expect(loaded.turns.map((t) => t.answer)).toEqual(['a']);
  });

  it('404s for an unknown session', async () => {
    await expect(controller.getSession('missing')).rejects.toBeInstanceOf(NotFoundException);
    await expect(controller.archiveSession('missing')).rejects.toBeInstanceOf(NotFoundException);
  });

  it('hides archived sessions unless asked', async () => {
    const first = await controller.startSession({ userId: 'u1' });
    await controller.startSession({ userId: 'u1' });
    await controller.archiveSession(first.sessionId);

    expect(await controller.listUserSessions('u1')).toHaveLength(1);
    expect(await controller.listUserSessions('u1', 'true')).toHaveLength(2);
  });

  it('fills defaults before asking the pipeline', async () => {
    await expect(controller.ask({ question: 'What is bail?' })).resolves.toBe(result);

    expect(orchestrator.answer).toHaveBeenCalledWith({
      question: 'What is bail?',
      sessionId: undefined,
      userId: 'anonymous',
      accessLevel: 'public',
      filters: undefined,
    });
  });

  it('ignores an access level sent by the caller', async () => {
    const body = { question: 'Explain the penalties for money laundering', accessLevel: 'admin' };
    const pipe = new ValidationPipe({ whitelist: true, transform: true });

    const validated: unknown = await pipe.transform(body, { type: 'body', metatype: AskQuestionDto });
    expect(validated).toBeInstanceOf(AskQuestionDto);
    expect(validated).not.toHaveProperty('accessLevel');

    await controller.ask(body);

    expect(orchestrator.answer).toHaveBeenCalledWith(
      expect.objectContaining({ accessLevel: 'public' }),
    );
  });

  it('applies the configured access level', async () => {
    const lawyerController = await createController({ DEFAULT_ACCESS_LEVEL: 'lawyer' });

    await lawyerController.ask({ question: 'What is bail?' });

    expect(orchestrator.answer).toHaveBeenCalledWith(
      expect.objectContaining({ accessLevel: 'lawyer' }),
    );
  });

  it('writes one event-stream frame per event', async () => {
    const events: PipelineStreamEvent[] = [
      { type: 'content', text: 'Bail ' },
      { type: 'final', result },
    ];
    orchestrator.answerStream.mockImplementation(async function* () {
      yield* events;
    });
    const res = fakeResponse();

    await controller.askStream({ question: 'What is bail?', userId: 'u1' }, res);

    expect(res.setHeader).toHaveBeenCalledWith('Content-Type', 'text/event-stream');
    expect(res.write.mock.calls).toEqual([
      [`data: ${JSON.stringify(events[0])}\n\n`],
      [`data: ${JSON.stringify(events[1])}\n\n`],
    ]);
    expect(res.end).toHaveBeenCalledTimes(1);
    expect(orchestrator.answerStream.mock.calls[0][0]).toEqual(
      expect.objectContaining({ userId: 'u1', accessLevel: 'public' }),
    );
  });

  it('cancels generation when the client disconnects', async () => {
    const res = fakeResponse();
    const seen: { signal?: AbortSignal } = {};
    orchestrator.answerStream.mockImplementation(async function* (_request: unknown, signal: AbortSignal) {
      seen.signal = signal;
      for (const [event, handler] of res.on.mock.calls) {
        if (event === 'close') handler();
      }
      yield { type: 'final', result };
    });

    await controller.askStream({ question: 'What is bail?' }, res);

    expect(res.on).toHaveBeenCalledWith('close', expect.any(Function));
    expect(seen.signal?.aborted).toBe(true);
    expect(res.off).toHaveBeenCalledWith('close', expect.any(Function));
  });
});
