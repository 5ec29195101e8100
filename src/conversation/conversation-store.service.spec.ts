import type { ActiveCaseContext, NewConversationTurn } from './conversation.types';
import {
  createInMemoryConversationStore,
  InMemoryConversationStore,
} from './testing/in-memory-conversation.repositories';

const caseA: ActiveCaseContext = {
  caseId: 'case-A',
  caseNumber: 'Crl. A. 45/2021',
  advocatesPetitioner: ['A. Khan'],
  advocatesRespondent: [],
  sources: [],
};

function newTurn(query: string): NewConversationTurn {
  return {
    sessionId: 's1',
    query,
    standaloneQuery: query,
    answer: `answer to ${query}`,
    status: 'success',
    confidence: 0.8,
    sources: [],
    resolvedCaseId: null,
  };
}

describe('ConversationStoreService', () => {
  let ctx: InMemoryConversationStore;

  beforeEach(async () => {
    ctx = await createInMemoryConversationStore();
  });

  describe('getOrCreateSession', () => {
    it('creates a session titled after the first question', async () => {
      const session = await ctx.store.getOrCreateSession(undefined, 'u1', '  What is bail?  ');

      expect(session.title).toBe('What is bail?');
      expect(session.userId).toBe('u1');
      expect(ctx.sessions.rows.has(session.sessionId)).toBe(true);
    });

    it('keeps the caller supplied id for a new session', async () => {
      const session = await ctx.store.getOrCreateSession('s1', 'u1');

      expect(session.sessionId).toBe('s1');
      expect(session.title).toBe('New conversation');
    });

    it('returns the existing active session', async () => {
      await ctx.store.createSession('u1', 'Bail', 's1');

      const session = await ctx.store.getOrCreateSession('s1', 'u1', 'another question');

      expect(session.title).toBe('Bail');
      expect(ctx.sessions.rows.size).toBe(1);
    });

    it('does not reopen an archived session', async () => {
      await ctx.store.createSession('u1', 'Bail', 's1');
      await ctx.store.archiveSession('s1');

      const session = await ctx.store.getOrCreateSession('s1', 'u1');

      expect(session.sessionId).not.toBe('s1');
      expect(ctx.sessions.rows.size).toBe(2);
    });
  });

  describe('loadState', () => {
    it('returns the last turns oldest first', async () => {
      await ctx.store.createSession('u1', undefined, 's1');
      for (const q of ['q1', 'q2', 'q3']) await ctx.store.recordTurn(newTurn(q));

      const state = await ctx.store.loadState('s1', 'u1', 'q4', 2);

      expect(state.degraded).toBe(false);
      expect(state.recentTurns.map((t) => t.query)).toEqual(['q2', 'q3']);
      expect(state.activeCase).toBeNull();
      expect(state.session.totalQueries).toBe(3);
      expect(state.session.lastQuery).toBe('q3');
    });

    it('loads the active case of the session', async () => {
      await ctx.store.createSession('u1', undefined, 's1');
      await ctx.store.setActiveCase('s1', caseA);

      const state = await ctx.store.loadState('s1', 'u1', 'q', 10);

      expect(state.session.activeCaseId).toBe('case-A');
      expect(state.activeCase).toEqual(caseA);
    });

    it('falls back to the lock cache when the store is down', async () => {
      ctx.lockCache.set('s1', 'case-A');
      ctx.sessions.failing = true;

      const state = await ctx.store.loadState('s1', 'u1', 'q', 10);

      expect(state.degraded).toBe(true);
      expect(state.session.sessionId).toBe('s1');
      expect(state.recentTurns).toEqual([]);
      expect(state.activeCase?.caseId).toBe('case-A');
    });

    it('keeps the id of a session created before the turn history failed', async () => {
      ctx.turns.failing = true;

      const state = await ctx.store.loadState(undefined, 'u1', 'What is bail?', 10);

      expect(state.degraded).toBe(true);
      expect([...ctx.sessions.rows.keys()]).toEqual([state.session.sessionId]);
    });
  });

  describe('active case', () => {
    it('updates the session and the cache together', async () => {
      await ctx.store.createSession('u1', undefined, 's1');

      await ctx.store.setActiveCase('s1', caseA);
      expect(ctx.lockCache.get('s1')).toBe('case-A');
      expect(ctx.sessions.rows.get('s1')?.activeCaseId).toBe('case-A');

      await ctx.store.clearActiveCase('s1');
      expect(ctx.lockCache.get('s1')).toBeNull();
      expect(ctx.sessions.rows.get('s1')?.activeCaseId).toBeNull();
      expect(await ctx.store.getActiveCase('s1')).toBeNull();
    });
  });

  it('lists a user\'s sessions without archived ones', async () => {
    await ctx.store.createSession('u1', 'one', 's1');
    await ctx.store.createSession('u1', 'two', 's2');
    await ctx.store.createSession('u2', 'three', 's3');
    await ctx.store.archiveSession('s2');

    const sessions = await ctx.store.listUserSessions('u1');

    expect(sessions.map((s) => s.sessionId)).toEqual(['s1']);
    expect(await ctx.store.listUserSessions('u1', true)).toHaveLength(2);
  });
});
