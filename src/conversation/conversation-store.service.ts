// src/conversation/conversation-store.service.ts
import { Injectable, Logger } from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';

import { errorMessage } from '../shared/errors';
import { ActiveCaseRepository } from './active-case.repository';
import { CaseLockCache } from './case-lock.cache';
import type {
  ActiveCaseContext,
  ConversationSession,
  ConversationTurnRecord,
  NewConversationTurn,
} from './conversation.types';
import { SessionRepository } from './session.repository';
import { TurnRepository } from './turn.repository';

export interface ConversationState {
  session: ConversationSession;
  recentTurns: ConversationTurnRecord[];
  activeCase: ActiveCaseContext | null;
  /** true when the store could not be read and the advisory cache was used */
  degraded: boolean;
}

const DEFAULT_TITLE = 'New conversation';
const TITLE_FROM_QUERY_CHARS = 60;

@Injectable()
export class ConversationStoreService {
  private readonly logger = new Logger(ConversationStoreService.name);

  constructor(
    private readonly sessions: SessionRepository,
    private readonly turns: TurnRepository,
    private readonly activeCases: ActiveCaseRepository,
    private readonly lockCache: CaseLockCache,
  ) {}

  createSession(userId: string, title?: string, sessionId: string = uuidv4()): Promise<ConversationSession> {
    return this.sessions.create({ sessionId, userId, title: title?.trim() || DEFAULT_TITLE });
  }

  getSession(sessionId: string): Promise<ConversationSession | null> {
    return this.sessions.findBySessionId(sessionId);
  }

  /**
   * Looks up an active session, otherwise creates one (keeping the caller's id
   * when one was given). The first question becomes the title.
   */
  async getOrCreateSession(
    sessionId: string | undefined,
    userId: string,
    firstQuery?: string,
  ): Promise<ConversationSession> {
    const title = firstQuery ? firstQuery.trim().slice(0, TITLE_FROM_QUERY_CHARS) : undefined;

    if (sessionId) {
      const existing = await this.sessions.findBySessionId(sessionId);
      if (!existing) return this.createSession(userId, title, sessionId);
      if (existing.isActive && !existing.isArchived) return existing;
    }

    // archived sessions are not reopened
    return this.createSession(userId, title);
  }

  /**
   * Session, recent turns (oldest first) and active case in one read. When
   * the store fails the turn proceeds on an ephemeral session, with the case
   * lock taken from the advisory cache.
   */
  async loadState(
    sessionId: string | undefined,
    userId: string,
    query: string,
    historyWindow: number,
  ): Promise<ConversationState> {
    let created: ConversationSession | null = null;
    try {
      const session = await this.getOrCreateSession(sessionId, userId, query);
      created = session;
      const [recentTurns, activeCase] = await Promise.all([
        this.turns.listRecent(session.sessionId, historyWindow),
        session.activeCaseId ? this.activeCases.findBySessionId(session.sessionId) : Promise.resolve(null),
      ]);

      if (activeCase) this.lockCache.set(session.sessionId, activeCase.caseId);
      return { session, recentTurns, activeCase, degraded: false };
    } catch (e) {
      const fallbackId = created?.sessionId ?? sessionId ?? uuidv4();
      this.logger.warn(`Conversation store unavailable for ${fallbackId}: ${errorMessage(e)}`);

      const cachedCaseId = this.lockCache.get(fallbackId);
      const now = new Date();
      return {
        session: {
          sessionId: fallbackId,
          userId,
          title: DEFAULT_TITLE,
          createdAt: now,
          lastActivityAt: now,
          activeCaseId: cachedCaseId,
          lastQuery: null,
          contextData: {},
          isActive: true,
          isArchived: false,
          totalQueries: 0,
        },
        recentTurns: [],
        activeCase: cachedCaseId
          ? { caseId: cachedCaseId, advocatesPetitioner: [], advocatesRespondent: [], sources: [] }
          : null,
        degraded: true,
      };
    }
  }

  async recordTurn(turn: NewConversationTurn): Promise<ConversationTurnRecord> {
    const saved = await this.turns.append(turn);
    await this.sessions.touch(turn.sessionId, turn.query);
    return saved;
  }

  listTurns(sessionId: string): Promise<ConversationTurnRecord[]> {
    return this.turns.listAll(sessionId);
  }

  getActiveCase(sessionId: string): Promise<ActiveCaseContext | null> {
    return this.activeCases.findBySessionId(sessionId);
  }

  async setActiveCase(sessionId: string, context: ActiveCaseContext): Promise<void> {
    this.lockCache.set(sessionId, context.caseId);
    await this.activeCases.upsert(sessionId, context);
    await this.sessions.setActiveCaseId(sessionId, context.caseId);
  }

  async clearActiveCase(sessionId: string): Promise<void> {
    this.lockCache.delete(sessionId);
    await this.activeCases.clear(sessionId);
    await this.sessions.setActiveCaseId(sessionId, null);
  }

  archiveSession(sessionId: string): Promise<ConversationSession | null> {
    return this.sessions.archive(sessionId);
  }

  listUserSessions(userId: string, includeArchived = false): Promise<ConversationSession[]> {
    return this.sessions.listByUserId(userId, includeArchived);
  }
}
