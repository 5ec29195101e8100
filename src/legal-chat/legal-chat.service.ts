// src/legal-chat/legal-chat.service.ts
import { Inject, Injectable, Logger, NotFoundException } from '@nestjs/common';

import { PIPELINE_CONFIG, PipelineConfig } from '../config/pipeline.config';
import { ConversationStoreService } from '../conversation/conversation-store.service';
import type {
  ConversationSession,
  ConversationTurnRecord,
} from '../conversation/conversation.types';
import type { AskRequest } from '../pipeline/pipeline.types';
import { AskQuestionDto } from './dto/ask-question.dto';
import { StartSessionDto } from './dto/start-session.dto';

export const ANONYMOUS_USER = 'anonymous';

export interface SessionWithTurns extends ConversationSession {
  turns: ConversationTurnRecord[];
}

/** Session bookkeeping behind the chat endpoints. */
@Injectable()
export class LegalChatService {
  private readonly logger = new Logger(LegalChatService.name);

  constructor(
    private readonly store: ConversationStoreService,
    @Inject(PIPELINE_CONFIG) private readonly config: PipelineConfig,
  ) {}

  /** The access level always comes from server configuration. */
  toAskRequest(dto: AskQuestionDto): AskRequest {
    return {
      question: dto.question,
      sessionId: dto.sessionId,
      userId: dto.userId || ANONYMOUS_USER,
      accessLevel: this.config.defaultAccessLevel,
      filters: dto.filters,
    };
  }

  startSession(dto: StartSessionDto): Promise<ConversationSession> {
    return this.store.createSession(dto.userId, dto.title);
  }

  async getSessionWithTurns(sessionId: string): Promise<SessionWithTurns> {
    const session = await this.store.getSession(sessionId);
    if (!session) {
      throw new NotFoundException(`Session ${sessionId} not found`);
    }

    const turns = await this.store.listTurns(sessionId);
    this.logger.debug(`Loaded session ${sessionId} with ${turns.length} turn(s)`);
    return { ...session, turns };
  }

  async archiveSession(sessionId: string): Promise<ConversationSession> {
    const session = await this.store.archiveSession(sessionId);
    if (!session) {
      throw new NotFoundException(`Session ${sessionId} not found`);
    }
    return session;
  }

  listUserSessions(userId: string, includeArchived = false): Promise<ConversationSession[]> {
    return this.store.listUserSessions(userId, includeArchived);
  }
}
