import { Injectable } from '@nestjs/common';
import { InjectModel } from '@nestjs/mongoose';
import { Model } from 'mongoose';

import type { ConversationSession } from './conversation.types';
import { Session, SessionDocument } from './schemas/session.schema';

export interface NewSession {
  sessionId: string;
  userId: string;
  title?: string;
}

export function toConversationSession(row: Session): ConversationSession {
  return {
    sessionId: row.sessionId,
    userId: row.userId,
    title: row.title,
    createdAt: row.createdAt ?? row.lastActivityAt,
    lastActivityAt: row.lastActivityAt,
    activeCaseId: row.activeCaseId ?? null,
    lastQuery: row.lastQuery ?? null,
    contextData: row.contextData ?? {},
    isActive: row.isActive,
    isArchived: row.isArchived,
    totalQueries: row.totalQueries ?? 0,
  };
}

@Injectable()
export class SessionRepository {
  constructor(
    @InjectModel(Session.name)
    private readonly model: Model<SessionDocument>,
  ) {}

  async create(data: NewSession): Promise<ConversationSession> {
    const doc = await this.model.create(data);
    return toConversationSession(doc.toObject());
  }

  async findBySessionId(sessionId: string): Promise<ConversationSession | null> {
    const row = await this.model.findOne({ sessionId }).lean<Session>().exec();
    return row ? toConversationSession(row) : null;
  }

  async touch(sessionId: string, lastQuery: string): Promise<void> {
    await this.model
      .updateOne(
        { sessionId },
        { $set: { lastActivityAt: new Date(), lastQuery }, $inc: { totalQueries: 1 } },
      )
      .exec();
  }

  async setActiveCaseId(sessionId: string, caseId: string | null): Promise<void> {
    await this.model.updateOne({ sessionId }, { $set: { activeCaseId: caseId } }).exec();
  }

  async archive(sessionId: string): Promise<ConversationSession | null> {
    const row = await this.model
      .findOneAndUpdate(
        { sessionId },
        { $set: { isArchived: true, isActive: false } },
        { new: true },
      )
      .lean<Session>()
      .exec();
    return row ? toConversationSession(row) : null;
  }

  async listByUserId(userId: string, includeArchived = false): Promise<ConversationSession[]> {
    const filter = includeArchived ? { userId } : { userId, isArchived: false };
    const rows = await this.model
      .find(filter)
      .sort({ lastActivityAt: -1 })
      .lean<Session[]>()
      .exec();
    return rows.map(toConversationSession);
  }
}
