import { Injectable } from '@nestjs/common';
import { InjectModel } from '@nestjs/mongoose';
import { Model } from 'mongoose';

import type { ConversationTurnRecord, NewConversationTurn } from './conversation.types';
import {
  ConversationTurn,
  ConversationTurnDocument,
} from './schemas/conversation-turn.schema';

export function toTurnRecord(row: ConversationTurn): ConversationTurnRecord {
  return {
    sessionId: row.sessionId,
    query: row.query,
    standaloneQuery: row.standaloneQuery,
    answer: row.answer,
    status: row.status,
    confidence: row.confidence,
    sources: row.sources ?? [],
    resolvedCaseId: row.resolvedCaseId ?? null,
    createdAt: row.createdAt ?? new Date(0),
  };
}

@Injectable()
export class TurnRepository {
  constructor(
    @InjectModel(ConversationTurn.name)
    private readonly model: Model<ConversationTurnDocument>,
  ) {}

  async append(turn: NewConversationTurn): Promise<ConversationTurnRecord> {
    const doc = await this.model.create(turn);
    return toTurnRecord(doc.toObject());
  }

  /** The last `limit` turns, returned oldest first. */
  async listRecent(sessionId: string, limit: number): Promise<ConversationTurnRecord[]> {
    const rows = await this.model
      .find({ sessionId })
      .sort({ createdAt: -1 })
      .limit(limit)
      .lean<ConversationTurn[]>()
      .exec();
    return rows.reverse().map(toTurnRecord);
  }

  async listAll(sessionId: string): Promise<ConversationTurnRecord[]> {
    const rows = await this.model
      .find({ sessionId })
      .sort({ createdAt: 1 })
      .lean<ConversationTurn[]>()
      .exec();
    return rows.map(toTurnRecord);
  }
}
