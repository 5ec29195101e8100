import { Injectable } from '@nestjs/common';
import { InjectModel } from '@nestjs/mongoose';
import { Model } from 'mongoose';

import type { ActiveCaseContext } from './conversation.types';
import { ActiveCase, ActiveCaseDocument } from './schemas/active-case.schema';

export function toActiveCaseContext(row: ActiveCase): ActiveCaseContext {
  return {
    caseId: row.caseId,
    caseNumber: row.caseNumber,
    caseTitle: row.caseTitle,
    court: row.court,
    bench: row.bench,
    status: row.status,
    advocatesPetitioner: row.advocatesPetitioner ?? [],
    advocatesRespondent: row.advocatesRespondent ?? [],
    shortOrder: row.shortOrder,
    summary: row.summary,
    sources: row.sources ?? [],
  };
}

@Injectable()
export class ActiveCaseRepository {
  constructor(
    @InjectModel(ActiveCase.name)
    private readonly model: Model<ActiveCaseDocument>,
  ) {}

  async upsert(sessionId: string, context: ActiveCaseContext): Promise<void> {
    await this.model
      .updateOne({ sessionId }, { $set: { ...context, sessionId } }, { upsert: true })
      .exec();
  }

  async findBySessionId(sessionId: string): Promise<ActiveCaseContext | null> {
    const row = await this.model.findOne({ sessionId }).lean<ActiveCase>().exec();
    return row ? toActiveCaseContext(row) : null;
  }

  async clear(sessionId: string): Promise<void> {
    await this.model.deleteOne({ sessionId }).exec();
  }
}
