// src/conversation/conversation.module.ts
import { Module } from '@nestjs/common';
import { MongooseModule } from '@nestjs/mongoose';

import { PIPELINE_CONFIG, PipelineConfig } from '../config/pipeline.config';
import { RetrievalModule } from '../retrieval/retrieval.module';
import { ActiveCaseRepository } from './active-case.repository';
import { CaseLockCache } from './case-lock.cache';
import { CaseResolverService } from './case-resolver.service';
import { ConversationStoreService } from './conversation-store.service';
import { ActiveCase, ActiveCaseSchema } from './schemas/active-case.schema';
import {
  ConversationTurn,
  ConversationTurnSchema,
} from './schemas/conversation-turn.schema';
import { Session, SessionSchema } from './schemas/session.schema';
import { SessionRepository } from './session.repository';
import { TurnRepository } from './turn.repository';

@Module({
  imports: [
    MongooseModule.forFeature([
      { name: Session.name, schema: SessionSchema },
      { name: ConversationTurn.name, schema: ConversationTurnSchema },
      { name: ActiveCase.name, schema: ActiveCaseSchema },
    ]),
    RetrievalModule,
  ],
  providers: [
    SessionRepository,
    TurnRepository,
    ActiveCaseRepository,
    {
      provide: CaseLockCache,
      inject: [PIPELINE_CONFIG],
      useFactory: (config: PipelineConfig) =>
        new CaseLockCache(config.caseLockCache.maxEntries, config.caseLockCache.ttlMs),
    },
    ConversationStoreService,
    CaseResolverService,
  ],
  exports: [ConversationStoreService, CaseResolverService],
})
export class ConversationModule {}
