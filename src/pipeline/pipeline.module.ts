// src/pipeline/pipeline.module.ts
import { Module } from '@nestjs/common';

import { AiModule } from '../ai/ai.module';
import { ContextModule } from '../context/context.module';
import { ConversationModule } from '../conversation/conversation.module';
import { GuardrailsModule } from '../guardrails/guardrails.module';
import { PromptsModule } from '../prompts/prompts.module';
import { RetrievalModule } from '../retrieval/retrieval.module';
import { LoggingModule } from '../shared/lib/logging/logging.module';
import { PipelineOrchestratorService } from './pipeline-orchestrator.service';

@Module({
  imports: [
    LoggingModule,
    AiModule,
    RetrievalModule,
    ContextModule,
    ConversationModule,
    GuardrailsModule,
    PromptsModule,
  ],
  providers: [PipelineOrchestratorService],
  exports: [PipelineOrchestratorService, ConversationModule],
})
export class PipelineModule {}
