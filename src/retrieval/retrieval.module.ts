import { Module } from '@nestjs/common';

import { AiModule } from '../ai/ai.module';
import { PgModule } from '../pg/pg.module';
import { OpenAiEmbeddingsService } from './openai-embeddings.service';
import { PgCaseRetriever } from './pg-case-retriever.service';
import { RETRIEVER } from './retriever.types';

@Module({
  imports: [PgModule, AiModule],
  providers: [
    OpenAiEmbeddingsService,
    PgCaseRetriever,
    { provide: RETRIEVER, useExisting: PgCaseRetriever },
  ],
  exports: [RETRIEVER],
})
export class RetrievalModule {}
