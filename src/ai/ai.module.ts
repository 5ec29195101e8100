// src/ai/ai.module.ts
import { Logger, Module } from '@nestjs/common';
import { OpenAI } from 'openai';

import { PgModule } from '../pg/pg.module';
import { AiUsageService } from './ai-usage.service';
import { GENERATOR } from './generator.types';
import { OpenAiGenerator } from './openai-generator.service';

@Module({
  imports: [PgModule],
  providers: [
    {
      provide: OpenAI,
      useFactory: () => {
        const apiKey = process.env.OPENAI_API_KEY;
        if (!apiKey) {
          // the app still starts; generation and embeddings report the missing key
          new Logger('AiModule').warn('OPENAI_API_KEY is not set.');
        }
        return new OpenAI({ apiKey: apiKey || 'missing' });
      },
    },
    AiUsageService,
    OpenAiGenerator,
    { provide: GENERATOR, useExisting: OpenAiGenerator },
  ],
  exports: [OpenAI, AiUsageService, GENERATOR],
})
export class AiModule {}
