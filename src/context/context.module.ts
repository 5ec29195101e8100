// src/context/context.module.ts
import { Module } from '@nestjs/common';

import { PIPELINE_CONFIG, PipelineConfig } from '../config/pipeline.config';
import { ChunkClassifierService } from './chunk-classifier.service';
import { ContextPackerService } from './context-packer.service';
import { TOKEN_COUNTER, createTokenCounter } from './token-counter';

@Module({
  providers: [
    {
      provide: TOKEN_COUNTER,
      inject: [PIPELINE_CONFIG],
      useFactory: (config: PipelineConfig) => createTokenCounter(config.tokenizer),
    },
    ChunkClassifierService,
    ContextPackerService,
  ],
  exports: [TOKEN_COUNTER, ChunkClassifierService, ContextPackerService],
})
export class ContextModule {}
