// src/config/pipeline-config.module.ts
import { Global, Module } from '@nestjs/common';
import { PIPELINE_CONFIG, loadPipelineConfig } from './pipeline.config';

// ConfigModule.forRoot has already merged .env into process.env by the time
// this factory runs.
@Global()
@Module({
  providers: [
    {
      provide: PIPELINE_CONFIG,
      useFactory: () => loadPipelineConfig(process.env),
    },
  ],
  exports: [PIPELINE_CONFIG],
})
export class PipelineConfigModule {}
