// src/app.module.ts
import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { MongooseModule } from '@nestjs/mongoose';

import { PipelineConfigModule } from './config/pipeline-config.module';
import { LegalChatModule } from './legal-chat/legal-chat.module';
import { LoggingModule } from './shared/lib/logging/logging.module';

@Module({
  imports: [
    ConfigModule.forRoot({ isGlobal: true }),
    MongooseModule.forRoot(
      process.env.LEGAL_QA_MONGO_URI || 'mongodb://localhost:27017/legal_qa',
    ),
    PipelineConfigModule,
    LoggingModule,
    LegalChatModule,
  ],
})
export class AppModule {}
