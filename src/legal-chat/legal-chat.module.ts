import { Module } from '@nestjs/common';

import { PipelineModule } from '../pipeline/pipeline.module';
import { LegalChatController } from './legal-chat.controller';
import { LegalChatService } from './legal-chat.service';

@Module({
  imports: [PipelineModule],
  controllers: [LegalChatController],
  providers: [LegalChatService],
  exports: [LegalChatService],
})
export class LegalChatModule {}
