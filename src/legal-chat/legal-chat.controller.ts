// src/legal-chat/legal-chat.controller.ts
import {
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Logger,
  Param,
  Post,
  Query,
  Res,
} from '@nestjs/common';
import type { Response } from 'express';

import { PipelineOrchestratorService } from '../pipeline/pipeline-orchestrator.service';
import type { PipelineResult } from '../pipeline/pipeline.types';
import { AskQuestionDto } from './dto/ask-question.dto';
import { StartSessionDto } from './dto/start-session.dto';
import { LegalChatService } from './legal-chat.service';

export type EventStreamResponse = Pick<
  Response,
  'status' | 'setHeader' | 'flushHeaders' | 'write' | 'end' | 'on' | 'off'
>;

@Controller('legal-chat')
export class LegalChatController {
  private readonly logger = new Logger(LegalChatController.name);

  constructor(
    private readonly chatService: LegalChatService,
    private readonly orchestrator: PipelineOrchestratorService,
  ) {}

  @Post('sessions')
  startSession(@Body() dto: StartSessionDto) {
    this.logger.debug(`POST /legal-chat/sessions user=${dto.userId}`);
    return this.chatService.startSession(dto);
  }

  @Get('sessions/:id')
  getSession(@Param('id') id: string) {
    return this.chatService.getSessionWithTurns(id);
  }

  @Post('sessions/:id/archive')
  @HttpCode(HttpStatus.OK)
  archiveSession(@Param('id') id: string) {
    return this.chatService.archiveSession(id);
  }

  @Get('users/:userId/sessions')
  listUserSessions(
    @Param('userId') userId: string,
    @Query('includeArchived') includeArchived?: string,
  ) {
    return this.chatService.listUserSessions(userId, includeArchived === 'true');
  }

  @Post('ask')
  @HttpCode(HttpStatus.OK)
  ask(@Body() dto: AskQuestionDto): Promise<PipelineResult> {
    this.logger.debug(`POST /legal-chat/ask session=${dto.sessionId ?? '(new)'}`);
    return this.orchestrator.answer(this.chatService.toAskRequest(dto));
  }

  /**
   * Server-sent events: one `data:` frame per content increment, then the
   * final result. Closing the connection cancels generation.
   */
  @Post('ask/stream')
  async askStream(@Body() dto: AskQuestionDto, @Res() res: EventStreamResponse): Promise<void> {
    res.status(HttpStatus.OK);
    res.setHeader('Content-Type', 'text/event-stream');
    res.setHeader('Cache-Control', 'no-cache');
    res.setHeader('Connection', 'keep-alive');
    res.flushHeaders();

    const controller = new AbortController();
    const onClose = () => controller.abort();
    res.on('close', onClose);

    try {
      for await (const event of this.orchestrator.answerStream(
        this.chatService.toAskRequest(dto),
        controller.signal,
      )) {
        res.write(`data: ${JSON.stringify(event)}\n\n`);
      }
    } finally {
      res.off('close', onClose);
      res.end();
    }
  }
}
