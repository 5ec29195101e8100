import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import { HydratedDocument } from 'mongoose';

import type { SourceReference } from '../../context/context.types';
import { PIPELINE_STATUSES, PipelineStatus } from '../../shared/errors';

export type ConversationTurnDocument = HydratedDocument<ConversationTurn>;

// append-only
@Schema({ collection: 'conversation_turns', timestamps: { createdAt: true, updatedAt: false } })
export class ConversationTurn {
  @Prop({ required: true, index: true, type: String })
  sessionId!: string;

  @Prop({ required: true, type: String })
  query!: string;

  @Prop({ type: String, default: '' })
  standaloneQuery!: string;

  @Prop({ type: String, default: '' })
  answer!: string;

  @Prop({ type: String, enum: [...PIPELINE_STATUSES], required: true })
  status!: PipelineStatus;

  @Prop({ type: Number, default: 0 })
  confidence!: number;

  @Prop({ type: [Object], default: [] })
  sources!: SourceReference[];

  @Prop({ type: String, default: null })
  resolvedCaseId!: string | null;

  @Prop({ type: Date })
  createdAt?: Date;
}

export const ConversationTurnSchema = SchemaFactory.createForClass(ConversationTurn);
ConversationTurnSchema.index({ sessionId: 1, createdAt: -1 });
