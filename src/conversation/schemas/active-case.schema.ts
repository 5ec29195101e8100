import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import { HydratedDocument } from 'mongoose';

import type { SourceReference } from '../../context/context.types';

export type ActiveCaseDocument = HydratedDocument<ActiveCase>;

// one document per session
@Schema({ collection: 'active_cases', timestamps: true })
export class ActiveCase {
  @Prop({ required: true, unique: true, index: true, type: String })
  sessionId!: string;

  @Prop({ required: true, type: String })
  caseId!: string;

  @Prop({ type: String })
  caseNumber?: string;

  @Prop({ type: String })
  caseTitle?: string;

  @Prop({ type: String })
  court?: string;

  @Prop({ type: String })
  bench?: string;

  @Prop({ type: String })
  status?: string;

  @Prop({ type: [String], default: [] })
  advocatesPetitioner!: string[];

  @Prop({ type: [String], default: [] })
  advocatesRespondent!: string[];

  @Prop({ type: String })
  shortOrder?: string;

  @Prop({ type: String })
  summary?: string;

  @Prop({ type: [Object], default: [] })
  sources!: SourceReference[];
}

export const ActiveCaseSchema = SchemaFactory.createForClass(ActiveCase);
