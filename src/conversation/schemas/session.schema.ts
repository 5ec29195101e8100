import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import { HydratedDocument } from 'mongoose';

export type SessionDocument = HydratedDocument<Session>;

@Schema({ collection: 'sessions', timestamps: { createdAt: true, updatedAt: false } })
export class Session {
  @Prop({ required: true, unique: true, index: true, type: String })
  sessionId!: string;

  @Prop({ required: true, index: true, type: String })
  userId!: string;

  @Prop({ type: String, default: 'New conversation', trim: true })
  title!: string;

  @Prop({ type: Date, default: () => new Date() })
  lastActivityAt!: Date;

  @Prop({ type: String, default: null })
  activeCaseId!: string | null;

  @Prop({ type: String, default: null })
  lastQuery!: string | null;

  @Prop({ type: Object, default: {} })
  contextData!: Record<string, unknown>;

  @Prop({ type: Boolean, default: true })
  isActive!: boolean;

  // sessions are archived, never deleted
  @Prop({ type: Boolean, default: false })
  isArchived!: boolean;

  @Prop({ type: Number, default: 0 })
  totalQueries!: number;

  // filled in by timestamps
  @Prop({ type: Date })
  createdAt?: Date;
}

export const SessionSchema = SchemaFactory.createForClass(Session);
