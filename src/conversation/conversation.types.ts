// src/conversation/conversation.types.ts
import type { SourceReference } from '../context/context.types';
import type { PipelineStatus } from '../shared/errors';

export interface ConversationSession {
  sessionId: string;
  userId: string;
  title: string;
  createdAt: Date;
  lastActivityAt: Date;
  activeCaseId: string | null;
  lastQuery: string | null;
  contextData: Record<string, unknown>;
  isActive: boolean;
  isArchived: boolean;
  totalQueries: number;
}

export interface ConversationTurnRecord {
  sessionId: string;
  query: string;
  standaloneQuery: string;
  answer: string;
  status: PipelineStatus;
  confidence: number;
  sources: SourceReference[];
  resolvedCaseId: string | null;
  createdAt: Date;
}

export type NewConversationTurn = Omit<ConversationTurnRecord, 'createdAt'>;

/** The case currently locked for a session. At most one per session. */
export interface ActiveCaseContext {
  caseId: string;
  caseNumber?: string;
  caseTitle?: string;
  court?: string;
  bench?: string;
  status?: string;
  advocatesPetitioner: string[];
  advocatesRespondent: string[];
  shortOrder?: string;
  summary?: string;
  sources: SourceReference[];
}

export type CaseLockState =
  | { kind: 'unlocked' }
  | { kind: 'locked'; caseId: string };

export type TopicDecision = 'same' | 'new';

export type FollowUpIndicator =
  | 'pronoun_reference'
  | 'follow_up_phrase'
  | 'incomplete_question'
  | 'comparative_question';

/** What the orchestrator should do with the stored active case after this turn. */
export type ActiveCaseAction = 'keep' | 'set' | 'clear';

export type ResolutionReason =
  | 'procedural_override'
  | 'opinion_override'
  | 'explicit_reference_resolved'
  | 'explicit_reference_unresolved'
  | 'topic_shift'
  | 'same_topic'
  | 'follow_up_of_previous_case'
  | 'no_case_context';

export interface CaseResolutionInput {
  query: string;
  /** null when the session has no locked case */
  activeCase: ActiveCaseContext | null;
  /** oldest first */
  recentTurns: readonly ConversationTurnRecord[];
}

export interface CaseResolution {
  lockState: CaseLockState;
  standaloneQuery: string;
  topic: TopicDecision | null;
  isProcedural: boolean;
  isGeneralOpinion: boolean;
  explicitReference: string | null;
  resolvedCase: ActiveCaseContext | null;
  activeCaseAction: ActiveCaseAction;
  shortSummary: string;
  followUpIndicators: FollowUpIndicator[];
  reason: ResolutionReason;
}
