// src/pipeline/pipeline.types.ts
import type { PackingMetadata } from '../context/context.types';
import type { CaseLockState, FollowUpIndicator, ResolutionReason } from '../conversation/conversation.types';
import type { RiskLevel } from '../guardrails/guardrail.types';
import type { FormattedPrompt, LegalDomain, QueryType } from '../prompts/prompt.types';
import type { RetrievalFilters } from '../retrieval/retriever.types';
import type { PipelineStatus } from '../shared/errors';
import type { AccessLevel } from '../shared/types';
import type { FormattedCitation } from './citation-formatter';

export interface AskRequest {
  question: string;
  sessionId?: string;
  userId: string;
  accessLevel: AccessLevel;
  filters?: RetrievalFilters;
}

export interface GuardrailSummary {
  stage: 'query' | 'response';
  allowed: boolean;
  riskLevel: RiskLevel;
  warnings: string[];
  errors: string[];
  qualityOverall?: number;
  hallucinationScore?: number;
}

export interface PipelineMetadata {
  standaloneQuery?: string;
  caseLock?: CaseLockState;
  resolutionReason?: ResolutionReason;
  followUpIndicators?: FollowUpIndicator[];
  queryType?: QueryType;
  legalDomain?: LegalDomain;
  templateUsed?: string;
  retrievedVia?: 'case' | 'search';
  retrievalResults?: number;
  contextChunks?: number;
  contextTokens?: number;
  /** true when the packer failed and a single passage was used instead */
  fallbackContext?: boolean;
  packing?: PackingMetadata;
  prompt?: FormattedPrompt['contextMetadata'];
  tokensUsed?: number;
  guardrail?: GuardrailSummary;
  /** the conversation store could not be read for this turn */
  degradedStore?: boolean;
  /** machine-readable cause of a non-success status */
  reason?: string;
  timings: {
    totalMs: number;
    retrievalMs?: number;
    generationMs?: number;
  };
}

export interface PipelineResult {
  answer: string;
  /** [0, 1]; 0 for every non-success status */
  confidence: number;
  sources: FormattedCitation[];
  status: PipelineStatus;
  sessionId: string;
  metadata: PipelineMetadata;
}

export type PipelineStreamEvent =
  | { type: 'content'; text: string }
  | { type: 'final'; result: PipelineResult };
