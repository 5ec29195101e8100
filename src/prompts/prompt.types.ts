// src/prompts/prompt.types.ts
import type { SourceType } from '../context/context.types';

export const QUERY_TYPES = [
  'case_inquiry',
  'law_research',
  'procedural_guidance',
  'constitutional_question',
  'criminal_law',
  'civil_law',
  'family_law',
  'general_legal',
] as const;

export type QueryType = (typeof QUERY_TYPES)[number];

export const LEGAL_DOMAINS = [
  'constitutional',
  'criminal',
  'civil',
  'family',
  'procedural',
  'general',
] as const;

export type LegalDomain = (typeof LEGAL_DOMAINS)[number];

export interface PromptTemplate {
  key: string;
  name: string;
  queryTypes: QueryType[];
  domains: LegalDomain[];
  focus: string;
  instructions: string[];
}

export interface QueryClassification {
  queryType: QueryType;
  domain: LegalDomain;
}

/** The parts of a packed context that go into a prompt. */
export interface PromptContext {
  contextText: string;
  chunkCount: number;
  tokenCount: number;
  sourceDistribution: Partial<Record<SourceType, number>>;
}

/** A prior exchange shown to the model. */
export interface PromptHistoryTurn {
  query: string;
  answer: string;
}

export interface FormattedPrompt {
  systemPrompt: string;
  userPrompt: string;
  templateName: string;
  queryType: QueryType;
  domain: LegalDomain;
  contextMetadata: {
    chunkCount: number;
    totalTokens: number;
    sourceTypes: SourceType[];
    conversationTurns: number;
  };
}
