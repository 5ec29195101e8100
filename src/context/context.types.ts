// src/context/context.types.ts
import type { PackingLimits } from '../config/pipeline.config';

export const SOURCE_TYPES = [
  'statute',
  'constitutional_article',
  'case_law',
  'judgment',
  'order',
  'legal_principle',
  'procedural_guidance',
  'case_metadata',
  'document_text',
  'general',
] as const;

export type SourceType = (typeof SOURCE_TYPES)[number];

export function isSourceType(value: string): value is SourceType {
  return (SOURCE_TYPES as readonly string[]).includes(value);
}

/**
 * Everything a retriever may know about a passage. Adapters map their rows
 * into these fields; anything else goes in as an extra string field.
 */
export interface PassageMetadata {
  caseId?: string;
  documentId?: string;
  caseNumber?: string;
  caseTitle?: string;
  court?: string;
  dateDecided?: string;
  judgeName?: string;
  legalDomain?: string;
  contentType?: string;
  documentType?: string;
  bench?: string;
  status?: string;
  source?: string;
  [extra: string]: string | undefined;
}

export interface RawPassage {
  readonly text: string;
  /** relevance in [0, 1] */
  readonly score: number;
  readonly metadata: Readonly<PassageMetadata>;
}

export interface ClassifiedChunk extends RawPassage {
  readonly sourceType: SourceType;
  /** 0..20 */
  readonly priority: number;
  readonly tokenCount: number;
  readonly contentId: string;
  readonly truncated?: boolean;
}

export interface ChunkSummary {
  index: number;
  sourceType: SourceType;
  priority: number;
  score: number;
  tokenCount: number;
  contentId: string;
  caseNumber?: string;
  court?: string;
  truncated: boolean;
  preview: string;
}

export interface PackingMetadata {
  originalChunkCount: number;
  processedChunkCount: number;
  selectedChunkCount: number;
  deduplicationRatio: number;
  selectionRatio: number;
  tokenEfficiency: number;
  formattedTokenCount: number;
  forcedFirstChunk: boolean;
  limits: PackingLimits;
}

export interface PackedContext {
  status: 'success' | 'error';
  chunks: ClassifiedChunk[];
  contextText: string;
  /** sum of the selected chunks' token counts */
  tokenCount: number;
  chunkCount: number;
  sourceDistribution: Partial<Record<SourceType, number>>;
  chunkSummary: ChunkSummary[];
  metadata: PackingMetadata;
  error?: string;
}

export interface SourceReference {
  contentId: string;
  sourceType: SourceType;
  score: number;
  caseId?: string;
  caseNumber?: string;
  caseTitle?: string;
  court?: string;
  dateDecided?: string;
  judgeName?: string;
}

export function toSourceReference(chunk: ClassifiedChunk): SourceReference {
  const m = chunk.metadata;
  return {
    contentId: chunk.contentId,
    sourceType: chunk.sourceType,
    score: chunk.score,
    caseId: m.caseId,
    caseNumber: m.caseNumber,
    caseTitle: m.caseTitle,
    court: m.court,
    dateDecided: m.dateDecided,
    judgeName: m.judgeName,
  };
}
