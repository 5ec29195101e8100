// src/context/chunk-classifier.service.ts
import { Inject, Injectable, Logger } from '@nestjs/common';
import { createHash } from 'crypto';

import { PIPELINE_CONFIG, PipelineConfig } from '../config/pipeline.config';
import { containsCaseNumber } from '../conversation/case-reference';
import { Err, Ok, Result } from '../shared/result';
import {
  ClassifiedChunk,
  PassageMetadata,
  RawPassage,
  SourceType,
  isSourceType,
} from './context.types';
import { TOKEN_COUNTER, TokenCounter } from './token-counter';

const MIN_TEXT_LENGTH = 10;
const MAX_PRIORITY = 20;

// Metadata tokens, checked in this order ("case_metadata" must hit metadata
// before case).
const METADATA_TYPE_LOOKUP: ReadonlyArray<[string, SourceType]> = [
  ['metadata', 'case_metadata'],
  ['constitution', 'constitutional_article'],
  ['constitutional', 'constitutional_article'],
  ['statute', 'statute'],
  ['law', 'statute'],
  ['act', 'statute'],
  ['judgment', 'judgment'],
  ['judgement', 'judgment'],
  ['order', 'order'],
  ['principle', 'legal_principle'],
  ['procedure', 'procedural_guidance'],
  ['procedural', 'procedural_guidance'],
  ['case', 'case_law'],
  ['document', 'document_text'],
];

// Lexical cues, first match wins. Case cues outrank statutory ones.
const LEXICAL_CUES: ReadonlyArray<[RegExp, SourceType]> = [
  [/\bcase number\b|\bpetitioner\b|\brespondent\b/, 'case_law'],
  [/\bconstitution(?:al)?\b|\bfundamental rights?\b/, 'constitutional_article'],
  [/\bcourt held\b|\bjudgment\b|\bdecided\b|\bruled\b/, 'judgment'],
  [/\b(?:section|article|act|code)\b/, 'statute'],
  [/\border\b|\bdirected\b|\binstructed\b/, 'order'],
  [/\bprinciples?\b|\bdoctrine\b/, 'legal_principle'],
  [/\bprocedure\b|\bprocess\b|\bhow to\b/, 'procedural_guidance'],
];

export type ClassificationError = { reason: 'text_too_short'; length: number };

export function normalizeText(text: string): string {
  return text.trim().replace(/\s+/g, ' ');
}

export function computeContentId(text: string, metadata: PassageMetadata): string {
  const digest = createHash('md5').update(normalizeText(text)).digest('hex');
  return `${metadata.caseId ?? 'unknown'}_${metadata.documentId ?? 'unknown'}_${digest.slice(0, 8)}`;
}

export function inferSourceType(text: string, metadata: PassageMetadata): SourceType {
  if (metadata.caseId || containsCaseNumber(text)) return 'case_law';

  for (const label of [metadata.contentType, metadata.documentType]) {
    const mapped = label ? mapMetadataLabel(label) : null;
    if (mapped) return mapped;
  }

  const lower = text.toLowerCase();
  for (const [pattern, type] of LEXICAL_CUES) {
    if (pattern.test(lower)) return type;
  }

  return 'general';
}

function mapMetadataLabel(label: string): SourceType | null {
  const normalized = label.trim().toLowerCase();
  if (isSourceType(normalized)) return normalized;

  const tokens = new Set(
    normalized
      .split(/[^a-z]+/)
      .filter(Boolean)
      .map((t) => (t.length > 3 && t.endsWith('s') ? t.slice(0, -1) : t)),
  );
  for (const [token, type] of METADATA_TYPE_LOOKUP) {
    if (tokens.has(token)) return type;
  }
  return null;
}

function leadingYear(date: string | undefined): number | null {
  const match = /^\s*(\d{4})/.exec(date ?? '');
  return match ? Number(match[1]) : null;
}

@Injectable()
export class ChunkClassifierService {
  private readonly logger = new Logger(ChunkClassifierService.name);

  constructor(
    @Inject(PIPELINE_CONFIG) private readonly config: PipelineConfig,
    @Inject(TOKEN_COUNTER) private readonly tokenCounter: TokenCounter,
  ) {}

  classifyAndScore(
    raw: RawPassage,
    now: Date = new Date(),
  ): Result<ClassifiedChunk, ClassificationError> {
    const text = (raw.text ?? '').trim();
    if (text.length < MIN_TEXT_LENGTH) {
      return Err({ reason: 'text_too_short', length: text.length });
    }

    const metadata = raw.metadata ?? {};
    const sourceType = inferSourceType(text, metadata);

    return Ok({
      text,
      score: raw.score,
      metadata,
      sourceType,
      priority: this.priorityFor(sourceType, text, raw.score, metadata, now),
      tokenCount: this.tokenCounter.count(text),
      contentId: computeContentId(text, metadata),
    });
  }

  /** Classifies a batch; passages that fail are skipped, not fatal. */
  classifyAll(passages: readonly RawPassage[], now: Date = new Date()): ClassifiedChunk[] {
    const chunks: ClassifiedChunk[] = [];
    for (const passage of passages) {
      const result = this.classifyAndScore(passage, now);
      if (result.ok) {
        chunks.push(result.value);
      } else {
        this.logger.debug(
          `Skipping passage (${result.error.reason}, length=${result.error.length})`,
        );
      }
    }
    return chunks;
  }

  priorityFor(
    sourceType: SourceType,
    text: string,
    score: number,
    metadata: PassageMetadata,
    now: Date = new Date(),
  ): number {
    let priority = this.config.priorities[sourceType];

    if (score > 0.8) priority += 3;
    else if (score > 0.6) priority += 2;
    else if (score > 0.4) priority += 1;

    const year = leadingYear(metadata.dateDecided);
    if (year !== null) {
      const age = now.getFullYear() - year;
      if (age >= 0 && age <= 5) priority += 2;
      else if (age > 5 && age <= 10) priority += 1;
    }

    const court = (metadata.court ?? '').toLowerCase();
    if (court.includes('supreme court')) priority += 3;
    else if (court.includes('high court')) priority += 2;

    if (text.length > 200) priority += 1;

    return Math.max(0, Math.min(MAX_PRIORITY, priority));
  }
}
