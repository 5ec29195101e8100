// src/context/context-packer.service.ts
import { Inject, Injectable, Logger } from '@nestjs/common';

import {
  PIPELINE_CONFIG,
  PackingLimits,
  PipelineConfig,
} from '../config/pipeline.config';
import { errorMessage } from '../shared/errors';
import { ChunkClassifierService } from './chunk-classifier.service';
import { deduplicateChunks, rankChunks } from './chunk-deduplicator';
import {
  ChunkSummary,
  ClassifiedChunk,
  PackedContext,
  RawPassage,
  SourceType,
} from './context.types';
import { TOKEN_COUNTER, TokenCounter } from './token-counter';

export const FORMAT_ORDER: readonly SourceType[] = [
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
];

const SECTION_HEADERS: Record<SourceType, string> = {
  statute: 'STATUTORY PROVISIONS',
  constitutional_article: 'CONSTITUTIONAL PROVISIONS',
  case_law: 'CASE LAW',
  judgment: 'JUDGMENTS',
  order: 'COURT ORDERS',
  legal_principle: 'LEGAL PRINCIPLES',
  procedural_guidance: 'PROCEDURAL GUIDANCE',
  case_metadata: 'CASE DETAILS',
  document_text: 'DOCUMENT TEXT',
  general: 'GENERAL INFORMATION',
};

const PREVIEW_LENGTH = 100;

interface Selection {
  selected: ClassifiedChunk[];
  forcedFirstChunk: boolean;
}

@Injectable()
export class ContextPackerService {
  private readonly logger = new Logger(ContextPackerService.name);

  constructor(
    @Inject(PIPELINE_CONFIG) private readonly config: PipelineConfig,
    @Inject(TOKEN_COUNTER) private readonly tokenCounter: TokenCounter,
    private readonly classifier: ChunkClassifierService,
  ) {}

  /** Classifies raw retriever output, then packs it. */
  packPassages(
    passages: readonly RawPassage[],
    limits?: Partial<PackingLimits>,
  ): PackedContext {
    const effective = this.resolveLimits(limits);
    try {
      return this.pack(this.classifier.classifyAll(passages), effective);
    } catch (e) {
      return this.failed(effective, e);
    }
  }

  /**
   * Never throws. A non-empty input always yields at least one chunk; the
   * token budget holds unless that single chunk was force-accepted.
   */
  pack(
    chunks: readonly ClassifiedChunk[],
    limits?: Partial<PackingLimits>,
  ): PackedContext {
    const effective = this.resolveLimits(limits);

    try {
      const unique = deduplicateChunks(chunks);
      const ranked = rankChunks(unique);
      const { selected, forcedFirstChunk } = this.select(ranked, effective);

      const ordered = this.groupByType(selected);
      const contextText = this.format(ordered);
      const tokenCount = ordered.reduce((sum, c) => sum + c.tokenCount, 0);

      const sourceDistribution: Partial<Record<SourceType, number>> = {};
      for (const chunk of ordered) {
        sourceDistribution[chunk.sourceType] = (sourceDistribution[chunk.sourceType] ?? 0) + 1;
      }

      this.logger.debug(
        `Packed ${ordered.length}/${unique.length} chunks (${chunks.length} in), ${tokenCount}/${effective.maxTokens} tokens`,
      );

      return {
        status: 'success',
        chunks: ordered,
        contextText,
        tokenCount,
        chunkCount: ordered.length,
        sourceDistribution,
        chunkSummary: ordered.map((chunk, i) => this.summarize(chunk, i + 1)),
        metadata: {
          originalChunkCount: chunks.length,
          processedChunkCount: unique.length,
          selectedChunkCount: ordered.length,
          deduplicationRatio: ratio(unique.length, chunks.length),
          selectionRatio: ratio(ordered.length, unique.length),
          tokenEfficiency: ratio(tokenCount, effective.maxTokens),
          formattedTokenCount: this.tokenCounter.count(contextText),
          forcedFirstChunk,
          limits: effective,
        },
      };
    } catch (e) {
      return this.failed(effective, e, chunks.length);
    }
  }

  private resolveLimits(limits?: Partial<PackingLimits>): PackingLimits {
    return { ...this.config.packing, ...limits };
  }

  private select(ranked: readonly ClassifiedChunk[], limits: PackingLimits): Selection {
    const selected: ClassifiedChunk[] = [];
    let total = 0;
    let forcedFirstChunk = false;

    for (const chunk of ranked) {
      if (selected.length >= limits.maxChunks) break;
      if (chunk.tokenCount < limits.minChunkTokens) continue;

      const candidate = this.fitToChunkLimit(chunk, limits.maxChunkTokens);

      if (total + candidate.tokenCount <= limits.maxTokens) {
        selected.push(candidate);
        total += candidate.tokenCount;
      } else if (selected.length === 0) {
        selected.push(candidate);
        total += candidate.tokenCount;
        forcedFirstChunk = true;
      } else {
        break;
      }
    }

    if (selected.length === 0 && ranked.length > 0) {
      selected.push(this.fitToChunkLimit(ranked[0], limits.maxChunkTokens));
      forcedFirstChunk = true;
    }

    return { selected, forcedFirstChunk };
  }

  private fitToChunkLimit(chunk: ClassifiedChunk, maxChunkTokens: number): ClassifiedChunk {
    if (chunk.tokenCount <= maxChunkTokens) return chunk;

    const text = this.tokenCounter.truncate(chunk.text, maxChunkTokens);
    return {
      ...chunk,
      text,
      tokenCount: this.tokenCounter.count(text),
      truncated: true,
    };
  }

  private groupByType(selected: readonly ClassifiedChunk[]): ClassifiedChunk[] {
    return FORMAT_ORDER.flatMap((type) => selected.filter((c) => c.sourceType === type));
  }

  private format(ordered: readonly ClassifiedChunk[]): string {
    const sections: string[] = [];
    let index = 0;

    for (const type of FORMAT_ORDER) {
      const group = ordered.filter((c) => c.sourceType === type);
      if (!group.length) continue;

      const entries = group.map((chunk) => {
        index += 1;
        const source = sourceLine(chunk);
        return source ? `[${index}] ${chunk.text}\n${source}` : `[${index}] ${chunk.text}`;
      });

      sections.push(`=== ${SECTION_HEADERS[type]} ===\n${entries.join('\n\n')}`);
    }

    return sections.join('\n\n');
  }

  private summarize(chunk: ClassifiedChunk, index: number): ChunkSummary {
    return {
      index,
      sourceType: chunk.sourceType,
      priority: chunk.priority,
      score: chunk.score,
      tokenCount: chunk.tokenCount,
      contentId: chunk.contentId,
      caseNumber: chunk.metadata.caseNumber,
      court: chunk.metadata.court,
      truncated: chunk.truncated === true,
      preview: chunk.text.slice(0, PREVIEW_LENGTH),
    };
  }

  private failed(limits: PackingLimits, e: unknown, originalChunkCount = 0): PackedContext {
    const message = errorMessage(e);
    this.logger.error(`Context packing failed: ${message}`);

    return {
      status: 'error',
      chunks: [],
      contextText: '',
      tokenCount: 0,
      chunkCount: 0,
      sourceDistribution: {},
      chunkSummary: [],
      metadata: {
        originalChunkCount,
        processedChunkCount: 0,
        selectedChunkCount: 0,
        deduplicationRatio: 0,
        selectionRatio: 0,
        tokenEfficiency: 0,
        formattedTokenCount: 0,
        forcedFirstChunk: false,
        limits,
      },
      error: message,
    };
  }
}

function sourceLine(chunk: ClassifiedChunk): string | null {
  const m = chunk.metadata;
  const parts = [
    m.caseNumber || m.caseTitle ? `Case: ${m.caseNumber ?? m.caseTitle}` : null,
    m.court ? `Court: ${m.court}` : null,
    m.dateDecided ? `Date: ${m.dateDecided}` : null,
    m.judgeName ? `Judge: ${m.judgeName}` : null,
  ].filter((p): p is string => p !== null);

  return parts.length ? `   Source: ${parts.join(' | ')}` : null;
}

function ratio(part: number, whole: number): number {
  return whole > 0 ? part / whole : 0;
}
