// src/retrieval/pg-case-retriever.service.ts
import { Injectable, Logger } from '@nestjs/common';

import type { PassageMetadata, RawPassage } from '../context/context.types';
import { CaseChunkRow, PgCaseRepository } from '../pg/pg-case.repository';
import { OpenAiEmbeddingsService } from './openai-embeddings.service';
import type { RetrievalFilters, Retriever } from './retriever.types';

const CASE_CHUNK_LIMIT = +(process.env.CASE_CHUNK_LIMIT || 50);

function clampScore(score: number): number {
  if (!Number.isFinite(score)) return 0;
  return Math.min(Math.max(score, 0), 1);
}

/**
 * The one place database rows become passages. Empty columns are left out of
 * the metadata; advocate lists stay as the stored delimited strings.
 */
export function toRawPassage(row: CaseChunkRow): RawPassage {
  const fields: [keyof PassageMetadata, string | null][] = [
    ['caseId', row.case_id],
    ['documentId', row.document_id],
    ['caseNumber', row.case_number],
    ['caseTitle', row.case_title],
    ['court', row.court],
    ['bench', row.bench],
    ['status', row.status],
    ['dateDecided', row.date_decided],
    ['judgeName', row.judge_name],
    ['legalDomain', row.legal_domain],
    ['contentType', row.content_type],
    ['advocatesPetitioner', row.advocates_petitioner],
    ['advocatesRespondent', row.advocates_respondent],
    ['shortOrder', row.short_order],
    ['summary', row.summary],
  ];

  const metadata: PassageMetadata = { source: 'case_chunks' };
  for (const [key, value] of fields) {
    if (value !== null && value !== '') metadata[key] = String(value);
  }

  return { text: row.chunk_text, score: clampScore(Number(row.score)), metadata };
}

@Injectable()
export class PgCaseRetriever implements Retriever {
  private readonly logger = new Logger(PgCaseRetriever.name);

  constructor(
    private readonly repo: PgCaseRepository,
    private readonly embeddings: OpenAiEmbeddingsService,
  ) {}

  async search(query: string, topK: number, filters?: RetrievalFilters): Promise<RawPassage[]> {
    const embedding = await this.embeddings.embedOne(query);
    if (!embedding.length) return [];

    const rows = await this.repo.findChunksByEmbedding(embedding, topK, filters);
    this.logger.debug(`search topK=${topK} -> ${rows.length} passages`);
    return rows.map(toRawPassage);
  }

  async getByCaseId(caseId: string): Promise<RawPassage[]> {
    const rows = await this.repo.findChunksByCaseId(caseId, CASE_CHUNK_LIMIT);
    return rows.map(toRawPassage);
  }

  async findExactCase(reference: string): Promise<RawPassage[]> {
    if (!reference.trim()) return [];
    const rows = await this.repo.findChunksByCaseReference(reference, CASE_CHUNK_LIMIT);
    this.logger.debug(`exact lookup "${reference}" -> ${rows.length} passages`);
    return rows.map(toRawPassage);
  }
}
