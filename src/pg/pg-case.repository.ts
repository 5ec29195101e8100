// src/pg/pg-case.repository.ts
import { Inject, Injectable } from '@nestjs/common';
import { Pool } from 'pg';
import { toSql } from 'pgvector';

import { errorMessage, errorStack } from '../shared/errors';
import { LOGGER_SERVICE, LoggerService } from '../shared/types';

export interface CaseChunkRow {
  id: number;
  case_id: string;
  document_id: string | null;
  chunk_index: number;
  chunk_text: string;
  content_type: string | null;
  case_number: string | null;
  case_title: string | null;
  court: string | null;
  bench: string | null;
  status: string | null;
  date_decided: string | null;
  judge_name: string | null;
  legal_domain: string | null;
  advocates_petitioner: string | null;
  advocates_respondent: string | null;
  short_order: string | null;
  summary: string | null;
  /** cosine similarity, 1 for exact lookups */
  score: number;
}

export interface CaseChunkFilters {
  court?: string;
  legalDomain?: string;
  yearFrom?: number;
  yearTo?: number;
}

const SELECT_COLUMNS = `
      cc.id,
      cc.case_id,
      cc.document_id,
      cc.chunk_index,
      cc.chunk_text,
      cc.content_type,
      c.case_number,
      c.case_title,
      c.court,
      c.bench,
      c.status,
      to_char(c.date_decided, 'YYYY-MM-DD') AS date_decided,
      c.judge_name,
      c.legal_domain,
      c.advocates_petitioner,
      c.advocates_respondent,
      c.short_order,
      c.summary`;

@Injectable()
export class PgCaseRepository {
  constructor(
    @Inject('PG_POOL')
    private readonly pool: Pool,
    @Inject(LOGGER_SERVICE) private readonly logger: LoggerService,
  ) {}

  async findChunksByEmbedding(
    embedding: number[],
    limit = 10,
    filters: CaseChunkFilters = {},
  ): Promise<CaseChunkRow[]> {
    const params: unknown[] = [toSql(embedding), limit];
    const where: string[] = [];

    if (filters.court) {
      params.push(`%${filters.court}%`);
      where.push(`c.court ILIKE $${params.length}`);
    }
    if (filters.legalDomain) {
      params.push(filters.legalDomain);
      where.push(`c.legal_domain = $${params.length}`);
    }
    if (filters.yearFrom !== undefined) {
      params.push(filters.yearFrom);
      where.push(`EXTRACT(YEAR FROM c.date_decided) >= $${params.length}`);
    }
    if (filters.yearTo !== undefined) {
      params.push(filters.yearTo);
      where.push(`EXTRACT(YEAR FROM c.date_decided) <= $${params.length}`);
    }

    const sql = `
    SELECT ${SELECT_COLUMNS},
      1 - (cc.embedding <=> $1::vector) AS score
    FROM case_chunks cc
    JOIN cases c ON c.id = cc.case_id
    ${where.length ? `WHERE ${where.join(' AND ')}` : ''}
    ORDER BY cc.embedding <=> $1::vector
    LIMIT $2;
  `;

    const t0 = Date.now();
    const res = await this.pool.query<CaseChunkRow>(sql, params);
    void this.logger.log(
      `[PG][vector] ms=${Date.now() - t0} rows=${res.rowCount} filters=${where.length} limit=${limit}`,
    );

    return res.rows;
  }

  async findChunksByCaseId(caseId: string, limit = 50): Promise<CaseChunkRow[]> {
    const res = await this.pool.query<CaseChunkRow>(
      `
      SELECT ${SELECT_COLUMNS},
        1.0::float8 AS score
      FROM case_chunks cc
      JOIN cases c ON c.id = cc.case_id
      WHERE cc.case_id = $1
      ORDER BY cc.chunk_index
      LIMIT $2;
      `,
      [caseId, limit],
    );
    return res.rows;
  }

  /**
   * Chunks of the single case best matching a case number or title. An exact
   * number wins over a reference that starts with the number (e.g. one
   * carrying a court suffix), which wins over a title match.
   */
  async findChunksByCaseReference(reference: string, limit = 50): Promise<CaseChunkRow[]> {
    const sql = `
    WITH best AS (
      SELECT c.id
      FROM cases c
      WHERE upper(c.case_number) = upper($1)
         OR upper($1) LIKE upper(c.case_number) || ' %'
         OR c.case_title ILIKE $1
      ORDER BY
        CASE
          WHEN upper(c.case_number) = upper($1) THEN 0
          WHEN c.case_title ILIKE $1 THEN 2
          ELSE 1
        END,
        length(c.case_number) DESC
      LIMIT 1
    )
    SELECT ${SELECT_COLUMNS},
      1.0::float8 AS score
    FROM case_chunks cc
    JOIN cases c ON c.id = cc.case_id
    JOIN best b ON b.id = cc.case_id
    ORDER BY cc.chunk_index
    LIMIT $2;
  `;

    try {
      const res = await this.pool.query<CaseChunkRow>(sql, [reference.trim(), limit]);
      return res.rows;
    } catch (e) {
      void this.logger.error(
        `[PG][case-ref] lookup failed for "${reference}": ${errorMessage(e)}`,
        errorStack(e),
      );
      throw e;
    }
  }
}
