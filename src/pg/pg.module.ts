// src/pg/pg.module.ts
import { Module } from '@nestjs/common';
import { Pool } from 'pg';

import { AiUsageRepository } from './ai-usage.repository';
import { PgCaseRepository } from './pg-case.repository';

import { LoggingModule } from '../shared/lib/logging/logging.module';
import { errorMessage, errorStack } from '../shared/errors';
import { LOGGER_SERVICE, LoggerService } from '../shared/types';

@Module({
  imports: [LoggingModule],
  providers: [
    {
      provide: 'PG_POOL',
      inject: [LOGGER_SERVICE],
      useFactory: (logger: LoggerService) => {
        const poolName = process.env.PG_POOL_NAME || process.env.APP_NAME || 'legal-qa';
        const poolId = `${poolName}-${process.pid}-${Math.random().toString(16).slice(2, 8)}`;
        const max = +(process.env.PG_POOL_MAX || 10);
        const probes = +(process.env.PG_IVFFLAT_PROBES || 20);

        const pool = new Pool({
          host: process.env.PG_HOST || 'localhost',
          port: +(process.env.PG_PORT || 5432),
          database: process.env.PG_DB || 'legal_cases',
          user: process.env.PG_USER || 'postgres',
          password: process.env.PG_PASS,

          max,
          idleTimeoutMillis: +(process.env.PG_IDLE_TIMEOUT_MS || 30_000),
          connectionTimeoutMillis: +(process.env.PG_CONN_TIMEOUT_MS || 5_000),
        });

        let connectCount = 0;

        void logger.log(
          `[PG] pool created id="${poolId}" name="${poolName}" pid=${process.pid} max=${max}`,
        );

        pool.on('connect', async (client) => {
          connectCount += 1;
          void logger.log(
            `[PG] connect #${connectCount} id="${poolId}" total=${pool.totalCount} idle=${pool.idleCount} waiting=${pool.waitingCount}`,
          );

          try {
            await client.query(`SET ivfflat.probes = ${probes}`);
            void logger.debug(`[PG] session init ok id="${poolId}" probes=${probes}`);
          } catch (e) {
            void logger.error(
              `[PG] failed session init id="${poolId}": ${errorMessage(e)}`,
              errorStack(e),
            );
          }
        });

        pool.on('remove', () => {
          void logger.warn(
            `[PG] remove id="${poolId}" total=${pool.totalCount} idle=${pool.idleCount} waiting=${pool.waitingCount}`,
          );
        });

        pool.on('error', (err) => {
          void logger.error(`[PG] pool error id="${poolId}": ${err.message}`, err.stack);
        });

        return pool;
      },
    },
    PgCaseRepository,
    AiUsageRepository,
  ],
  exports: ['PG_POOL', PgCaseRepository, AiUsageRepository],
})
export class PgModule {}
