import type { Pool } from 'pg';
import type { EntityKey } from '@domain/entity-mapping.js';
import type { Logger } from '@application/ports/logger.js';
import type { DatabaseConfig } from '@composition/config.js';
import { PostgresPersistenceContext } from '../persistence/postgres/PostgresPersistenceContext.js';
import { fromPoolClient } from '../persistence/postgres/SqlConnection.js';
import { createPostgresPool } from '../persistence/postgres/createPostgresPool.js';
import { TransactionalUnitOfWork } from '../persistence/transactional-unit-of-work.js';

/**
 * Hands out units of work backed by PostgreSQL, one pooled client each.
 * The client goes back to the pool when the unit of work is disposed.
 */
export class DatabaseFactory {
    constructor(
        private readonly pool: Pool,
        private readonly logger: Logger
    ) {}

    static fromConfig(config: DatabaseConfig, logger: Logger): DatabaseFactory {
        return new DatabaseFactory(createPostgresPool(config, logger), logger);
    }

    async createUnitOfWork<TKey extends EntityKey>(): Promise<TransactionalUnitOfWork<TKey>> {
        const client = await this.pool.connect();
        const context = new PostgresPersistenceContext(fromPoolClient(client), this.logger);
        return new TransactionalUnitOfWork<TKey>(context, this.logger);
    }

    async close(): Promise<void> {
        await this.pool.end();
    }
}
