import type { EntityDescriptor, EntityKey } from '@domain/entity-mapping.js';
import type { TransactionHandle } from '@application/ports/persistence-context.js';
import type { Logger } from '@application/ports/logger.js';
import { describeCause } from '@application/errors.js';
import type { TrackedEntry } from '../change-tracker.js';
import { TrackingPersistenceContext, type Row } from '../tracking-persistence-context.js';
import type { SqlConnection } from './SqlConnection.js';
import { buildDelete, buildInsert, buildSelect, buildSelectIn, buildUpdate, toProperties } from './sql.js';

/**
 * Transaction on the context's client: BEGIN when opened, COMMIT or ROLLBACK when completed
 */
class PostgresTransaction implements TransactionHandle {
    private completed = false;

    constructor(
        private readonly connection: SqlConnection,
        private readonly onComplete: () => void
    ) {}

    async commit(): Promise<void> {
        this.assertOpen();
        // a failed COMMIT leaves the handle open so the caller can still roll back
        await this.connection.query('COMMIT');
        this.complete();
    }

    async rollback(): Promise<void> {
        this.assertOpen();
        try {
            await this.connection.query('ROLLBACK');
        } finally {
            this.complete();
        }
    }

    async dispose(): Promise<void> {
        if (!this.completed) {
            await this.rollback();
        }
    }

    private assertOpen(): void {
        if (this.completed) {
            throw new Error('The transaction has already completed');
        }
    }

    private complete(): void {
        this.completed = true;
        this.onComplete();
    }
}

/**
 * Persistence context over a single pooled PostgreSQL client.
 * Every read and write of the context, and its transaction, go through that client.
 */
export class PostgresPersistenceContext extends TrackingPersistenceContext {
    private transaction: PostgresTransaction | null = null;

    private readonly logger: Logger;

    constructor(
        private readonly connection: SqlConnection,
        logger: Logger
    ) {
        super();
        this.logger = logger.child({ component: 'PostgresPersistenceContext' });
    }

    protected async openTransaction(): Promise<TransactionHandle> {
        if (this.transaction) {
            throw new Error('A transaction is already in progress on this connection');
        }

        await this.connection.query('BEGIN');

        const transaction = new PostgresTransaction(this.connection, () => {
            this.transaction = null;
        });
        this.transaction = transaction;
        return transaction;
    }

    protected async selectRows(mapping: EntityDescriptor, criteria: Row): Promise<Row[]> {
        const { text, values } = buildSelect(mapping, criteria);
        const result = await this.connection.query(text, values);
        return result.rows.map((row) => toProperties(mapping, row));
    }

    protected async selectWhereIn(
        mapping: EntityDescriptor,
        property: string,
        values: readonly EntityKey[]
    ): Promise<Row[]> {
        const statement = buildSelectIn(mapping, property, values);
        const result = await this.connection.query(statement.text, statement.values);
        return result.rows.map((row) => toProperties(mapping, row));
    }

    protected async applyChanges(entries: readonly TrackedEntry[]): Promise<void> {
        // Inside an explicit transaction the caller decides when it commits
        if (this.transaction) {
            await this.writeAll(entries);
            return;
        }

        await this.connection.query('BEGIN');
        try {
            await this.writeAll(entries);
            await this.connection.query('COMMIT');
        } catch (error) {
            // the write error is the one the caller gets
            try {
                await this.connection.query('ROLLBACK');
            } catch (rollbackError) {
                this.logger.warn('Rollback after failed write did not complete', { error: describeCause(rollbackError) });
            }
            throw error;
        }
    }

    protected async release(): Promise<void> {
        // A client returned mid-transaction would leak it to the next borrower
        const error = this.transaction ? new Error('Connection released with an open transaction') : undefined;
        this.transaction = null;
        this.connection.release(error);
    }

    private async writeAll(entries: readonly TrackedEntry[]): Promise<void> {
        for (const entry of entries) {
            switch (entry.state) {
                case 'added': {
                    const { text, values } = buildInsert(entry.mapping, entry.entity);
                    await this.connection.query(text, values);
                    break;
                }
                case 'modified': {
                    const { text, values } = buildUpdate(entry.mapping, entry.entity);
                    this.expectRow(entry, await this.connection.query(text, values));
                    break;
                }
                case 'deleted': {
                    const { text, values } = buildDelete(entry.mapping, entry.key);
                    this.expectRow(entry, await this.connection.query(text, values));
                    break;
                }
            }
        }
    }

    private expectRow(entry: TrackedEntry, result: { rowCount: number | null }): void {
        if (!result.rowCount) {
            throw new Error(`${entry.mapping.name} with key ${entry.key} does not exist`);
        }
    }
}
