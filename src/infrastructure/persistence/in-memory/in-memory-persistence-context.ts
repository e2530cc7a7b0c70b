import { toRecord, type EntityDescriptor, type EntityKey } from '@domain/entity-mapping.js';
import type { TransactionHandle } from '@application/ports/persistence-context.js';
import type { TrackedEntry } from '../change-tracker.js';
import { TrackingPersistenceContext, type Row } from '../tracking-persistence-context.js';
import { InMemoryDatabase } from './in-memory-database.js';

class InMemoryTransaction implements TransactionHandle {
    private completed = false;

    constructor(
        private readonly database: InMemoryDatabase,
        private readonly onComplete: () => void
    ) {
        database.begin();
    }

    async commit(): Promise<void> {
        this.assertOpen();
        this.database.commit();
        this.complete();
    }

    async rollback(): Promise<void> {
        this.assertOpen();
        this.database.rollback();
        this.complete();
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
 * Persistence context over an {@link InMemoryDatabase}. Rows are cloned on the way in and out,
 * so entities handed to callers never alias stored state.
 */
export class InMemoryPersistenceContext extends TrackingPersistenceContext {
    private transaction: InMemoryTransaction | null = null;

    constructor(private readonly database: InMemoryDatabase = new InMemoryDatabase()) {
        super();
    }

    protected async openTransaction(): Promise<TransactionHandle> {
        const transaction = new InMemoryTransaction(this.database, () => {
            this.transaction = null;
        });
        this.transaction = transaction;
        return transaction;
    }

    protected async selectRows(mapping: EntityDescriptor, criteria: Row): Promise<Row[]> {
        const conditions = Object.entries(criteria);
        const rows: Row[] = [];
        for (const row of this.database.table(mapping.table).values()) {
            if (conditions.every(([property, value]) => row[property] === value)) {
                rows.push(structuredClone(row));
            }
        }
        return rows;
    }

    protected async selectWhereIn(
        mapping: EntityDescriptor,
        property: string,
        values: readonly EntityKey[]
    ): Promise<Row[]> {
        const rows: Row[] = [];
        for (const row of this.database.table(mapping.table).values()) {
            const value = row[property];
            if ((typeof value === 'string' || typeof value === 'number') && values.includes(value)) {
                rows.push(structuredClone(row));
            }
        }
        return rows;
    }

    protected async applyChanges(entries: readonly TrackedEntry[]): Promise<void> {
        this.database.atomically(() => {
            for (const entry of entries) {
                const table = this.database.table(entry.mapping.table);
                const exists = table.has(entry.key);

                switch (entry.state) {
                    case 'added':
                        if (exists) {
                            throw new Error(`Duplicate key ${entry.key} for ${entry.mapping.name}`);
                        }
                        table.set(entry.key, structuredClone(toRecord(entry.mapping, entry.entity)));
                        break;
                    case 'modified':
                        if (!exists) {
                            throw new Error(`${entry.mapping.name} with key ${entry.key} does not exist`);
                        }
                        table.set(entry.key, structuredClone(toRecord(entry.mapping, entry.entity)));
                        break;
                    case 'deleted':
                        if (!exists) {
                            throw new Error(`${entry.mapping.name} with key ${entry.key} does not exist`);
                        }
                        table.delete(entry.key);
                        break;
                }
            }
        });
    }

    // The database outlives its contexts: a transaction still open here is rolled back
    protected async release(): Promise<void> {
        if (this.transaction) {
            await this.transaction.dispose();
        }
    }
}
