import type { EntityKey } from '@domain/entity-mapping.js';

type Table = Map<EntityKey, Record<string, unknown>>;

/**
 * Process-local store shared by in-memory persistence contexts.
 * A transaction snapshots every table; rollback puts the snapshot back.
 */
export class InMemoryDatabase {
    private tables = new Map<string, Table>();
    private snapshot: Map<string, Table> | null = null;

    table(name: string): Table {
        let table = this.tables.get(name);
        if (!table) {
            table = new Map();
            this.tables.set(name, table);
        }
        return table;
    }

    get inTransaction(): boolean {
        return this.snapshot !== null;
    }

    begin(): void {
        if (this.snapshot) {
            throw new Error('A transaction is already in progress on this database');
        }
        this.snapshot = this.copyTables();
    }

    commit(): void {
        if (!this.snapshot) {
            throw new Error('No transaction is in progress on this database');
        }
        this.snapshot = null;
    }

    rollback(): void {
        if (!this.snapshot) {
            throw new Error('No transaction is in progress on this database');
        }
        this.tables = this.snapshot;
        this.snapshot = null;
    }

    /**
     * Runs the writes against the live tables and restores them if any write throws.
     */
    atomically(writes: () => void): void {
        const before = this.copyTables();
        try {
            writes();
        } catch (error) {
            this.tables = before;
            throw error;
        }
    }

    rowCount(name: string): number {
        return this.tables.get(name)?.size ?? 0;
    }

    private copyTables(): Map<string, Table> {
        const copy = new Map<string, Table>();
        for (const [name, table] of this.tables) {
            copy.set(name, structuredClone(table));
        }
        return copy;
    }
}
