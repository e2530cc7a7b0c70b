import type { PoolClient } from 'pg';

export interface SqlResult {
    rows: Record<string, unknown>[];
    rowCount: number | null;
}

/**
 * The part of a pooled pg client the persistence context talks to.
 */
export interface SqlConnection {
    query(text: string, values?: unknown[]): Promise<SqlResult>;
    /** Passing an error destroys the underlying client instead of returning it to the pool. */
    release(error?: Error): void;
}

export function fromPoolClient(client: PoolClient): SqlConnection {
    return {
        query: async (text, values) => {
            const result = await client.query(text, values);
            return { rows: result.rows, rowCount: result.rowCount };
        },
        release: (error) => client.release(error),
    };
}
