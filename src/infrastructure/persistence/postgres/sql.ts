import { columnFor, readKey, toRecord, type EntityDescriptor, type EntityKey } from '@domain/entity-mapping.js';

export interface SqlStatement {
    text: string;
    values: unknown[];
}

export function quoteIdentifier(name: string): string {
    return `"${name.replace(/"/g, '""')}"`;
}

/**
 * SELECT * with one equality condition per criterion; a null criterion becomes IS NULL.
 */
export function buildSelect(mapping: EntityDescriptor, criteria: Record<string, unknown>): SqlStatement {
    const conditions: string[] = [];
    const values: unknown[] = [];

    for (const [property, value] of Object.entries(criteria)) {
        const column = quoteIdentifier(columnFor(mapping, property));
        if (value === null) {
            conditions.push(`${column} IS NULL`);
            continue;
        }
        values.push(value);
        conditions.push(`${column} = $${values.length}`);
    }

    const where = conditions.length > 0 ? ` WHERE ${conditions.join(' AND ')}` : '';
    return { text: `SELECT * FROM ${quoteIdentifier(mapping.table)}${where}`, values };
}

export function buildSelectIn(mapping: EntityDescriptor, property: string, keys: readonly EntityKey[]): SqlStatement {
    return {
        text: `SELECT * FROM ${quoteIdentifier(mapping.table)} WHERE ${quoteIdentifier(columnFor(mapping, property))} = ANY($1)`,
        values: [[...keys]],
    };
}

export function buildInsert(mapping: EntityDescriptor, entity: object): SqlStatement {
    const record = toRecord(mapping, entity);
    const columns: string[] = [];
    const placeholders: string[] = [];
    const values: unknown[] = [];

    for (const [property, value] of Object.entries(record)) {
        values.push(value);
        columns.push(quoteIdentifier(columnFor(mapping, property)));
        placeholders.push(`$${values.length}`);
    }

    return {
        text: `INSERT INTO ${quoteIdentifier(mapping.table)} (${columns.join(', ')}) VALUES (${placeholders.join(', ')})`,
        values,
    };
}

/**
 * Full-row UPDATE: every stored property except the key is written back.
 */
export function buildUpdate(mapping: EntityDescriptor, entity: object): SqlStatement {
    const key = readKey(mapping, entity);
    if (key === undefined) {
        throw new Error(`${mapping.name} cannot be updated without a value for '${mapping.key}'`);
    }

    const assignments: string[] = [];
    const values: unknown[] = [];

    for (const [property, value] of Object.entries(toRecord(mapping, entity))) {
        if (property === mapping.key) {
            continue;
        }
        values.push(value);
        assignments.push(`${quoteIdentifier(columnFor(mapping, property))} = $${values.length}`);
    }

    if (assignments.length === 0) {
        throw new Error(`${mapping.name} has no columns to update`);
    }

    values.push(key);
    return {
        text: `UPDATE ${quoteIdentifier(mapping.table)} SET ${assignments.join(', ')} WHERE ${quoteIdentifier(columnFor(mapping, mapping.key))} = $${values.length}`,
        values,
    };
}

export function buildDelete(mapping: EntityDescriptor, key: EntityKey): SqlStatement {
    return {
        text: `DELETE FROM ${quoteIdentifier(mapping.table)} WHERE ${quoteIdentifier(columnFor(mapping, mapping.key))} = $1`,
        values: [key],
    };
}

/**
 * Renames the columns of a result row to entity property names.
 */
export function toProperties(mapping: EntityDescriptor, row: Record<string, unknown>): Record<string, unknown> {
    const overrides = new Map<string, string>();
    for (const [property, column] of Object.entries(mapping.columns ?? {})) {
        overrides.set(column, property);
    }

    const properties: Record<string, unknown> = {};
    for (const [column, value] of Object.entries(row)) {
        properties[overrides.get(column) ?? toCamelCase(column)] = value;
    }
    return properties;
}

export function toCamelCase(column: string): string {
    return column.replace(/_([a-z0-9])/g, (_match, letter: string) => letter.toUpperCase());
}
