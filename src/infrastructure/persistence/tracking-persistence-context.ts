import {
    isPredicate,
    readKey,
    type Criteria,
    type EntityDescriptor,
    type EntityKey,
    type EntityMapping,
} from '@domain/entity-mapping.js';
import {
    EntityValidationException,
    type EntitySet,
    type ListOptions,
    type PersistenceContext,
    type TransactionHandle,
} from '@application/ports/persistence-context.js';
import { ChangeTracker, type TrackedEntry } from './change-tracker.js';

/**
 * Stored values keyed by entity property name.
 */
export type Row = Record<string, unknown>;

/**
 * Base for the engines: staging, validation, materialization and eager loading live here,
 * the subclasses only read and write rows and manage transactions.
 */
export abstract class TrackingPersistenceContext implements PersistenceContext {
    protected readonly tracker = new ChangeTracker();
    private disposed = false;

    set<T extends object, TKey extends EntityKey>(mapping: EntityMapping<T>): EntitySet<T, TKey> {
        return {
            find: (id) => this.find(mapping, id),
            list: (options) => this.list(mapping, options ?? {}),
            add: (entity) => {
                this.assertUsable();
                this.tracker.stageAdd(mapping, entity);
            },
            update: (entity) => {
                this.assertUsable();
                this.tracker.stageUpdate(mapping, entity);
            },
            remove: (entity) => {
                this.assertUsable();
                this.tracker.stageRemove(mapping, entity);
            },
        };
    }

    async beginTransaction(): Promise<TransactionHandle> {
        this.assertUsable();
        return this.openTransaction();
    }

    async saveChanges(): Promise<number> {
        this.assertUsable();

        const failures = this.tracker.validate();
        if (failures.length > 0) {
            throw new EntityValidationException(failures);
        }

        const entries = this.tracker.pending();
        if (entries.length === 0) {
            return 0;
        }

        await this.applyChanges(entries);
        this.tracker.clear();

        return entries.length;
    }

    discardChanges(): void {
        this.tracker.clear();
    }

    async dispose(): Promise<void> {
        if (this.disposed) {
            return;
        }
        this.disposed = true;
        this.tracker.clear();
        await this.release();
    }

    get isDisposed(): boolean {
        return this.disposed;
    }

    protected abstract openTransaction(): Promise<TransactionHandle>;

    /** Rows of the mapping's table whose properties equal every criterion. */
    protected abstract selectRows(mapping: EntityDescriptor, criteria: Row): Promise<Row[]>;

    /** Rows of the mapping's table whose `property` is one of `values`. */
    protected abstract selectWhereIn(
        mapping: EntityDescriptor,
        property: string,
        values: readonly EntityKey[]
    ): Promise<Row[]>;

    /** Writes the entries, all or nothing. */
    protected abstract applyChanges(entries: readonly TrackedEntry[]): Promise<void>;

    protected abstract release(): Promise<void>;

    protected assertUsable(): void {
        if (this.disposed) {
            throw new Error('The persistence context has been disposed');
        }
    }

    /**
     * Staged entities win over stored rows: an added or modified entity is returned as staged,
     * one staged for removal is not found.
     */
    private async find<T extends object>(mapping: EntityMapping<T>, id: EntityKey): Promise<T | null> {
        this.assertUsable();

        const staged = this.tracker.lookup(mapping, id);
        if (staged !== undefined) {
            if (staged.state === 'deleted') {
                return null;
            }
            const parsed = mapping.schema.safeParse(staged.entity);
            if (!parsed.success) {
                throw new Error(`${mapping.name} with key ${id} is staged with values that fail its schema`);
            }
            return parsed.data;
        }

        const rows = await this.selectRows(mapping, { [mapping.key]: id });
        return rows.length > 0 ? mapping.schema.parse(rows[0]) : null;
    }

    private async list<T extends object>(mapping: EntityMapping<T>, options: ListOptions<T>): Promise<T[]> {
        this.assertUsable();
        const { filter, include = [] } = options;

        let entities: T[];
        if (filter !== undefined && isPredicate(filter)) {
            const rows = await this.selectRows(mapping, {});
            entities = rows.map((row) => mapping.schema.parse(row)).filter(filter);
        } else {
            const rows = await this.selectRows(mapping, filter === undefined ? {} : toCriteriaRow(filter));
            entities = rows.map((row) => mapping.schema.parse(row));
        }

        for (const relation of include) {
            await this.loadRelation(mapping, entities, relation);
        }

        return entities;
    }

    /**
     * Loads one relation for every entity with a single read against the related table.
     */
    private async loadRelation(mapping: EntityDescriptor, entities: readonly object[], name: string): Promise<void> {
        const relation = mapping.relations?.[name];
        if (relation === undefined) {
            throw new Error(`${mapping.name} has no relation named '${name}'`);
        }
        if (entities.length === 0) {
            return;
        }

        const { target, foreignKey } = relation;

        if (relation.kind === 'many') {
            const keys = distinctKeys(entities.map((entity) => readKey(mapping, entity)));
            const rows = await this.selectWhereIn(target, foreignKey, keys);
            const groups = new Map<string, unknown[]>();
            for (const row of rows) {
                const related: unknown = target.schema.parse(row);
                const owner = String(row[foreignKey]);
                const group = groups.get(owner);
                if (group) {
                    group.push(related);
                } else {
                    groups.set(owner, [related]);
                }
            }
            for (const entity of entities) {
                Reflect.set(entity, name, groups.get(String(readKey(mapping, entity))) ?? []);
            }
            return;
        }

        const references = distinctKeys(entities.map((entity) => toKey(Reflect.get(entity, foreignKey))));
        const rows = await this.selectWhereIn(target, target.key, references);
        const byKey = new Map<string, unknown>();
        for (const row of rows) {
            const related: unknown = target.schema.parse(row);
            byKey.set(String(row[target.key]), related);
        }
        for (const entity of entities) {
            const related = byKey.get(String(Reflect.get(entity, foreignKey)));
            if (related !== undefined) {
                Reflect.set(entity, name, related);
            }
        }
    }
}

function toCriteriaRow<T>(criteria: Criteria<T>): Row {
    const row: Row = {};
    for (const [property, value] of Object.entries(criteria)) {
        if (value !== undefined) {
            row[property] = value;
        }
    }
    return row;
}

function toKey(value: unknown): EntityKey | undefined {
    return typeof value === 'string' || typeof value === 'number' ? value : undefined;
}

function distinctKeys(keys: readonly (EntityKey | undefined)[]): EntityKey[] {
    const distinct: EntityKey[] = [];
    for (const key of keys) {
        if (key !== undefined && !distinct.includes(key)) {
            distinct.push(key);
        }
    }
    return distinct;
}
