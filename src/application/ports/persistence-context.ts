import type { EntityKey, EntityMapping, QueryFilter, RelationKey } from '@domain/entity-mapping.js';

export interface ListOptions<T> {
    filter?: QueryFilter<T>;
    include?: readonly RelationKey<T>[];
}

/**
 * Typed collection access for one entity type. Reads go to the store;
 * `add`, `update` and `remove` only stage changes until `saveChanges`.
 */
export interface EntitySet<T extends object, TKey extends EntityKey> {
    find(id: TKey): Promise<T | null>;
    list(options?: ListOptions<T>): Promise<T[]>;
    add(entity: T): void;
    /** Stages every stored property of the entity as changed. */
    update(entity: T): void;
    remove(entity: T): void;
}

export interface TransactionHandle {
    commit(): Promise<void>;
    rollback(): Promise<void>;
    /** Idempotent. A handle disposed while still open is rolled back. */
    dispose(): Promise<void>;
}

/**
 * A live session with the store. Implemented by the persistence engines.
 */
export interface PersistenceContext {
    set<T extends object, TKey extends EntityKey>(mapping: EntityMapping<T>): EntitySet<T, TKey>;
    beginTransaction(): Promise<TransactionHandle>;
    /**
     * Writes every staged change and returns how many entries were written.
     * @throws {EntityValidationException} before anything is written when a staged entity fails its schema
     */
    saveChanges(): Promise<number>;
    discardChanges(): void;
    dispose(): Promise<void>;
}

export interface PropertyValidationError {
    readonly property: string;
    readonly message: string;
}

export interface EntityValidationFailure {
    readonly entityName: string;
    readonly entity: object;
    readonly errors: readonly PropertyValidationError[];
}

/**
 * Raised by an engine when staged entities do not satisfy their schema.
 */
export class EntityValidationException extends Error {
    constructor(public readonly failures: readonly EntityValidationFailure[]) {
        super(`Validation failed for ${failures.length} ${failures.length === 1 ? 'entity' : 'entities'}`);
        this.name = 'EntityValidationException';
    }
}
