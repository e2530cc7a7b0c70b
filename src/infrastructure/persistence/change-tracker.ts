import { readKey, type EntityDescriptor, type EntityKey } from '@domain/entity-mapping.js';
import type { EntityValidationFailure, PropertyValidationError } from '@application/ports/persistence-context.js';

export type EntryState = 'added' | 'modified' | 'deleted';

export interface TrackedEntry {
    readonly mapping: EntityDescriptor;
    readonly key: EntityKey;
    readonly entity: object;
    readonly state: EntryState;
}

/**
 * Keeps the changes staged on a persistence context until they are saved or discarded.
 * One entry per entity identity (type name + key); entries keep their staging order.
 */
export class ChangeTracker {
    private readonly entries = new Map<string, TrackedEntry>();

    stageAdd(mapping: EntityDescriptor, entity: object): void {
        const key = this.requireKey(mapping, entity);
        const identity = this.identity(mapping, key);
        const existing = this.entries.get(identity);

        if (existing && existing.state !== 'deleted') {
            throw new Error(`${mapping.name} with key ${key} is already tracked`);
        }

        // Re-adding something staged for removal turns into a full update of the stored row
        const state: EntryState = existing ? 'modified' : 'added';
        this.replace(identity, { mapping, key, entity, state });
    }

    stageUpdate(mapping: EntityDescriptor, entity: object): void {
        const key = this.requireKey(mapping, entity);
        const identity = this.identity(mapping, key);
        const existing = this.entries.get(identity);

        if (existing?.state === 'deleted') {
            throw new Error(`${mapping.name} with key ${key} is staged for removal and cannot be updated`);
        }

        const state: EntryState = existing?.state === 'added' ? 'added' : 'modified';
        this.replace(identity, { mapping, key, entity, state });
    }

    stageRemove(mapping: EntityDescriptor, entity: object): void {
        const key = this.requireKey(mapping, entity);
        const identity = this.identity(mapping, key);
        const existing = this.entries.get(identity);

        if (existing?.state === 'added') {
            this.entries.delete(identity);
            return;
        }

        this.replace(identity, { mapping, key, entity, state: 'deleted' });
    }

    /**
     * The staged entry for an entity identity, if there is one.
     */
    lookup(mapping: EntityDescriptor, key: EntityKey): TrackedEntry | undefined {
        return this.entries.get(this.identity(mapping, key));
    }

    pending(): TrackedEntry[] {
        return [...this.entries.values()];
    }

    get hasChanges(): boolean {
        return this.entries.size > 0;
    }

    /**
     * Runs every added or modified entity through its mapping's schema.
     */
    validate(): EntityValidationFailure[] {
        const failures: EntityValidationFailure[] = [];

        for (const entry of this.entries.values()) {
            if (entry.state === 'deleted') {
                continue;
            }

            const parsed = entry.mapping.schema.safeParse(entry.entity);
            if (parsed.success) {
                continue;
            }

            const errors: PropertyValidationError[] = parsed.error.issues.map((issue) => ({
                property: issue.path.length > 0 ? issue.path.join('.') : entry.mapping.name,
                message: issue.message,
            }));
            failures.push({ entityName: entry.mapping.name, entity: entry.entity, errors });
        }

        return failures;
    }

    clear(): void {
        this.entries.clear();
    }

    // An entity staged again keeps its original position, so parents stay ahead of their children
    private replace(identity: string, entry: TrackedEntry): void {
        this.entries.set(identity, entry);
    }

    private requireKey(mapping: EntityDescriptor, entity: object): EntityKey {
        const key = readKey(mapping, entity);
        if (key === undefined) {
            throw new Error(`${mapping.name} cannot be staged without a value for '${mapping.key}'`);
        }
        return key;
    }

    private identity(mapping: EntityDescriptor, key: EntityKey): string {
        return `${mapping.name}:${typeof key}:${key}`;
    }
}
