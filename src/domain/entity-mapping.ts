import type { z } from 'zod';

/**
 * Identifier types an entity can be addressed by.
 */
export type EntityKey = string | number;

export interface RelationMapping {
    readonly kind: 'one' | 'many';
    readonly target: EntityDescriptor;
    /**
     * For `many`: the property on the target holding the owner's key.
     * For `one`: the property on the owner holding the target's key.
     */
    readonly foreignKey: string;
}

/**
 * Type-erased view of an entity mapping, used where entities of different types sit side by side
 * (change tracking, relation targets).
 */
export interface EntityDescriptor {
    readonly name: string;
    readonly table: string;
    readonly key: string;
    readonly schema: z.ZodTypeAny;
    /** Property to column overrides. Properties without an entry map to their snake_case name. */
    readonly columns?: Readonly<Record<string, string>>;
    readonly relations?: Readonly<Record<string, RelationMapping>>;
}

/**
 * Describes how an entity type is stored: its name, table, identifier property and schema.
 * The schema validates staged entities before they are written and materializes stored rows.
 */
export interface EntityMapping<T extends object> extends EntityDescriptor {
    readonly key: keyof T & string;
    readonly schema: z.ZodType<T, z.ZodTypeDef, unknown>;
}

/**
 * Names of the properties a list query may eager-load.
 */
export type RelationKey<T> = keyof T & string;

export type Criteria<T> = { readonly [K in keyof T]?: T[K] };

export type EntityPredicate<T> = (entity: T) => boolean;

/**
 * Either property equality criteria, which engines can push down to the store,
 * or a predicate evaluated against materialized entities.
 */
export type QueryFilter<T> = Criteria<T> | EntityPredicate<T>;

export function isPredicate<T>(filter: QueryFilter<T>): filter is EntityPredicate<T> {
    return typeof filter === 'function';
}

export function readKey(mapping: EntityDescriptor, entity: object): EntityKey | undefined {
    const value: unknown = Reflect.get(entity, mapping.key);
    return typeof value === 'string' || typeof value === 'number' ? value : undefined;
}

export function columnFor(mapping: EntityDescriptor, property: string): string {
    return mapping.columns?.[property] ?? toSnakeCase(property);
}

export function toSnakeCase(property: string): string {
    return property.replace(/[A-Z]/g, (letter) => `_${letter.toLowerCase()}`);
}

/**
 * Copies the stored properties of an entity, leaving relation properties and undefined values out.
 */
export function toRecord(mapping: EntityDescriptor, entity: object): Record<string, unknown> {
    const record: Record<string, unknown> = {};
    for (const [property, value] of Object.entries(entity)) {
        if (value === undefined || mapping.relations?.[property] !== undefined) {
            continue;
        }
        record[property] = value;
    }
    return record;
}
