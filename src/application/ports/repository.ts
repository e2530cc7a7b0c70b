import type { EntityKey, EntityMapping, QueryFilter, RelationKey } from '@domain/entity-mapping.js';
import type { Result } from '@shared/result.js';
import type { AppError } from '../errors.js';

/**
 * Generic CRUD over any mapped entity type. The identifier type is fixed per repository;
 * the entity type is chosen per call through its mapping.
 */
export interface Repository<TKey extends EntityKey> {
    findById<T extends object>(type: EntityMapping<T>, id: TKey): Promise<Result<T | null, AppError>>;
    getList<T extends object>(type: EntityMapping<T>, filter?: QueryFilter<T>): Promise<Result<T[], AppError>>;
    getListIncluding<T extends object>(
        type: EntityMapping<T>,
        filter: QueryFilter<T> | undefined,
        ...include: RelationKey<T>[]
    ): Promise<Result<T[], AppError>>;
    add<T extends object>(type: EntityMapping<T>, entity: T): Promise<Result<T, AppError>>;
    update<T extends object>(type: EntityMapping<T>, entity: T): Promise<Result<T, AppError>>;
    delete<T extends object>(type: EntityMapping<T>, id: TKey): Promise<Result<void, AppError>>;
}
