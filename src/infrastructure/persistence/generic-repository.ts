import type { EntityKey, EntityMapping, QueryFilter, RelationKey } from '@domain/entity-mapping.js';
import type { PersistenceContext } from '@application/ports/persistence-context.js';
import type { Repository } from '@application/ports/repository.js';
import type { ContextGuard } from '@application/ports/UnitOfWork.js';
import { AppError, NotFoundError, PersistenceError } from '@application/errors.js';
import { Result, ok, fail } from '@shared/result.js';

/**
 * Repository over a persistence context it does not own.
 * Every operation asks the guard first; when the guard fails the context is not touched.
 * Writes are only staged: they reach the store when the owning unit of work commits.
 */
export class GenericRepository<TKey extends EntityKey> implements Repository<TKey> {
    constructor(
        private readonly context: PersistenceContext,
        private readonly guard: ContextGuard
    ) {}

    async findById<T extends object>(type: EntityMapping<T>, id: TKey): Promise<Result<T | null, AppError>> {
        const usable = this.guard();
        if (!usable.ok) {
            return usable;
        }

        try {
            return ok(await this.context.set<T, TKey>(type).find(id));
        } catch (error) {
            return fail(this.toAppError(`An error occurred while finding ${type.name} ${id}`, error));
        }
    }

    async getList<T extends object>(type: EntityMapping<T>, filter?: QueryFilter<T>): Promise<Result<T[], AppError>> {
        return this.list(type, filter, []);
    }

    /**
     * Lists entities and eager-loads the named relations for all of them.
     * Without relations this is the same query as {@link getList}.
     */
    async getListIncluding<T extends object>(
        type: EntityMapping<T>,
        filter: QueryFilter<T> | undefined,
        ...include: RelationKey<T>[]
    ): Promise<Result<T[], AppError>> {
        return this.list(type, filter, include);
    }

    async add<T extends object>(type: EntityMapping<T>, entity: T): Promise<Result<T, AppError>> {
        const usable = this.guard();
        if (!usable.ok) {
            return usable;
        }

        try {
            this.context.set<T, TKey>(type).add(entity);
            return ok(entity);
        } catch (error) {
            return fail(this.toAppError(`An error occurred while adding ${type.name}`, error));
        }
    }

    async update<T extends object>(type: EntityMapping<T>, entity: T): Promise<Result<T, AppError>> {
        const usable = this.guard();
        if (!usable.ok) {
            return usable;
        }

        try {
            this.context.set<T, TKey>(type).update(entity);
            return ok(entity);
        } catch (error) {
            return fail(this.toAppError(`An error occurred while updating ${type.name}`, error));
        }
    }

    async delete<T extends object>(type: EntityMapping<T>, id: TKey): Promise<Result<void, AppError>> {
        const usable = this.guard();
        if (!usable.ok) {
            return usable;
        }

        try {
            const set = this.context.set<T, TKey>(type);
            const entity = await set.find(id);
            if (entity === null) {
                return fail(new NotFoundError(`${type.name} ${id} was not found`));
            }

            set.remove(entity);
            return ok(undefined);
        } catch (error) {
            return fail(this.toAppError(`An error occurred while deleting ${type.name} ${id}`, error));
        }
    }

    private async list<T extends object>(
        type: EntityMapping<T>,
        filter: QueryFilter<T> | undefined,
        include: readonly RelationKey<T>[]
    ): Promise<Result<T[], AppError>> {
        const usable = this.guard();
        if (!usable.ok) {
            return usable;
        }

        try {
            return ok(await this.context.set<T, TKey>(type).list({ filter, include }));
        } catch (error) {
            return fail(this.toAppError(`An error occurred while listing ${type.name}`, error));
        }
    }

    private toAppError(message: string, error: unknown): AppError {
        return error instanceof AppError ? error : new PersistenceError(message, error);
    }
}
