import { randomUUID } from 'crypto';
import type { EntityKey } from '@domain/entity-mapping.js';
import {
    EntityValidationException,
    type PersistenceContext,
    type TransactionHandle,
} from '@application/ports/persistence-context.js';
import type { Repository } from '@application/ports/repository.js';
import type { TransactionState, UnitOfWork } from '@application/ports/UnitOfWork.js';
import type { Logger } from '@application/ports/logger.js';
import {
    AppError,
    InvalidStateError,
    NoActiveTransactionError,
    PersistenceError,
    RollbackError,
    TransactionAlreadyOpenError,
    TransactionOpenError,
    ValidationFailedError,
    describeCause,
} from '@application/errors.js';
import { Result, ok, fail } from '@shared/result.js';
import { GenericRepository } from './generic-repository.js';

/**
 * Unit of Work over a persistence context it owns.
 * Holds at most one open transaction and a single repository wired to {@link ensureContext},
 * so every repository call fails once the context has been disposed.
 *
 * @example
 * ```typescript
 * const begun = await uow.beginTransaction();
 * await uow.repository.add(customers, { id: 1, name: 'Ada', email: 'ada@example.com' });
 * const committed = await uow.commitTransaction();
 * ```
 */
export class TransactionalUnitOfWork<TKey extends EntityKey> implements UnitOfWork<TKey> {
    readonly id: string;
    readonly repository: Repository<TKey>;
    private context: PersistenceContext | null;
    private transaction: TransactionHandle | null = null;
    // set while the engine is opening a transaction, before the handle exists
    private opening = false;
    private readonly logger: Logger;

    constructor(context: PersistenceContext, logger: Logger) {
        this.id = randomUUID();
        this.context = context;
        this.logger = logger.child({ component: 'UnitOfWork', unitOfWorkId: this.id });
        this.repository = new GenericRepository<TKey>(context, () => {
            const usable = this.ensureContext();
            return usable.ok ? ok(undefined) : usable;
        });
    }

    get state(): TransactionState {
        return this.transaction === null ? 'no-transaction' : 'transaction-open';
    }

    get isDisposed(): boolean {
        return this.context === null;
    }

    async beginTransaction(): Promise<Result<void, AppError>> {
        const usable = this.ensureContext();
        if (!usable.ok) {
            return usable;
        }

        if (this.transaction !== null || this.opening) {
            return fail(new TransactionAlreadyOpenError());
        }

        this.opening = true;
        try {
            this.transaction = await usable.value.beginTransaction();
            this.logger.debug('Transaction started');
            return ok(undefined);
        } catch (error) {
            return fail(new TransactionOpenError(error));
        } finally {
            this.opening = false;
        }
    }

    /**
     * Flushes the staged changes and commits. Any failure rolls the transaction back before it is reported;
     * schema failures come back as {@link ValidationFailedError}.
     * The transaction is closed whatever the outcome.
     *
     * @returns the number of entries written
     */
    async commitTransaction(): Promise<Result<number, AppError>> {
        const usable = this.ensureContext();
        if (!usable.ok) {
            return usable;
        }

        const transaction = this.transaction;
        if (transaction === null) {
            return fail(new NoActiveTransactionError());
        }

        try {
            const written = await usable.value.saveChanges();
            await transaction.commit();
            this.logger.debug('Transaction committed', { written });
            return ok(written);
        } catch (error) {
            const rollback = await this.rollbackTransaction();
            if (!rollback.ok) {
                this.logger.error('Rollback after failed commit did not complete', { error: rollback.error.message });
            }
            return fail(this.translateCommitError(error));
        } finally {
            if (this.transaction === transaction) {
                await this.closeTransaction(transaction);
            }
        }
    }

    /**
     * Rolls back the open transaction and drops the staged changes. Does nothing when no transaction is open.
     */
    async rollbackTransaction(): Promise<Result<void, AppError>> {
        const usable = this.ensureContext();
        if (!usable.ok) {
            return usable;
        }

        const transaction = this.transaction;
        if (transaction === null) {
            return ok(undefined);
        }

        try {
            await transaction.rollback();
            this.logger.debug('Transaction rolled back');
            return ok(undefined);
        } catch (error) {
            return fail(new RollbackError(error));
        } finally {
            usable.value.discardChanges();
            await this.closeTransaction(transaction);
        }
    }

    /**
     * Runs `work` in its own transaction: commits when it resolves, rolls back when it throws.
     */
    async run<T>(work: (repository: Repository<TKey>) => Promise<T>): Promise<Result<T, AppError>> {
        const begun = await this.beginTransaction();
        if (!begun.ok) {
            return begun;
        }

        let value: T;
        try {
            value = await work(this.repository);
        } catch (error) {
            const rollback = await this.rollbackTransaction();
            if (!rollback.ok) {
                this.logger.error('Rollback after failed work did not complete', { error: rollback.error.message });
            }
            return fail(error instanceof AppError ? error : new PersistenceError('Transaction failed', error));
        }

        const committed = await this.commitTransaction();
        return committed.ok ? ok(value) : committed;
    }

    /**
     * Releases the persistence context. Failures while releasing are logged, never thrown.
     */
    async dispose(): Promise<void> {
        const context = this.context;
        if (context === null) {
            return;
        }
        this.context = null;

        try {
            await context.dispose();
        } catch (error) {
            this.logger.warn('Failed to dispose persistence context', { error: describeCause(error) });
        }
    }

    private ensureContext(): Result<PersistenceContext, InvalidStateError> {
        if (this.context === null) {
            return fail(new InvalidStateError());
        }
        return ok(this.context);
    }

    private translateCommitError(error: unknown): AppError {
        if (error instanceof EntityValidationException) {
            return new ValidationFailedError(error.failures, error);
        }
        if (error instanceof AppError) {
            return error;
        }
        return new PersistenceError('An error occurred during the commit transaction', error);
    }

    private async closeTransaction(transaction: TransactionHandle): Promise<void> {
        this.transaction = null;
        try {
            await transaction.dispose();
        } catch (error) {
            this.logger.warn('Failed to dispose transaction', { error: describeCause(error) });
        }
    }
}
