import type { EntityKey } from '@domain/entity-mapping.js';
import type { Result } from '../../shared/result.js';
import type { AppError } from '../errors.js';
import type { Repository } from './repository.js';

export type TransactionState = 'no-transaction' | 'transaction-open';

export interface UnitOfWork<TKey extends EntityKey> {
    readonly repository: Repository<TKey>;
    readonly state: TransactionState;
    readonly isDisposed: boolean;
    beginTransaction(): Promise<Result<void, AppError>>;
    commitTransaction(): Promise<Result<number, AppError>>;
    rollbackTransaction(): Promise<Result<void, AppError>>;
    run<T>(work: (repository: Repository<TKey>) => Promise<T>): Promise<Result<T, AppError>>;
    dispose(): Promise<void>;
}

/**
 * Checks that the owning unit of work can still be used. Called by the repository before every operation.
 */
export type ContextGuard = () => Result<void, AppError>;
