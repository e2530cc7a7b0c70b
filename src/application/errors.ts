import type { EntityValidationFailure } from './ports/persistence-context.js';

export type AppErrorType =
    | 'invalidState'
    | 'transactionAlreadyOpen'
    | 'noActiveTransaction'
    | 'transactionOpen'
    | 'rollback'
    | 'validation'
    | 'persistence'
    | 'notFound';

export class AppError extends Error {
    constructor(
        message: string,
        public readonly type: AppErrorType,
        options?: { cause?: unknown }
    ) {
        super(message, options);
        this.name = 'AppError';
    }
}

/**
 * The persistence context is gone; the unit of work cannot be used any more.
 */
export class InvalidStateError extends AppError {
    constructor(
        message = 'The persistence context is disposed and unusable',
        type: 'invalidState' | 'transactionAlreadyOpen' = 'invalidState'
    ) {
        super(message, type);
        this.name = 'InvalidStateError';
    }
}

export class TransactionAlreadyOpenError extends InvalidStateError {
    constructor() {
        super('There is already an open transaction', 'transactionAlreadyOpen');
        this.name = 'TransactionAlreadyOpenError';
    }
}

export class NoActiveTransactionError extends AppError {
    constructor() {
        super('There is no current transaction', 'noActiveTransaction');
        this.name = 'NoActiveTransactionError';
    }
}

export class TransactionOpenError extends AppError {
    constructor(cause: unknown) {
        super(`An error occurred while beginning the transaction: ${describeCause(cause)}`, 'transactionOpen', { cause });
        this.name = 'TransactionOpenError';
    }
}

export class RollbackError extends AppError {
    constructor(cause: unknown) {
        super(`An error occurred during the rollback transaction: ${describeCause(cause)}`, 'rollback', { cause });
        this.name = 'RollbackError';
    }
}

export class PersistenceError extends AppError {
    constructor(message: string, cause?: unknown) {
        super(cause === undefined ? message : `${message}: ${describeCause(cause)}`, 'persistence', { cause });
        this.name = 'PersistenceError';
    }
}

export class NotFoundError extends AppError {
    constructor(message: string) {
        super(message, 'notFound');
        this.name = 'NotFoundError';
    }
}

/**
 * Staged entities failed their schema while changes were being saved.
 * The message lists every failing entity followed by one `- field : message` line per error.
 */
export class ValidationFailedError extends AppError {
    constructor(
        public readonly failures: readonly EntityValidationFailure[],
        cause?: unknown
    ) {
        super(formatValidationFailures(failures), 'validation', { cause });
        this.name = 'ValidationFailedError';
    }
}

export function formatValidationFailures(failures: readonly EntityValidationFailure[]): string {
    const lines: string[] = [];
    for (const failure of failures) {
        lines.push(`${failure.entityName} failed validation`);
        for (const error of failure.errors) {
            lines.push(`- ${error.property} : ${error.message}`);
        }
    }
    return lines.join('\n');
}

export function describeCause(cause: unknown): string {
    if (cause instanceof Error) {
        return cause.message;
    }
    return typeof cause === 'string' ? cause : 'Unknown error';
}
