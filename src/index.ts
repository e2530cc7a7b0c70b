export { ok, fail, isSuccess, isFailure, unwrap } from './shared/result.js';
export type { Result, Success, Failure } from './shared/result.js';

export {
    AppError,
    InvalidStateError,
    TransactionAlreadyOpenError,
    NoActiveTransactionError,
    TransactionOpenError,
    RollbackError,
    PersistenceError,
    NotFoundError,
    ValidationFailedError,
} from './application/errors.js';
export type { AppErrorType } from './application/errors.js';

export type {
    EntityKey,
    EntityMapping,
    EntityDescriptor,
    RelationMapping,
    RelationKey,
    Criteria,
    EntityPredicate,
    QueryFilter,
} from './domain/entity-mapping.js';

export { EntityValidationException } from './application/ports/persistence-context.js';
export type {
    PersistenceContext,
    EntitySet,
    ListOptions,
    TransactionHandle,
    EntityValidationFailure,
    PropertyValidationError,
} from './application/ports/persistence-context.js';
export type { Repository } from './application/ports/repository.js';
export type { UnitOfWork, TransactionState, ContextGuard } from './application/ports/UnitOfWork.js';
export type { Logger, LoggerContext } from './application/ports/logger.js';

export { GenericRepository } from './infrastructure/persistence/generic-repository.js';
export { TransactionalUnitOfWork } from './infrastructure/persistence/transactional-unit-of-work.js';
export { TrackingPersistenceContext } from './infrastructure/persistence/tracking-persistence-context.js';
export { InMemoryDatabase } from './infrastructure/persistence/in-memory/in-memory-database.js';
export { InMemoryPersistenceContext } from './infrastructure/persistence/in-memory/in-memory-persistence-context.js';
export { PostgresPersistenceContext } from './infrastructure/persistence/postgres/PostgresPersistenceContext.js';
export { fromPoolClient } from './infrastructure/persistence/postgres/SqlConnection.js';
export type { SqlConnection, SqlResult } from './infrastructure/persistence/postgres/SqlConnection.js';
export { createPostgresPool } from './infrastructure/persistence/postgres/createPostgresPool.js';
export { DatabaseFactory } from './infrastructure/database/DatabaseFactory.js';
export { PinoLogger, createPinoInstance } from './infrastructure/observability/pino-logger.js';

export { createConfig, loadConfig } from './composition/config.js';
export type { Config, DatabaseConfig, LogConfig, AppConfig } from './composition/config.js';
export { buildContainer } from './composition/container.js';
export type { Container } from './composition/container.js';
