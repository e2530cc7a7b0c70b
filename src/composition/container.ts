import type { EntityKey } from '@domain/entity-mapping.js';
import type { Logger } from '@application/ports/logger.js';
import { DatabaseFactory } from '@infrastructure/database/DatabaseFactory.js';
import { createPinoInstance, PinoLogger } from '@infrastructure/observability/pino-logger.js';
import type { TransactionalUnitOfWork } from '@infrastructure/persistence/transactional-unit-of-work.js';
import { isTest, loadConfig, type Config } from './config.js';

export interface Container {
    config: Config;
    logger: Logger;
    databaseFactory: DatabaseFactory;

    createUnitOfWork<TKey extends EntityKey>(): Promise<TransactionalUnitOfWork<TKey>>;

    // Resources that need cleaning up
    cleanup(): Promise<void>;
}

/**
 * Builds the dependency container: logger, connection pool and unit of work factory
 */
export function buildContainer(config: Config = loadConfig()): Container {
    const logger = new PinoLogger(createPinoInstance(config.log, config.app.name));

    // Log configuration on startup (excluding sensitive data)
    if (!isTest(config.app)) {
        logger.info('Configuration loaded', {
            app: config.app,
            database: {
                host: config.database.host,
                port: config.database.port,
                name: config.database.name,
                user: config.database.user,
                maxConnections: config.database.maxConnections,
                ssl: config.database.ssl,
            },
        });
    }

    const databaseFactory = DatabaseFactory.fromConfig(config.database, logger);

    const cleanup = async (): Promise<void> => {
        logger.info('Closing PostgreSQL pool');
        await databaseFactory.close();
    };

    return {
        config,
        logger,
        databaseFactory,
        createUnitOfWork<TKey extends EntityKey>() {
            return databaseFactory.createUnitOfWork<TKey>();
        },
        cleanup,
    };
}
