import { Pool, type PoolConfig } from 'pg';
import type { DatabaseConfig } from '@composition/config.js';
import type { Logger } from '@application/ports/logger.js';

export function toPoolConfig(config: DatabaseConfig): PoolConfig {
    const poolConfig: PoolConfig = {
        host: config.host,
        port: config.port,
        database: config.name,
        user: config.user,
        password: config.password,
        max: config.maxConnections,
        connectionTimeoutMillis: config.connectionTimeout,
        idleTimeoutMillis: config.idleTimeout,
    };

    // SSL only when explicitly enabled
    if (config.ssl) {
        poolConfig.ssl = { rejectUnauthorized: false };
    }

    return poolConfig;
}

/**
 * Creates a PostgreSQL connection pool and reports its lifecycle events through the logger
 */
export function createPostgresPool(config: DatabaseConfig, logger: Logger): Pool {
    const pool = new Pool(toPoolConfig(config));

    pool.on('connect', () => {
        logger.debug('New PostgreSQL connection established');
    });

    // An idle client failing must not crash the process; the pool discards it
    pool.on('error', (err) => {
        logger.error('Unexpected error on idle PostgreSQL client', { error: err.message });
    });

    pool.on('remove', () => {
        logger.debug('PostgreSQL connection removed from pool');
    });

    return pool;
}
