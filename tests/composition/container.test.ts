import { describe, it, expect } from 'vitest';
import { buildContainer } from '@composition/container';
import { createConfig } from '@composition/config';
import { toPoolConfig } from '@infrastructure/persistence/postgres/createPostgresPool';

describe('buildContainer', () => {
    const config = createConfig({ NODE_ENV: 'test', LOG_LEVEL: 'silent', DB_NAME: 'orders_test' });

    it('should wire the given configuration', async () => {
        const container = buildContainer(config);

        expect(container.config).toBe(config);
        expect(container.config.database.name).toBe('orders_test');

        await container.cleanup();
    });

    it('should close a pool that never connected', async () => {
        const container = buildContainer(config);

        await expect(container.cleanup()).resolves.toBeUndefined();
    });
});

describe('toPoolConfig', () => {
    it('should map database settings onto pg pool options', () => {
        const database = createConfig({ DB_NAME: 'orders', DB_MAX_CONNECTIONS: '4' }).database;

        expect(toPoolConfig(database)).toEqual({
            host: 'localhost',
            port: 5432,
            database: 'orders',
            user: 'postgres',
            password: 'postgres',
            max: 4,
            connectionTimeoutMillis: 30000,
            idleTimeoutMillis: 30000,
        });
    });

    it('should only add ssl options when enabled', () => {
        const database = createConfig({ DB_SSL: 'true' }).database;

        expect(toPoolConfig(database).ssl).toEqual({ rejectUnauthorized: false });
    });
});
