// backend/src/infrastructure/database/connections.ts
import { Pool, PoolConfig } from 'pg';
import { Environment } from '../../config/environment';
import { logger } from '../monitoring/logger.service';
import { InfrastructureException } from '../../shared/exceptions/infrastructure.exception';

export type PostgresSettings = Pick<
    Environment,
    'POSTGRES_HOST' | 'POSTGRES_PORT' | 'POSTGRES_DB' | 'POSTGRES_USER' | 'POSTGRES_PASSWORD' | 'POSTGRES_MAX_CONNECTIONS'
>;

export const getPostgresConfig = (settings: PostgresSettings): PoolConfig => ({
    host: settings.POSTGRES_HOST,
    port: settings.POSTGRES_PORT,
    database: settings.POSTGRES_DB,
    user: settings.POSTGRES_USER,
    password: settings.POSTGRES_PASSWORD,
    max: settings.POSTGRES_MAX_CONNECTIONS,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 10000,
    application_name: 'card-ledger',
});

export interface DatabaseHealth {
    healthy: boolean;
    latencyMs: number;
    error?: string;
}

/**
 * Owns the PostgreSQL pool for the lifetime of the process.
 */
export class PostgresConnection {
    private connected = false;

    constructor(private readonly pool: Pool) {}

    static fromSettings(settings: PostgresSettings): PostgresConnection {
        return new PostgresConnection(new Pool(getPostgresConfig(settings)));
    }

    getPool(): Pool {
        return this.pool;
    }

    async connect(): Promise<void> {
        const startTime = Date.now();

        try {
            const client = await this.pool.connect();
            try {
                await client.query('SELECT NOW() AS current_time');
            } finally {
                client.release();
            }

            this.connected = true;
            this.pool.on('error', (error) => {
                logger.error('Idle PostgreSQL client error', error);
            });

            logger.info('PostgreSQL connected', { duration: `${Date.now() - startTime}ms` });
        } catch (error) {
            this.connected = false;
            logger.error('Failed to connect to PostgreSQL', error);
            throw new InfrastructureException('PostgreSQL connection failed');
        }
    }

    async healthCheck(): Promise<DatabaseHealth> {
        const startTime = Date.now();

        try {
            await this.pool.query('SELECT 1');
            return { healthy: true, latencyMs: Date.now() - startTime };
        } catch (error) {
            return {
                healthy: false,
                latencyMs: Date.now() - startTime,
                error: error instanceof Error ? error.message : String(error),
            };
        }
    }

    isConnected(): boolean {
        return this.connected;
    }

    async disconnect(): Promise<void> {
        await this.pool.end();
        this.connected = false;
        logger.info('PostgreSQL pool closed');
    }
}
