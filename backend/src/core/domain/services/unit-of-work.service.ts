// backend/src/core/domain/services/unit-of-work.service.ts
import { PoolClient } from 'pg';
import { logger } from '../../../infrastructure/monitoring/logger.service';

export interface IRepository {
    setConnection(connection: PoolClient): void;
    clearConnection(): void;
}

/**
 * One database transaction on one client. Repositories see the client only
 * while the operation runs.
 */
export class UnitOfWork {
    private connectionFailure: Error | undefined;

    constructor(
        private readonly connection: PoolClient,
        private readonly repositories: readonly IRepository[]
    ) {}

    async execute<T>(operation: () => Promise<T>): Promise<T> {
        await this.send('BEGIN');
        this.repositories.forEach(repository => repository.setConnection(this.connection));

        try {
            let result: T;
            try {
                result = await operation();
            } catch (error) {
                await this.rollbackAfter(error);
                throw error;
            }

            await this.send('COMMIT');
            return result;
        } finally {
            this.repositories.forEach(repository => repository.clearConnection());
        }
    }

    /**
     * Set when BEGIN, COMMIT or ROLLBACK itself failed: the client may be in an
     * unknown state and should not go back to the pool.
     */
    connectionError(): Error | undefined {
        return this.connectionFailure;
    }

    private async send(statement: 'BEGIN' | 'COMMIT'): Promise<void> {
        try {
            await this.connection.query(statement);
        } catch (error) {
            this.connectionFailure = error instanceof Error ? error : new Error(String(error));
            logger.error(`Unit of Work ${statement} failed`, error, { processId: this.connection.processID });
            throw error;
        }
    }

    // The operation's error is the one callers see, even if ROLLBACK fails too
    private async rollbackAfter(cause: unknown): Promise<void> {
        try {
            await this.connection.query('ROLLBACK');
            logger.debug('Unit of Work rolled back', {
                processId: this.connection.processID,
                cause: cause instanceof Error ? cause.message : String(cause)
            });
        } catch (rollbackError) {
            this.connectionFailure = rollbackError instanceof Error ? rollbackError : new Error(String(rollbackError));
            logger.error('Unit of Work ROLLBACK failed', rollbackError, {
                processId: this.connection.processID,
                cause: cause instanceof Error ? cause.message : String(cause)
            });
        }
    }
}
