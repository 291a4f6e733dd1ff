// backend/src/infrastructure/database/postgres/repositories/postgres.repository.ts
import { PoolClient } from 'pg';
import { IRepository } from '../../../../core/domain/services/unit-of-work.service';
import { InfrastructureException } from '../../../../shared/exceptions/infrastructure.exception';

/**
 * Repositories only run inside a unit of work; the connection is handed in on `begin`
 * and taken away on commit or rollback.
 */
export abstract class PostgresRepository implements IRepository {
    private connection: PoolClient | null = null;

    setConnection(connection: PoolClient): void {
        this.connection = connection;
    }

    clearConnection(): void {
        this.connection = null;
    }

    protected getConnection(): PoolClient {
        if (!this.connection) {
            throw new InfrastructureException(`${this.constructor.name} used outside of a unit of work`);
        }
        return this.connection;
    }
}
