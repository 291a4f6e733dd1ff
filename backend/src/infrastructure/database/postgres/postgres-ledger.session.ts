// backend/src/infrastructure/database/postgres/postgres-ledger.session.ts
import { Pool } from 'pg';
import { LedgerRepositories, LedgerSession } from '../../../core/domain/repositories/ledger-session';
import { UnitOfWork } from '../../../core/domain/services/unit-of-work.service';
import { CardRepositoryImpl } from './repositories/card.repository.impl';
import { TransactionRepositoryImpl } from './repositories/transaction.repository.impl';

/**
 * One pooled connection per `run`, wrapped in BEGIN/COMMIT by a UnitOfWork.
 */
export class PostgresLedgerSession implements LedgerSession {
    constructor(private readonly pool: Pool) {}

    async run<T>(work: (repositories: LedgerRepositories) => Promise<T>): Promise<T> {
        const client = await this.pool.connect();
        const cards = new CardRepositoryImpl();
        const transactions = new TransactionRepositoryImpl();
        const unitOfWork = new UnitOfWork(client, [cards, transactions]);

        try {
            return await unitOfWork.execute(() => work({ cards, transactions }));
        } finally {
            // pg destroys a client released with an error instead of pooling it
            client.release(unitOfWork.connectionError());
        }
    }
}
