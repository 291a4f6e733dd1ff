// backend/src/core/application/use-cases/transaction/list-transactions.use-case.ts
import { TransactionWithCard } from '../../../domain/entities/transaction.entity';
import { LedgerSession } from '../../../domain/repositories/ledger-session';

export class ListTransactionsUseCase {
    constructor(private readonly session: LedgerSession) {}

    /**
     * Every transaction, newest first, with the name of the card it was recorded on.
     */
    async execute(): Promise<TransactionWithCard[]> {
        return this.session.run(({ transactions }) => transactions.findAll());
    }
}
