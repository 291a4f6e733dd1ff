// backend/src/core/domain/repositories/ledger-session.ts
import { CardRepository } from './card.repository';
import { TransactionRepository } from './transaction.repository';

export interface LedgerRepositories {
    cards: CardRepository;
    transactions: TransactionRepository;
}

/**
 * Runs work against the ledger store as one atomic unit: either every write
 * made through the given repositories is kept, or none is.
 */
export interface LedgerSession {
    run<T>(work: (repositories: LedgerRepositories) => Promise<T>): Promise<T>;
}
