// backend/src/core/domain/repositories/transaction.repository.ts
import { NewTransaction, Transaction, TransactionWithCard } from '../entities/transaction.entity';

export interface TransactionRepository {
    create(transaction: NewTransaction): Promise<Transaction>;
    /** Newest first. */
    findAll(): Promise<TransactionWithCard[]>;
    findByCard(cardId: number): Promise<Transaction[]>;
    deleteByCard(cardId: number): Promise<number>;
}
