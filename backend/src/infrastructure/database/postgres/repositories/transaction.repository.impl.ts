// backend/src/infrastructure/database/postgres/repositories/transaction.repository.impl.ts
import { TransactionRepository } from '../../../../core/domain/repositories/transaction.repository';
import {
    NewTransaction,
    Transaction,
    TransactionWithCard,
    isTransactionType
} from '../../../../core/domain/entities/transaction.entity';
import { PostgresRepository } from './postgres.repository';
import { logger } from '../../../monitoring/logger.service';
import { InfrastructureException } from '../../../../shared/exceptions/infrastructure.exception';

type TransactionRow = {
    id: number;
    card_id: number;
    transaction_type: string;
    amount: number;
    description: string;
    category: string;
    date: string;
};

type TransactionWithCardRow = TransactionRow & {
    card_name: string;
};

// DATE columns come back as text so that no timezone shifts the calendar day
const TRANSACTION_COLUMNS = `t.id, t.card_id, t.transaction_type, t.amount, t.description, t.category,
    to_char(t.date, 'YYYY-MM-DD') AS date`;

export class TransactionRepositoryImpl extends PostgresRepository implements TransactionRepository {

    async create(transaction: NewTransaction): Promise<Transaction> {
        try {
            const result = await this.getConnection().query<TransactionRow>(
                `WITH t AS (
                    INSERT INTO transactions (card_id, transaction_type, amount, description, category, date)
                    VALUES ($1, $2, $3, $4, $5, $6)
                    RETURNING *
                )
                SELECT ${TRANSACTION_COLUMNS} FROM t`,
                [
                    transaction.cardId,
                    transaction.transactionType,
                    transaction.amount,
                    transaction.description,
                    transaction.category,
                    transaction.date
                ]
            );

            logger.database('Transaction inserted', {
                transactionId: result.rows[0].id,
                cardId: transaction.cardId
            });

            return this.mapRowToTransaction(result.rows[0]);

        } catch (error) {
            logger.error('Failed to create transaction', error, { cardId: transaction.cardId });
            throw error;
        }
    }

    async findAll(): Promise<TransactionWithCard[]> {
        try {
            const result = await this.getConnection().query<TransactionWithCardRow>(
                `SELECT ${TRANSACTION_COLUMNS}, c.name AS card_name
                 FROM transactions t
                 JOIN cards c ON c.id = t.card_id
                 ORDER BY t.date DESC, t.id DESC`
            );

            return result.rows.map(row => ({
                ...this.mapRowToTransaction(row),
                cardName: row.card_name
            }));

        } catch (error) {
            logger.error('Failed to list transactions', error);
            throw error;
        }
    }

    async findByCard(cardId: number): Promise<Transaction[]> {
        try {
            const result = await this.getConnection().query<TransactionRow>(
                `SELECT ${TRANSACTION_COLUMNS}
                 FROM transactions t
                 WHERE t.card_id = $1
                 ORDER BY t.date DESC, t.id DESC`,
                [cardId]
            );

            return result.rows.map(row => this.mapRowToTransaction(row));

        } catch (error) {
            logger.error('Failed to list card transactions', error, { cardId });
            throw error;
        }
    }

    async deleteByCard(cardId: number): Promise<number> {
        try {
            const result = await this.getConnection().query(
                'DELETE FROM transactions WHERE card_id = $1',
                [cardId]
            );

            return result.rowCount ?? 0;

        } catch (error) {
            logger.error('Failed to delete card transactions', error, { cardId });
            throw error;
        }
    }

    private mapRowToTransaction(row: TransactionRow): Transaction {
        if (!isTransactionType(row.transaction_type)) {
            throw new InfrastructureException(
                `Transaction ${row.id} has unknown type "${row.transaction_type}"`
            );
        }

        return {
            id: row.id,
            cardId: row.card_id,
            transactionType: row.transaction_type,
            amount: Number(row.amount),
            description: row.description,
            category: row.category,
            date: row.date
        };
    }
}
