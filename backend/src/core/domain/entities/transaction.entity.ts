// backend/src/core/domain/entities/transaction.entity.ts

export enum TransactionType {
    INCOME = 'income',
    EXPENSE = 'expense'
}

export const TRANSACTION_TYPES: readonly TransactionType[] = [TransactionType.INCOME, TransactionType.EXPENSE];

/**
 * A single income or expense recorded against a card.
 * `amount` is always positive; the direction comes from the card type and transaction type.
 * `date` is a calendar date in `YYYY-MM-DD` form.
 */
export interface Transaction {
    id: number;
    cardId: number;
    transactionType: TransactionType;
    amount: number;
    description: string;
    category: string;
    date: string;
}

export type NewTransaction = Omit<Transaction, 'id'>;

export interface TransactionWithCard extends Transaction {
    cardName: string;
}

export function isTransactionType(value: unknown): value is TransactionType {
    return typeof value === 'string' && TRANSACTION_TYPES.some((transactionType) => transactionType === value);
}
