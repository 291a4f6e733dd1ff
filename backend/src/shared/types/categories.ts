// backend/src/shared/types/categories.ts
import { TransactionType } from '../../core/domain/entities/transaction.entity';

/**
 * Suggestions offered by clients when recording a transaction.
 * Categories are free-form; nothing validates against this list.
 */
export const SUGGESTED_CATEGORIES: Readonly<Record<TransactionType, readonly string[]>> = {
    [TransactionType.INCOME]: ['Salary', 'Business', 'Investment', 'Other'],
    [TransactionType.EXPENSE]: [
        'Food & Dining',
        'Shopping',
        'Transportation',
        'Bills & Utilities',
        'Entertainment',
        'Healthcare',
        'Other',
    ],
};
