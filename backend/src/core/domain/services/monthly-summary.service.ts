// backend/src/core/domain/services/monthly-summary.service.ts
import { Transaction, TransactionType } from '../entities/transaction.entity';
import { roundToCents } from '../value-objects/money.vo';
import { BusinessException } from '../../../shared/exceptions/business.exception';
import { ValidationException } from '../../../shared/exceptions/validation.exception';
import { ERROR_CODES } from '../../../shared/types/error-codes';

export interface MonthlySummary {
    income: number;
    expenses: number;
    savings: number;
}

export interface MonthlyStat extends MonthlySummary {
    month: string;
}

export type SummarisableTransaction = Pick<Transaction, 'amount' | 'transactionType' | 'date'>;

const DATE_PATTERN = /^(\d{4})-(\d{2})-\d{2}/;

/**
 * `YYYY-MM` key of a `YYYY-MM-DD` date.
 */
export function monthKey(date: string): string {
    const match = DATE_PATTERN.exec(date);
    if (!match) {
        throw new ValidationException(`Invalid transaction date: ${date}`, [
            { field: 'date', message: 'Date must be in YYYY-MM-DD format' }
        ]);
    }
    return `${match[1]}-${match[2]}`;
}

/**
 * Groups transactions by calendar month and totals income and expenses.
 * Only months that have at least one transaction appear in the result.
 */
export function aggregateByMonth(transactions: Iterable<SummarisableTransaction>): Map<string, MonthlySummary> {
    const stats = new Map<string, MonthlySummary>();

    for (const transaction of transactions) {
        const key = monthKey(transaction.date);
        const summary = stats.get(key) ?? { income: 0, expenses: 0, savings: 0 };

        switch (transaction.transactionType) {
            case TransactionType.INCOME:
                summary.income = roundToCents(summary.income + transaction.amount);
                break;
            case TransactionType.EXPENSE:
                summary.expenses = roundToCents(summary.expenses + transaction.amount);
                break;
            default: {
                const unsupported: never = transaction.transactionType;
                throw new BusinessException(
                    `Unsupported transaction type: ${String(unsupported)}`,
                    ERROR_CODES.UNSUPPORTED_TRANSACTION_TYPE
                );
            }
        }

        summary.savings = roundToCents(summary.income - summary.expenses);
        stats.set(key, summary);
    }

    return stats;
}

/**
 * Most recent month first.
 */
export function sortMonthsDescending(stats: Map<string, MonthlySummary>): MonthlyStat[] {
    return Array.from(stats.entries())
        .sort(([a], [b]) => (a < b ? 1 : a > b ? -1 : 0))
        .map(([month, summary]) => ({ month, ...summary }));
}
