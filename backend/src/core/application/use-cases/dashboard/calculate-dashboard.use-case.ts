// backend/src/core/application/use-cases/dashboard/calculate-dashboard.use-case.ts
import { Card } from '../../../domain/entities/card.entity';
import { LedgerSession } from '../../../domain/repositories/ledger-session';
import {
    MonthlyStat,
    aggregateByMonth,
    sortMonthsDescending
} from '../../../domain/services/monthly-summary.service';
import { roundToCents } from '../../../domain/value-objects/money.vo';
import { logger } from '../../../../infrastructure/monitoring/logger.service';

export interface DashboardData {
    cards: Card[];
    monthlyStats: MonthlyStat[];
    summary: {
        totalIncome: number;
        totalExpenses: number;
        netSavings: number;
        transactionCount: number;
        cardCount: number;
    };
}

export class CalculateDashboardUseCase {
    constructor(private readonly session: LedgerSession) {}

    async execute(): Promise<DashboardData> {
        const { cards, transactions } = await this.session.run(async (repositories) => ({
            cards: await repositories.cards.findAll(),
            transactions: await repositories.transactions.findAll()
        }));

        const monthlyStats = sortMonthsDescending(aggregateByMonth(transactions));

        const totalIncome = roundToCents(monthlyStats.reduce((sum, stat) => sum + stat.income, 0));
        const totalExpenses = roundToCents(monthlyStats.reduce((sum, stat) => sum + stat.expenses, 0));

        logger.debug('Dashboard calculated', {
            cardCount: cards.length,
            transactionCount: transactions.length,
            months: monthlyStats.length
        });

        return {
            cards,
            monthlyStats,
            summary: {
                totalIncome,
                totalExpenses,
                netSavings: roundToCents(totalIncome - totalExpenses),
                transactionCount: transactions.length,
                cardCount: cards.length
            }
        };
    }
}
