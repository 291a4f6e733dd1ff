// backend/src/api/controllers/dashboard.controller.ts
import { FastifyReply, FastifyRequest } from 'fastify';
import { LedgerSession } from '../../core/domain/repositories/ledger-session';
import { CalculateDashboardUseCase } from '../../core/application/use-cases/dashboard/calculate-dashboard.use-case';
import { HTTP_STATUS } from '../../shared/constants/status-codes';
import { SUGGESTED_CATEGORIES } from '../../shared/types/categories';

export class DashboardController {
    private readonly calculateDashboardUseCase: CalculateDashboardUseCase;

    constructor(session: LedgerSession) {
        this.calculateDashboardUseCase = new CalculateDashboardUseCase(session);
    }

    /**
     * Cards plus income, expenses and savings per month, most recent month first
     * GET /dashboard
     */
    async getDashboard(_request: FastifyRequest, reply: FastifyReply): Promise<void> {
        const dashboard = await this.calculateDashboardUseCase.execute();

        reply.code(HTTP_STATUS.SUCCESS).send({
            success: true,
            data: dashboard
        });
    }

    /**
     * GET /categories
     */
    async getCategories(_request: FastifyRequest, reply: FastifyReply): Promise<void> {
        reply.code(HTTP_STATUS.SUCCESS).send({
            success: true,
            data: { categories: SUGGESTED_CATEGORIES }
        });
    }
}
