// backend/src/api/routes/dashboard.routes.ts
import { FastifyPluginAsync } from 'fastify';
import { DashboardController } from '../controllers/dashboard.controller';

export interface DashboardRoutesOptions {
    controller: DashboardController;
}

const dashboardRoutes: FastifyPluginAsync<DashboardRoutesOptions> = async (fastify, { controller }) => {
    fastify.get('/dashboard', {
        schema: { tags: ['Dashboard'], description: 'Cards and monthly income, expenses and savings' }
    }, controller.getDashboard.bind(controller));

    fastify.get('/categories', {
        schema: { tags: ['Dashboard'], description: 'Suggested income and expense categories' }
    }, controller.getCategories.bind(controller));
};

export default dashboardRoutes;
