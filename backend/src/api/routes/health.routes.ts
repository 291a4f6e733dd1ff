// backend/src/api/routes/health.routes.ts
import { FastifyPluginAsync } from 'fastify';
import { DatabaseHealth } from '../../infrastructure/database/connections';
import { HTTP_STATUS } from '../../shared/constants/status-codes';

export interface HealthRoutesOptions {
    checkDatabase?: () => Promise<DatabaseHealth>;
}

const healthRoutes: FastifyPluginAsync<HealthRoutesOptions> = async (fastify, { checkDatabase }) => {
    fastify.get('/health', {
        schema: { tags: ['Health'], description: 'Health check endpoint' }
    }, async (_request, reply) => {
        const database = checkDatabase ? await checkDatabase() : undefined;
        const healthy = database?.healthy ?? true;

        return reply.code(healthy ? HTTP_STATUS.SUCCESS : HTTP_STATUS.SERVICE_UNAVAILABLE).send({
            status: healthy ? 'healthy' : 'unhealthy',
            service: 'card-ledger',
            uptime: process.uptime(),
            timestamp: new Date().toISOString(),
            ...(database && { database })
        });
    });
};

export default healthRoutes;
