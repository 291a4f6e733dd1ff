// backend/src/api/routes/transaction.routes.ts
import { FastifyPluginAsync } from 'fastify';
import { TransactionController } from '../controllers/transaction.controller';

export interface TransactionRoutesOptions {
    controller: TransactionController;
}

const transactionRoutes: FastifyPluginAsync<TransactionRoutesOptions> = async (fastify, { controller }) => {
    fastify.get('/', {
        schema: { tags: ['Transactions'], description: 'List all transactions, newest first' }
    }, controller.list.bind(controller));

    fastify.post('/', {
        schema: { tags: ['Transactions'], description: 'Record an income or expense and update the card balance' }
    }, controller.create.bind(controller));
};

export default transactionRoutes;
