// backend/src/api/routes/card.routes.ts
import { FastifyPluginAsync } from 'fastify';
import { CardController } from '../controllers/card.controller';

export interface CardRoutesOptions {
    controller: CardController;
}

const cardRoutes: FastifyPluginAsync<CardRoutesOptions> = async (fastify, { controller }) => {
    fastify.get('/', {
        schema: { tags: ['Cards'], description: 'List all cards' }
    }, controller.list.bind(controller));

    fastify.post('/', {
        schema: { tags: ['Cards'], description: 'Register a debit or credit card' }
    }, controller.create.bind(controller));

    fastify.get('/:id', {
        schema: { tags: ['Cards'], description: 'Get a card with its transactions' }
    }, controller.getById.bind(controller));

    fastify.delete('/:id', {
        schema: { tags: ['Cards'], description: 'Delete a card and all of its transactions' }
    }, controller.delete.bind(controller));
};

export default cardRoutes;
