// backend/src/api/controllers/card.controller.ts
import { FastifyReply, FastifyRequest } from 'fastify';
import { LedgerSession } from '../../core/domain/repositories/ledger-session';
import { CreateCardUseCase } from '../../core/application/use-cases/card/create-card.use-case';
import { DeleteCardUseCase } from '../../core/application/use-cases/card/delete-card.use-case';
import { GetCardUseCase } from '../../core/application/use-cases/card/get-card.use-case';
import { ListCardsUseCase } from '../../core/application/use-cases/card/list-cards.use-case';
import { createCardSchema } from '../validators/card.validator';
import { idParamsSchema } from '../validators/common.validator';
import { ValidationUtil } from '../../shared/utils/validation.util';
import { HTTP_STATUS } from '../../shared/constants/status-codes';

export class CardController {
    private readonly createCardUseCase: CreateCardUseCase;
    private readonly listCardsUseCase: ListCardsUseCase;
    private readonly getCardUseCase: GetCardUseCase;
    private readonly deleteCardUseCase: DeleteCardUseCase;

    constructor(session: LedgerSession) {
        this.createCardUseCase = new CreateCardUseCase(session);
        this.listCardsUseCase = new ListCardsUseCase(session);
        this.getCardUseCase = new GetCardUseCase(session);
        this.deleteCardUseCase = new DeleteCardUseCase(session);
    }

    /**
     * POST /cards
     */
    async create(request: FastifyRequest, reply: FastifyReply): Promise<void> {
        const input = ValidationUtil.validate(createCardSchema, request.body);
        const card = await this.createCardUseCase.execute(input);

        reply.code(HTTP_STATUS.CREATED).send({
            success: true,
            data: { card },
            message: 'Card created successfully'
        });
    }

    /**
     * GET /cards
     */
    async list(_request: FastifyRequest, reply: FastifyReply): Promise<void> {
        const cards = await this.listCardsUseCase.execute();

        reply.code(HTTP_STATUS.SUCCESS).send({
            success: true,
            data: { cards }
        });
    }

    /**
     * GET /cards/:id
     */
    async getById(request: FastifyRequest, reply: FastifyReply): Promise<void> {
        const { id } = ValidationUtil.validate(idParamsSchema, request.params);
        const details = await this.getCardUseCase.execute(id);

        reply.code(HTTP_STATUS.SUCCESS).send({
            success: true,
            data: details
        });
    }

    /**
     * DELETE /cards/:id
     */
    async delete(request: FastifyRequest, reply: FastifyReply): Promise<void> {
        const { id } = ValidationUtil.validate(idParamsSchema, request.params);
        const result = await this.deleteCardUseCase.execute(id);

        reply.code(HTTP_STATUS.SUCCESS).send({
            success: true,
            data: {
                cardId: result.card.id,
                deletedTransactions: result.deletedTransactions
            },
            message: 'Card deleted successfully'
        });
    }
}
