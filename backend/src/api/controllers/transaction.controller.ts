// backend/src/api/controllers/transaction.controller.ts
import { FastifyReply, FastifyRequest } from 'fastify';
import { LedgerSession } from '../../core/domain/repositories/ledger-session';
import { CreateTransactionUseCase } from '../../core/application/use-cases/transaction/create-transaction.use-case';
import { ListTransactionsUseCase } from '../../core/application/use-cases/transaction/list-transactions.use-case';
import { createTransactionSchema } from '../validators/transaction.validator';
import { ValidationUtil } from '../../shared/utils/validation.util';
import { HTTP_STATUS } from '../../shared/constants/status-codes';

export class TransactionController {
    private readonly createTransactionUseCase: CreateTransactionUseCase;
    private readonly listTransactionsUseCase: ListTransactionsUseCase;

    constructor(session: LedgerSession) {
        this.createTransactionUseCase = new CreateTransactionUseCase(session);
        this.listTransactionsUseCase = new ListTransactionsUseCase(session);
    }

    /**
     * Records a transaction and updates the card balance
     * POST /transactions
     */
    async create(request: FastifyRequest, reply: FastifyReply): Promise<void> {
        const input = ValidationUtil.validate(createTransactionSchema, request.body);
        const result = await this.createTransactionUseCase.execute(input);

        reply.code(HTTP_STATUS.CREATED).send({
            success: true,
            data: {
                transaction: result.transaction,
                card: result.card
            },
            message: result.message
        });
    }

    /**
     * GET /transactions
     */
    async list(_request: FastifyRequest, reply: FastifyReply): Promise<void> {
        const transactions = await this.listTransactionsUseCase.execute();

        reply.code(HTTP_STATUS.SUCCESS).send({
            success: true,
            data: { transactions }
        });
    }
}
