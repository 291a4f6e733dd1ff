// backend/src/core/application/use-cases/transaction/create-transaction.use-case.ts
import { Card } from '../../../domain/entities/card.entity';
import { Transaction, TransactionType } from '../../../domain/entities/transaction.entity';
import { LedgerSession } from '../../../domain/repositories/ledger-session';
import { applyTransaction } from '../../../domain/services/balance.service';
import { roundToCents } from '../../../domain/value-objects/money.vo';
import { logger } from '../../../../infrastructure/monitoring/logger.service';
import { BaseException } from '../../../../shared/exceptions/base.exception';
import { BusinessException } from '../../../../shared/exceptions/business.exception';
import { NotFoundException } from '../../../../shared/exceptions/not-found.exception';
import { ERROR_CODES } from '../../../../shared/types/error-codes';
import { DateUtil } from '../../../../shared/utils/date.util';
import { HTTP_STATUS } from '../../../../shared/constants/status-codes';

export interface CreateTransactionUseCaseRequest {
    cardId: number;
    transactionType: TransactionType;
    amount: number;
    description: string;
    category: string;
    /** YYYY-MM-DD; today when omitted */
    date?: string;
}

export interface CreateTransactionUseCaseResponse {
    transaction: Transaction;
    card: Card;
    message: string;
}

export class CreateTransactionUseCase {
    constructor(private readonly session: LedgerSession) {}

    async execute(request: CreateTransactionUseCaseRequest): Promise<CreateTransactionUseCaseResponse> {
        try {
            logger.info('Creating new transaction', {
                cardId: request.cardId,
                transactionType: request.transactionType,
                amount: request.amount
            });

            const amount = roundToCents(request.amount);

            // Insert and balance update commit together; the card row stays locked until then
            const { transaction, card } = await this.session.run(async ({ cards, transactions }) => {
                const current = await cards.findByIdForUpdate(request.cardId);
                if (!current) {
                    throw new NotFoundException(`Card ${request.cardId} not found`, ERROR_CODES.CARD_NOT_FOUND);
                }

                const newBalance = applyTransaction(current, request.transactionType, amount);

                const created = await transactions.create({
                    cardId: current.id,
                    transactionType: request.transactionType,
                    amount,
                    description: request.description,
                    category: request.category,
                    date: request.date ?? DateUtil.today()
                });

                const updated = await cards.updateBalance(current.id, newBalance);

                return { transaction: created, card: updated };
            });

            logger.info('Transaction created successfully', {
                transactionId: transaction.id,
                cardId: card.id,
                balance: card.balance
            });

            return {
                transaction,
                card,
                message: 'Transaction created successfully'
            };

        } catch (error) {
            logger.error('Failed to create transaction', error, {
                cardId: request.cardId,
                transactionType: request.transactionType
            });

            if (error instanceof BaseException) {
                throw error;
            }

            throw new BusinessException('Failed to create transaction', ERROR_CODES.TRANSACTION_CREATION_FAILED, HTTP_STATUS.INTERNAL_ERROR);
        }
    }
}
