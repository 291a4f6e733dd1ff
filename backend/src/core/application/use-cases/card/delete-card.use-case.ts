// backend/src/core/application/use-cases/card/delete-card.use-case.ts
import { Card } from '../../../domain/entities/card.entity';
import { LedgerSession } from '../../../domain/repositories/ledger-session';
import { NotFoundException } from '../../../../shared/exceptions/not-found.exception';
import { ERROR_CODES } from '../../../../shared/types/error-codes';
import { logger } from '../../../../infrastructure/monitoring/logger.service';

export interface DeleteCardUseCaseResponse {
    card: Card;
    deletedTransactions: number;
}

/**
 * A card owns its transactions: they are removed in the same unit of work as the card.
 */
export class DeleteCardUseCase {
    constructor(private readonly session: LedgerSession) {}

    async execute(cardId: number): Promise<DeleteCardUseCaseResponse> {
        const result = await this.session.run(async ({ cards, transactions }) => {
            const card = await cards.findByIdForUpdate(cardId);
            if (!card) {
                throw new NotFoundException(`Card ${cardId} not found`, ERROR_CODES.CARD_NOT_FOUND);
            }

            const deletedTransactions = await transactions.deleteByCard(cardId);
            await cards.delete(cardId);

            return { card, deletedTransactions };
        });

        logger.info('Card deleted', {
            cardId,
            deletedTransactions: result.deletedTransactions
        });

        return result;
    }
}
