// backend/src/core/application/use-cases/card/get-card.use-case.ts
import { Card } from '../../../domain/entities/card.entity';
import { Transaction } from '../../../domain/entities/transaction.entity';
import { LedgerSession } from '../../../domain/repositories/ledger-session';
import { NotFoundException } from '../../../../shared/exceptions/not-found.exception';
import { ERROR_CODES } from '../../../../shared/types/error-codes';

export interface CardDetails {
    card: Card;
    transactions: Transaction[];
}

export class GetCardUseCase {
    constructor(private readonly session: LedgerSession) {}

    async execute(cardId: number): Promise<CardDetails> {
        return this.session.run(async ({ cards, transactions }) => {
            const card = await cards.findById(cardId);
            if (!card) {
                throw new NotFoundException(`Card ${cardId} not found`, ERROR_CODES.CARD_NOT_FOUND);
            }

            return {
                card,
                transactions: await transactions.findByCard(cardId)
            };
        });
    }
}
