// backend/src/core/application/use-cases/card/create-card.use-case.ts
import { Card, CardType } from '../../../domain/entities/card.entity';
import { LedgerSession } from '../../../domain/repositories/ledger-session';
import { roundToCents } from '../../../domain/value-objects/money.vo';
import { logger } from '../../../../infrastructure/monitoring/logger.service';

export interface CreateCardUseCaseRequest {
    name: string;
    cardType: CardType;
    balance?: number;
}

export class CreateCardUseCase {
    constructor(private readonly session: LedgerSession) {}

    async execute(request: CreateCardUseCaseRequest): Promise<Card> {
        const card = await this.session.run(({ cards }) => cards.create({
            name: request.name,
            cardType: request.cardType,
            balance: roundToCents(request.balance ?? 0)
        }));

        logger.info('Card created', {
            cardId: card.id,
            cardType: card.cardType,
            balance: card.balance
        });

        return card;
    }
}
