// backend/src/core/application/use-cases/card/list-cards.use-case.ts
import { Card } from '../../../domain/entities/card.entity';
import { LedgerSession } from '../../../domain/repositories/ledger-session';

export class ListCardsUseCase {
    constructor(private readonly session: LedgerSession) {}

    async execute(): Promise<Card[]> {
        return this.session.run(({ cards }) => cards.findAll());
    }
}
