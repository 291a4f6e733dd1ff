// backend/src/core/domain/repositories/card.repository.ts
import { Card, NewCard } from '../entities/card.entity';

export interface CardRepository {
    create(card: NewCard): Promise<Card>;
    findById(id: number): Promise<Card | null>;
    /**
     * Same as findById, but holds a write lock on the card until the surrounding
     * unit of work ends, so concurrent balance updates on one card serialise.
     */
    findByIdForUpdate(id: number): Promise<Card | null>;
    findAll(): Promise<Card[]>;
    updateBalance(id: number, balance: number): Promise<Card>;
    delete(id: number): Promise<boolean>;
}
