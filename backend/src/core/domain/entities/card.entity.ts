// backend/src/core/domain/entities/card.entity.ts

/**
 * For a debit card the balance is money held by the owner;
 * for a credit card it is debt owed by the owner.
 */
export enum CardType {
    DEBIT = 'debit',
    CREDIT = 'credit'
}

export const CARD_TYPES: readonly CardType[] = [CardType.DEBIT, CardType.CREDIT];

export interface Card {
    id: number;
    name: string;
    cardType: CardType;
    balance: number;
}

export type NewCard = Omit<Card, 'id'>;

export function isCardType(value: unknown): value is CardType {
    return typeof value === 'string' && CARD_TYPES.some((cardType) => cardType === value);
}
