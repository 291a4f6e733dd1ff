// backend/src/core/domain/services/balance.service.ts
import { Card, CardType } from '../entities/card.entity';
import { TransactionType } from '../entities/transaction.entity';
import { isPositiveAmount, roundToCents } from '../value-objects/money.vo';
import { BusinessException } from '../../../shared/exceptions/business.exception';
import { ValidationException } from '../../../shared/exceptions/validation.exception';
import { ERROR_CODES } from '../../../shared/types/error-codes';

/**
 * Signed change a transaction makes to a card's balance.
 *
 * | card   | income  | expense |
 * |--------|---------|---------|
 * | debit  | +amount | -amount |
 * | credit | -amount | +amount |
 *
 * No clamping: debit balances may go below zero (overdraft) and
 * credit balances below zero (overpayment in the holder's favour).
 */
export function balanceDelta(cardType: CardType, transactionType: TransactionType, amount: number): number {
    if (!isPositiveAmount(amount)) {
        throw new ValidationException('Amount must be a positive number', [
            { field: 'amount', message: `Invalid amount: ${amount}` }
        ]);
    }

    const direction = incomeDirection(cardType);

    switch (transactionType) {
        case TransactionType.INCOME:
            return direction * amount;
        case TransactionType.EXPENSE:
            return -direction * amount;
        default: {
            const unsupported: never = transactionType;
            throw new BusinessException(
                `Unsupported transaction type: ${String(unsupported)}`,
                ERROR_CODES.UNSUPPORTED_TRANSACTION_TYPE
            );
        }
    }
}

/**
 * New balance of `card` after recording a transaction against it.
 * Throws a ValidationException when the result cannot be kept in cents.
 */
export function applyTransaction(
    card: Pick<Card, 'balance' | 'cardType'>,
    transactionType: TransactionType,
    amount: number
): number {
    return roundToCents(card.balance + balanceDelta(card.cardType, transactionType, amount));
}

function incomeDirection(cardType: CardType): 1 | -1 {
    switch (cardType) {
        case CardType.DEBIT:
            return 1;
        // income pays down credit-card debt
        case CardType.CREDIT:
            return -1;
        default: {
            const unsupported: never = cardType;
            throw new BusinessException(
                `Unsupported card type: ${String(unsupported)}`,
                ERROR_CODES.UNSUPPORTED_CARD_TYPE
            );
        }
    }
}
