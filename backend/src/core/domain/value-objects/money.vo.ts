// backend/src/core/domain/value-objects/money.vo.ts
import { ValidationException } from '../../../shared/exceptions/validation.exception';

/**
 * Rounds a monetary value to cents. Signed values are allowed:
 * balances go negative on overdraft or credit-card overpayment.
 * Throws when the value is too large to be expressed in cents.
 */
export function roundToCents(amount: number): number {
    const cents = (amount + Math.sign(amount) * Number.EPSILON) * 100;
    if (!Number.isFinite(cents)) {
        throw new ValidationException(`Monetary value out of range: ${amount}`);
    }

    const rounded = Math.round(cents) / 100;
    // normalise -0
    return rounded === 0 ? 0 : rounded;
}

export function isPositiveAmount(amount: number): boolean {
    return Number.isFinite(amount) && amount > 0;
}
