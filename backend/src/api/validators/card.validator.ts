// backend/src/api/validators/card.validator.ts
import { z } from 'zod';
import { CardType } from '../../core/domain/entities/card.entity';
import { toNumber } from './common.validator';

export const createCardSchema = z.object({
    name: z.string({ required_error: 'Name is required' })
        .trim()
        .min(1, 'Name is required')
        .max(100, 'Name must be at most 100 characters'),

    cardType: z.nativeEnum(CardType, {
        errorMap: () => ({ message: 'Card type must be debit or credit' }),
    }),

    // Opening balance; negative means overdrawn (debit) or in credit (credit card)
    balance: z.preprocess(
        toNumber,
        z.number({ invalid_type_error: 'Balance must be a number' })
            .finite('Balance must be a finite number')
            .min(-999999999.99, 'Balance is too small')
            .max(999999999.99, 'Balance is too large')
            .multipleOf(0.01, 'Balance can have at most 2 decimal places')
            .optional()
    ).transform(balance => balance ?? 0),
});
