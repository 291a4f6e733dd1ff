// backend/src/api/validators/transaction.validator.ts
import { z } from 'zod';
import { TransactionType } from '../../core/domain/entities/transaction.entity';
import { DateUtil } from '../../shared/utils/date.util';
import { blankToUndefined, toNumber } from './common.validator';

/**
 * Schema for recording a transaction against a card.
 * Amount is always positive: whether it raises or lowers the balance depends on the card type.
 */
export const createTransactionSchema = z.object({
    cardId: z.preprocess(
        toNumber,
        z.number({ required_error: 'Card is required', invalid_type_error: 'Card ID must be a number' })
            .int('Card ID must be an integer')
            .positive('Card ID must be positive')
    ),

    transactionType: z.nativeEnum(TransactionType, {
        errorMap: () => ({ message: 'Transaction type must be income or expense' }),
    }),

    amount: z.preprocess(
        toNumber,
        z.number({ required_error: 'Amount is required', invalid_type_error: 'Amount must be a number' })
            .finite('Amount must be a finite number')
            .positive('Amount must be positive')
            .max(999999999.99, 'Amount is too large')
            .multipleOf(0.01, 'Amount can have at most 2 decimal places')
    ),

    description: z.string({ required_error: 'Description is required' })
        .trim()
        .min(1, 'Description is required')
        .max(200, 'Description must be at most 200 characters'),

    category: z.string({ required_error: 'Category is required' })
        .trim()
        .min(1, 'Category is required')
        .max(50, 'Category must be at most 50 characters'),

    date: z.preprocess(
        blankToUndefined,
        z.string()
            .refine(DateUtil.isValidDate, 'Date must be a valid date in YYYY-MM-DD format')
            .optional()
    ),
});
