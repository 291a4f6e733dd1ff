// backend/src/api/validators/common.validator.ts
import { z } from 'zod';

/**
 * Form posts send numbers as strings; blank values count as missing.
 */
export const toNumber = (value: unknown): unknown => {
    if (value === null || value === undefined) return undefined;
    if (typeof value === 'string') {
        return value.trim() === '' ? undefined : Number(value);
    }
    return value;
};

export const blankToUndefined = (value: unknown): unknown =>
    typeof value === 'string' && value.trim() === '' ? undefined : value;

export const idParamsSchema = z.object({
    id: z.preprocess(
        toNumber,
        z.number({ required_error: 'ID is required', invalid_type_error: 'ID must be a number' })
            .int('ID must be an integer')
            .positive('ID must be positive')
    ),
});
