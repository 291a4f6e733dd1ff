// backend/src/shared/utils/validation.util.ts
import { z } from 'zod';
import { ValidationException, FieldError } from '../exceptions/validation.exception';

export class ValidationUtil {
    /**
     * Parses `data` with a zod schema, turning zod issues into a ValidationException
     */
    static validate<S extends z.ZodTypeAny>(schema: S, data: unknown): z.output<S> {
        const result = schema.safeParse(data);

        if (!result.success) {
            throw new ValidationException('Invalid input data', ValidationUtil.toFieldErrors(result.error));
        }

        return result.data;
    }

    static toFieldErrors(error: z.ZodError): FieldError[] {
        return error.issues.map(issue => ({
            field: issue.path.length > 0 ? issue.path.join('.') : 'body',
            message: issue.message
        }));
    }
}
