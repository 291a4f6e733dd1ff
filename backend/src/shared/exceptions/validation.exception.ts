// backend/src/shared/exceptions/validation.exception.ts
import { BaseException } from './base.exception';
import { ERROR_CODES } from '../types/error-codes';
import { HTTP_STATUS } from '../constants/status-codes';

export interface FieldError {
    field: string;
    message: string;
}

export class ValidationException extends BaseException {
    public readonly validationErrors: FieldError[];

    constructor(message: string, validationErrors: FieldError[] = []) {
        super(message, ERROR_CODES.VALIDATION_ERROR, HTTP_STATUS.BAD_REQUEST, validationErrors.length > 0 ? validationErrors : undefined);
        this.validationErrors = validationErrors;
    }
}
