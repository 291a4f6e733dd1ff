// backend/src/shared/exceptions/not-found.exception.ts
import { BaseException } from './base.exception';
import { ERROR_CODES } from '../types/error-codes';
import { HTTP_STATUS } from '../constants/status-codes';

export class NotFoundException extends BaseException {
    constructor(message: string, code: string = ERROR_CODES.NOT_FOUND, details?: unknown) {
        super(message, code, HTTP_STATUS.NOT_FOUND, details);
    }
}
