// backend/src/shared/exceptions/infrastructure.exception.ts
import { BaseException } from './base.exception';
import { ERROR_CODES } from '../types/error-codes';
import { HTTP_STATUS } from '../constants/status-codes';

export class InfrastructureException extends BaseException {
    constructor(message: string, code: string = ERROR_CODES.DATABASE_ERROR, statusCode: number = HTTP_STATUS.INTERNAL_ERROR) {
        super(message, code, statusCode);
    }
}
