// backend/src/shared/exceptions/business.exception.ts
import { BaseException } from './base.exception';
import { ERROR_CODES } from '../types/error-codes';
import { HTTP_STATUS } from '../constants/status-codes';

export class BusinessException extends BaseException {
    constructor(message: string, code: string = ERROR_CODES.BUSINESS_ERROR, statusCode: number = HTTP_STATUS.UNPROCESSABLE_ENTITY) {
        super(message, code, statusCode);
    }
}
