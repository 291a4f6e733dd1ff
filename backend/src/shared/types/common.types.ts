// backend/src/shared/types/common.types.ts
import { ExceptionBody } from '../exceptions/base.exception';

export interface ApiErrorResponse {
    success: false;
    error: ExceptionBody;
}
