// backend/src/api/middlewares/error-handler.middleware.ts
import { FastifyError, FastifyReply, FastifyRequest } from 'fastify';
import { ZodError } from 'zod';
import { BaseException } from '../../shared/exceptions/base.exception';
import { ApiErrorResponse } from '../../shared/types/common.types';
import { ERROR_CODES } from '../../shared/types/error-codes';
import { HTTP_STATUS } from '../../shared/constants/status-codes';
import { ValidationUtil } from '../../shared/utils/validation.util';
import { logger } from '../../infrastructure/monitoring/logger.service';

export interface ErrorHandlerOptions {
    /** Hide messages of unexpected errors from clients */
    exposeInternalErrors: boolean;
}

/**
 * Maps every error thrown by a route to the API error envelope
 */
export function createErrorHandler(options: ErrorHandlerOptions) {
    return function errorHandler(error: FastifyError | Error, request: FastifyRequest, reply: FastifyReply): void {
        const { statusCode, body } = toErrorResponse(error, options);

        if (statusCode >= HTTP_STATUS.INTERNAL_ERROR) {
            logger.error('Request failed', error, { method: request.method, url: request.url, statusCode });
        } else {
            logger.warn('Request rejected', {
                method: request.method,
                url: request.url,
                statusCode,
                code: body.error.code
            });
        }

        reply.status(statusCode).send(body);
    };
}

export function notFoundHandler(request: FastifyRequest, reply: FastifyReply): void {
    const body: ApiErrorResponse = {
        success: false,
        error: {
            code: ERROR_CODES.ROUTE_NOT_FOUND,
            message: `Route ${request.method} ${request.url} not found`
        }
    };
    reply.status(HTTP_STATUS.NOT_FOUND).send(body);
}

function toErrorResponse(
    error: FastifyError | Error,
    options: ErrorHandlerOptions
): { statusCode: number; body: ApiErrorResponse } {
    if (error instanceof BaseException) {
        return { statusCode: error.statusCode, body: { success: false, error: error.toJSON() } };
    }

    if (error instanceof ZodError) {
        return {
            statusCode: HTTP_STATUS.BAD_REQUEST,
            body: {
                success: false,
                error: {
                    code: ERROR_CODES.VALIDATION_ERROR,
                    message: 'Invalid input data',
                    details: ValidationUtil.toFieldErrors(error)
                }
            }
        };
    }

    // Fastify's own client errors: malformed JSON, unsupported media type, body too large
    const statusCode = 'statusCode' in error && typeof error.statusCode === 'number' ? error.statusCode : HTTP_STATUS.INTERNAL_ERROR;
    if (statusCode >= HTTP_STATUS.BAD_REQUEST && statusCode < HTTP_STATUS.INTERNAL_ERROR) {
        return {
            statusCode,
            body: {
                success: false,
                error: {
                    code: 'code' in error && typeof error.code === 'string' ? error.code : ERROR_CODES.VALIDATION_ERROR,
                    message: error.message
                }
            }
        };
    }

    return {
        statusCode: HTTP_STATUS.INTERNAL_ERROR,
        body: {
            success: false,
            error: {
                code: ERROR_CODES.INTERNAL_SERVER_ERROR,
                message: options.exposeInternalErrors ? error.message : 'Internal server error'
            }
        }
    };
}
