// backend/src/shared/types/error-codes.ts

/**
 * Error codes returned in the `error.code` field of API responses.
 */
export const ERROR_CODES = {
    // Validation
    VALIDATION_ERROR: 'VALIDATION_ERROR',

    // Lookups
    NOT_FOUND: 'NOT_FOUND',
    CARD_NOT_FOUND: 'CARD_NOT_FOUND',
    ROUTE_NOT_FOUND: 'ROUTE_NOT_FOUND',

    // Business rules
    BUSINESS_ERROR: 'BUSINESS_ERROR',
    UNSUPPORTED_CARD_TYPE: 'UNSUPPORTED_CARD_TYPE',
    UNSUPPORTED_TRANSACTION_TYPE: 'UNSUPPORTED_TRANSACTION_TYPE',
    TRANSACTION_CREATION_FAILED: 'TRANSACTION_CREATION_FAILED',

    // System
    DATABASE_ERROR: 'DATABASE_ERROR',
    CONFIGURATION_ERROR: 'CONFIGURATION_ERROR',
    INTERNAL_SERVER_ERROR: 'INTERNAL_SERVER_ERROR',
} as const;

export type ErrorCode = typeof ERROR_CODES[keyof typeof ERROR_CODES];
