// backend/src/shared/constants/status-codes.ts
export const HTTP_STATUS = {
    SUCCESS: 200,
    CREATED: 201,

    BAD_REQUEST: 400,
    NOT_FOUND: 404,
    UNPROCESSABLE_ENTITY: 422,

    INTERNAL_ERROR: 500,
    SERVICE_UNAVAILABLE: 503
} as const;
