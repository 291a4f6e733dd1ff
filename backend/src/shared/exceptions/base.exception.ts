// backend/src/shared/exceptions/base.exception.ts
export interface ExceptionBody {
    code: string;
    message: string;
    details?: unknown;
}

export abstract class BaseException extends Error {
    public readonly code: string;
    public readonly statusCode: number;
    public readonly details?: unknown;

    constructor(
        message: string,
        code: string,
        statusCode: number,
        details?: unknown
    ) {
        super(message);
        this.name = this.constructor.name;
        this.code = code;
        this.statusCode = statusCode;
        this.details = details;

        // Maintains proper stack trace for where our error was thrown
        Error.captureStackTrace(this, this.constructor);
    }

    toJSON(): ExceptionBody {
        return {
            code: this.code,
            message: this.message,
            ...(this.details !== undefined && { details: this.details }),
        };
    }
}
