import pino, { Logger, LoggerOptions } from 'pino';

export type LogMeta = Record<string, unknown>;

export class LoggerService {
    private static instance: LoggerService;
    private logger: Logger;

    private constructor() {
        this.logger = this.createLogger();
    }

    static getInstance(): LoggerService {
        if (!LoggerService.instance) {
            LoggerService.instance = new LoggerService();
        }
        return LoggerService.instance;
    }

    private createLogger(): Logger {
        const isDevelopment = process.env.NODE_ENV === 'development';
        const isTest = process.env.NODE_ENV === 'test';
        const logLevel = process.env.LOG_LEVEL || (isTest ? 'silent' : isDevelopment ? 'debug' : 'info');

        const baseOptions: LoggerOptions = {
            level: logLevel,
            timestamp: pino.stdTimeFunctions.isoTime,
            formatters: {
                level: (label) => ({ level: label })
            }
        };

        if (isDevelopment) {
            return pino({
                ...baseOptions,
                transport: {
                    target: 'pino-pretty',
                    options: {
                        colorize: true,
                        translateTime: 'HH:MM:ss Z',
                        ignore: 'pid,hostname'
                    }
                }
            });
        }

        return pino({
            ...baseOptions,
            serializers: {
                error: pino.stdSerializers.err
            }
        });
    }

    private formatMessage(message: string, meta?: LogMeta): object {
        return {
            message,
            ...meta
        };
    }

    debug(message: string, meta?: LogMeta): void {
        this.logger.debug(this.formatMessage(message, meta));
    }

    info(message: string, meta?: LogMeta): void {
        this.logger.info(this.formatMessage(message, meta));
    }

    warn(message: string, meta?: LogMeta): void {
        this.logger.warn(this.formatMessage(message, meta));
    }

    error(message: string, error?: unknown, meta?: LogMeta): void {
        this.logger.error(this.formatMessage(message, { ...meta, ...LoggerService.errorMeta(error) }));
    }

    fatal(message: string, error?: unknown, meta?: LogMeta): void {
        this.logger.fatal(this.formatMessage(message, { ...meta, ...LoggerService.errorMeta(error) }));
    }

    http(message: string, meta?: LogMeta): void {
        this.info(`[HTTP] ${message}`, meta);
    }

    database(message: string, meta?: LogMeta): void {
        this.debug(`[DATABASE] ${message}`, meta);
    }

    flush(): void {
        this.logger.flush();
    }

    private static errorMeta(error?: unknown): LogMeta {
        if (error === undefined) {
            return {};
        }
        if (error instanceof Error) {
            return {
                error: {
                    name: error.name,
                    message: error.message,
                    stack: error.stack
                }
            };
        }
        return { error: { message: String(error) } };
    }
}

// Singleton instance
export const logger = LoggerService.getInstance();
