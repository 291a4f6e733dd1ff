import { z } from 'zod';
import { InfrastructureException } from '../shared/exceptions/infrastructure.exception';
import { ERROR_CODES } from '../shared/types/error-codes';

const booleanFlag = (fallback: 'true' | 'false') =>
    z.enum(['true', 'false']).default(fallback).transform(val => val === 'true');

const integer = (fallback: string) =>
    z.string().regex(/^\d+$/, 'Must be a non-negative integer').default(fallback).transform(val => parseInt(val, 10));

export const environmentSchema = z.object({
    // Application
    NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
    HOST: z.string().default('0.0.0.0'),
    PORT: integer('3333'),
    API_PREFIX: z.string().startsWith('/', 'API prefix must start with /').default('/api'),
    CORS_ORIGIN: z.string().default('http://localhost:3000').transform(val => val.split(',').map(origin => origin.trim())),

    // Database - PostgreSQL
    POSTGRES_HOST: z.string().default('localhost'),
    POSTGRES_PORT: integer('5432'),
    POSTGRES_DB: z.string().default('card_ledger'),
    POSTGRES_USER: z.string().default('postgres'),
    POSTGRES_PASSWORD: z.string().default(''),
    POSTGRES_MAX_CONNECTIONS: integer('10'),

    // Logging
    LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional(),

    // Features
    ENABLE_SWAGGER: booleanFlag('true')
});

export type Environment = z.infer<typeof environmentSchema>;

/**
 * Parses raw environment variables. Throws with every zod issue attached when a value is invalid.
 */
export function loadEnvironment(source: NodeJS.ProcessEnv): Environment {
    const result = environmentSchema.safeParse(source);
    if (!result.success) {
        const issues = result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
        throw new InfrastructureException(`Invalid configuration: ${issues.join('; ')}`, ERROR_CODES.CONFIGURATION_ERROR);
    }
    return result.data;
}

export class ConfigService {
    private static instance: ConfigService | undefined;
    private readonly config: Environment;

    constructor(config: Environment) {
        this.config = config;
    }

    static getInstance(): ConfigService {
        if (!ConfigService.instance) {
            ConfigService.instance = new ConfigService(loadEnvironment(process.env));
        }
        return ConfigService.instance;
    }

    get<K extends keyof Environment>(key: K): Environment[K] {
        return this.config[key];
    }

    getAll(): Environment {
        return { ...this.config };
    }

    isDevelopment(): boolean {
        return this.config.NODE_ENV === 'development';
    }

    isProduction(): boolean {
        return this.config.NODE_ENV === 'production';
    }
}
