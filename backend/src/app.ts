// backend/src/app.ts
import fastify, { FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import swagger from '@fastify/swagger';
import swaggerUi from '@fastify/swagger-ui';

import { LedgerSession } from './core/domain/repositories/ledger-session';
import { DatabaseHealth } from './infrastructure/database/connections';
import { logger } from './infrastructure/monitoring/logger.service';
import { createErrorHandler, notFoundHandler } from './api/middlewares/error-handler.middleware';
import { CardController } from './api/controllers/card.controller';
import { TransactionController } from './api/controllers/transaction.controller';
import { DashboardController } from './api/controllers/dashboard.controller';
import cardRoutes from './api/routes/card.routes';
import transactionRoutes from './api/routes/transaction.routes';
import dashboardRoutes from './api/routes/dashboard.routes';
import healthRoutes from './api/routes/health.routes';

export interface AppConfig {
    apiPrefix: string;
    environment: string;
    host: string;
    port: number;
    enableSwagger: boolean;
    cors: {
        origin: string | string[] | boolean;
        credentials: boolean;
    };
}

export interface AppDependencies {
    session: LedgerSession;
    checkDatabase?: () => Promise<DatabaseHealth>;
}

export const DEFAULT_APP_CONFIG: AppConfig = {
    apiPrefix: '/api',
    environment: 'development',
    host: '0.0.0.0',
    port: 3333,
    enableSwagger: false,
    cors: {
        origin: ['http://localhost:3000'],
        credentials: true
    }
};

export class App {
    private fastify: FastifyInstance;
    private config: AppConfig;

    constructor(private readonly dependencies: AppDependencies, config?: Partial<AppConfig>) {
        this.config = { ...DEFAULT_APP_CONFIG, ...config };

        this.fastify = fastify({
            logger: false,
            trustProxy: true,
            requestTimeout: 30000,
            bodyLimit: 1048576 // 1MB
        });
    }

    public async initialize(): Promise<void> {
        try {
            logger.info('Initializing application...', { environment: this.config.environment });

            await this.setupPlugins();
            this.setupHooks();
            this.setupErrorHandling();
            await this.setupRoutes();

            await this.fastify.ready();

            logger.info('Application initialized successfully');

        } catch (error) {
            logger.error('Failed to initialize application', error);
            throw error;
        }
    }

    private async setupPlugins(): Promise<void> {
        await this.fastify.register(cors, {
            origin: this.config.cors.origin,
            credentials: this.config.cors.credentials
        });

        // Form posts from plain HTML forms
        this.fastify.addContentTypeParser(
            'application/x-www-form-urlencoded',
            { parseAs: 'string' },
            (_request, body, done) => {
                done(null, Object.fromEntries(new URLSearchParams(String(body))));
            }
        );

        if (this.config.enableSwagger) {
            await this.fastify.register(swagger, {
                swagger: {
                    info: {
                        title: 'Card Ledger API',
                        description: 'Payment cards, their transactions and monthly savings statistics',
                        version: '1.0.0'
                    },
                    consumes: ['application/json', 'application/x-www-form-urlencoded'],
                    produces: ['application/json'],
                    tags: [
                        { name: 'Health', description: 'Health check endpoints' },
                        { name: 'Cards', description: 'Debit and credit cards' },
                        { name: 'Transactions', description: 'Income and expense records' },
                        { name: 'Dashboard', description: 'Monthly statistics' }
                    ]
                }
            });

            await this.fastify.register(swaggerUi, {
                routePrefix: '/docs',
                uiConfig: {
                    docExpansion: 'list',
                    deepLinking: false
                }
            });
        }
    }

    private setupHooks(): void {
        this.fastify.addHook('onResponse', async (request, reply) => {
            logger.http(`${request.method} ${request.url}`, {
                requestId: request.id,
                statusCode: reply.statusCode,
                duration: `${Math.round(reply.elapsedTime)}ms`
            });
        });
    }

    private setupErrorHandling(): void {
        this.fastify.setErrorHandler(createErrorHandler({
            exposeInternalErrors: this.config.environment !== 'production'
        }));
        this.fastify.setNotFoundHandler(notFoundHandler);
    }

    private async setupRoutes(): Promise<void> {
        const basePrefix = this.config.apiPrefix;
        const { session, checkDatabase } = this.dependencies;

        await this.fastify.register(healthRoutes, {
            prefix: basePrefix,
            checkDatabase
        });

        await this.fastify.register(dashboardRoutes, {
            prefix: basePrefix,
            controller: new DashboardController(session)
        });

        await this.fastify.register(cardRoutes, {
            prefix: `${basePrefix}/cards`,
            controller: new CardController(session)
        });

        await this.fastify.register(transactionRoutes, {
            prefix: `${basePrefix}/transactions`,
            controller: new TransactionController(session)
        });
    }

    public async start(): Promise<void> {
        await this.fastify.listen({
            host: this.config.host,
            port: this.config.port
        });

        logger.info(`Server is running on http://${this.config.host}:${this.config.port}`);
    }

    public async close(): Promise<void> {
        await this.fastify.close();
        logger.info('Server closed successfully');
    }

    public getFastifyInstance(): FastifyInstance {
        return this.fastify;
    }
}

export default App;
