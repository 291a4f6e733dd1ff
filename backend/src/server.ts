// backend/src/server.ts
import dotenv from 'dotenv';
import path from 'path';

// Environment file by NODE_ENV, then the plain .env as fallback
const envFile = process.env.NODE_ENV === 'production'
    ? '.env.production'
    : process.env.NODE_ENV === 'test'
        ? '.env.test'
        : '.env.development';

dotenv.config({ path: path.resolve(process.cwd(), envFile) });
dotenv.config();

import App from './app';
import { ConfigService } from './config/environment';
import { logger } from './infrastructure/monitoring/logger.service';
import { PostgresConnection } from './infrastructure/database/connections';
import { ensureSchema } from './infrastructure/database/postgres/schema';
import { PostgresLedgerSession } from './infrastructure/database/postgres/postgres-ledger.session';

/**
 * Process entry point: configuration, database, HTTP server and graceful shutdown
 */
class Server {
    private app: App | null = null;
    private database: PostgresConnection | null = null;
    private shutdownInProgress = false;

    constructor(private readonly config: ConfigService) {
        this.setupShutdownHandlers();
    }

    public async start(): Promise<void> {
        try {
            logger.info('Starting server...', { environment: this.config.get('NODE_ENV') });

            const database = PostgresConnection.fromSettings(this.config.getAll());
            this.database = database;
            await database.connect();
            await ensureSchema(database.getPool());

            this.app = new App(
                {
                    session: new PostgresLedgerSession(database.getPool()),
                    checkDatabase: () => database.healthCheck()
                },
                {
                    apiPrefix: this.config.get('API_PREFIX'),
                    environment: this.config.get('NODE_ENV'),
                    host: this.config.get('HOST'),
                    port: this.config.get('PORT'),
                    enableSwagger: this.config.get('ENABLE_SWAGGER'),
                    cors: {
                        origin: this.config.get('CORS_ORIGIN'),
                        credentials: true
                    }
                }
            );

            await this.app.initialize();
            await this.app.start();

        } catch (error) {
            logger.fatal('Failed to start server', error);
            await this.shutdown(1);
        }
    }

    private setupShutdownHandlers(): void {
        process.on('SIGTERM', () => {
            logger.info('SIGTERM received. Starting graceful shutdown...');
            void this.shutdown(0);
        });

        process.on('SIGINT', () => {
            logger.info('SIGINT received. Starting graceful shutdown...');
            void this.shutdown(0);
        });

        process.on('uncaughtException', (error) => {
            logger.fatal('Uncaught Exception', error);
            void this.shutdown(1);
        });

        process.on('unhandledRejection', (reason) => {
            logger.fatal('Unhandled Rejection', reason);
            void this.shutdown(1);
        });
    }

    private async shutdown(exitCode: number): Promise<void> {
        if (this.shutdownInProgress) {
            return;
        }
        this.shutdownInProgress = true;

        try {
            if (this.app) {
                await this.app.close();
            }
            if (this.database) {
                await this.database.disconnect();
            }
            logger.info('Graceful shutdown completed');
        } catch (error) {
            logger.error('Error during shutdown', error);
            exitCode = 1;
        } finally {
            logger.flush();
            process.exit(exitCode);
        }
    }
}

async function main(): Promise<void> {
    const server = new Server(ConfigService.getInstance());
    await server.start();
}

if (require.main === module) {
    main().catch((error: unknown) => {
        logger.fatal('Failed to start application', error);
        process.exit(1);
    });
}

export default Server;
