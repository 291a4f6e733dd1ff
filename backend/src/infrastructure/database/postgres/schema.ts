// backend/src/infrastructure/database/postgres/schema.ts
import { Pool } from 'pg';
import { logger } from '../../monitoring/logger.service';

export const SCHEMA_STATEMENTS: readonly string[] = [
    `CREATE TABLE IF NOT EXISTS cards (
        id SERIAL PRIMARY KEY,
        name VARCHAR(100) NOT NULL,
        card_type VARCHAR(20) NOT NULL CHECK (card_type IN ('debit', 'credit')),
        balance DOUBLE PRECISION NOT NULL DEFAULT 0
    )`,
    `CREATE TABLE IF NOT EXISTS transactions (
        id SERIAL PRIMARY KEY,
        card_id INTEGER NOT NULL REFERENCES cards(id) ON DELETE CASCADE,
        transaction_type VARCHAR(20) NOT NULL CHECK (transaction_type IN ('income', 'expense')),
        amount DOUBLE PRECISION NOT NULL CHECK (amount > 0),
        description VARCHAR(200) NOT NULL,
        category VARCHAR(50) NOT NULL,
        date DATE NOT NULL DEFAULT CURRENT_DATE
    )`,
    'CREATE INDEX IF NOT EXISTS idx_transactions_card_id ON transactions(card_id)',
    'CREATE INDEX IF NOT EXISTS idx_transactions_date ON transactions(date DESC)',
];

/**
 * Creates the ledger tables when they are missing. Safe to run on every start.
 */
export async function ensureSchema(pool: Pool): Promise<void> {
    const client = await pool.connect();

    try {
        await client.query('BEGIN');
        for (const statement of SCHEMA_STATEMENTS) {
            await client.query(statement);
        }
        await client.query('COMMIT');
        logger.database('Schema ready', { statements: SCHEMA_STATEMENTS.length });
    } catch (error) {
        await client.query('ROLLBACK');
        logger.error('Failed to create schema', error);
        throw error;
    } finally {
        client.release();
    }
}
