// test/unit/infrastructure/database/postgres-ledger.session.test.ts
import { Pool } from 'pg';
import { PostgresLedgerSession } from '@/infrastructure/database/postgres/postgres-ledger.session';
import { CardType } from '@/core/domain/entities/card.entity';
import { MockPoolClient, TestUtils } from '@test/helpers/test-utils';

describe('PostgresLedgerSession', () => {
    let connection: MockPoolClient;
    let session: PostgresLedgerSession;

    const statements = (): unknown[] => connection.query.mock.calls.map(([sql]) => sql);

    beforeEach(() => {
        connection = TestUtils.createMockPoolClient();
        const pool = { connect: jest.fn().mockResolvedValue(connection.client) };
        session = new PostgresLedgerSession(pool as unknown as Pool);
    });

    it('should run the work inside BEGIN and COMMIT on one connection', async () => {
        connection.query.mockImplementation((sql: string) =>
            Promise.resolve(
                sql.startsWith('SELECT')
                    ? { rows: [{ id: 1, name: 'Main', card_type: 'credit', balance: 300 }], rowCount: 1 }
                    : { rows: [], rowCount: 0 }
            )
        );

        const card = await session.run(({ cards }) => cards.findByIdForUpdate(1));

        expect(card).toEqual({ id: 1, name: 'Main', cardType: CardType.CREDIT, balance: 300 });
        expect(statements()).toEqual([
            'BEGIN',
            'SELECT id, name, card_type, balance FROM cards WHERE id = $1 FOR UPDATE',
            'COMMIT'
        ]);
        expect(connection.release).toHaveBeenCalledTimes(1);
        expect(connection.release).toHaveBeenCalledWith(undefined);
    });

    it('should roll back and release the connection when the work fails', async () => {
        await expect(
            session.run(async ({ transactions }) => {
                await transactions.deleteByCard(1);
                throw new Error('Card vanished');
            })
        ).rejects.toThrow('Card vanished');

        expect(statements()).toEqual(['BEGIN', 'DELETE FROM transactions WHERE card_id = $1', 'ROLLBACK']);
        expect(connection.release).toHaveBeenCalledTimes(1);
        expect(connection.release).toHaveBeenCalledWith(undefined);
    });

    it('should discard the connection when COMMIT fails', async () => {
        const commitError = new Error('server closed the connection unexpectedly');
        connection.query.mockImplementation((sql: string) =>
            sql === 'COMMIT' ? Promise.reject(commitError) : Promise.resolve({ rows: [], rowCount: 0 })
        );

        await expect(session.run(({ cards }) => cards.delete(1))).rejects.toThrow(commitError);

        expect(connection.release).toHaveBeenCalledWith(commitError);
    });

    it('should surface the work error and discard the connection when ROLLBACK fails', async () => {
        const rollbackError = new Error('terminating connection due to administrator command');
        connection.query.mockImplementation((sql: string) =>
            sql === 'ROLLBACK' ? Promise.reject(rollbackError) : Promise.resolve({ rows: [], rowCount: 0 })
        );

        await expect(
            session.run(async ({ cards }) => {
                const card = await cards.findByIdForUpdate(1);
                if (!card) {
                    throw new Error('Card 1 not found');
                }
                return card;
            })
        ).rejects.toThrow('Card 1 not found');

        expect(connection.release).toHaveBeenCalledWith(rollbackError);
    });

    it('should unbind the repositories once the work is done', async () => {
        const escaped = await session.run(async (repositories) => repositories);

        await expect(escaped.cards.findAll()).rejects.toThrow('CardRepositoryImpl used outside of a unit of work');
    });
});
