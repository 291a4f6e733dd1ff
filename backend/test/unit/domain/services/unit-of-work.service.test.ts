// test/unit/domain/services/unit-of-work.service.test.ts
import { UnitOfWork } from '@/core/domain/services/unit-of-work.service';
import { CardRepositoryImpl } from '@/infrastructure/database/postgres/repositories/card.repository.impl';
import { TransactionRepositoryImpl } from '@/infrastructure/database/postgres/repositories/transaction.repository.impl';
import { TransactionType } from '@/core/domain/entities/transaction.entity';
import { MockPoolClient, TestUtils } from '@test/helpers/test-utils';

describe('UnitOfWork', () => {
    let connection: MockPoolClient;
    let cards: CardRepositoryImpl;
    let transactions: TransactionRepositoryImpl;
    let unitOfWork: UnitOfWork;

    const cardRow = { id: 1, name: 'Everyday Debit', card_type: 'debit', balance: 900 };
    const transactionRow = {
        id: 5,
        card_id: 1,
        transaction_type: 'expense',
        amount: 100,
        description: 'Groceries',
        category: 'Food & Dining',
        date: '2024-01-15'
    };

    const statements = (): string[] =>
        connection.query.mock.calls.map(([sql]) => String(sql).trim().split(/\s+/).slice(0, 2).join(' '));

    // Every statement starting with one of `failing` rejects with an error named after it
    const failOn = (...failing: string[]): void => {
        connection.query.mockImplementation((sql: string) => {
            const match = failing.find(prefix => sql.trim().startsWith(prefix));
            if (match) {
                return Promise.reject(new Error(`${match} failed`));
            }
            const rows = sql.startsWith('UPDATE') ? [cardRow] : sql.startsWith('WITH') ? [transactionRow] : [];
            return Promise.resolve({ rows, rowCount: rows.length });
        });
    };

    const recordExpense = async (): Promise<void> => {
        await transactions.create({
            cardId: 1,
            transactionType: TransactionType.EXPENSE,
            amount: 100,
            description: 'Groceries',
            category: 'Food & Dining',
            date: '2024-01-15'
        });
        await cards.updateBalance(1, 900);
    };

    beforeEach(() => {
        connection = TestUtils.createMockPoolClient();
        cards = new CardRepositoryImpl();
        transactions = new TransactionRepositoryImpl();
        unitOfWork = new UnitOfWork(connection.client, [cards, transactions]);
    });

    it('should commit the balance update together with the insert', async () => {
        failOn();

        const balance = await unitOfWork.execute(async () => {
            await transactions.create({
                cardId: 1,
                transactionType: TransactionType.EXPENSE,
                amount: 100,
                description: 'Groceries',
                category: 'Food & Dining',
                date: '2024-01-15'
            });
            return (await cards.updateBalance(1, 900)).balance;
        });

        expect(balance).toBe(900);
        expect(statements()).toEqual(['BEGIN', 'WITH t', 'UPDATE cards', 'COMMIT']);
        expect(unitOfWork.connectionError()).toBeUndefined();
    });

    it('should unbind the repositories once the work is done', async () => {
        await unitOfWork.execute(async () => undefined);

        await expect(cards.findAll()).rejects.toThrow('CardRepositoryImpl used outside of a unit of work');
    });

    it('should roll back without touching the balance when the insert fails', async () => {
        failOn('WITH');

        await expect(unitOfWork.execute(recordExpense)).rejects.toThrow('WITH failed');

        expect(statements()).toEqual(['BEGIN', 'WITH t', 'ROLLBACK']);
        expect(unitOfWork.connectionError()).toBeUndefined();
    });

    it('should keep the original error when ROLLBACK fails as well', async () => {
        failOn('UPDATE', 'ROLLBACK');

        await expect(unitOfWork.execute(recordExpense)).rejects.toThrow('UPDATE failed');

        expect(statements()).toEqual(['BEGIN', 'WITH t', 'UPDATE cards', 'ROLLBACK']);
        expect(unitOfWork.connectionError()?.message).toBe('ROLLBACK failed');
    });

    it('should not run the work when BEGIN fails', async () => {
        failOn('BEGIN');
        const work = jest.fn(recordExpense);

        await expect(unitOfWork.execute(work)).rejects.toThrow('BEGIN failed');

        expect(work).not.toHaveBeenCalled();
        expect(unitOfWork.connectionError()?.message).toBe('BEGIN failed');
    });

    it('should report a failed COMMIT as a broken connection', async () => {
        failOn('COMMIT');

        await expect(unitOfWork.execute(recordExpense)).rejects.toThrow('COMMIT failed');

        expect(statements()).toEqual(['BEGIN', 'WITH t', 'UPDATE cards', 'COMMIT']);
        expect(unitOfWork.connectionError()?.message).toBe('COMMIT failed');
    });
});
