// test/integration/api/ledger.api.test.ts
import { FastifyInstance } from 'fastify';
import App from '@/app';
import { InMemoryLedgerSession } from '@test/helpers/in-memory-ledger.session';

describe('Ledger API', () => {
    let app: App;
    let server: FastifyInstance;
    let session: InMemoryLedgerSession;

    beforeEach(async () => {
        session = new InMemoryLedgerSession();
        app = new App({ session }, { environment: 'test' });
        await app.initialize();
        server = app.getFastifyInstance();
    });

    afterEach(async () => {
        await app.close();
    });

    const createCard = async (payload: Record<string, unknown>): Promise<number> => {
        const response = await server.inject({ method: 'POST', url: '/api/cards', payload });
        return JSON.parse(response.body).data.card.id;
    };

    const createTransaction = (payload: Record<string, unknown>) =>
        server.inject({ method: 'POST', url: '/api/transactions', payload });

    describe('POST /api/cards', () => {
        it('should create a card with a zero opening balance', async () => {
            const response = await server.inject({
                method: 'POST',
                url: '/api/cards',
                payload: { name: 'Everyday Debit', cardType: 'debit' }
            });

            expect(response.statusCode).toBe(201);
            expect(JSON.parse(response.body)).toEqual({
                success: true,
                data: { card: { id: 1, name: 'Everyday Debit', cardType: 'debit', balance: 0 } },
                message: 'Card created successfully'
            });
        });

        it('should accept a form post', async () => {
            const response = await server.inject({
                method: 'POST',
                url: '/api/cards',
                headers: { 'content-type': 'application/x-www-form-urlencoded' },
                payload: 'name=Travel+Credit&cardType=credit&balance=250.50'
            });

            expect(response.statusCode).toBe(201);
            expect(JSON.parse(response.body).data.card).toEqual({
                id: 1,
                name: 'Travel Credit',
                cardType: 'credit',
                balance: 250.5
            });
        });

        it('should reject an unknown card type', async () => {
            const response = await server.inject({
                method: 'POST',
                url: '/api/cards',
                payload: { name: 'Gift Card', cardType: 'prepaid' }
            });

            expect(response.statusCode).toBe(400);
            expect(JSON.parse(response.body)).toEqual({
                success: false,
                error: {
                    code: 'VALIDATION_ERROR',
                    message: 'Invalid input data',
                    details: [{ field: 'cardType', message: 'Card type must be debit or credit' }]
                }
            });
            expect(session.snapshot().cards).toHaveLength(0);
        });

        it('should reject an opening balance out of range', async () => {
            const response = await server.inject({
                method: 'POST',
                url: '/api/cards',
                payload: { name: 'Big', cardType: 'debit', balance: 1e307 }
            });

            expect(response.statusCode).toBe(400);
            expect(JSON.parse(response.body).error.details).toEqual([
                { field: 'balance', message: 'Balance is too large' }
            ]);
            expect(session.snapshot().cards).toHaveLength(0);
        });
    });

    describe('POST /api/transactions', () => {
        it('should record an expense and update the card balance', async () => {
            const cardId = await createCard({ name: 'Travel Credit', cardType: 'credit', balance: 500 });

            const response = await createTransaction({
                cardId,
                transactionType: 'expense',
                amount: 100,
                description: 'Hotel',
                category: 'Entertainment',
                date: '2024-02-14'
            });

            expect(response.statusCode).toBe(201);
            const body = JSON.parse(response.body);
            expect(body.message).toBe('Transaction created successfully');
            expect(body.data.card.balance).toBe(600);
            expect(body.data.transaction).toEqual({
                id: 1,
                cardId,
                transactionType: 'expense',
                amount: 100,
                description: 'Hotel',
                category: 'Entertainment',
                date: '2024-02-14'
            });
        });

        it.each([0, -10])('should reject amount %p without touching the balance', async (amount) => {
            const cardId = await createCard({ name: 'Everyday Debit', cardType: 'debit', balance: 1000 });

            const response = await createTransaction({
                cardId,
                transactionType: 'income',
                amount,
                description: 'Refund',
                category: 'Other'
            });

            expect(response.statusCode).toBe(400);
            expect(JSON.parse(response.body).error.details).toEqual([
                { field: 'amount', message: 'Amount must be positive' }
            ]);
            expect(session.snapshot().cards[0].balance).toBe(1000);
            expect(session.snapshot().transactions).toHaveLength(0);
        });

        it('should return 404 for an unknown card', async () => {
            const response = await createTransaction({
                cardId: 99,
                transactionType: 'income',
                amount: 10,
                description: 'Refund',
                category: 'Other'
            });

            expect(response.statusCode).toBe(404);
            expect(JSON.parse(response.body)).toEqual({
                success: false,
                error: { code: 'CARD_NOT_FOUND', message: 'Card 99 not found' }
            });
        });

        it('should map an unexpected store failure to 500', async () => {
            const cardId = await createCard({ name: 'Everyday Debit', cardType: 'debit' });
            session.failNext('transactions.create');

            const response = await createTransaction({
                cardId,
                transactionType: 'income',
                amount: 10,
                description: 'Refund',
                category: 'Other'
            });

            expect(response.statusCode).toBe(500);
            expect(JSON.parse(response.body).error).toEqual({
                code: 'TRANSACTION_CREATION_FAILED',
                message: 'Failed to create transaction'
            });
        });
    });

    describe('GET /api/transactions', () => {
        it('should list transactions newest first with card names', async () => {
            const cardId = await createCard({ name: 'Everyday Debit', cardType: 'debit' });
            await createTransaction({ cardId, transactionType: 'income', amount: 10, description: 'January', category: 'Salary', date: '2024-01-31' });
            await createTransaction({ cardId, transactionType: 'expense', amount: 4, description: 'March', category: 'Shopping', date: '2024-03-02' });

            const response = await server.inject({ method: 'GET', url: '/api/transactions' });

            expect(response.statusCode).toBe(200);
            const { transactions } = JSON.parse(response.body).data;
            expect(transactions.map((t: { description: string }) => t.description)).toEqual(['March', 'January']);
            expect(transactions[0].cardName).toBe('Everyday Debit');
        });
    });

    describe('GET /api/cards/:id', () => {
        it('should return the card with its transactions', async () => {
            const cardId = await createCard({ name: 'Everyday Debit', cardType: 'debit', balance: 50 });
            await createTransaction({ cardId, transactionType: 'expense', amount: 100, description: 'Rent share', category: 'Bills & Utilities', date: '2024-01-01' });

            const response = await server.inject({ method: 'GET', url: `/api/cards/${cardId}` });

            expect(response.statusCode).toBe(200);
            const { data } = JSON.parse(response.body);
            expect(data.card.balance).toBe(-50);
            expect(data.transactions).toHaveLength(1);
        });

        it('should reject a non-numeric id', async () => {
            const response = await server.inject({ method: 'GET', url: '/api/cards/abc' });

            expect(response.statusCode).toBe(400);
            expect(JSON.parse(response.body).error.code).toBe('VALIDATION_ERROR');
        });
    });

    describe('DELETE /api/cards/:id', () => {
        it('should delete the card and its transactions', async () => {
            const cardId = await createCard({ name: 'Everyday Debit', cardType: 'debit' });
            await createTransaction({ cardId, transactionType: 'income', amount: 10, description: 'Gift', category: 'Other', date: '2024-01-01' });
            await createTransaction({ cardId, transactionType: 'income', amount: 20, description: 'Gift', category: 'Other', date: '2024-01-02' });

            const response = await server.inject({ method: 'DELETE', url: `/api/cards/${cardId}` });

            expect(response.statusCode).toBe(200);
            expect(JSON.parse(response.body)).toEqual({
                success: true,
                data: { cardId, deletedTransactions: 2 },
                message: 'Card deleted successfully'
            });
            expect(session.snapshot()).toEqual({ cards: [], transactions: [] });

            const again = await server.inject({ method: 'DELETE', url: `/api/cards/${cardId}` });
            expect(again.statusCode).toBe(404);
        });
    });

    describe('GET /api/dashboard', () => {
        it('should return monthly statistics, most recent month first', async () => {
            const cardId = await createCard({ name: 'Everyday Debit', cardType: 'debit' });
            await createTransaction({ cardId, transactionType: 'income', amount: 1000, description: 'Salary', category: 'Salary', date: '2024-01-05' });
            await createTransaction({ cardId, transactionType: 'expense', amount: 200, description: 'Groceries', category: 'Food & Dining', date: '2024-01-20' });
            await createTransaction({ cardId, transactionType: 'income', amount: 500, description: 'Bonus', category: 'Business', date: '2024-02-01' });

            const response = await server.inject({ method: 'GET', url: '/api/dashboard' });

            expect(response.statusCode).toBe(200);
            const { data } = JSON.parse(response.body);
            expect(data.monthlyStats).toEqual([
                { month: '2024-02', income: 500, expenses: 0, savings: 500 },
                { month: '2024-01', income: 1000, expenses: 200, savings: 800 }
            ]);
            expect(data.summary).toEqual({
                totalIncome: 1500,
                totalExpenses: 200,
                netSavings: 1300,
                transactionCount: 3,
                cardCount: 1
            });
            expect(data.cards[0].balance).toBe(1300);
        });
    });

    describe('GET /api/categories', () => {
        it('should serve the suggested categories', async () => {
            const response = await server.inject({ method: 'GET', url: '/api/categories' });

            expect(JSON.parse(response.body).data.categories).toEqual({
                income: ['Salary', 'Business', 'Investment', 'Other'],
                expense: ['Food & Dining', 'Shopping', 'Transportation', 'Bills & Utilities', 'Entertainment', 'Healthcare', 'Other']
            });
        });
    });

    describe('GET /api/health', () => {
        it('should report healthy without a database check', async () => {
            const response = await server.inject({ method: 'GET', url: '/api/health' });

            expect(response.statusCode).toBe(200);
            expect(JSON.parse(response.body)).toMatchObject({ status: 'healthy', service: 'card-ledger' });
        });

        it('should report 503 when the database check fails', async () => {
            const unhealthy = new App(
                { session, checkDatabase: async () => ({ healthy: false, latencyMs: 3, error: 'connection refused' }) },
                { environment: 'test' }
            );
            await unhealthy.initialize();

            const response = await unhealthy.getFastifyInstance().inject({ method: 'GET', url: '/api/health' });

            expect(response.statusCode).toBe(503);
            expect(JSON.parse(response.body)).toMatchObject({
                status: 'unhealthy',
                database: { healthy: false, error: 'connection refused' }
            });
            await unhealthy.close();
        });
    });

    describe('unknown routes', () => {
        it('should answer with the error envelope', async () => {
            const response = await server.inject({ method: 'GET', url: '/api/budgets' });

            expect(response.statusCode).toBe(404);
            expect(JSON.parse(response.body)).toEqual({
                success: false,
                error: { code: 'ROUTE_NOT_FOUND', message: 'Route GET /api/budgets not found' }
            });
        });
    });
});
