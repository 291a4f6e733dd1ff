// backend/src/infrastructure/database/postgres/repositories/card.repository.impl.ts
import { CardRepository } from '../../../../core/domain/repositories/card.repository';
import { Card, NewCard, isCardType } from '../../../../core/domain/entities/card.entity';
import { PostgresRepository } from './postgres.repository';
import { logger } from '../../../monitoring/logger.service';
import { InfrastructureException } from '../../../../shared/exceptions/infrastructure.exception';

// a type alias, not an interface: pg requires rows to be indexable
type CardRow = {
    id: number;
    name: string;
    card_type: string;
    balance: number;
};

const CARD_COLUMNS = 'id, name, card_type, balance';

export class CardRepositoryImpl extends PostgresRepository implements CardRepository {

    async create(card: NewCard): Promise<Card> {
        try {
            const result = await this.getConnection().query<CardRow>(
                `INSERT INTO cards (name, card_type, balance)
                 VALUES ($1, $2, $3)
                 RETURNING ${CARD_COLUMNS}`,
                [card.name, card.cardType, card.balance]
            );

            return this.mapRowToCard(result.rows[0]);

        } catch (error) {
            logger.error('Failed to create card', error, { name: card.name });
            throw error;
        }
    }

    async findById(id: number): Promise<Card | null> {
        return this.findOne(`SELECT ${CARD_COLUMNS} FROM cards WHERE id = $1`, id);
    }

    async findByIdForUpdate(id: number): Promise<Card | null> {
        return this.findOne(`SELECT ${CARD_COLUMNS} FROM cards WHERE id = $1 FOR UPDATE`, id);
    }

    async findAll(): Promise<Card[]> {
        try {
            const result = await this.getConnection().query<CardRow>(
                `SELECT ${CARD_COLUMNS} FROM cards ORDER BY id ASC`
            );

            return result.rows.map(row => this.mapRowToCard(row));

        } catch (error) {
            logger.error('Failed to list cards', error);
            throw error;
        }
    }

    async updateBalance(id: number, balance: number): Promise<Card> {
        try {
            const result = await this.getConnection().query<CardRow>(
                `UPDATE cards SET balance = $1 WHERE id = $2 RETURNING ${CARD_COLUMNS}`,
                [balance, id]
            );

            if (result.rows.length === 0) {
                throw new InfrastructureException(`Card ${id} disappeared during balance update`);
            }

            return this.mapRowToCard(result.rows[0]);

        } catch (error) {
            logger.error('Failed to update card balance', error, { cardId: id });
            throw error;
        }
    }

    async delete(id: number): Promise<boolean> {
        try {
            const result = await this.getConnection().query('DELETE FROM cards WHERE id = $1', [id]);
            return (result.rowCount ?? 0) > 0;

        } catch (error) {
            logger.error('Failed to delete card', error, { cardId: id });
            throw error;
        }
    }

    private async findOne(query: string, id: number): Promise<Card | null> {
        try {
            const result = await this.getConnection().query<CardRow>(query, [id]);

            if (result.rows.length === 0) {
                return null;
            }

            return this.mapRowToCard(result.rows[0]);

        } catch (error) {
            logger.error('Failed to find card by id', error, { cardId: id });
            throw error;
        }
    }

    private mapRowToCard(row: CardRow): Card {
        if (!isCardType(row.card_type)) {
            throw new InfrastructureException(`Card ${row.id} has unknown card type "${row.card_type}"`);
        }

        return {
            id: row.id,
            name: row.name,
            cardType: row.card_type,
            balance: Number(row.balance),
        };
    }
}
