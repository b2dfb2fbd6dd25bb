import { ConnectionFactory } from '../lib/database';
import { Dealer } from '../types';

export class DealerRepository {
  constructor(private readonly connections: ConnectionFactory) {}

  async findByDealerId(dealerId: number): Promise<Dealer | null> {
    return this.connections.withConnection(async (db) => {
      const r = await db.query<Dealer>(
        'SELECT dealer_id AS "DealerId", hashed_password AS "HashedPassword" FROM users WHERE dealer_id = $1',
        [dealerId]
      );
      return r.rows[0] ?? null;
    });
  }

  /**
   * Credentials are provisioned out of band; only seeding calls this.
   */
  async upsert(dealerId: number, hashedPassword: string): Promise<void> {
    await this.connections.withConnection(async (db) => {
      const updated = await db.query('UPDATE users SET hashed_password = $2 WHERE dealer_id = $1', [
        dealerId,
        hashedPassword,
      ]);
      if (updated.rowCount === 0) {
        await db.query('INSERT INTO users (dealer_id, hashed_password) VALUES ($1, $2)', [
          dealerId,
          hashedPassword,
        ]);
      }
    });
  }
}
