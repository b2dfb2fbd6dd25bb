import { ConnectionFactory } from '../lib/database';
import { Car, CarSearchCriteria, NewCar } from '../types';

const CAR_COLUMNS =
  'id AS "Id", make AS "Make", model AS "Model", year AS "Year", stock_level AS "StockLevel", dealer_id AS "DealerId"';

/**
 * Inventory access. Every statement carries the owning dealer id, so a row
 * owned by another dealer behaves exactly like a missing one.
 */
export class CarRepository {
  constructor(private readonly connections: ConnectionFactory) {}

  /** Returns the number of inserted rows. */
  async insert(car: NewCar): Promise<number> {
    return this.connections.withConnection(async (db) => {
      const r = await db.query(
        'INSERT INTO cars (make, model, year, stock_level, dealer_id) VALUES ($1, $2, $3, $4, $5)',
        [car.Make, car.Model, car.Year, car.StockLevel, car.DealerId]
      );
      return r.rowCount ?? 0;
    });
  }

  async listByDealer(dealerId: number): Promise<Car[]> {
    return this.connections.withConnection(async (db) => {
      const r = await db.query<Car>(`SELECT ${CAR_COLUMNS} FROM cars WHERE dealer_id = $1 ORDER BY id`, [
        dealerId,
      ]);
      return r.rows;
    });
  }

  /** Returns the number of deleted rows (0 or 1). */
  async deleteOwned(id: number, dealerId: number): Promise<number> {
    return this.connections.withConnection(async (db) => {
      const r = await db.query('DELETE FROM cars WHERE id = $1 AND dealer_id = $2', [id, dealerId]);
      return r.rowCount ?? 0;
    });
  }

  /** Returns the number of updated rows (0 or 1). */
  async updateStockOwned(id: number, dealerId: number, stockLevel: number): Promise<number> {
    return this.connections.withConnection(async (db) => {
      const r = await db.query('UPDATE cars SET stock_level = $1 WHERE id = $2 AND dealer_id = $3', [
        stockLevel,
        id,
        dealerId,
      ]);
      return r.rowCount ?? 0;
    });
  }

  async search(dealerId: number, criteria: CarSearchCriteria): Promise<Car[]> {
    const params: Array<string | number> = [dealerId];
    let query = `SELECT ${CAR_COLUMNS} FROM cars WHERE dealer_id = $1`;

    if (criteria.make) {
      params.push(criteria.make);
      query += ` AND LOWER(make) = LOWER($${params.length})`;
    }

    if (criteria.model) {
      params.push(criteria.model);
      query += ` AND LOWER(model) = LOWER($${params.length})`;
    }

    query += ' ORDER BY id';

    return this.connections.withConnection(async (db) => {
      const r = await db.query<Car>(query, params);
      return r.rows;
    });
  }
}
