import { Pool, PoolClient } from 'pg';

export type Connection = PoolClient;

/** What the factory needs from a pool: `pg.Pool` in production, pg-mem's pool in tests. */
export interface ClientSource {
  connect(): Promise<PoolClient>;
  end(): Promise<void>;
}

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS users (
    dealer_id INTEGER PRIMARY KEY,
    hashed_password TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS cars (
    id SERIAL PRIMARY KEY,
    make VARCHAR(50) NOT NULL,
    model VARCHAR(50) NOT NULL,
    year INTEGER NOT NULL,
    stock_level INTEGER NOT NULL,
    dealer_id INTEGER NOT NULL
  );
`;

export const createPool = (databaseUrl: string): Pool => {
  if (!databaseUrl) {
    throw new Error('DATABASE_URL environment variable is not set');
  }
  return new Pool({ connectionString: databaseUrl });
};

/**
 * Hands out one pooled client per unit of work.
 *
 * The factory only holds the pool and is shared by concurrent requests.
 */
export class ConnectionFactory {
  constructor(private readonly pool: ClientSource) {
    Object.freeze(this);
  }

  /** Runs `work` on its own client, releasing it on every exit path. */
  async withConnection<T>(work: (connection: Connection) => Promise<T>): Promise<T> {
    const connection = await this.pool.connect();
    try {
      return await work(connection);
    } finally {
      connection.release();
    }
  }

  /** Creates the tables if they do not exist yet. */
  async migrate(): Promise<void> {
    await this.withConnection(async (db) => {
      await db.query(SCHEMA);
    });
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}
