import dotenv from 'dotenv';
import { ConnectionFactory, createPool } from '../src/lib/database';
import { seedDealers } from '../src/lib/seed';

dotenv.config();

const demoDealers = [
  { dealerId: 1001, password: 'password123' },
  { dealerId: 1002, password: 'password456' },
  { dealerId: 1003, password: 'password789' },
];

async function main() {
  console.log('Seeding database...');

  const connections = new ConnectionFactory(createPool(process.env.DATABASE_URL ?? ''));
  try {
    await connections.migrate();
    await seedDealers(connections, demoDealers);
  } finally {
    await connections.close();
  }

  console.log(`✅ Seeded ${demoDealers.length} dealers`);
}

main().catch((error: unknown) => {
  console.error('Seeding failed:', error);
  process.exit(1);
});
