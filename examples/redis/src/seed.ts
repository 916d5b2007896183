import { Redis } from 'ioredis';
import { RedisCardinalityStore, type TableRef } from '@cardinal/core';

export const TABLE: TableRef = { schema: 'default', table: 'people' };

const FIRST_NAMES = ['alice', 'bob', 'carol', 'dave', 'erin'];
const CITIES = ['paris', 'oslo', 'lima'];

/**
 * Seed counters for a small `people` table: every row is indexed on
 * firstname and city, and a third of the rows are labelled `private`.
 */
export async function seed(store: RedisCardinalityStore, rows = 300): Promise<void> {
  await store.dropTable(TABLE);
  await store.createTable(TABLE);

  const writer = store.newWriter(TABLE);
  for (let i = 0; i < rows; i++) {
    const visibility = i % 3 === 0 ? 'private' : '';
    writer.incrementRowCount();
    writer.incrementCardinality(FIRST_NAMES[i % FIRST_NAMES.length], 'cf_firstname', visibility);
    // Cities are skewed: lima only appears on every tenth row
    writer.incrementCardinality(i % 10 === 0 ? 'lima' : CITIES[i % 2], 'cf_city', visibility);
  }
  await writer.close();
}

async function main() {
  const client = new Redis(process.env.REDIS_URL ?? 'redis://localhost:6379');
  try {
    await seed(new RedisCardinalityStore({ client }));
    console.log(`Seeded ${TABLE.schema}.${TABLE.table}`);
  } finally {
    client.disconnect();
  }
}

if (process.argv[1]?.endsWith('seed.ts')) {
  main().catch((e) => {
    console.error(e);
    process.exit(1);
  });
}
