import { db, closeDatabase } from '../src/config/database.js';
import { createDrizzleItemRepository } from '../src/repositories/index.js';
import { seedItems } from '../src/db/seed/index.js';

/**
 * Entry point for database seeding.
 * Run via: npm run db:seed
 */
async function main(): Promise<void> {
  if (!db) {
    console.error('❌ Database not available - cannot run seeds');
    console.error('   Set DATABASE_URL in your .env file to connect to a database');
    process.exit(1);
  }

  console.log('🌱 Seeding items...\n');
  const startTime = Date.now();

  const inserted = await seedItems(createDrizzleItemRepository(db));

  console.log(`\n✅ Seeded ${inserted} items in ${Date.now() - startTime}ms`);
}

main()
  .then(() => closeDatabase())
  .then(() => {
    process.exit(0);
  })
  .catch((error: unknown) => {
    console.error('❌ Seed failed:', error);
    process.exit(1);
  });
