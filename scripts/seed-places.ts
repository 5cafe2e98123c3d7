import { sql } from 'kysely';
import { config } from '../src/config/env.js';
import { createDb } from '../src/db/client.js';
import { loadPlaceFixtures } from '../src/modules/catalog/places/place.repository.js';

async function main() {
  if (!config.DATABASE_URL) throw new Error('DATABASE_URL is required to seed places');
  const db = createDb(config.DATABASE_URL);
  const places = loadPlaceFixtures(config.PLACES_FIXTURE_PATH);

  console.log(`Seeding places: ${places.length} rows`);

  try {
    await db.schema
      .createTable('places')
      .ifNotExists()
      .addColumn('id', 'text', (col) => col.primaryKey())
      .addColumn('name', 'text', (col) => col.notNull())
      .addColumn('city_code', 'varchar(10)', (col) => col.notNull())
      .addColumn('category', 'text', (col) => col.notNull())
      .addColumn('address', 'text', (col) => col.notNull())
      .addColumn('lat', 'double precision', (col) => col.notNull())
      .addColumn('lon', 'double precision', (col) => col.notNull())
      .addColumn('price_tier', 'text')
      .addColumn('source_ref', 'text')
      .addColumn('internal_score', 'double precision', (col) => col.notNull().defaultTo(0))
      .addColumn('created_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
      .execute();

    // Listing order is (created_at, id)
    await db.schema
      .createIndex('places_city_created_idx')
      .ifNotExists()
      .on('places')
      .columns(['city_code', 'created_at', 'id'])
      .execute();

    await db.transaction().execute(async (trx) => {
      await trx.deleteFrom('places').execute();
      await trx.insertInto('places').values(places).execute();
    });
  } finally {
    await db.destroy();
  }

  console.log('Seeding places done');
}

main().catch((e) => {
  console.error(e);
  process.exit(1);
});
