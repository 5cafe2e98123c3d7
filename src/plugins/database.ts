// Fastify plugin to expose a Kysely instance via app.db when DATABASE_URL is set
import fp from 'fastify-plugin';
import type { Kysely } from 'kysely';
import { createDb } from '../db/client.js';
import type { Database } from '../db/types.js';

declare module 'fastify' {
  interface FastifyInstance {
    db: Kysely<Database> | null;
  }
}

const databasePlugin = fp<{ url?: string }>(async (app, opts) => {
  if (!opts.url) {
    app.log.info('DATABASE_URL is not set; serving catalog fixtures from disk');
    app.decorate('db', null);
    return;
  }

  const db = createDb(opts.url);
  app.decorate('db', db);

  app.addHook('onClose', async () => {
    await db.destroy();
  });
});

export default databasePlugin;
