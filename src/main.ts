import 'dotenv/config';
import { Pool } from 'pg';
import { BlogDatabase } from './blog/blog-database';
import { loadConfig } from './config';
import { PgClient } from './database/pg-client';
import { isBlogError } from './errors';
import { createApp } from './web/app';
import { createAppContext } from './web/context';
import { createPgSessionStore } from './web/session-store';

async function main(): Promise<void> {
  const config = loadConfig();

  const pool = new Pool({ connectionString: config.databaseUrl });
  const client = PgClient.fromPool(pool);
  const db = new BlogDatabase(client, {
    logQueries: config.logQueries,
    logParameters: config.logQueries,
  });

  console.log('Ensuring database schema...');
  await db.getSchemaManager().ensureCreated();

  const sessionStore = createPgSessionStore(pool, { pruneIntervalSeconds: config.sessionPruneIntervalSeconds });
  const app = createApp(createAppContext(config, db), { sessionStore });
  const server = app.listen(config.port, config.host, () => {
    console.log(`Blog listening on http://${config.host}:${config.port}`);
  });

  const shutdown = (): void => {
    server.close(() => {
      sessionStore.close();
      db.dispose().then(
        () => process.exit(0),
        (error: unknown) => {
          console.error('Failed to close database pool:', error);
          process.exit(1);
        }
      );
    });
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

main().catch((error: unknown) => {
  console.error(isBlogError(error) ? error.message : error);
  process.exit(1);
});
