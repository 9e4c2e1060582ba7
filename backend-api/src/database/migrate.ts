import { migrate } from 'drizzle-orm/node-postgres/migrator';

import { logError, logInfo } from '../utils/logger.js';
import { db, pool } from './db.js';

// Applies the migrations drizzle-kit generated from ./schema.ts (npm run db:generate).
async function main() {
  await migrate(db, { migrationsFolder: './drizzle' });
  logInfo('[backend-api] migrations applied', undefined, { critical: true });
  await pool.end();
}

main().catch(async (e) => {
  logError('[backend-api] migrations failed', { error: String(e) });
  await pool.end();
  process.exit(1);
});
