import 'dotenv/config';

import { createApp } from './app.js';
import { db } from './database/db.js';
import { PgLogisticsStore } from './services/store/pgLogisticsStore.js';
import { logError, logInfo } from './utils/logger.js';

const port = Number(process.env.PORT ?? 3001);
// Listens on localhost by default; expose through the reverse proxy or set HOST=0.0.0.0.
const host = process.env.HOST ?? '127.0.0.1';

function bootstrap() {
  const app = createApp({ store: new PgLogisticsStore(db) });
  const server = app.listen(port, host, () => {
    logInfo(`[backend-api] listening on ${host}:${port}`, undefined, { critical: true });
  });
  server.on('error', (e) => {
    logError('[backend-api] server failed', { error: String(e) });
    process.exit(1);
  });
}

bootstrap();
