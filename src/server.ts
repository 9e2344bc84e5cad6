// =============================================================================
// GAZETTE - Main Server
// Multi-tenant publishing platform: articles, newsletters, subscriptions.
// =============================================================================

import { createApp } from './app';
import { config } from './config';
import { createPool } from './db/pool';
import { PgPublishingStore } from './db/pg-store';
import { ConsoleMailer } from './services/password-reset';
import { errorMessage, log } from './utils/log';

const pool = createPool();

const app = createApp({
  store: new PgPublishingStore(pool),
  mailer: new ConsoleMailer(),
  checkDatabase: async () => {
    await pool.query('SELECT 1');
  },
});

const server = app.listen(config.port, () => {
  log.info('Server', `GAZETTE listening on port ${config.port} (${config.nodeEnv})`);
  log.info('Server', `Reset links point at ${config.siteUrl}`);
});

function shutdown(signal: string): void {
  log.info('Server', `${signal} received, closing`);
  server.close(() => {
    pool.end()
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        log.error('Server', 'Pool shutdown failed', { error: errorMessage(err) });
        process.exit(1);
      });
  });
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));
