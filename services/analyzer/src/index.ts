import { config } from './config';
import { redact } from './logger';
import { buildApp } from './server';
import { createRecordStore } from './storage';

/**
 * Main entrypoint for the string analyzer service.
 * Opens the configured record store, builds the Fastify app and listens on configured host/port.
 */
async function main() {
  const store = createRecordStore();
  await store.open();

  const app = await buildApp({ store, logger: { level: config.logLevel, redact } });

  const shutdown = (signal: NodeJS.Signals) => {
    app.log.info({ signal }, 'shutting down');
    app.close().then(
      () => process.exit(0),
      (err: unknown) => {
        app.log.error({ err }, 'shutdown failed');
        process.exit(1);
      },
    );
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  // --- Start server ---
  try {
    await app.listen({ port: config.port, host: config.host });
    app.log.info(`String analyzer listening on http://${config.host}:${config.port} (storage: ${config.storage.driver})`);
  } catch (err) {
    app.log.error({ err }, 'Server startup failed');
    process.exit(1);
  }
}

// run
main().catch((err) => {
  // last-resort catch for any uncaught promise
  console.error('Fatal error starting string analyzer:', err);
  process.exit(1);
});
