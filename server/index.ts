// MUST be first import to load environment variables before other modules
import { env } from './env.js';

import { createApp, createOrchestrator } from './app.js';
import { ConfigError, loadConfig, type AppConfig } from './config.js';
import { serverLogger as serverLog } from '../services/logger.js';
import { createPgDatabase, ensureSchema, type Database } from './services/ledger/db.js';
import { MemoryLedger } from './services/ledger/memoryLedger.js';
import { PostgresLedger } from './services/ledger/postgresLedger.js';
import type { Ledger } from './services/ledger/types.js';
import { errorMessage } from './services/pipeline/errors.js';
import { ProviderRouter } from './services/providers/index.js';

async function openLedger(config: AppConfig): Promise<{ ledger: Ledger; db: Database | null }> {
  if (!config.databaseUrl) {
    serverLog.warn('DATABASE_URL not set; using the in-memory ledger (state is lost on restart)');
    return { ledger: new MemoryLedger(), db: null };
  }
  const db = createPgDatabase(config.databaseUrl);
  await ensureSchema(db);
  return { ledger: new PostgresLedger(db), db };
}

async function main(): Promise<void> {
  const config = loadConfig(env);

  for (const [name, provider] of Object.entries(config.providers)) {
    if (!provider.apiKey) serverLog.warn(`No API key configured for ${name}; its stages will be rejected`);
  }

  const { ledger, db } = await openLedger(config);
  const dispatcher = new ProviderRouter({
    elevenlabs: { apiKey: config.providers.elevenlabs.apiKey ?? '', baseUrl: config.providers.elevenlabs.baseUrl },
    nca: { apiKey: config.providers.nca.apiKey ?? '', baseUrl: config.providers.nca.baseUrl },
    goapi: { apiKey: config.providers.goapi.apiKey ?? '', baseUrl: config.providers.goapi.baseUrl },
    requestTimeoutMs: config.providerRequestTimeoutMs,
  });

  const orchestrator = createOrchestrator(config, ledger, dispatcher);
  const app = createApp(config, orchestrator);

  const server = app.listen(config.port, () => {
    serverLog.info(`Orchestrator listening on http://localhost:${config.port}`);
    serverLog.info(`Webhook base URL: ${config.webhookBaseUrl}`);
  });
  orchestrator.sweeper.start();

  const shutdown = (signal: string) => {
    serverLog.info(`${signal} received, shutting down`);
    orchestrator.sweeper.stop();
    server.close(() => {
      const closing = db ? db.close() : Promise.resolve();
      void closing
        .catch((error: unknown) => serverLog.error('Error closing database', errorMessage(error)))
        .finally(() => process.exit(0));
    });
  };
  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

main().catch((error: unknown) => {
  if (error instanceof ConfigError) {
    serverLog.error(error.message);
  } else {
    serverLog.error('Failed to start server', errorMessage(error));
  }
  process.exit(1);
});
