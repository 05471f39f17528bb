import express, { type Express, type Request, type Response, type NextFunction } from 'express';
import cors from 'cors';
import type { IncomingMessage } from 'node:http';
import type { AppConfig } from './config.js';
import { createLogger } from '../services/logger.js';
import type { Ledger } from './services/ledger/types.js';
import { WebhookCorrelator } from './services/pipeline/correlator.js';
import { errorMessage } from './services/pipeline/errors.js';
import { PipelineService } from './services/pipeline/pipelineService.js';
import { StageScheduler } from './services/pipeline/scheduler.js';
import { TimeoutSweeper } from './services/pipeline/timeoutSweeper.js';
import type { StageDispatcher } from './services/providers/types.js';
import { createHealthRouter } from './routes/health.js';
import { createVideoRouter } from './routes/videos.js';
import { createWebhookRouter } from './routes/webhooks.js';

const serverLog = createLogger('Server');

export interface Orchestrator {
  ledger: Ledger;
  scheduler: StageScheduler;
  correlator: WebhookCorrelator;
  service: PipelineService;
  sweeper: TimeoutSweeper;
}

export function createOrchestrator(config: AppConfig, ledger: Ledger, dispatcher: StageDispatcher): Orchestrator {
  const scheduler = new StageScheduler({
    ledger,
    dispatcher,
    webhookBaseUrl: config.webhookBaseUrl,
    policies: config.stagePolicies,
    dispatchBackoffMs: config.dispatchBackoffMs,
  });
  return {
    ledger,
    scheduler,
    correlator: new WebhookCorrelator({ ledger, scheduler }),
    service: new PipelineService({ ledger, scheduler }),
    sweeper: new TimeoutSweeper({
      ledger,
      scheduler,
      intervalMs: config.sweep.intervalMs,
      stallAfterMs: config.sweep.stallAfterMs,
    }),
  };
}

// Unparsed bodies, kept for webhook signature checks
const rawBodies = new WeakMap<IncomingMessage, Buffer>();

export function createApp(config: AppConfig, orchestrator: Orchestrator): Express {
  const app = express();

  app.use(cors());
  app.use(
    express.json({
      limit: '5mb',
      verify: (req, _res, buf) => {
        rawBodies.set(req, buf);
      },
    })
  );

  app.use('/api/health', createHealthRouter({
    ledger: orchestrator.ledger,
    sweeper: orchestrator.sweeper,
    providerKeys: {
      elevenlabs: Boolean(config.providers.elevenlabs.apiKey),
      nca: Boolean(config.providers.nca.apiKey),
      goapi: Boolean(config.providers.goapi.apiKey),
    },
  }));
  app.use('/api', createVideoRouter({ service: orchestrator.service, defaults: config.defaults }));
  app.use(
    '/webhooks',
    createWebhookRouter(
      { correlator: orchestrator.correlator, signatures: config.webhookSignatures },
      (req: Request) => rawBodies.get(req)
    )
  );

  // Malformed JSON and anything else that escaped a route
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const status = err instanceof SyntaxError ? 400 : 500;
    serverLog.error('Unhandled request error', errorMessage(err));
    res.status(status).json({ error: errorMessage(err) });
  });

  return app;
}
