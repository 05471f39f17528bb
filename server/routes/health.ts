import { Router, type Request, type Response } from 'express';
import type { ProviderName } from '../types/pipeline.js';
import type { Ledger } from '../services/ledger/types.js';
import type { TimeoutSweeper } from '../services/pipeline/timeoutSweeper.js';
import type { RouteResult } from './types.js';

export interface HealthRouteDeps {
  ledger: Pick<Ledger, 'kind'>;
  sweeper: Pick<TimeoutSweeper, 'getStatus'>;
  providerKeys: Record<ProviderName, boolean>;
}

export function handleHealth(deps: HealthRouteDeps, now: Date = new Date()): RouteResult {
  return {
    status: 200,
    body: {
      status: 'ok',
      timestamp: now.toISOString(),
      ledger: deps.ledger.kind,
      apis: deps.providerKeys,
      sweeper: deps.sweeper.getStatus(),
    },
  };
}

/**
 * Health check endpoint
 */
export function createHealthRouter(deps: HealthRouteDeps): Router {
  const router = Router();
  router.get('/', (_req: Request, res: Response) => {
    const result = handleHealth(deps);
    res.status(result.status).json(result.body);
  });
  return router;
}
