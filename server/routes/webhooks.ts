import { Router, type Request, type Response } from 'express';
import type { WebhookEvent } from '../types/pipeline.js';
import { createLogger } from '../../services/logger.js';
import { errorMessage } from '../services/pipeline/errors.js';
import type { CallbackOutcome } from '../services/pipeline/correlator.js';
import { isProviderName, normalizeWebhook } from '../services/webhooks/normalize.js';
import { SIGNATURE_HEADERS, verifySignature, type SignatureSettings } from '../services/webhooks/signature.js';
import { sendResult, type RouteResult } from './types.js';

const webhookLog = createLogger('Webhooks');

export interface WebhookRouteDeps {
  correlator: { onCallback(event: WebhookEvent): Promise<CallbackOutcome> };
  signatures: SignatureSettings;
}

export interface IncomingWebhook {
  provider: string;
  token: unknown;
  body: unknown;
  rawBody: Buffer | string;
  /** Value of the provider's signature header, if sent */
  signature?: string;
}

/**
 * Answers 200 for any well-formed callback, whether it changed anything or
 * not, so providers do not redeliver. Only malformed or unsigned requests
 * get an error status.
 */
export async function handleWebhook(deps: WebhookRouteDeps, incoming: IncomingWebhook): Promise<RouteResult> {
  const { provider } = incoming;
  if (!isProviderName(provider)) {
    return { status: 404, body: { error: `Unknown provider: ${provider}` } };
  }

  const check = verifySignature(provider, deps.signatures[provider], incoming.rawBody, incoming.signature);
  if (!check.valid) {
    webhookLog.warn(`Rejected ${provider} webhook: ${check.reason}`);
    return { status: 401, body: { error: 'Unauthorized: Invalid webhook signature' } };
  }

  const normalized = normalizeWebhook(provider, incoming.token, incoming.body);
  if (normalized.kind === 'invalid') {
    webhookLog.warn(`Invalid ${provider} webhook: ${normalized.reason}`);
    return { status: 400, body: { error: normalized.reason } };
  }
  if (normalized.kind === 'ignored') {
    webhookLog.debug(`Ignoring ${provider} webhook: ${normalized.reason}`);
    return { status: 200, body: { status: 'ignored' } };
  }

  try {
    const outcome = await deps.correlator.onCallback(normalized.event);
    return { status: 200, body: { status: outcome } };
  } catch (error) {
    webhookLog.error(`Failed to apply ${provider} webhook`, { token: normalized.event.token, error: errorMessage(error) });
    return { status: 200, body: { status: 'error' } };
  }
}

/**
 * @param rawBodyOf - returns the unparsed request body captured by the JSON parser
 */
export function createWebhookRouter(deps: WebhookRouteDeps, rawBodyOf: (req: Request) => Buffer | undefined): Router {
  const router = Router();

  router.post('/:provider', async (req: Request, res: Response): Promise<void> => {
    const provider = req.params.provider ?? '';
    const signatureHeader = isProviderName(provider) ? req.get(SIGNATURE_HEADERS[provider]) : undefined;

    const result = await handleWebhook(deps, {
      provider,
      token: req.query.token,
      body: req.body,
      rawBody: rawBodyOf(req) ?? JSON.stringify(req.body ?? {}),
      signature: signatureHeader,
    });
    sendResult(res, result);
  });

  return router;
}
