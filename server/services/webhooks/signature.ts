import { createHmac, timingSafeEqual } from 'node:crypto';
import type { ProviderName } from '../../types/pipeline.js';
import { createLogger } from '../../../services/logger.js';

const log = createLogger('WebhookSignature');

export const SIGNATURE_HEADERS: Record<ProviderName, string> = {
  elevenlabs: 'X-ElevenLabs-Signature',
  nca: 'X-NCA-Signature',
  goapi: 'X-GoAPI-Signature',
};

export interface SignatureSetting {
  enabled: boolean;
  secret?: string;
}

export type SignatureSettings = Record<ProviderName, SignatureSetting>;

export type SignatureCheck = { valid: true } | { valid: false; reason: string };

export function computeSignature(secret: string, payload: Buffer | string): string {
  return createHmac('sha256', secret).update(payload).digest('hex');
}

/**
 * Verify a provider's hex HMAC-SHA256 of the raw request body.
 * Passes unconditionally when validation is off for the provider.
 */
export function verifySignature(
  provider: ProviderName,
  setting: SignatureSetting,
  rawBody: Buffer | string,
  signature: string | undefined
): SignatureCheck {
  if (!setting.enabled) return { valid: true };

  if (!setting.secret) {
    log.error(`Signature validation enabled for ${provider} but no secret is configured`);
    return { valid: false, reason: 'No webhook secret configured' };
  }
  if (!signature) {
    return { valid: false, reason: `Missing signature header: ${SIGNATURE_HEADERS[provider]}` };
  }

  const expected = Buffer.from(computeSignature(setting.secret, rawBody), 'utf8');
  const received = Buffer.from(signature.trim().toLowerCase(), 'utf8');
  if (expected.length !== received.length || !timingSafeEqual(expected, received)) {
    log.warn(`Invalid webhook signature for ${provider}`);
    return { valid: false, reason: 'Invalid signature' };
  }
  return { valid: true };
}
