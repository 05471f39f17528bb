import { describe, it, expect } from 'vitest';
import { computeSignature, verifySignature } from '../../../server/services/webhooks/signature.js';

const body = '{"status":"completed"}';
const setting = { enabled: true, secret: 'test-secret' };

describe('verifySignature', () => {
  it('accepts the HMAC of the raw body', () => {
    const signature = computeSignature('test-secret', body);
    expect(verifySignature('elevenlabs', setting, Buffer.from(body), signature)).toEqual({ valid: true });
  });

  it('accepts an upper-case hex digest', () => {
    const signature = computeSignature('test-secret', body).toUpperCase();
    expect(verifySignature('nca', setting, body, signature)).toEqual({ valid: true });
  });

  it('rejects a signature over a different body', () => {
    const signature = computeSignature('test-secret', '{"status":"failed"}');
    expect(verifySignature('goapi', setting, body, signature)).toEqual({ valid: false, reason: 'Invalid signature' });
  });

  it('rejects a truncated signature', () => {
    const signature = computeSignature('test-secret', body).slice(0, 10);
    expect(verifySignature('goapi', setting, body, signature)).toEqual({ valid: false, reason: 'Invalid signature' });
  });

  it('names the missing header', () => {
    expect(verifySignature('nca', setting, body, undefined)).toEqual({
      valid: false,
      reason: 'Missing signature header: X-NCA-Signature',
    });
  });

  it('fails closed without a secret', () => {
    expect(verifySignature('elevenlabs', { enabled: true }, body, 'abc')).toEqual({
      valid: false,
      reason: 'No webhook secret configured',
    });
  });

  it('passes everything when disabled', () => {
    expect(verifySignature('elevenlabs', { enabled: false }, body, undefined)).toEqual({ valid: true });
  });
});
