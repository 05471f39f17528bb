import { describe, it, expect } from 'vitest';
import {
  InvariantViolation,
  PipelineError,
  errorMessage,
  exhaustionReason,
} from '../../../server/services/pipeline/errors.js';

describe('pipeline errors', () => {
  it('picks the exhaustion reason from the last dispatch error', () => {
    expect(exhaustionReason(undefined)).toBe('stage_timeout');
    expect(exhaustionReason('upstream 503')).toBe('provider_error');
  });

  it('reads a message from anything thrown', () => {
    expect(errorMessage(new InvariantViolation('bad order'))).toBe('bad order');
    expect(errorMessage('plain')).toBe('plain');
  });

  it('uses instanceof for classification', async () => {
    expect(new InvariantViolation('x')).toBeInstanceOf(PipelineError);
    const exported = Object.keys(await import('../../../server/services/pipeline/errors.js'));
    expect(exported).not.toContain('isPipelineError');
  });
});
