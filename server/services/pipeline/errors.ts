import type { FailureReason, ProviderName, StageKind } from '../../types/pipeline.js';

export type PipelineErrorCode =
  | 'TRANSIENT_PROVIDER_ERROR'
  | 'PROVIDER_REJECTED'
  | 'STAGE_TIMEOUT'
  | 'PROVIDER_REPORTED_FAILURE'
  | 'STALE_CALLBACK'
  | 'INVARIANT_VIOLATION';

/**
 * Base error class for orchestrator errors.
 */
export class PipelineError extends Error {
  readonly code: PipelineErrorCode;
  readonly context?: Record<string, unknown>;

  constructor(code: PipelineErrorCode, message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = 'PipelineError';
    this.code = code;
    this.context = context;
  }
}

/**
 * Network failure, timeout, 429 or 5xx while dispatching. Retried by the
 * scheduler up to the stage's attempt ceiling.
 */
export class TransientProviderError extends PipelineError {
  constructor(
    public readonly provider: ProviderName,
    message: string,
    public readonly status?: number
  ) {
    super('TRANSIENT_PROVIDER_ERROR', message, { provider, status });
    this.name = 'TransientProviderError';
  }
}

/**
 * The provider refused the request outright (4xx other than 408/429).
 * Retrying the same payload cannot help.
 */
export class ProviderRejectedError extends PipelineError {
  constructor(
    public readonly provider: ProviderName,
    message: string,
    public readonly status: number
  ) {
    super('PROVIDER_REJECTED', message, { provider, status });
    this.name = 'ProviderRejectedError';
  }
}

export class StageTimeout extends PipelineError {
  constructor(entityId: string, stage: StageKind, attempts: number) {
    super('STAGE_TIMEOUT', `Stage ${stage} for ${entityId} produced no callback after ${attempts} attempt(s)`, {
      entityId,
      stage,
      attempts,
    });
    this.name = 'StageTimeout';
  }
}

export class ProviderReportedFailure extends PipelineError {
  constructor(entityId: string, stage: StageKind, detail: string) {
    super('PROVIDER_REPORTED_FAILURE', `Provider reported failure for ${stage} on ${entityId}: ${detail}`, {
      entityId,
      stage,
    });
    this.name = 'ProviderReportedFailure';
  }
}

export class StaleCallback extends PipelineError {
  constructor(token: string, why: string) {
    super('STALE_CALLBACK', `Discarding callback for token ${token}: ${why}`, { token });
    this.name = 'StaleCallback';
  }
}

/**
 * Data that breaks a structural rule (gapped segment indices, a transition
 * on an entity that does not exist). Fatal to the triggering operation only.
 */
export class InvariantViolation extends PipelineError {
  constructor(message: string, context?: Record<string, unknown>) {
    super('INVARIANT_VIOLATION', message, context);
    this.name = 'InvariantViolation';
  }
}

/**
 * Reason recorded on an entity whose stage ran out of attempts.
 */
export function exhaustionReason(lastError: string | undefined): FailureReason {
  return lastError ? 'provider_error' : 'stage_timeout';
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
