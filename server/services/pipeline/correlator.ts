/**
 * Webhook Correlator
 *
 * Maps a normalized provider callback back to the attempt that produced it
 * and applies the result exactly once.
 */

import { idempotencyKey, type WebhookEvent } from '../../types/pipeline.js';
import { pipelineLogger } from '../../../services/logger.js';
import type { Ledger } from '../ledger/types.js';
import { providerFor } from '../providers/types.js';
import { ProviderReportedFailure, StaleCallback } from './errors.js';
import type { StageScheduler } from './scheduler.js';
import { artifactFieldFor, dispatchedState, doneState } from './stateMachine.js';

const log = pipelineLogger.child('Correlator');

const DEFAULT_DEDUPE_CAPACITY = 5000;

export type CallbackOutcome = 'applied' | 'stale' | 'duplicate';

export interface CorrelatorOptions {
  ledger: Ledger;
  scheduler: StageScheduler;
  dedupeCapacity?: number;
}

/**
 * Insertion-ordered key set that forgets its oldest entries past capacity.
 */
class RecentKeys {
  private keys: Set<string> = new Set();

  constructor(private capacity: number) {}

  has(key: string): boolean {
    return this.keys.has(key);
  }

  add(key: string): void {
    this.keys.add(key);
    while (this.keys.size > this.capacity) {
      const oldest = this.keys.values().next();
      if (oldest.done) break;
      this.keys.delete(oldest.value);
    }
  }

  delete(key: string): void {
    this.keys.delete(key);
  }
}

export class WebhookCorrelator {
  private ledger: Ledger;
  private scheduler: StageScheduler;
  private recent: RecentKeys;

  constructor(options: CorrelatorOptions) {
    this.ledger = options.ledger;
    this.scheduler = options.scheduler;
    this.recent = new RecentKeys(options.dedupeCapacity ?? DEFAULT_DEDUPE_CAPACITY);
  }

  async onCallback(event: WebhookEvent): Promise<CallbackOutcome> {
    const key = idempotencyKey(event);
    if (this.recent.has(key)) {
      log.debug(`Duplicate callback ${key}`);
      return 'duplicate';
    }
    this.recent.add(key);

    try {
      return await this.apply(event);
    } catch (error) {
      // Let a later redelivery try again
      this.recent.delete(key);
      throw error;
    }
  }

  private async apply(event: WebhookEvent): Promise<CallbackOutcome> {
    const entity = await this.ledger.findByToken(event.token);
    if (!entity?.attempt) {
      return this.discard(new StaleCallback(event.token, 'no live attempt carries this token'));
    }

    const attempt = entity.attempt;
    if (providerFor(attempt.stage, attempt.step) !== event.provider) {
      return this.discard(
        new StaleCallback(event.token, `${event.provider} cannot complete a ${attempt.stage} stage`)
      );
    }

    const expected = dispatchedState(attempt.stage);
    if (entity.state !== expected) {
      return this.discard(new StaleCallback(event.token, `entity ${entity.id} is ${entity.state}`));
    }

    if (event.outcome === 'success' && event.artifactRef && entity.kind === 'video' && attempt.step === 'track') {
      const result = await this.scheduler.startMusicMix(entity, attempt, event.artifactRef);
      if (result === 'noop') return this.discard(new StaleCallback(event.token, 'attempt was superseded'));

      log.info(`Music track ready for ${entity.id}`, { artifactRef: event.artifactRef, mix: result });
      return 'applied';
    }

    if (event.outcome === 'success' && event.artifactRef) {
      const won = await this.ledger.tryTransition(entity.id, {
        expected,
        next: doneState(attempt.stage),
        attemptToken: attempt.token,
        attempt: null,
        artifact: { field: artifactFieldFor(attempt.stage, attempt.step), ref: event.artifactRef },
      });
      if (!won) return this.discard(new StaleCallback(event.token, 'attempt was superseded'));

      log.info(`${attempt.stage} done for ${entity.id}`, { artifactRef: event.artifactRef });
      await this.scheduler.advance(entity.id);
      if (entity.kind === 'segment') {
        await this.scheduler.advance(entity.videoId);
      }
      return 'applied';
    }

    const failure = new ProviderReportedFailure(
      entity.id,
      attempt.stage,
      event.error ?? (event.outcome === 'success' ? 'success reported without an output reference' : 'unknown error')
    );
    const won = await this.ledger.tryTransition(entity.id, {
      expected,
      next: 'failed',
      attemptToken: attempt.token,
      attempt: null,
      failure: { reason: 'provider_failure', detail: failure.message },
    });
    if (!won) return this.discard(new StaleCallback(event.token, 'attempt was superseded'));

    log.warn(failure.message);
    if (entity.kind === 'segment') {
      await this.scheduler.cascade(entity);
    }
    return 'applied';
  }

  private discard(stale: StaleCallback): CallbackOutcome {
    log.info(stale.message);
    return 'stale';
  }
}
