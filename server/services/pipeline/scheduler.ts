/**
 * Stage Scheduler
 *
 * Moves an entity forward one step at a time: dispatches the next stage when
 * the entity is at rest, retries or fails an attempt whose deadline passed,
 * and propagates a segment failure to its video. Every write goes through a
 * ledger CAS, so concurrent callers converge on one outcome per step.
 */

import { v4 as uuidv4 } from 'uuid';
import {
  DEFAULT_STAGE_POLICIES,
  type EntityRecord,
  type EntityState,
  type Failure,
  type FailureReason,
  type MusicStep,
  type SegmentRecord,
  type StageAttempt,
  type StageKind,
  type StagePolicies,
  type VideoRecord,
} from '../../types/pipeline.js';
import { pipelineLogger } from '../../../services/logger.js';
import { computeBackoffMs } from '../../../services/shared/robustUtils.js';
import type { Ledger, TransitionRequest } from '../ledger/types.js';
import { providerFor, type StageDispatcher, type StageRequest } from '../providers/types.js';
import {
  errorMessage,
  exhaustionReason,
  InvariantViolation,
  ProviderRejectedError,
  StageTimeout,
} from './errors.js';
import {
  checkAggregateReadiness,
  dispatchedState,
  isTerminal,
  nextDispatch,
  type AggregateReadiness,
} from './stateMachine.js';

const log = pipelineLogger.child('Scheduler');

const DEFAULT_DISPATCH_BACKOFF_MS = 5000;
const MAX_FAIL_ATTEMPTS = 3;

export type AdvanceResult =
  | 'noop' // terminal, in flight, or another caller won the claim
  | 'waiting' // video stage blocked on segments
  | 'dispatched'
  | 'retried'
  | 'backoff' // dispatch hit a transient error; the sweep will retry
  | 'failed';

export interface SchedulerOptions {
  ledger: Ledger;
  dispatcher: StageDispatcher;
  webhookBaseUrl: string;
  policies?: StagePolicies;
  dispatchBackoffMs?: number;
  now?: () => number;
  mintToken?: () => string;
}

export class StageScheduler {
  private ledger: Ledger;
  private dispatcher: StageDispatcher;
  private webhookBaseUrl: string;
  private policies: StagePolicies;
  private dispatchBackoffMs: number;
  private now: () => number;
  private mintToken: () => string;

  constructor(options: SchedulerOptions) {
    this.ledger = options.ledger;
    this.dispatcher = options.dispatcher;
    this.webhookBaseUrl = options.webhookBaseUrl.replace(/\/+$/, '');
    this.policies = options.policies ?? DEFAULT_STAGE_POLICIES;
    this.dispatchBackoffMs = options.dispatchBackoffMs ?? DEFAULT_DISPATCH_BACKOFF_MS;
    this.now = options.now ?? Date.now;
    this.mintToken = options.mintToken ?? (() => uuidv4());
  }

  callbackUrl(stage: StageKind, token: string, step?: MusicStep): string {
    return `${this.webhookBaseUrl}/webhooks/${providerFor(stage, step)}?token=${encodeURIComponent(token)}`;
  }

  async advance(entityId: string): Promise<AdvanceResult> {
    const entity = await this.ledger.get(entityId);
    if (!entity) {
      throw new InvariantViolation(`Cannot advance unknown entity ${entityId}`, { entityId });
    }
    if (isTerminal(entity.kind, entity.state)) return 'noop';

    if (entity.attempt) {
      if (entity.attempt.deadline > this.now()) return 'noop';
      return this.expire(entity, entity.attempt);
    }

    const stage = nextDispatch(entity.kind, entity.state);
    if (!stage) return 'noop';

    const request = await this.buildRequest(entity, stage);
    if (request === 'waiting' || request === 'failed') return request;
    return this.claimAndDispatch(entity, stage, request, 1, null);
  }

  /**
   * Mark an entity failed, clearing any live attempt. A failed segment takes
   * its video down with it. Returns false if the entity was already terminal.
   */
  async fail(entityId: string, reason: FailureReason, detail?: string): Promise<boolean> {
    const failed = await this.failEntity(entityId, { reason, detail });
    if (failed?.kind === 'segment') {
      await this.cascade(failed);
    }
    return failed !== null;
  }

  /**
   * Store a generated music track and hand it to the mixer under the same
   * music stage. The track attempt is replaced by the mix attempt in one CAS,
   * so a late track callback after this point is stale.
   */
  async startMusicMix(video: VideoRecord, trackAttempt: StageAttempt, trackRef: string): Promise<AdvanceResult> {
    if (!video.concatRef) {
      return this.violate(video, `Video ${video.id} has no concatenated cut to mix music into`);
    }
    const request: StageRequest = {
      stage: 'music',
      step: 'mix',
      videoRef: video.concatRef,
      musicRef: trackRef,
      filename: `${video.id}_final.mp4`,
    };
    return this.claimAndDispatch(video, 'music', request, 1, trackAttempt.token, {
      field: 'musicTrackRef',
      ref: trackRef,
    });
  }

  /** Fail the parent video of a segment that has just failed */
  async cascade(segment: SegmentRecord): Promise<void> {
    const video = await this.failEntity(segment.videoId, {
      reason: 'segment_failed',
      detail: `Segment ${segment.index} (${segment.id}) failed`,
    });
    if (video) {
      log.warn(`Video ${video.id} failed because segment ${segment.id} failed`);
    }
  }

  private async expire(entity: EntityRecord, attempt: StageAttempt): Promise<AdvanceResult> {
    const policy = this.policies[attempt.stage];

    if (attempt.number < policy.maxAttempts) {
      log.info(`Retrying ${attempt.stage} for ${entity.id}`, {
        attempt: attempt.number + 1,
        of: policy.maxAttempts,
        lastError: attempt.lastError,
      });
      const request = await this.buildRequest(entity, attempt.stage, attempt.step);
      if (request === 'waiting' || request === 'failed') return request;
      return this.claimAndDispatch(entity, attempt.stage, request, attempt.number + 1, attempt.token);
    }

    const reason = exhaustionReason(attempt.lastError);
    const detail = attempt.lastError ?? new StageTimeout(entity.id, attempt.stage, attempt.number).message;
    const won = await this.ledger.tryTransition(entity.id, {
      expected: entity.state,
      next: 'failed',
      attemptToken: attempt.token,
      attempt: null,
      failure: { reason, detail },
    });
    if (!won) return 'noop';

    log.warn(`${attempt.stage} exhausted for ${entity.id}`, { reason, attempts: attempt.number });
    if (entity.kind === 'segment') await this.cascade(entity);
    return 'failed';
  }

  private async claimAndDispatch(
    entity: EntityRecord,
    stage: StageKind,
    request: StageRequest,
    number: number,
    currentToken: string | null,
    artifact?: TransitionRequest['artifact']
  ): Promise<AdvanceResult> {
    const timeoutMs = this.policies[stage].timeoutSeconds * 1000;
    const token = this.mintToken();
    const dispatchedAt = this.now();
    const next = dispatchedState(stage);
    const step = request.stage === 'music' ? request.step : undefined;

    const attempt: StageAttempt = { stage, token, number, dispatchedAt, deadline: dispatchedAt + timeoutMs };
    if (step) attempt.step = step;

    const claimed = await this.ledger.tryTransition(entity.id, {
      expected: entity.state,
      next,
      attemptToken: currentToken,
      attempt,
      artifact,
    });
    if (!claimed) {
      log.debug(`Lost dispatch claim for ${stage} on ${entity.id}`);
      return 'noop';
    }

    try {
      const receipt = await this.dispatcher.dispatch(request, {
        token,
        callbackUrl: this.callbackUrl(stage, token, step),
      });
      await this.ledger.recordAttempt(entity.id, stage, token, {
        deadline: this.now() + timeoutMs,
        providerJobId: receipt.providerJobId,
      });
      log.info(`Dispatched ${stage} for ${entity.id}`, { attempt: number, providerJobId: receipt.providerJobId });
      return number > 1 ? 'retried' : 'dispatched';
    } catch (error) {
      if (error instanceof ProviderRejectedError) {
        log.error(`Provider rejected ${stage} for ${entity.id}`, { status: error.status, message: error.message });
        const won = await this.ledger.tryTransition(entity.id, {
          expected: next,
          next: 'failed',
          attemptToken: token,
          attempt: null,
          failure: { reason: 'provider_rejected', detail: error.message },
        });
        if (won && entity.kind === 'segment') await this.cascade(entity);
        return won ? 'failed' : 'noop';
      }

      // Transient or unexpected: keep the attempt and let the sweep retry it
      const message = errorMessage(error);
      const delay = computeBackoffMs(number, this.dispatchBackoffMs);
      log.warn(`Dispatch of ${stage} for ${entity.id} failed, retrying in ${delay}ms`, { message });
      await this.ledger.recordAttempt(entity.id, stage, token, {
        deadline: this.now() + delay,
        lastError: message,
      });
      return 'backoff';
    }
  }

  /**
   * Assemble the provider input for a stage from persisted artifacts.
   * Video stages return 'waiting' until every segment is done. A missing
   * upstream artifact fails the entity before the violation is thrown.
   */
  private async buildRequest(
    entity: EntityRecord,
    stage: StageKind,
    step?: MusicStep
  ): Promise<StageRequest | 'waiting' | 'failed'> {
    if (entity.kind === 'segment') {
      if (stage === 'voice') {
        const video = await this.requireVideo(entity.videoId);
        return { stage: 'voice', text: entity.text, voiceId: video.voiceId };
      }
      if (stage === 'media') {
        if (!entity.voiceoverRef) {
          return this.violate(entity, `Segment ${entity.id} has no voiceover to combine`);
        }
        return { stage: 'media', videoRef: entity.backgroundMediaRef, audioRef: entity.voiceoverRef };
      }
      throw new InvariantViolation(`Stage ${stage} does not apply to segments`, { entityId: entity.id });
    }

    if (stage === 'concat') {
      return this.buildConcatRequest(entity);
    }
    if (stage === 'music') {
      if (!entity.concatRef) {
        return this.violate(entity, `Video ${entity.id} has no concatenated cut to score`);
      }
      if (step === 'mix') {
        if (!entity.musicTrackRef) {
          return this.violate(entity, `Video ${entity.id} has no music track to mix`);
        }
        return {
          stage: 'music',
          step: 'mix',
          videoRef: entity.concatRef,
          musicRef: entity.musicTrackRef,
          filename: `${entity.id}_final.mp4`,
        };
      }
      return {
        stage: 'music',
        step: 'track',
        prompt: entity.musicPrompt,
        durationSeconds: entity.segmentIds.length * entity.targetSegmentDuration,
      };
    }
    throw new InvariantViolation(`Stage ${stage} does not apply to videos`, { entityId: entity.id });
  }

  /** Record an invariant violation on the entity, cascading for segments, then throw it */
  private async violate(entity: EntityRecord, message: string): Promise<never> {
    const violation = new InvariantViolation(message, { entityId: entity.id });
    await this.fail(entity.id, 'invariant_violation', message);
    throw violation;
  }

  private async buildConcatRequest(video: VideoRecord): Promise<StageRequest | 'waiting' | 'failed'> {
    const segments = await this.ledger.listSegments(video.id);

    let readiness: AggregateReadiness;
    try {
      readiness = checkAggregateReadiness(segments);
    } catch (error) {
      if (error instanceof InvariantViolation) {
        await this.failEntity(video.id, { reason: 'invariant_violation', detail: error.message });
      }
      throw error;
    }

    if (readiness.status === 'waiting') {
      log.debug(`Video ${video.id} waiting on ${readiness.pending.length} segment(s)`);
      return 'waiting';
    }
    if (readiness.status === 'failed') {
      await this.failEntity(video.id, {
        reason: 'segment_failed',
        detail: `Segment(s) failed: ${readiness.failed.join(', ')}`,
      });
      return 'failed';
    }

    const videoRefs: string[] = [];
    for (const segment of readiness.ordered) {
      if (!segment.combinedRef) {
        const violation = new InvariantViolation(`Segment ${segment.id} is done but has no combined clip`, {
          entityId: segment.id,
        });
        await this.failEntity(video.id, { reason: 'invariant_violation', detail: violation.message });
        throw violation;
      }
      videoRefs.push(segment.combinedRef);
    }
    return { stage: 'concat', videoRefs, filename: `${video.id}.mp4` };
  }

  private async requireVideo(videoId: string): Promise<VideoRecord> {
    const video = await this.ledger.get(videoId);
    if (video?.kind !== 'video') {
      throw new InvariantViolation(`Video ${videoId} not found`, { entityId: videoId });
    }
    return video;
  }

  /**
   * CAS the entity into failed, re-reading on a lost race.
   * Returns the entity as it was before failing, or null if it was terminal.
   */
  private async failEntity(entityId: string, failure: Failure): Promise<EntityRecord | null> {
    for (let i = 0; i < MAX_FAIL_ATTEMPTS; i++) {
      const entity = await this.ledger.get(entityId);
      if (!entity) {
        throw new InvariantViolation(`Cannot fail unknown entity ${entityId}`, { entityId });
      }
      if (isTerminal(entity.kind, entity.state)) return null;

      const expected: EntityState = entity.state;
      const won = await this.ledger.tryTransition(entityId, {
        expected,
        next: 'failed',
        attemptToken: entity.attempt?.token ?? null,
        attempt: null,
        failure,
      });
      if (won) {
        log.info(`Failed ${entity.kind} ${entityId}`, failure);
        return entity;
      }
    }
    log.warn(`Gave up failing ${entityId} after ${MAX_FAIL_ATTEMPTS} lost races`);
    return null;
  }
}
