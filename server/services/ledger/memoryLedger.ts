/**
 * In-process ledger. Each operation reads and writes the map without
 * yielding, so a CAS is atomic within one Node process. Suitable for tests
 * and single-instance local runs; multi-worker deployments use PostgresLedger.
 */

import type { EntityRecord, SegmentRecord, StageKind, VideoRecord } from '../../types/pipeline.js';
import { createLogger } from '../../../services/logger.js';
import { InvariantViolation } from '../pipeline/errors.js';
import { canTransition, isTerminal, statusFor } from '../pipeline/stateMachine.js';
import type { AttemptUpdate, Ledger, TransitionRequest } from './types.js';

const log = createLogger('MemoryLedger');

export interface MemoryLedgerOptions {
  now?: () => number;
}

export class MemoryLedger implements Ledger {
  readonly kind = 'memory' as const;

  private entities: Map<string, EntityRecord> = new Map();
  private tokenIndex: Map<string, string> = new Map();
  private now: () => number;

  constructor(options: MemoryLedgerOptions = {}) {
    this.now = options.now ?? Date.now;
  }

  async get(entityId: string): Promise<EntityRecord | null> {
    const entity = this.entities.get(entityId);
    return entity ? structuredClone(entity) : null;
  }

  async listSegments(videoId: string): Promise<SegmentRecord[]> {
    const segments: SegmentRecord[] = [];
    for (const entity of this.entities.values()) {
      if (entity.kind === 'segment' && entity.videoId === videoId) {
        segments.push(structuredClone(entity));
      }
    }
    return segments.sort((a, b) => a.index - b.index);
  }

  async findByToken(token: string): Promise<EntityRecord | null> {
    const entityId = this.tokenIndex.get(token);
    return entityId ? this.get(entityId) : null;
  }

  async tryTransition(entityId: string, request: TransitionRequest): Promise<boolean> {
    const entity = this.entities.get(entityId);
    if (!entity) {
      throw new InvariantViolation(`Transition attempted on unknown entity ${entityId}`, { entityId });
    }
    if (!canTransition(entity.kind, request.expected, request.next)) {
      throw new InvariantViolation(
        `Illegal ${entity.kind} transition ${request.expected} → ${request.next}`,
        { entityId }
      );
    }

    const liveToken = entity.attempt?.token ?? null;
    if (entity.state !== request.expected || liveToken !== request.attemptToken) {
      log.debug(`CAS lost on ${entityId}`, {
        expected: request.expected,
        actual: entity.state,
        expectedToken: request.attemptToken,
        liveToken,
      });
      return false;
    }

    const updated = applyTransition(entity, request, this.now());
    this.entities.set(entityId, updated);

    if (request.attempt !== undefined) {
      if (liveToken) this.tokenIndex.delete(liveToken);
      if (request.attempt) this.tokenIndex.set(request.attempt.token, entityId);
    }
    return true;
  }

  async recordAttempt(entityId: string, stage: StageKind, token: string, update: AttemptUpdate): Promise<boolean> {
    const entity = this.entities.get(entityId);
    if (!entity?.attempt || entity.attempt.token !== token || entity.attempt.stage !== stage) {
      return false;
    }
    this.entities.set(entityId, {
      ...entity,
      attempt: { ...entity.attempt, ...update },
      updatedAt: this.now(),
    });
    return true;
  }

  async createPipeline(video: VideoRecord, segments: SegmentRecord[]): Promise<void> {
    const ids = [video.id, ...segments.map((s) => s.id)];
    const clash = ids.find((id) => this.entities.has(id));
    if (clash) {
      throw new InvariantViolation(`Entity ${clash} already exists`, { entityId: clash });
    }
    this.entities.set(video.id, structuredClone(video));
    for (const segment of segments) {
      this.entities.set(segment.id, structuredClone(segment));
    }
  }

  async listDueAttempts(now: number, limit: number): Promise<string[]> {
    return [...this.entities.values()]
      .filter((e) => e.attempt !== null && e.state !== 'failed' && e.attempt.deadline <= now)
      .sort((a, b) => (a.attempt?.deadline ?? 0) - (b.attempt?.deadline ?? 0))
      .slice(0, limit)
      .map((e) => e.id);
  }

  async listStalled(olderThan: number, limit: number): Promise<string[]> {
    return [...this.entities.values()]
      .filter((e) => e.attempt === null && !isTerminal(e.kind, e.state) && e.updatedAt < olderThan)
      .filter((e) => !this.awaitingSegments(e))
      .sort((a, b) => a.updatedAt - b.updatedAt)
      .slice(0, limit)
      .map((e) => e.id);
  }

  /** A created video whose segments are still in progress is waiting, not stalled */
  private awaitingSegments(entity: EntityRecord): boolean {
    if (entity.kind !== 'video' || entity.state !== 'created') return false;
    for (const other of this.entities.values()) {
      if (other.kind === 'segment' && other.videoId === entity.id && !isTerminal('segment', other.state)) {
        return true;
      }
    }
    return false;
  }

  /** Number of stored entities */
  size(): number {
    return this.entities.size;
  }
}

function applyTransition(entity: EntityRecord, request: TransitionRequest, now: number): EntityRecord {
  const common = {
    status: statusFor(entity.kind, request.next),
    attempt: request.attempt === undefined ? entity.attempt : request.attempt,
    failure: request.failure ?? entity.failure,
    updatedAt: now,
  };

  const artifact = request.artifact;

  if (entity.kind === 'segment') {
    const next: SegmentRecord = { ...entity, ...common, state: narrowSegmentState(request.next) };
    if (artifact) {
      switch (artifact.field) {
        case 'voiceoverRef':
          next.voiceoverRef = artifact.ref;
          break;
        case 'combinedRef':
          next.combinedRef = artifact.ref;
          break;
        default:
          throw new InvariantViolation(`${artifact.field} is not a segment artifact`, { entityId: entity.id });
      }
    }
    return next;
  }

  const next: VideoRecord = { ...entity, ...common, state: narrowVideoState(request.next) };
  if (artifact) {
    switch (artifact.field) {
      case 'concatRef':
        next.concatRef = artifact.ref;
        break;
      case 'musicTrackRef':
        next.musicTrackRef = artifact.ref;
        break;
      case 'finalMediaRef':
        next.finalMediaRef = artifact.ref;
        break;
      default:
        throw new InvariantViolation(`${artifact.field} is not a video artifact`, { entityId: entity.id });
    }
  }
  return next;
}

function narrowSegmentState(state: TransitionRequest['next']): SegmentRecord['state'] {
  switch (state) {
    case 'created':
    case 'voice_dispatched':
    case 'voice_done':
    case 'media_dispatched':
    case 'media_done':
    case 'failed':
      return state;
    default:
      throw new InvariantViolation(`${state} is not a segment state`);
  }
}

function narrowVideoState(state: TransitionRequest['next']): VideoRecord['state'] {
  switch (state) {
    case 'created':
    case 'concat_dispatched':
    case 'concat_done':
    case 'music_dispatched':
    case 'music_done':
    case 'failed':
      return state;
    default:
      throw new InvariantViolation(`${state} is not a video state`);
  }
}
