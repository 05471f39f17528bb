import type {
  EntityRecord,
  EntityState,
  Failure,
  SegmentRecord,
  SegmentState,
  StageAttempt,
  StageKind,
  VideoRecord,
} from '../../types/pipeline.js';
import { checkAggregateReadiness, type AggregateReadiness, type ArtifactField } from '../pipeline/stateMachine.js';

/**
 * Compare-and-swap request. Applies only if the entity's persisted state is
 * `expected` and its live attempt token is `attemptToken`.
 */
export interface TransitionRequest {
  expected: EntityState;
  next: EntityState;
  /** Token of the live attempt the caller observed; null when none was live */
  attemptToken: string | null;
  /** New live attempt; null clears it; omitted keeps the current one */
  attempt?: StageAttempt | null;
  artifact?: { field: ArtifactField; ref: string };
  failure?: Failure;
}

export interface AttemptUpdate {
  deadline: number;
  providerJobId?: string;
  lastError?: string;
}

/**
 * The persistence surface the orchestrator needs. Any store offering
 * single-row compare-and-swap can back it.
 */
export interface Ledger {
  readonly kind: 'memory' | 'postgres';

  get(entityId: string): Promise<EntityRecord | null>;

  /** Segments of a video, ordered by sequence index */
  listSegments(videoId: string): Promise<SegmentRecord[]>;

  /** Entity whose live attempt carries this token */
  findByToken(token: string): Promise<EntityRecord | null>;

  /**
   * @returns false when the CAS lost; throws InvariantViolation when the
   * entity does not exist or the transition is not in the state machine
   */
  tryTransition(entityId: string, request: TransitionRequest): Promise<boolean>;

  /** Update the live attempt in place, only while `token` is still the live one */
  recordAttempt(entityId: string, stage: StageKind, token: string, update: AttemptUpdate): Promise<boolean>;

  createPipeline(video: VideoRecord, segments: SegmentRecord[]): Promise<void>;

  /** Ids of entities whose live attempt deadline is at or before `now` */
  listDueAttempts(now: number, limit: number): Promise<string[]>;

  /** Ids of non-terminal entities with no live attempt, untouched since `olderThan` */
  listStalled(olderThan: number, limit: number): Promise<string[]>;
}

export async function readAggregateState(
  ledger: Ledger,
  videoId: string,
  target: SegmentState = 'media_done'
): Promise<AggregateReadiness> {
  const segments = await ledger.listSegments(videoId);
  return checkAggregateReadiness(segments, target);
}
