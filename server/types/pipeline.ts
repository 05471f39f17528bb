/**
 * Pipeline Type Definitions
 *
 * Records held by the ledger for each unit of work, plus the transient
 * webhook input the correlator consumes.
 */

/**
 * Segment state machine:
 * created → voice_dispatched → voice_done → media_dispatched → media_done
 *
 * Video state machine (once every segment is media_done):
 * created → concat_dispatched → concat_done → music_dispatched → music_done
 *
 * Any non-terminal state may move to failed.
 */
export type SegmentState =
  | 'created'
  | 'voice_dispatched'
  | 'voice_done'
  | 'media_dispatched'
  | 'media_done'
  | 'failed';

export type VideoState =
  | 'created'
  | 'concat_dispatched'
  | 'concat_done'
  | 'music_dispatched'
  | 'music_done'
  | 'failed';

export type EntityState = SegmentState | VideoState;

export type SegmentStage = 'voice' | 'media';
export type VideoStage = 'concat' | 'music';
export type StageKind = SegmentStage | VideoStage;

export type EntityKind = 'video' | 'segment';

/** The music stage runs as a generated track followed by a mix onto the cut */
export type MusicStep = 'track' | 'mix';

export type PipelineStatus = 'pending' | 'running' | 'complete' | 'failed';

export type ProviderName = 'elevenlabs' | 'nca' | 'goapi';

export type FailureReason =
  | 'stage_timeout'
  | 'provider_error'
  | 'provider_rejected'
  | 'provider_failure'
  | 'segment_failed'
  | 'invariant_violation'
  | 'cancelled';

/**
 * The live in-flight call for an entity. Replaced wholesale on retry;
 * a callback carrying any other token is stale.
 */
export interface StageAttempt {
  stage: StageKind;
  token: string;
  /** 1-based; compared against the stage's maxAttempts */
  number: number;
  dispatchedAt: number;
  deadline: number;
  /** Set on music attempts only */
  step?: MusicStep;
  providerJobId?: string;
  lastError?: string;
}

export interface Failure {
  reason: FailureReason;
  detail?: string;
}

interface EntityBase {
  id: string;
  status: PipelineStatus;
  attempt: StageAttempt | null;
  failure: Failure | null;
  createdAt: number;
  updatedAt: number;
}

export interface VideoRecord extends EntityBase {
  kind: 'video';
  state: VideoState;
  script: string;
  targetSegmentDuration: number;
  segmentIds: string[];
  voiceId: string;
  musicPrompt: string;
  concatRef: string | null;
  musicTrackRef: string | null;
  finalMediaRef: string | null;
}

export interface SegmentRecord extends EntityBase {
  kind: 'segment';
  state: SegmentState;
  videoId: string;
  index: number;
  text: string;
  backgroundMediaRef: string;
  voiceoverRef: string | null;
  combinedRef: string | null;
}

export type EntityRecord = VideoRecord | SegmentRecord;

export type WebhookOutcome = 'success' | 'failure';

/**
 * A provider callback normalized to one shape. Consumed once, never stored.
 */
export interface WebhookEvent {
  provider: ProviderName;
  token: string;
  outcome: WebhookOutcome;
  artifactRef?: string;
  error?: string;
}

export function idempotencyKey(event: WebhookEvent): string {
  return `${event.provider}:${event.token}:${event.outcome}`;
}

/**
 * Per-stage timeout and retry budget.
 */
export interface StagePolicy {
  timeoutSeconds: number;
  maxAttempts: number;
}

export type StagePolicies = Record<StageKind, StagePolicy>;

export const DEFAULT_STAGE_POLICIES: StagePolicies = {
  voice: { timeoutSeconds: 180, maxAttempts: 3 },
  media: { timeoutSeconds: 300, maxAttempts: 3 },
  concat: { timeoutSeconds: 600, maxAttempts: 2 },
  music: { timeoutSeconds: 300, maxAttempts: 3 },
};
