/**
 * Pipeline State Machine
 *
 * Shared vocabulary for the scheduler, correlator and ledger: state order per
 * entity kind, which stage a state belongs to, the legal transitions, and the
 * aggregate rule that gates the video-scoped stages.
 */

import type {
  EntityKind,
  EntityState,
  MusicStep,
  PipelineStatus,
  SegmentRecord,
  SegmentState,
  StageKind,
  VideoState,
} from '../../types/pipeline.js';
import { InvariantViolation } from './errors.js';

export const SEGMENT_STATE_ORDER: readonly SegmentState[] = [
  'created',
  'voice_dispatched',
  'voice_done',
  'media_dispatched',
  'media_done',
];

export const VIDEO_STATE_ORDER: readonly VideoState[] = [
  'created',
  'concat_dispatched',
  'concat_done',
  'music_dispatched',
  'music_done',
];

export const SEGMENT_STAGES = ['voice', 'media'] as const;
export const VIDEO_STAGES = ['concat', 'music'] as const;
export const ALL_STAGES: readonly StageKind[] = [...SEGMENT_STAGES, ...VIDEO_STAGES];

const DISPATCHED: Record<StageKind, EntityState> = {
  voice: 'voice_dispatched',
  media: 'media_dispatched',
  concat: 'concat_dispatched',
  music: 'music_dispatched',
};

const DONE: Record<StageKind, EntityState> = {
  voice: 'voice_done',
  media: 'media_done',
  concat: 'concat_done',
  music: 'music_done',
};

/** Entity field each stage's artifact lands in. */
const ARTIFACT_FIELD = {
  voice: 'voiceoverRef',
  media: 'combinedRef',
  concat: 'concatRef',
  music: 'finalMediaRef',
} as const satisfies Record<StageKind, string>;

export type ArtifactField = (typeof ARTIFACT_FIELD)[StageKind] | 'musicTrackRef';

/** Where a finished attempt's output is stored; a music track precedes the mix. */
export function artifactFieldFor(stage: StageKind, step?: MusicStep): ArtifactField {
  return stage === 'music' && step === 'track' ? 'musicTrackRef' : ARTIFACT_FIELD[stage];
}

function orderFor(kind: EntityKind): readonly EntityState[] {
  return kind === 'segment' ? SEGMENT_STATE_ORDER : VIDEO_STATE_ORDER;
}

export function scopeOf(stage: StageKind): EntityKind {
  return stage === 'voice' || stage === 'media' ? 'segment' : 'video';
}

export function dispatchedState(stage: StageKind): EntityState {
  return DISPATCHED[stage];
}

export function doneState(stage: StageKind): EntityState {
  return DONE[stage];
}

/**
 * Stage a dispatched or done state belongs to; null for created/failed.
 */
export function stageOf(state: EntityState): StageKind | null {
  for (const stage of ALL_STAGES) {
    if (DISPATCHED[stage] === state || DONE[stage] === state) return stage;
  }
  return null;
}

export function isDispatchedState(state: EntityState): boolean {
  const stage = stageOf(state);
  return stage !== null && DISPATCHED[stage] === state;
}

export function finalState(kind: EntityKind): EntityState {
  return kind === 'segment' ? 'media_done' : 'music_done';
}

export function isTerminal(kind: EntityKind, state: EntityState): boolean {
  return state === 'failed' || state === finalState(kind);
}

/**
 * Position in the kind's fixed order; -1 for failed or a state of the other kind.
 */
export function stateRank(kind: EntityKind, state: EntityState): number {
  return orderFor(kind).indexOf(state);
}

export function hasReached(kind: EntityKind, state: EntityState, target: EntityState): boolean {
  const rank = stateRank(kind, state);
  const targetRank = stateRank(kind, target);
  return rank >= 0 && targetRank >= 0 && rank >= targetRank;
}

/**
 * The stage to dispatch next from a resting state, or null when the state is
 * in flight or terminal.
 */
export function nextDispatch(kind: EntityKind, state: EntityState): StageKind | null {
  const stages: readonly StageKind[] = kind === 'segment' ? SEGMENT_STAGES : VIDEO_STAGES;
  if (state === 'created') return stages[0] ?? null;
  const current = stageOf(state);
  if (current === null || DONE[current] !== state) return null;
  const position = stages.indexOf(current);
  if (position < 0) return null;
  return stages[position + 1] ?? null;
}

export function canTransition(kind: EntityKind, from: EntityState, to: EntityState): boolean {
  if (from === 'failed') return false;
  const order = orderFor(kind);
  const fromRank = order.indexOf(from);
  if (fromRank < 0) return false;
  if (to === 'failed') return !isTerminal(kind, from);

  const toRank = order.indexOf(to);
  if (toRank < 0) return false;

  // A dispatched state may re-enter itself to swap in a retry attempt
  if (from === to) return isDispatchedState(to);
  return toRank === fromRank + 1;
}

/**
 * Kind-agnostic form used where only the state pair is known.
 */
export function isLegalTransition(from: EntityState, to: EntityState): boolean {
  return canTransition('segment', from, to) || canTransition('video', from, to);
}

export function statusFor(kind: EntityKind, state: EntityState): PipelineStatus {
  if (state === 'failed') return 'failed';
  if (state === 'created') return 'pending';
  if (state === finalState(kind)) return 'complete';
  return 'running';
}

export type AggregateReadiness =
  | { status: 'ready'; ordered: SegmentRecord[] }
  | { status: 'waiting'; pending: string[] }
  | { status: 'failed'; failed: string[] };

/**
 * Verify a video's segment indices are exactly 0..N-1.
 * Returns the segments ordered by index.
 */
export function assertContiguous<T extends { id: string; index: number }>(segments: readonly T[]): T[] {
  if (segments.length === 0) {
    throw new InvariantViolation('A video needs at least one segment');
  }
  const ordered = [...segments].sort((a, b) => a.index - b.index);
  ordered.forEach((segment, position) => {
    if (segment.index !== position) {
      throw new InvariantViolation(
        `Segment indices must be contiguous from 0; found ${ordered.map((s) => s.index).join(',')}`,
        { segmentId: segment.id, expected: position, actual: segment.index }
      );
    }
  });
  return ordered;
}

/**
 * Whether every segment has reached `target`. A failed segment makes the
 * aggregate failed regardless of its siblings.
 */
export function checkAggregateReadiness(
  segments: readonly SegmentRecord[],
  target: SegmentState = 'media_done'
): AggregateReadiness {
  const ordered = assertContiguous(segments);

  const failed = ordered.filter((s) => s.state === 'failed').map((s) => s.id);
  if (failed.length > 0) return { status: 'failed', failed };

  const pending = ordered.filter((s) => !hasReached('segment', s.state, target)).map((s) => s.id);
  if (pending.length > 0) return { status: 'waiting', pending };

  return { status: 'ready', ordered };
}
