/**
 * Pipeline State Machine Tests
 */

import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import type { SegmentState, VideoState } from '../../../server/types/pipeline.js';
import {
  SEGMENT_STATE_ORDER,
  VIDEO_STATE_ORDER,
  artifactFieldFor,
  assertContiguous,
  canTransition,
  checkAggregateReadiness,
  dispatchedState,
  doneState,
  hasReached,
  isLegalTransition,
  nextDispatch,
  stageOf,
  stateRank,
  statusFor,
} from '../../../server/services/pipeline/stateMachine.js';
import { InvariantViolation } from '../../../server/services/pipeline/errors.js';
import { providerFor } from '../../../server/services/providers/types.js';
import { makeSegmentRecord } from '../helpers/harness.js';

const segmentStates: SegmentState[] = [...SEGMENT_STATE_ORDER, 'failed'];
const videoStates: VideoState[] = [...VIDEO_STATE_ORDER, 'failed'];

describe('stage mapping', () => {
  it('routes the music track to GoAPI and the mix to NCA', () => {
    expect(providerFor('voice')).toBe('elevenlabs');
    expect(providerFor('concat')).toBe('nca');
    expect(providerFor('music', 'track')).toBe('goapi');
    expect(providerFor('music', 'mix')).toBe('nca');
    expect(artifactFieldFor('music', 'track')).toBe('musicTrackRef');
    expect(artifactFieldFor('music', 'mix')).toBe('finalMediaRef');
    expect(artifactFieldFor('media')).toBe('combinedRef');
  });

  it('maps stages to their dispatched and done states', () => {
    expect(dispatchedState('voice')).toBe('voice_dispatched');
    expect(doneState('media')).toBe('media_done');
    expect(dispatchedState('concat')).toBe('concat_dispatched');
    expect(doneState('music')).toBe('music_done');
  });

  it('finds the stage of a state', () => {
    expect(stageOf('media_dispatched')).toBe('media');
    expect(stageOf('concat_done')).toBe('concat');
    expect(stageOf('created')).toBeNull();
    expect(stageOf('failed')).toBeNull();
  });

  it('picks the next stage to dispatch from resting states only', () => {
    expect(nextDispatch('segment', 'created')).toBe('voice');
    expect(nextDispatch('segment', 'voice_done')).toBe('media');
    expect(nextDispatch('segment', 'voice_dispatched')).toBeNull();
    expect(nextDispatch('segment', 'media_done')).toBeNull();
    expect(nextDispatch('video', 'created')).toBe('concat');
    expect(nextDispatch('video', 'concat_done')).toBe('music');
    expect(nextDispatch('video', 'music_done')).toBeNull();
    expect(nextDispatch('video', 'failed')).toBeNull();
  });

  it('derives status from state', () => {
    expect(statusFor('segment', 'created')).toBe('pending');
    expect(statusFor('segment', 'voice_done')).toBe('running');
    expect(statusFor('segment', 'media_done')).toBe('complete');
    expect(statusFor('video', 'concat_done')).toBe('running');
    expect(statusFor('video', 'music_done')).toBe('complete');
    expect(statusFor('video', 'failed')).toBe('failed');
  });
});

describe('canTransition', () => {
  it('allows single forward steps', () => {
    expect(canTransition('segment', 'created', 'voice_dispatched')).toBe(true);
    expect(canTransition('segment', 'voice_dispatched', 'voice_done')).toBe(true);
    expect(canTransition('video', 'concat_done', 'music_dispatched')).toBe(true);
  });

  it('rejects skipped and backward steps', () => {
    expect(canTransition('segment', 'created', 'voice_done')).toBe(false);
    expect(canTransition('segment', 'voice_done', 'voice_dispatched')).toBe(false);
    expect(canTransition('video', 'created', 'concat_done')).toBe(false);
  });

  it('allows a dispatched state to re-enter itself for a retry', () => {
    expect(canTransition('segment', 'media_dispatched', 'media_dispatched')).toBe(true);
    expect(canTransition('segment', 'voice_done', 'voice_done')).toBe(false);
  });

  it('allows failing from any non-terminal state, and nothing after', () => {
    expect(canTransition('segment', 'created', 'failed')).toBe(true);
    expect(canTransition('video', 'music_dispatched', 'failed')).toBe(true);
    expect(canTransition('segment', 'media_done', 'failed')).toBe(false);
    expect(canTransition('video', 'music_done', 'failed')).toBe(false);
    expect(canTransition('segment', 'failed', 'created')).toBe(false);
  });

  it('rejects states of the other entity kind', () => {
    expect(canTransition('segment', 'created', 'concat_dispatched')).toBe(false);
    expect(isLegalTransition('created', 'concat_dispatched')).toBe(true);
    expect(isLegalTransition('voice_done', 'concat_dispatched')).toBe(false);
  });
});

describe('Property 1: a segment never skips an intermediate state', () => {
  it('every allowed non-failure transition advances rank by at most one', () => {
    fc.assert(
      fc.property(fc.constantFrom(...segmentStates), fc.constantFrom(...segmentStates), (from, to) => {
        if (!canTransition('segment', from, to) || to === 'failed') return true;
        const step = stateRank('segment', to) - stateRank('segment', from);
        return step === 1 || (step === 0 && from === to);
      })
    );
  });

  it('any walk of allowed transitions visits states in order', () => {
    fc.assert(
      fc.property(fc.array(fc.constantFrom(...videoStates), { maxLength: 30 }), (targets) => {
        let current: VideoState = 'created';
        const visited: VideoState[] = [current];
        for (const target of targets) {
          if (canTransition('video', current, target)) {
            current = target;
            if (visited[visited.length - 1] !== target) visited.push(target);
          }
        }
        const ranks = visited.filter((s) => s !== 'failed').map((s) => stateRank('video', s));
        return ranks.every((rank, i) => rank === i);
      })
    );
  });
});

describe('hasReached', () => {
  it('compares positions in the fixed order', () => {
    expect(hasReached('segment', 'media_done', 'voice_done')).toBe(true);
    expect(hasReached('segment', 'voice_done', 'media_done')).toBe(false);
    expect(hasReached('segment', 'failed', 'created')).toBe(false);
  });
});

describe('assertContiguous', () => {
  it('returns segments sorted by index', () => {
    const ordered = assertContiguous([
      { id: 'b', index: 1 },
      { id: 'c', index: 2 },
      { id: 'a', index: 0 },
    ]);
    expect(ordered.map((s) => s.id)).toEqual(['a', 'b', 'c']);
  });

  it('rejects gaps, duplicates and empty lists', () => {
    expect(() => assertContiguous([{ id: 'a', index: 0 }, { id: 'b', index: 2 }])).toThrow(InvariantViolation);
    expect(() => assertContiguous([{ id: 'a', index: 0 }, { id: 'b', index: 0 }])).toThrow(InvariantViolation);
    expect(() => assertContiguous([{ id: 'a', index: 1 }])).toThrow(InvariantViolation);
    expect(() => assertContiguous([])).toThrow('A video needs at least one segment');
  });
});

describe('checkAggregateReadiness', () => {
  it('is ready only when every segment has reached the target', () => {
    const segments = [
      makeSegmentRecord({ id: 's1', index: 1, state: 'media_done' }),
      makeSegmentRecord({ id: 's0', index: 0, state: 'media_done' }),
    ];
    const readiness = checkAggregateReadiness(segments);
    expect(readiness.status).toBe('ready');
    if (readiness.status === 'ready') {
      expect(readiness.ordered.map((s) => s.id)).toEqual(['s0', 's1']);
    }
  });

  it('reports pending segments', () => {
    const readiness = checkAggregateReadiness([
      makeSegmentRecord({ id: 's0', index: 0, state: 'media_done' }),
      makeSegmentRecord({ id: 's1', index: 1, state: 'media_dispatched' }),
    ]);
    expect(readiness).toEqual({ status: 'waiting', pending: ['s1'] });
  });

  it('reports failure as soon as any segment failed', () => {
    const readiness = checkAggregateReadiness([
      makeSegmentRecord({ id: 's0', index: 0, state: 'failed' }),
      makeSegmentRecord({ id: 's1', index: 1, state: 'voice_dispatched' }),
    ]);
    expect(readiness).toEqual({ status: 'failed', failed: ['s0'] });
  });

  it('accepts an earlier target', () => {
    const readiness = checkAggregateReadiness(
      [makeSegmentRecord({ id: 's0', index: 0, state: 'media_dispatched' })],
      'voice_done'
    );
    expect(readiness.status).toBe('ready');
  });
});
