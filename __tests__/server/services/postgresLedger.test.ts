import { describe, it, expect, vi } from 'vitest';
import type { Queryable, QueryResultLike } from '../../../server/services/ledger/db.js';
import { PostgresLedger } from '../../../server/services/ledger/postgresLedger.js';
import { InvariantViolation } from '../../../server/services/pipeline/errors.js';
import { makeSegmentRecord, makeVideoRecord } from '../helpers/harness.js';

function fakeDb(...results: unknown[][]) {
  const query = vi.fn(async (_sql: string, _params?: unknown[]): Promise<QueryResultLike> => {
    const rows = results.shift() ?? [];
    return { rows, rowCount: rows.length };
  });
  const db: Queryable = { query };
  return { db, query };
}

const segmentRow = {
  id: 'seg_1',
  kind: 'segment',
  video_id: 'vid_1',
  seq_index: 2,
  state: 'voice_dispatched',
  status: 'running',
  attempt: { stage: 'voice', token: 'tok-1', number: 1, dispatchedAt: 1000, deadline: 2000 },
  failure: null,
  data: { text: 'Hi.', backgroundMediaRef: 'https://media.test/bg.mp4', voiceoverRef: null, combinedRef: null },
  created_at: '1000',
  updated_at: '1500',
};

describe('PostgresLedger', () => {
  it('parses rows into records, coercing BIGINT strings', async () => {
    const { db } = fakeDb([segmentRow]);
    const ledger = new PostgresLedger(db);

    expect(await ledger.get('seg_1')).toEqual({
      kind: 'segment',
      id: 'seg_1',
      videoId: 'vid_1',
      index: 2,
      state: 'voice_dispatched',
      status: 'running',
      attempt: { stage: 'voice', token: 'tok-1', number: 1, dispatchedAt: 1000, deadline: 2000 },
      failure: null,
      text: 'Hi.',
      backgroundMediaRef: 'https://media.test/bg.mp4',
      voiceoverRef: null,
      combinedRef: null,
      createdAt: 1000,
      updatedAt: 1500,
    });
  });

  it('defaults a missing music track on older video rows and keeps the attempt step', async () => {
    const { db } = fakeDb([
      {
        id: 'vid_1',
        kind: 'video',
        video_id: null,
        seq_index: null,
        state: 'music_dispatched',
        status: 'running',
        attempt: { stage: 'music', step: 'track', token: 'tok-m', number: 1, dispatchedAt: 1000, deadline: 2000 },
        failure: null,
        data: {
          script: 'Hi.',
          targetSegmentDuration: 30,
          segmentIds: ['seg_1'],
          voiceId: 'voice-test',
          musicPrompt: 'soft piano',
          concatRef: 'https://cdn.test/cut.mp4',
          finalMediaRef: null,
        },
        created_at: '1000',
        updated_at: '1500',
      },
    ]);

    const video = await new PostgresLedger(db).get('vid_1');
    expect(video).toMatchObject({ kind: 'video', musicTrackRef: null, concatRef: 'https://cdn.test/cut.mp4' });
    expect(video?.attempt?.step).toBe('track');
  });

  it('returns null for a missing row', async () => {
    const { db } = fakeDb([]);
    expect(await new PostgresLedger(db).findByToken('nope')).toBeNull();
  });

  it('rejects a row that does not match the schema', async () => {
    const { db } = fakeDb([{ ...segmentRow, state: 'bogus' }]);
    await expect(new PostgresLedger(db).get('seg_1')).rejects.toThrow();
  });

  it('issues a single guarded UPDATE for a transition with an artifact', async () => {
    const { db, query } = fakeDb([{ id: 'seg_1' }]);
    const ledger = new PostgresLedger(db, { now: () => 5000 });

    const won = await ledger.tryTransition('seg_1', {
      expected: 'voice_dispatched',
      next: 'voice_done',
      attemptToken: 'tok-1',
      attempt: null,
      artifact: { field: 'voiceoverRef', ref: 'https://cdn.test/v.mp3' },
    });

    expect(won).toBe(true);
    expect(query).toHaveBeenCalledTimes(1);
    const [sql, params] = query.mock.calls[0] ?? [];
    expect(sql).toContain("data = jsonb_set(data, ARRAY[$7]::text[], to_jsonb($8::text))");
    expect(sql).toContain('WHERE id = $9');
    expect(sql).toContain('AND state = $10');
    expect(sql).toContain('AND attempt_token IS NOT DISTINCT FROM $11');
    expect(sql).toContain('AND kind = $12');
    expect(params).toEqual([
      'voice_done',
      'running',
      5000,
      null,
      null,
      null,
      'voiceoverRef',
      'https://cdn.test/v.mp3',
      'seg_1',
      'voice_dispatched',
      'tok-1',
      'segment',
    ]);
  });

  it('stores the new attempt with its token and deadline columns', async () => {
    const { db, query } = fakeDb([{ id: 'vid_1' }]);
    const ledger = new PostgresLedger(db, { now: () => 7000 });
    const attempt = { stage: 'concat' as const, token: 'tok-c', number: 1, dispatchedAt: 7000, deadline: 607000 };

    await ledger.tryTransition('vid_1', { expected: 'created', next: 'concat_dispatched', attemptToken: null, attempt });

    const [, params] = query.mock.calls[0] ?? [];
    expect(params).toEqual([
      'concat_dispatched',
      'running',
      7000,
      JSON.stringify(attempt),
      'tok-c',
      607000,
      'vid_1',
      'created',
      null,
      'video',
    ]);
  });

  it('marks the final state complete', async () => {
    const { db, query } = fakeDb([{ id: 'vid_1' }]);
    await new PostgresLedger(db, { now: () => 1 }).tryTransition('vid_1', {
      expected: 'music_dispatched',
      next: 'music_done',
      attemptToken: 'tok-m',
      attempt: null,
      artifact: { field: 'finalMediaRef', ref: 'https://cdn.test/final.mp4' },
    });
    const [, params] = query.mock.calls[0] ?? [];
    expect(params?.[1]).toBe('complete');
    expect(params?.[6]).toBe('finalMediaRef');
  });

  it('reports a lost CAS when the row exists', async () => {
    const { db, query } = fakeDb([], [{ id: 'seg_1', kind: 'segment' }]);
    const won = await new PostgresLedger(db).tryTransition('seg_1', {
      expected: 'created',
      next: 'voice_dispatched',
      attemptToken: null,
    });
    expect(won).toBe(false);
    expect(query).toHaveBeenCalledTimes(2);
  });

  it('throws when the row does not exist', async () => {
    const { db } = fakeDb([], []);
    await expect(
      new PostgresLedger(db).tryTransition('ghost', { expected: 'created', next: 'voice_dispatched', attemptToken: null })
    ).rejects.toThrow(InvariantViolation);
  });

  it('refuses illegal transitions without touching the database', async () => {
    const { db, query } = fakeDb();
    await expect(
      new PostgresLedger(db).tryTransition('seg_1', { expected: 'created', next: 'media_done', attemptToken: null })
    ).rejects.toThrow('Illegal segment transition created → media_done');
    expect(query).not.toHaveBeenCalled();
  });

  it('refuses a video transition on a segment row', async () => {
    const { db, query } = fakeDb([], [{ id: 'seg_1', kind: 'segment' }]);
    await expect(
      new PostgresLedger(db).tryTransition('seg_1', { expected: 'created', next: 'concat_dispatched', attemptToken: null })
    ).rejects.toThrow('Illegal segment transition created → concat_dispatched');
    expect(query.mock.calls[0]?.[0]).toContain('AND kind = $7');
    expect(query.mock.calls[0]?.[1]?.[6]).toBe('video');
  });

  it('leaves the kind unguarded for created → failed', async () => {
    const { db, query } = fakeDb([{ id: 'vid_1' }]);
    await new PostgresLedger(db, { now: () => 2 }).tryTransition('vid_1', {
      expected: 'created',
      next: 'failed',
      attemptToken: null,
      failure: { reason: 'cancelled' },
    });
    const [sql, params] = query.mock.calls[0] ?? [];
    expect(sql).not.toContain('kind =');
    expect(params).toEqual(['failed', 'failed', 2, '{"reason":"cancelled"}', 'vid_1', 'created', null]);
  });

  it('merges attempt updates guarded by token and stage', async () => {
    const { db, query } = fakeDb([{ id: 'seg_1' }]);
    const ok = await new PostgresLedger(db, { now: () => 3000 }).recordAttempt('seg_1', 'voice', 'tok-1', {
      deadline: 9000,
      providerJobId: 'job-7',
    });
    expect(ok).toBe(true);
    const [sql, params] = query.mock.calls[0] ?? [];
    expect(sql).toContain('attempt = attempt || $1::jsonb');
    expect(params).toEqual(['{"deadline":9000,"providerJobId":"job-7"}', 9000, 3000, 'seg_1', 'tok-1', 'voice']);
  });

  it('inserts a video and its segments in one statement', async () => {
    const { db, query } = fakeDb([]);
    const video = makeVideoRecord({ id: 'vid_1', segmentIds: ['seg_1', 'seg_2'] });
    await new PostgresLedger(db).createPipeline(video, [
      makeSegmentRecord({ id: 'seg_1', videoId: 'vid_1', index: 0 }),
      makeSegmentRecord({ id: 'seg_2', videoId: 'vid_1', index: 1 }),
    ]);

    expect(query).toHaveBeenCalledTimes(1);
    const [sql, params] = query.mock.calls[0] ?? [];
    expect(sql).toContain('($19, $20, $21, $22, $23, $24, $25::jsonb, $26, $27)');
    expect(params).toHaveLength(27);
    expect(params?.slice(0, 4)).toEqual(['vid_1', 'video', null, null]);
    expect(params?.slice(18, 22)).toEqual(['seg_2', 'segment', 'vid_1', 1]);
    expect(JSON.parse(String(params?.[6]))).toEqual({
      script: 'manual',
      targetSegmentDuration: 30,
      segmentIds: ['seg_1', 'seg_2'],
      voiceId: 'voice-test',
      musicPrompt: 'soft piano',
      concatRef: null,
      musicTrackRef: null,
      finalMediaRef: null,
    });
  });

  it('lists due attempt ids', async () => {
    const { db, query } = fakeDb([{ id: 'seg_2' }, { id: 'seg_1' }]);
    expect(await new PostgresLedger(db).listDueAttempts(123, 50)).toEqual(['seg_2', 'seg_1']);
    expect(query.mock.calls[0]?.[1]).toEqual([123, 50]);
  });

  it('lists stalled ids excluding terminal states and videos still waiting on segments', async () => {
    const { db, query } = fakeDb([{ id: 'vid_1' }]);
    expect(await new PostgresLedger(db).listStalled(456, 10)).toEqual(['vid_1']);
    const [sql, params] = query.mock.calls[0] ?? [];
    expect(params).toEqual([['failed', 'media_done', 'music_done'], 456, 10]);
    expect(sql).toContain("AND NOT (kind = 'video' AND state = 'created' AND EXISTS (");
    expect(sql).toContain("WHERE s.kind = 'segment' AND s.video_id = pipeline_entities.id AND NOT (s.state = ANY($1::text[]))");
  });
});
