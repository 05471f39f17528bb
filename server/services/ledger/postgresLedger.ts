/**
 * Postgres-backed ledger. Every state change is a single conditional UPDATE
 * guarded by state and attempt token, so concurrent workers racing on the
 * same entity see exactly one winner.
 */

import { z } from 'zod';
import type { EntityKind, EntityRecord, EntityState, SegmentRecord, StageKind, VideoRecord } from '../../types/pipeline.js';
import { createLogger } from '../../../services/logger.js';
import { InvariantViolation } from '../pipeline/errors.js';
import { canTransition, isLegalTransition, scopeOf, stageOf, statusFor } from '../pipeline/stateMachine.js';
import type { Queryable } from './db.js';
import type { AttemptUpdate, Ledger, TransitionRequest } from './types.js';

const log = createLogger('PostgresLedger');

const STAGES = ['voice', 'media', 'concat', 'music'] as const;
const SEGMENT_STATES = ['created', 'voice_dispatched', 'voice_done', 'media_dispatched', 'media_done', 'failed'] as const;
const VIDEO_STATES = ['created', 'concat_dispatched', 'concat_done', 'music_dispatched', 'music_done', 'failed'] as const;
const TERMINAL_STATES = ['failed', 'media_done', 'music_done'];

const attemptSchema = z.object({
  stage: z.enum(STAGES),
  token: z.string(),
  number: z.number().int(),
  dispatchedAt: z.number(),
  deadline: z.number(),
  step: z.enum(['track', 'mix']).optional(),
  providerJobId: z.string().optional(),
  lastError: z.string().optional(),
});

const failureSchema = z.object({
  reason: z.enum([
    'stage_timeout',
    'provider_error',
    'provider_rejected',
    'provider_failure',
    'segment_failed',
    'invariant_violation',
    'cancelled',
  ]),
  detail: z.string().optional(),
});

const baseRowSchema = z.object({
  id: z.string(),
  status: z.enum(['pending', 'running', 'complete', 'failed']),
  attempt: attemptSchema.nullable(),
  failure: failureSchema.nullable(),
  // BIGINT columns arrive as strings
  created_at: z.coerce.number(),
  updated_at: z.coerce.number(),
});

const videoRowSchema = baseRowSchema.extend({
  kind: z.literal('video'),
  state: z.enum(VIDEO_STATES),
  data: z.object({
    script: z.string(),
    targetSegmentDuration: z.number(),
    segmentIds: z.array(z.string()),
    voiceId: z.string(),
    musicPrompt: z.string(),
    concatRef: z.string().nullable(),
    // absent on rows written before the mix step existed
    musicTrackRef: z.string().nullable().default(null),
    finalMediaRef: z.string().nullable(),
  }),
});

const segmentRowSchema = baseRowSchema.extend({
  kind: z.literal('segment'),
  state: z.enum(SEGMENT_STATES),
  video_id: z.string(),
  seq_index: z.coerce.number().int(),
  data: z.object({
    text: z.string(),
    backgroundMediaRef: z.string(),
    voiceoverRef: z.string().nullable(),
    combinedRef: z.string().nullable(),
  }),
});

const entityRowSchema = z.discriminatedUnion('kind', [videoRowSchema, segmentRowSchema]);
const idRowSchema = z.object({ id: z.string() });
const kindRowSchema = z.object({ id: z.string(), kind: z.enum(['video', 'segment']) });

type EntityRow = z.infer<typeof entityRowSchema>;

function toRecord(row: EntityRow): EntityRecord {
  const base = {
    id: row.id,
    status: row.status,
    attempt: row.attempt,
    failure: row.failure,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
  if (row.kind === 'video') {
    return { ...base, kind: 'video', state: row.state, ...row.data };
  }
  return { ...base, kind: 'segment', state: row.state, videoId: row.video_id, index: row.seq_index, ...row.data };
}

/**
 * Entity kind a transition implies; null for created → failed, which is
 * legal for either kind.
 */
function kindForTransition(from: EntityState, to: EntityState): EntityKind | null {
  const stage = stageOf(to) ?? stageOf(from);
  return stage ? scopeOf(stage) : null;
}

/** Positional parameter collector */
class Params {
  readonly values: unknown[] = [];

  add(value: unknown): string {
    this.values.push(value);
    return `$${this.values.length}`;
  }
}

const SELECT_COLUMNS =
  'id, kind, video_id, seq_index, state, status, attempt, failure, data, created_at, updated_at';

export interface PostgresLedgerOptions {
  now?: () => number;
}

export class PostgresLedger implements Ledger {
  readonly kind = 'postgres' as const;

  private now: () => number;

  constructor(
    private db: Queryable,
    options: PostgresLedgerOptions = {}
  ) {
    this.now = options.now ?? Date.now;
  }

  async get(entityId: string): Promise<EntityRecord | null> {
    const result = await this.db.query(`SELECT ${SELECT_COLUMNS} FROM pipeline_entities WHERE id = $1`, [entityId]);
    const row = result.rows[0];
    return row === undefined ? null : toRecord(entityRowSchema.parse(row));
  }

  async listSegments(videoId: string): Promise<SegmentRecord[]> {
    const result = await this.db.query(
      `SELECT ${SELECT_COLUMNS} FROM pipeline_entities
       WHERE kind = 'segment' AND video_id = $1
       ORDER BY seq_index ASC`,
      [videoId]
    );
    return result.rows.map((row) => {
      const record = toRecord(entityRowSchema.parse(row));
      if (record.kind !== 'segment') {
        throw new InvariantViolation(`Row ${record.id} listed as a segment is a ${record.kind}`);
      }
      return record;
    });
  }

  async findByToken(token: string): Promise<EntityRecord | null> {
    const result = await this.db.query(
      `SELECT ${SELECT_COLUMNS} FROM pipeline_entities WHERE attempt_token = $1`,
      [token]
    );
    const row = result.rows[0];
    return row === undefined ? null : toRecord(entityRowSchema.parse(row));
  }

  async tryTransition(entityId: string, request: TransitionRequest): Promise<boolean> {
    const kind = kindForTransition(request.expected, request.next);
    const legal = kind
      ? canTransition(kind, request.expected, request.next)
      : isLegalTransition(request.expected, request.next);
    if (!legal) {
      throw new InvariantViolation(
        `Illegal ${kind ?? 'entity'} transition ${request.expected} → ${request.next}`,
        { entityId }
      );
    }

    const params = new Params();
    const sets = [
      `state = ${params.add(request.next)}`,
      `status = ${params.add(statusFor(kind ?? 'segment', request.next))}`,
      `updated_at = ${params.add(this.now())}`,
    ];

    if (request.attempt !== undefined) {
      const attempt = request.attempt;
      sets.push(
        `attempt = ${params.add(attempt ? JSON.stringify(attempt) : null)}::jsonb`,
        `attempt_token = ${params.add(attempt?.token ?? null)}`,
        `attempt_deadline = ${params.add(attempt?.deadline ?? null)}`
      );
    }
    if (request.failure) {
      sets.push(`failure = ${params.add(JSON.stringify(request.failure))}::jsonb`);
    }
    if (request.artifact) {
      sets.push(
        `data = jsonb_set(data, ARRAY[${params.add(request.artifact.field)}]::text[], to_jsonb(${params.add(request.artifact.ref)}::text))`
      );
    }

    const conditions = [
      `id = ${params.add(entityId)}`,
      `state = ${params.add(request.expected)}`,
      `attempt_token IS NOT DISTINCT FROM ${params.add(request.attemptToken)}`,
    ];
    if (kind) conditions.push(`kind = ${params.add(kind)}`);

    const sql = `UPDATE pipeline_entities SET ${sets.join(', ')}
      WHERE ${conditions.join('\n        AND ')}
      RETURNING id`;

    const result = await this.db.query(sql, params.values);
    if (result.rows.length > 0) return true;

    const existing = await this.db.query('SELECT id, kind FROM pipeline_entities WHERE id = $1', [entityId]);
    const row = existing.rows[0];
    if (row === undefined) {
      throw new InvariantViolation(`Transition attempted on unknown entity ${entityId}`, { entityId });
    }
    const actualKind = kindRowSchema.parse(row).kind;
    if (kind && actualKind !== kind) {
      throw new InvariantViolation(
        `Illegal ${actualKind} transition ${request.expected} → ${request.next}`,
        { entityId }
      );
    }
    log.debug(`CAS lost on ${entityId}`, { expected: request.expected, next: request.next });
    return false;
  }

  async recordAttempt(entityId: string, stage: StageKind, token: string, update: AttemptUpdate): Promise<boolean> {
    const result = await this.db.query(
      `UPDATE pipeline_entities
       SET attempt = attempt || $1::jsonb, attempt_deadline = $2, updated_at = $3
       WHERE id = $4 AND attempt_token = $5 AND attempt->>'stage' = $6
       RETURNING id`,
      [JSON.stringify(update), update.deadline, this.now(), entityId, token, stage]
    );
    return result.rows.length > 0;
  }

  async createPipeline(video: VideoRecord, segments: SegmentRecord[]): Promise<void> {
    const params = new Params();
    const tuples: string[] = [];

    const pushRow = (
      entity: EntityRecord,
      videoId: string | null,
      index: number | null,
      data: Record<string, unknown>
    ) => {
      tuples.push(
        `(${[
          params.add(entity.id),
          params.add(entity.kind),
          params.add(videoId),
          params.add(index),
          params.add(entity.state),
          params.add(entity.status),
          `${params.add(JSON.stringify(data))}::jsonb`,
          params.add(entity.createdAt),
          params.add(entity.updatedAt),
        ].join(', ')})`
      );
    };

    pushRow(video, null, null, {
      script: video.script,
      targetSegmentDuration: video.targetSegmentDuration,
      segmentIds: video.segmentIds,
      voiceId: video.voiceId,
      musicPrompt: video.musicPrompt,
      concatRef: video.concatRef,
      musicTrackRef: video.musicTrackRef,
      finalMediaRef: video.finalMediaRef,
    });
    for (const segment of segments) {
      pushRow(segment, segment.videoId, segment.index, {
        text: segment.text,
        backgroundMediaRef: segment.backgroundMediaRef,
        voiceoverRef: segment.voiceoverRef,
        combinedRef: segment.combinedRef,
      });
    }

    // One statement, so the video and its segments land together or not at all
    await this.db.query(
      `INSERT INTO pipeline_entities
         (id, kind, video_id, seq_index, state, status, data, created_at, updated_at)
       VALUES ${tuples.join(', ')}`,
      params.values
    );
  }

  async listDueAttempts(now: number, limit: number): Promise<string[]> {
    const result = await this.db.query(
      `SELECT id FROM pipeline_entities
       WHERE attempt_token IS NOT NULL AND state <> 'failed' AND attempt_deadline <= $1
       ORDER BY attempt_deadline ASC
       LIMIT $2`,
      [now, limit]
    );
    return result.rows.map((row) => idRowSchema.parse(row).id);
  }

  async listStalled(olderThan: number, limit: number): Promise<string[]> {
    const result = await this.db.query(
      `SELECT id FROM pipeline_entities
       WHERE attempt_token IS NULL AND NOT (state = ANY($1::text[])) AND updated_at < $2
         AND NOT (kind = 'video' AND state = 'created' AND EXISTS (
           SELECT 1 FROM pipeline_entities s
           WHERE s.kind = 'segment' AND s.video_id = pipeline_entities.id AND NOT (s.state = ANY($1::text[]))
         ))
       ORDER BY updated_at ASC
       LIMIT $3`,
      [TERMINAL_STATES, olderThan, limit]
    );
    return result.rows.map((row) => idRowSchema.parse(row).id);
  }
}
