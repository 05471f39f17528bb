import { v4 as uuidv4 } from 'uuid';
import type { SegmentRecord, VideoRecord } from '../../types/pipeline.js';
import { pipelineLogger } from '../../../services/logger.js';
import type { Ledger } from '../ledger/types.js';
import { errorMessage } from './errors.js';
import type { StageScheduler } from './scheduler.js';
import { assertContiguous } from './stateMachine.js';

const log = pipelineLogger.child('Service');

export interface SegmentInput {
  index: number;
  text: string;
  backgroundMediaRef: string;
}

export interface CreateVideoInput {
  script: string;
  targetSegmentDuration: number;
  voiceId: string;
  musicPrompt: string;
  segments: SegmentInput[];
}

export interface VideoView {
  video: VideoRecord;
  segments: SegmentRecord[];
}

export interface PipelineServiceOptions {
  ledger: Ledger;
  scheduler: StageScheduler;
  now?: () => number;
  newId?: (prefix: 'vid' | 'seg') => string;
}

export class PipelineService {
  private ledger: Ledger;
  private scheduler: StageScheduler;
  private now: () => number;
  private newId: (prefix: 'vid' | 'seg') => string;

  constructor(options: PipelineServiceOptions) {
    this.ledger = options.ledger;
    this.scheduler = options.scheduler;
    this.now = options.now ?? Date.now;
    this.newId = options.newId ?? ((prefix) => `${prefix}_${uuidv4()}`);
  }

  /**
   * Persist a video and its segments, then start every segment's voice stage.
   * Throws InvariantViolation, persisting nothing, if indices are not 0..N-1.
   */
  async createVideo(input: CreateVideoInput): Promise<VideoView> {
    const ordered = assertContiguous(input.segments.map((s) => ({ ...s, id: `#${s.index}` })));
    const now = this.now();
    const videoId = this.newId('vid');

    const segments = ordered.map((s): SegmentRecord => ({
      kind: 'segment',
      id: this.newId('seg'),
      videoId,
      index: s.index,
      text: s.text,
      backgroundMediaRef: s.backgroundMediaRef,
      state: 'created',
      status: 'pending',
      attempt: null,
      failure: null,
      voiceoverRef: null,
      combinedRef: null,
      createdAt: now,
      updatedAt: now,
    }));

    const video: VideoRecord = {
      kind: 'video',
      id: videoId,
      script: input.script,
      targetSegmentDuration: input.targetSegmentDuration,
      segmentIds: segments.map((s) => s.id),
      voiceId: input.voiceId,
      musicPrompt: input.musicPrompt,
      state: 'created',
      status: 'pending',
      attempt: null,
      failure: null,
      concatRef: null,
      musicTrackRef: null,
      finalMediaRef: null,
      createdAt: now,
      updatedAt: now,
    };

    await this.ledger.createPipeline(video, segments);
    log.info(`Created video ${videoId} with ${segments.length} segment(s)`);

    // A failed first dispatch is retried by the sweep; creation still succeeds
    await Promise.all(
      segments.map(async (segment) => {
        try {
          await this.scheduler.advance(segment.id);
        } catch (error) {
          log.error(`Initial dispatch for ${segment.id} failed`, errorMessage(error));
        }
      })
    );

    const view = await this.getVideo(videoId);
    return view ?? { video, segments };
  }

  async getVideo(videoId: string): Promise<VideoView | null> {
    const video = await this.ledger.get(videoId);
    if (video?.kind !== 'video') return null;
    const segments = await this.ledger.listSegments(videoId);
    return { video, segments };
  }

  async cancel(entityId: string, kind: 'video' | 'segment'): Promise<'cancelled' | 'not_found' | 'already_terminal'> {
    const entity = await this.ledger.get(entityId);
    if (entity?.kind !== kind) return 'not_found';
    const changed = await this.scheduler.fail(entityId, 'cancelled', `${kind} cancelled by request`);
    return changed ? 'cancelled' : 'already_terminal';
  }
}
