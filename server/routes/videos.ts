import { Router, type Request, type Response } from 'express';
import { z } from 'zod';
import { createLogger } from '../../services/logger.js';
import { errorMessage, InvariantViolation } from '../services/pipeline/errors.js';
import type { PipelineService, SegmentInput } from '../services/pipeline/pipelineService.js';
import { DEFAULT_SEGMENT_DURATION, EmptyScriptError, segmentScript } from '../services/script/scriptProcessor.js';
import { sendResult, type RouteResult } from './types.js';

const videoLog = createLogger('Videos');

const sharedFields = {
  targetSegmentDuration: z.number().positive().max(600).default(DEFAULT_SEGMENT_DURATION),
  voiceId: z.string().trim().min(1).optional(),
  musicPrompt: z.string().trim().min(1).optional(),
};

const explicitSegmentsSchema = z.object({
  ...sharedFields,
  script: z.string().optional(),
  segments: z
    .array(
      z.object({
        index: z.number().int().min(0),
        text: z.string().trim().min(1),
        backgroundMediaRef: z.string().trim().min(1),
      })
    )
    .min(1),
});

const fromScriptSchema = z.object({
  ...sharedFields,
  script: z.string().trim().min(1),
  backgroundMediaRefs: z.array(z.string().trim().min(1)).min(1),
  segmentation: z.enum(['duration', 'newline']).default('duration'),
});

export const createVideoSchema = z.union([explicitSegmentsSchema, fromScriptSchema]);

export type CreateVideoBody = z.infer<typeof createVideoSchema>;

export interface VideoRouteDeps {
  service: PipelineService;
  defaults: { voiceId: string; musicPrompt: string };
}

function toSegmentInputs(body: CreateVideoBody): { script: string; segments: SegmentInput[] } {
  if ('segments' in body) {
    return {
      script: body.script ?? body.segments.map((s) => s.text).join('\n'),
      segments: body.segments,
    };
  }

  const refs = body.backgroundMediaRefs;
  const timed = segmentScript(body.script, body.segmentation, body.targetSegmentDuration);
  return {
    script: body.script,
    // Background clips are reused in order when there are fewer clips than segments
    segments: timed.map((segment) => ({
      index: segment.index,
      text: segment.text,
      backgroundMediaRef: refs[segment.index % refs.length] ?? '',
    })),
  };
}

export async function handleCreateVideo(deps: VideoRouteDeps, rawBody: unknown): Promise<RouteResult> {
  const parsed = createVideoSchema.safeParse(rawBody);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    return { status: 400, body: { error: issue ? `${issue.path.join('.') || 'body'}: ${issue.message}` : 'Invalid body' } };
  }

  try {
    const body = parsed.data;
    const { script, segments } = toSegmentInputs(body);
    const view = await deps.service.createVideo({
      script,
      segments,
      targetSegmentDuration: body.targetSegmentDuration,
      voiceId: body.voiceId ?? deps.defaults.voiceId,
      musicPrompt: body.musicPrompt ?? deps.defaults.musicPrompt,
    });
    return { status: 201, body: view };
  } catch (error) {
    if (error instanceof InvariantViolation) {
      return { status: 422, body: { error: error.message } };
    }
    if (error instanceof EmptyScriptError) {
      return { status: 400, body: { error: error.message } };
    }
    throw error;
  }
}

export async function handleGetVideo(deps: VideoRouteDeps, videoId: string): Promise<RouteResult> {
  const view = await deps.service.getVideo(videoId);
  return view ? { status: 200, body: view } : { status: 404, body: { error: `Video ${videoId} not found` } };
}

export async function handleCancel(
  deps: VideoRouteDeps,
  entityId: string,
  kind: 'video' | 'segment'
): Promise<RouteResult> {
  const outcome = await deps.service.cancel(entityId, kind);
  switch (outcome) {
    case 'not_found':
      return { status: 404, body: { error: `${kind === 'video' ? 'Video' : 'Segment'} ${entityId} not found` } };
    case 'already_terminal':
      return { status: 409, body: { error: `${entityId} has already finished` } };
    case 'cancelled':
      return { status: 200, body: { id: entityId, status: 'failed', reason: 'cancelled' } };
  }
}

export function createVideoRouter(deps: VideoRouteDeps): Router {
  const router = Router();

  const run = async (res: Response, label: string, handler: () => Promise<RouteResult>): Promise<void> => {
    try {
      sendResult(res, await handler());
    } catch (error: unknown) {
      videoLog.error(`${label} error:`, errorMessage(error));
      res.status(500).json({ error: errorMessage(error) });
    }
  };

  router.post('/videos', (req: Request, res: Response) =>
    run(res, 'Create video', () => handleCreateVideo(deps, req.body))
  );

  router.get('/videos/:id', (req: Request, res: Response) =>
    run(res, 'Get video', () => handleGetVideo(deps, req.params.id ?? ''))
  );

  router.post('/videos/:id/cancel', (req: Request, res: Response) =>
    run(res, 'Cancel video', () => handleCancel(deps, req.params.id ?? '', 'video'))
  );

  router.post('/segments/:id/cancel', (req: Request, res: Response) =>
    run(res, 'Cancel segment', () => handleCancel(deps, req.params.id ?? '', 'segment'))
  );

  return router;
}
