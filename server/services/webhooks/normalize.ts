/**
 * Webhook Normalization
 *
 * Each provider reports completion in its own body shape. These parsers
 * reduce them to a WebhookEvent or explain why the body was not one.
 */

import { z } from 'zod';
import type { ProviderName, WebhookEvent, WebhookOutcome } from '../../types/pipeline.js';

export type NormalizeResult =
  | { kind: 'event'; event: WebhookEvent }
  /** Well-formed but not final, e.g. a progress ping */
  | { kind: 'ignored'; reason: string }
  | { kind: 'invalid'; reason: string };

const PROVIDERS: readonly ProviderName[] = ['elevenlabs', 'nca', 'goapi'];

export function isProviderName(value: string): value is ProviderName {
  return PROVIDERS.some((p) => p === value);
}

const SUCCESS_STATUSES = new Set(['completed', 'complete', 'success', 'succeeded', 'done']);
const FAILURE_STATUSES = new Set(['failed', 'failure', 'error', 'cancelled']);

function outcomeFromStatus(status: string | undefined): WebhookOutcome | null {
  if (!status) return null;
  const normalized = status.toLowerCase();
  if (SUCCESS_STATUSES.has(normalized)) return 'success';
  if (FAILURE_STATUSES.has(normalized)) return 'failure';
  return null;
}

const errorField = z.union([z.string(), z.object({ message: z.string().optional() }).passthrough()]).optional();

function errorText(error: z.infer<typeof errorField>): string | undefined {
  if (error === undefined) return undefined;
  return typeof error === 'string' ? error : error.message;
}

function finish(
  provider: ProviderName,
  token: string,
  outcome: WebhookOutcome | null,
  artifactRef: string | undefined,
  error: string | undefined
): NormalizeResult {
  if (outcome === null) return { kind: 'ignored', reason: 'status is not final' };
  if (outcome === 'success' && !artifactRef) {
    return {
      kind: 'event',
      event: { provider, token, outcome: 'failure', error: error ?? 'success reported without an output reference' },
    };
  }
  const event: WebhookEvent = { provider, token, outcome };
  if (outcome === 'success' && artifactRef) event.artifactRef = artifactRef;
  if (outcome === 'failure') event.error = error ?? 'provider reported failure';
  return { kind: 'event', event };
}

// --- ElevenLabs ---

const elevenLabsSchema = z
  .object({
    status: z.string(),
    output: z.object({ url: z.string().optional() }).passthrough().optional(),
    audio_url: z.string().optional(),
    error: errorField,
  })
  .passthrough();

function normalizeElevenLabs(token: string, body: unknown): NormalizeResult {
  const parsed = elevenLabsSchema.safeParse(body);
  if (!parsed.success) return { kind: 'invalid', reason: 'ElevenLabs payload needs a status' };
  const { status, output, audio_url, error } = parsed.data;
  return finish('elevenlabs', token, outcomeFromStatus(status), output?.url ?? audio_url, errorText(error));
}

// --- NCA Toolkit ---

const urlFields = z
  .object({
    url: z.string().optional(),
    output_url: z.string().optional(),
    file_url: z.string().optional(),
  })
  .passthrough();

const ncaResponseSchema = z.union([
  z.string(),
  z.array(z.object({ file_url: z.string().optional(), url: z.string().optional() }).passthrough()),
  urlFields.extend({
    outputs: z.array(z.object({ url: z.string().optional() }).passthrough()).optional(),
  }),
]);

const ncaSchema = urlFields
  .extend({
    id: z.string().optional(),
    code: z.coerce.number().optional(),
    status: z.string().optional(),
    message: z.string().optional(),
    response: ncaResponseSchema.nullish(),
    error: errorField,
  })
  .passthrough();

function ncaOutcome(code: number | undefined, status: string | undefined, message: string | undefined): WebhookOutcome | null {
  if (code !== undefined) {
    if (code === 200) return 'success';
    if (code >= 400) return 'failure';
  }
  const fromStatus = outcomeFromStatus(status);
  if (fromStatus) return fromStatus;
  if (message) {
    const lowered = message.toLowerCase();
    if (lowered.includes('error') || lowered.includes('fail')) return 'failure';
    if (lowered.includes('success') || lowered.includes('complete')) return 'success';
  }
  return null;
}

function ncaOutputUrl(data: z.infer<typeof ncaSchema>): string | undefined {
  const response = data.response;
  if (typeof response === 'string' && response.length > 0) return response;
  if (Array.isArray(response)) {
    const first = response[0];
    const fromArray = first?.file_url ?? first?.url;
    if (fromArray) return fromArray;
  } else if (response && typeof response === 'object') {
    const fromOutputs = response.outputs?.[0]?.url;
    const fromObject = fromOutputs ?? response.url ?? response.output_url ?? response.file_url;
    if (fromObject) return fromObject;
  }
  return data.output_url ?? data.file_url ?? data.url;
}

function normalizeNca(token: string, body: unknown): NormalizeResult {
  const parsed = ncaSchema.safeParse(body);
  if (!parsed.success) return { kind: 'invalid', reason: 'Unrecognized NCA payload' };
  const data = parsed.data;
  const outcome = ncaOutcome(data.code, data.status, data.message);
  const error = errorText(data.error) ?? (outcome === 'failure' ? data.message : undefined);
  return finish('nca', token, outcome, ncaOutputUrl(data), error);
}

// --- GoAPI ---

const goApiOutputSchema = z
  .object({
    video_url: z.string().optional(),
    audio_url: z.string().optional(),
    url: z.string().optional(),
    works: z
      .array(
        z
          .object({
            audio: z.object({ resource: z.string().optional() }).passthrough().optional(),
            video: z.object({ resource: z.string().optional() }).passthrough().optional(),
          })
          .passthrough()
      )
      .optional(),
  })
  .passthrough();

const goApiTaskSchema = z
  .object({
    status: z.string(),
    output: goApiOutputSchema.nullish(),
    error: errorField.nullable(),
  })
  .passthrough();

const goApiEnvelopeSchema = z.object({ data: goApiTaskSchema }).passthrough();

type GoApiTask = z.infer<typeof goApiTaskSchema>;

/** Task fields arrive either under `data` or at the root */
function parseGoApiTask(body: unknown): GoApiTask | null {
  const wrapped = goApiEnvelopeSchema.safeParse(body);
  if (wrapped.success) return wrapped.data.data;
  const direct = goApiTaskSchema.safeParse(body);
  return direct.success ? direct.data : null;
}

function normalizeGoApi(token: string, body: unknown): NormalizeResult {
  const task = parseGoApiTask(body);
  if (!task) return { kind: 'invalid', reason: 'GoAPI payload needs a status' };
  const output = task.output;
  const work = output?.works?.[0];
  // the generated track; video fields cover tasks that render a clip
  const artifactRef =
    output?.audio_url ?? output?.url ?? work?.audio?.resource ?? output?.video_url ?? work?.video?.resource;
  return finish('goapi', token, outcomeFromStatus(task.status), artifactRef, errorText(task.error ?? undefined));
}

const tokenSchema = z.string().trim().min(1);

/**
 * @param queryToken - `token` query parameter from the callback URL; NCA
 * also echoes it as the body `id`
 */
export function normalizeWebhook(provider: ProviderName, queryToken: unknown, body: unknown): NormalizeResult {
  let candidate = queryToken;
  if (candidate === undefined && provider === 'nca') {
    const echoed = z.object({ id: z.string() }).passthrough().safeParse(body);
    if (echoed.success) candidate = echoed.data.id;
  }
  const token = tokenSchema.safeParse(candidate);
  if (!token.success) return { kind: 'invalid', reason: 'Missing correlation token' };

  switch (provider) {
    case 'elevenlabs':
      return normalizeElevenLabs(token.data, body);
    case 'nca':
      return normalizeNca(token.data, body);
    case 'goapi':
      return normalizeGoApi(token.data, body);
  }
}
