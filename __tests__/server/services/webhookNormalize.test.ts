import { describe, it, expect } from 'vitest';
import { isProviderName, normalizeWebhook } from '../../../server/services/webhooks/normalize.js';

describe('normalizeWebhook', () => {
  describe('correlation token', () => {
    it('rejects a callback without a token', () => {
      expect(normalizeWebhook('elevenlabs', undefined, { status: 'completed' })).toEqual({
        kind: 'invalid',
        reason: 'Missing correlation token',
      });
      expect(normalizeWebhook('goapi', '   ', { status: 'completed' })).toEqual({
        kind: 'invalid',
        reason: 'Missing correlation token',
      });
    });

    it('falls back to the echoed NCA job id', () => {
      const result = normalizeWebhook('nca', undefined, { id: 'tok-9', code: 200, response: 'https://cdn.test/out.mp4' });
      expect(result).toEqual({
        kind: 'event',
        event: { provider: 'nca', token: 'tok-9', outcome: 'success', artifactRef: 'https://cdn.test/out.mp4' },
      });
    });

    it('prefers the query token over the body id', () => {
      const result = normalizeWebhook('nca', 'tok-q', { id: 'tok-body', code: 200, response: 'https://cdn.test/o.mp4' });
      expect(result.kind === 'event' && result.event.token).toBe('tok-q');
    });
  });

  describe('ElevenLabs', () => {
    it('reads output.url on completion', () => {
      expect(normalizeWebhook('elevenlabs', 'tok-1', { status: 'completed', output: { url: 'https://cdn.test/a.mp3' } })).toEqual({
        kind: 'event',
        event: { provider: 'elevenlabs', token: 'tok-1', outcome: 'success', artifactRef: 'https://cdn.test/a.mp3' },
      });
    });

    it('falls back to audio_url', () => {
      const result = normalizeWebhook('elevenlabs', 'tok-1', { status: 'success', audio_url: 'https://cdn.test/b.mp3' });
      expect(result.kind === 'event' && result.event.artifactRef).toBe('https://cdn.test/b.mp3');
    });

    it('carries the error message of a failure', () => {
      expect(normalizeWebhook('elevenlabs', 'tok-1', { status: 'failed', error: { message: 'voice not found' } })).toEqual({
        kind: 'event',
        event: { provider: 'elevenlabs', token: 'tok-1', outcome: 'failure', error: 'voice not found' },
      });
    });

    it('ignores progress updates', () => {
      expect(normalizeWebhook('elevenlabs', 'tok-1', { status: 'processing' })).toEqual({
        kind: 'ignored',
        reason: 'status is not final',
      });
    });

    it('turns a success without output into a failure', () => {
      expect(normalizeWebhook('elevenlabs', 'tok-1', { status: 'completed' })).toEqual({
        kind: 'event',
        event: {
          provider: 'elevenlabs',
          token: 'tok-1',
          outcome: 'failure',
          error: 'success reported without an output reference',
        },
      });
    });

    it('rejects a body without a status', () => {
      expect(normalizeWebhook('elevenlabs', 'tok-1', { output: {} })).toEqual({
        kind: 'invalid',
        reason: 'ElevenLabs payload needs a status',
      });
    });
  });

  describe('NCA Toolkit', () => {
    const ref = (body: unknown) => {
      const result = normalizeWebhook('nca', 'tok-n', body);
      return result.kind === 'event' ? result.event.artifactRef : undefined;
    };

    it('finds the output in each response shape', () => {
      expect(ref({ code: 200, response: [{ file_url: 'https://cdn.test/1.mp4' }] })).toBe('https://cdn.test/1.mp4');
      expect(ref({ code: 200, response: { outputs: [{ url: 'https://cdn.test/2.mp4' }] } })).toBe('https://cdn.test/2.mp4');
      expect(ref({ code: 200, response: { output_url: 'https://cdn.test/3.mp4' } })).toBe('https://cdn.test/3.mp4');
      expect(ref({ code: 200, response: null, output_url: 'https://cdn.test/4.mp4' })).toBe('https://cdn.test/4.mp4');
    });

    it('accepts a numeric string code', () => {
      expect(ref({ code: '200', response: 'https://cdn.test/5.mp4' })).toBe('https://cdn.test/5.mp4');
    });

    it('reports an error code with its message', () => {
      expect(normalizeWebhook('nca', 'tok-n', { code: 500, message: 'ffmpeg exited with 1' })).toEqual({
        kind: 'event',
        event: { provider: 'nca', token: 'tok-n', outcome: 'failure', error: 'ffmpeg exited with 1' },
      });
    });

    it('uses the status, then the message, when no code is sent', () => {
      expect(ref({ status: 'done', url: 'https://cdn.test/6.mp4' })).toBe('https://cdn.test/6.mp4');
      const failed = normalizeWebhook('nca', 'tok-n', { message: 'Job failed' });
      expect(failed.kind === 'event' && failed.event.outcome).toBe('failure');
    });

    it('ignores a queued notice', () => {
      expect(normalizeWebhook('nca', 'tok-n', { code: 202, message: 'queued' }).kind).toBe('ignored');
    });
  });

  describe('GoAPI', () => {
    it('reads the task from the data envelope', () => {
      expect(
        normalizeWebhook('goapi', 'tok-g', {
          code: 200,
          data: { task_id: 't1', status: 'completed', output: { video_url: 'https://cdn.test/final.mp4' } },
        })
      ).toEqual({
        kind: 'event',
        event: { provider: 'goapi', token: 'tok-g', outcome: 'success', artifactRef: 'https://cdn.test/final.mp4' },
      });
    });

    it('prefers the audio track over any video output', () => {
      const result = normalizeWebhook('goapi', 'tok-g', {
        data: {
          status: 'completed',
          output: { video_url: 'https://cdn.test/preview.mp4', audio_url: 'https://cdn.test/track.mp3' },
        },
      });
      expect(result.kind === 'event' && result.event.artifactRef).toBe('https://cdn.test/track.mp3');
    });

    it('reads a task at the root and the first work', () => {
      const result = normalizeWebhook('goapi', 'tok-g', {
        status: 'Completed',
        output: { works: [{ video: { resource: 'https://cdn.test/work.mp4' } }] },
      });
      expect(result.kind === 'event' && result.event.artifactRef).toBe('https://cdn.test/work.mp4');
    });

    it('reports failures with a null output', () => {
      expect(
        normalizeWebhook('goapi', 'tok-g', { data: { status: 'failed', output: null, error: { message: 'bad prompt' } } })
      ).toEqual({
        kind: 'event',
        event: { provider: 'goapi', token: 'tok-g', outcome: 'failure', error: 'bad prompt' },
      });
    });

    it('rejects a body without a status', () => {
      expect(normalizeWebhook('goapi', 'tok-g', { data: {} }).kind).toBe('invalid');
    });
  });

  it('recognizes provider names', () => {
    expect(isProviderName('nca')).toBe(true);
    expect(isProviderName('suno')).toBe(false);
  });
});
