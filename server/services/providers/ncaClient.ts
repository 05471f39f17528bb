import { providerLogger } from '../../../services/logger.js';
import { extractReceipt, postJson, type FetchLike } from './httpClient.js';
import type {
  ConcatRequest,
  DispatchContext,
  DispatchReceipt,
  MediaRequest,
  MusicMixRequest,
  ProviderCredentials,
} from './types.js';

const log = providerLogger.child('NCA');

/** Music level relative to the cut's own audio */
export const BACKGROUND_MUSIC_VOLUME = 0.2;

export interface NcaClientOptions extends ProviderCredentials {
  timeoutMs: number;
  fetchImpl?: FetchLike;
}

/**
 * NCA Toolkit media jobs: voice-over-clip compose, ordered concatenation and
 * the background music mix.
 * The toolkit echoes `id` back in its callback, so we send the correlation
 * token there as well as in the webhook URL.
 */
export class NcaClient {
  constructor(private options: NcaClientOptions) {}

  async combineMedia(request: MediaRequest, context: DispatchContext): Promise<DispatchReceipt> {
    log.debug('Dispatching compose', { videoRef: request.videoRef });
    return this.post('/v1/ffmpeg/compose', {
      inputs: [{ file_url: request.videoRef }, { file_url: request.audioRef }],
      filters: [{ filter: '[0:v]copy[vout]' }, { filter: '[1:a]copy[aout]' }],
      outputs: [
        {
          options: [
            { option: '-map', argument: '[vout]' },
            { option: '-map', argument: '[aout]' },
            { option: '-c:v', argument: 'copy' },
            { option: '-c:a', argument: 'aac' },
            { option: '-shortest' },
          ],
        },
      ],
      webhook_url: context.callbackUrl,
      id: context.token,
    });
  }

  async concatenate(request: ConcatRequest, context: DispatchContext): Promise<DispatchReceipt> {
    log.debug('Dispatching concat', { clips: request.videoRefs.length });
    return this.post('/v1/video/combine', {
      video_urls: request.videoRefs.map((video_url) => ({ video_url })),
      filename: request.filename,
      transition: 'none',
      output_format: 'mp4',
      webhook_url: context.callbackUrl,
      id: context.token,
    });
  }

  async addBackgroundMusic(request: MusicMixRequest, context: DispatchContext): Promise<DispatchReceipt> {
    log.debug('Dispatching music mix', { videoRef: request.videoRef });
    return this.post('/v1/ffmpeg/compose', {
      inputs: [{ file_url: request.videoRef }, { file_url: request.musicRef }],
      filename: request.filename,
      filters: [
        { filter: '[0:a]volume=1.0[a0]' },
        { filter: `[1:a]volume=${BACKGROUND_MUSIC_VOLUME}[a1]` },
        { filter: '[a0][a1]amix=inputs=2:duration=shortest:dropout_transition=2[aout]' },
      ],
      outputs: [
        {
          options: [
            { option: '-map', argument: '0:v' },
            { option: '-map', argument: '[aout]' },
            { option: '-c:v', argument: 'copy' },
            { option: '-shortest' },
          ],
        },
      ],
      webhook_url: context.callbackUrl,
      id: context.token,
    });
  }

  private async post(path: string, body: Record<string, unknown>): Promise<DispatchReceipt> {
    const payload = await postJson({
      provider: 'nca',
      url: `${this.options.baseUrl}${path}`,
      headers: { 'x-api-key': this.options.apiKey },
      body,
      timeoutMs: this.options.timeoutMs,
      fetchImpl: this.options.fetchImpl,
    });
    return extractReceipt(payload);
  }
}
