import { providerLogger } from '../../../services/logger.js';
import { extractReceipt, postJson, type FetchLike } from './httpClient.js';
import type { DispatchContext, DispatchReceipt, MusicTrackRequest, ProviderCredentials } from './types.js';

const log = providerLogger.child('GoAPI');

export const GOAPI_MUSIC_MODEL = 'suno-v3.5';

export interface GoApiClientOptions extends ProviderCredentials {
  timeoutMs: number;
  fetchImpl?: FetchLike;
}

/**
 * Suno music generation. The webhook carries the audio track, which NCA
 * then mixes under the video.
 */
export class GoApiClient {
  constructor(private options: GoApiClientOptions) {}

  async generateMusic(request: MusicTrackRequest, context: DispatchContext): Promise<DispatchReceipt> {
    log.debug('Dispatching music track', { duration: request.durationSeconds });

    const payload = await postJson({
      provider: 'goapi',
      url: `${this.options.baseUrl}/music/suno`,
      headers: { Authorization: `Bearer ${this.options.apiKey}` },
      body: {
        prompt: request.prompt,
        duration: request.durationSeconds,
        model: GOAPI_MUSIC_MODEL,
        instrumental: true,
        wait_audio: false,
        webhook_url: context.callbackUrl,
      },
      timeoutMs: this.options.timeoutMs,
      fetchImpl: this.options.fetchImpl,
    });
    return extractReceipt(payload);
  }
}
