import { providerLogger } from '../../../services/logger.js';
import { extractReceipt, postJson, type FetchLike } from './httpClient.js';
import type { DispatchContext, DispatchReceipt, ProviderCredentials, VoiceRequest } from './types.js';

const log = providerLogger.child('ElevenLabs');

export const ELEVENLABS_MODEL_ID = 'eleven_monolingual_v1';

export interface ElevenLabsClientOptions extends ProviderCredentials {
  timeoutMs: number;
  fetchImpl?: FetchLike;
}

/**
 * Text-to-speech. The rendered voiceover URL arrives on the webhook.
 */
export class ElevenLabsClient {
  constructor(private options: ElevenLabsClientOptions) {}

  async generateVoice(request: VoiceRequest, context: DispatchContext): Promise<DispatchReceipt> {
    const url = `${this.options.baseUrl}/text-to-speech/${encodeURIComponent(request.voiceId)}/stream`;
    log.debug('Dispatching voiceover', { voiceId: request.voiceId, chars: request.text.length });

    const payload = await postJson({
      provider: 'elevenlabs',
      url,
      headers: { 'xi-api-key': this.options.apiKey },
      body: {
        text: request.text,
        model_id: ELEVENLABS_MODEL_ID,
        voice_settings: { stability: 0.5, similarity_boost: 0.75 },
        webhook_url: context.callbackUrl,
      },
      timeoutMs: this.options.timeoutMs,
      fetchImpl: this.options.fetchImpl,
    });
    return extractReceipt(payload);
  }
}
