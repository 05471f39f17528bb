import { ElevenLabsClient } from './elevenLabsClient.js';
import type { FetchLike } from './httpClient.js';
import { GoApiClient } from './goApiClient.js';
import { NcaClient } from './ncaClient.js';
import type { DispatchContext, DispatchReceipt, ProviderCredentials, StageDispatcher, StageRequest } from './types.js';

export interface ProviderSettings {
  elevenlabs: ProviderCredentials;
  nca: ProviderCredentials;
  goapi: ProviderCredentials;
  requestTimeoutMs: number;
  fetchImpl?: FetchLike;
}

/**
 * Routes each stage to the provider that performs it.
 */
export class ProviderRouter implements StageDispatcher {
  private elevenLabs: ElevenLabsClient;
  private nca: NcaClient;
  private goApi: GoApiClient;

  constructor(settings: ProviderSettings) {
    const shared = { timeoutMs: settings.requestTimeoutMs, fetchImpl: settings.fetchImpl };
    this.elevenLabs = new ElevenLabsClient({ ...settings.elevenlabs, ...shared });
    this.nca = new NcaClient({ ...settings.nca, ...shared });
    this.goApi = new GoApiClient({ ...settings.goapi, ...shared });
  }

  dispatch(request: StageRequest, context: DispatchContext): Promise<DispatchReceipt> {
    switch (request.stage) {
      case 'voice':
        return this.elevenLabs.generateVoice(request, context);
      case 'media':
        return this.nca.combineMedia(request, context);
      case 'concat':
        return this.nca.concatenate(request, context);
      case 'music':
        return request.step === 'track'
          ? this.goApi.generateMusic(request, context)
          : this.nca.addBackgroundMusic(request, context);
    }
  }
}

export * from './types.js';
export { mapStatusToError } from './httpClient.js';
