import type { MusicStep, ProviderName, StageKind } from '../../types/pipeline.js';

export interface VoiceRequest {
  stage: 'voice';
  text: string;
  voiceId: string;
}

/** Lay a segment's voiceover over its background clip */
export interface MediaRequest {
  stage: 'media';
  videoRef: string;
  audioRef: string;
}

/** Join combined segment clips, in the order given */
export interface ConcatRequest {
  stage: 'concat';
  videoRefs: string[];
  filename: string;
}

/** Generate an instrumental track for the finished cut */
export interface MusicTrackRequest {
  stage: 'music';
  step: 'track';
  prompt: string;
  durationSeconds: number;
}

/** Mix the generated track under the concatenated cut's own audio */
export interface MusicMixRequest {
  stage: 'music';
  step: 'mix';
  videoRef: string;
  musicRef: string;
  filename: string;
}

export type MusicRequest = MusicTrackRequest | MusicMixRequest;

export type StageRequest = VoiceRequest | MediaRequest | ConcatRequest | MusicRequest;

export interface DispatchContext {
  /** Correlation token the callback must carry back */
  token: string;
  /** Fully-formed webhook URL, token included */
  callbackUrl: string;
}

export interface DispatchReceipt {
  providerJobId?: string;
}

/**
 * Fire-and-forget entry point the scheduler talks to. Returns once the
 * provider has accepted the job; results arrive later by webhook.
 */
export interface StageDispatcher {
  dispatch(request: StageRequest, context: DispatchContext): Promise<DispatchReceipt>;
}

const STAGE_PROVIDER: Record<StageKind, ProviderName> = {
  voice: 'elevenlabs',
  media: 'nca',
  concat: 'nca',
  music: 'goapi',
};

/** Provider that calls back for a stage; the music mix runs on NCA. */
export function providerFor(stage: StageKind, step?: MusicStep): ProviderName {
  return stage === 'music' && step === 'mix' ? 'nca' : STAGE_PROVIDER[stage];
}

export interface ProviderCredentials {
  apiKey: string;
  baseUrl: string;
}
