/**
 * Typed application configuration, validated from the environment.
 */

import { z } from 'zod';
import { DEFAULT_STAGE_POLICIES, type ProviderName, type StageKind, type StagePolicies, type StagePolicy } from './types/pipeline.js';
import type { SignatureSettings } from './services/webhooks/signature.js';

const TRUTHY = new Set(['true', '1', 'yes', 'on']);

const flag = z
  .string()
  .optional()
  .transform((value) => TRUTHY.has((value ?? '').trim().toLowerCase()));

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim() ? value.trim() : undefined));

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const envSchema = z.object({
  PORT: positiveInt(5000),
  WEBHOOK_BASE_URL: z.string().url().default('http://localhost:5000'),
  DATABASE_URL: optionalString,

  ELEVENLABS_API_KEY: optionalString,
  ELEVENLABS_BASE_URL: z.string().url().default('https://api.elevenlabs.io/v1'),
  NCA_API_KEY: optionalString,
  NCA_BASE_URL: z.string().url().default('http://localhost:8080'),
  GOAPI_API_KEY: optionalString,
  GOAPI_BASE_URL: z.string().url().default('https://api.goapi.ai/v1'),

  DEFAULT_VOICE_ID: z.string().min(1).default('21m00Tcm4TlvDq8ikWAM'),
  DEFAULT_MUSIC_PROMPT: z.string().min(1).default('Calm instrumental background music'),

  STAGE_VOICE_TIMEOUT_SECONDS: positiveInt(DEFAULT_STAGE_POLICIES.voice.timeoutSeconds),
  STAGE_VOICE_MAX_ATTEMPTS: positiveInt(DEFAULT_STAGE_POLICIES.voice.maxAttempts),
  STAGE_MEDIA_TIMEOUT_SECONDS: positiveInt(DEFAULT_STAGE_POLICIES.media.timeoutSeconds),
  STAGE_MEDIA_MAX_ATTEMPTS: positiveInt(DEFAULT_STAGE_POLICIES.media.maxAttempts),
  STAGE_CONCAT_TIMEOUT_SECONDS: positiveInt(DEFAULT_STAGE_POLICIES.concat.timeoutSeconds),
  STAGE_CONCAT_MAX_ATTEMPTS: positiveInt(DEFAULT_STAGE_POLICIES.concat.maxAttempts),
  STAGE_MUSIC_TIMEOUT_SECONDS: positiveInt(DEFAULT_STAGE_POLICIES.music.timeoutSeconds),
  STAGE_MUSIC_MAX_ATTEMPTS: positiveInt(DEFAULT_STAGE_POLICIES.music.maxAttempts),

  SWEEP_INTERVAL_MS: positiveInt(15000),
  STALL_AFTER_SECONDS: positiveInt(600),
  DISPATCH_BACKOFF_MS: positiveInt(5000),
  PROVIDER_REQUEST_TIMEOUT_MS: positiveInt(30000),

  WEBHOOK_VALIDATION_ELEVENLABS_ENABLED: flag,
  WEBHOOK_SECRET_ELEVENLABS: optionalString,
  WEBHOOK_VALIDATION_NCA_ENABLED: flag,
  WEBHOOK_SECRET_NCA: optionalString,
  WEBHOOK_VALIDATION_GOAPI_ENABLED: flag,
  WEBHOOK_SECRET_GOAPI: optionalString,
});

export type Env = z.infer<typeof envSchema>;

export interface ProviderConfig {
  apiKey?: string;
  baseUrl: string;
}

export interface AppConfig {
  port: number;
  webhookBaseUrl: string;
  databaseUrl?: string;
  providers: Record<ProviderName, ProviderConfig>;
  defaults: { voiceId: string; musicPrompt: string };
  stagePolicies: StagePolicies;
  sweep: { intervalMs: number; stallAfterMs: number };
  dispatchBackoffMs: number;
  providerRequestTimeoutMs: number;
  webhookSignatures: SignatureSettings;
}

export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration:\n  ${issues.join('\n  ')}`);
    this.name = 'ConfigError';
  }
}

function stagePolicy(env: Env, stage: StageKind): StagePolicy {
  switch (stage) {
    case 'voice':
      return { timeoutSeconds: env.STAGE_VOICE_TIMEOUT_SECONDS, maxAttempts: env.STAGE_VOICE_MAX_ATTEMPTS };
    case 'media':
      return { timeoutSeconds: env.STAGE_MEDIA_TIMEOUT_SECONDS, maxAttempts: env.STAGE_MEDIA_MAX_ATTEMPTS };
    case 'concat':
      return { timeoutSeconds: env.STAGE_CONCAT_TIMEOUT_SECONDS, maxAttempts: env.STAGE_CONCAT_MAX_ATTEMPTS };
    case 'music':
      return { timeoutSeconds: env.STAGE_MUSIC_TIMEOUT_SECONDS, maxAttempts: env.STAGE_MUSIC_MAX_ATTEMPTS };
  }
}

export function loadConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`));
  }
  const env = parsed.data;

  return {
    port: env.PORT,
    webhookBaseUrl: env.WEBHOOK_BASE_URL.replace(/\/+$/, ''),
    databaseUrl: env.DATABASE_URL,
    providers: {
      elevenlabs: { apiKey: env.ELEVENLABS_API_KEY, baseUrl: env.ELEVENLABS_BASE_URL },
      nca: { apiKey: env.NCA_API_KEY, baseUrl: env.NCA_BASE_URL },
      goapi: { apiKey: env.GOAPI_API_KEY, baseUrl: env.GOAPI_BASE_URL },
    },
    defaults: { voiceId: env.DEFAULT_VOICE_ID, musicPrompt: env.DEFAULT_MUSIC_PROMPT },
    stagePolicies: {
      voice: stagePolicy(env, 'voice'),
      media: stagePolicy(env, 'media'),
      concat: stagePolicy(env, 'concat'),
      music: stagePolicy(env, 'music'),
    },
    sweep: { intervalMs: env.SWEEP_INTERVAL_MS, stallAfterMs: env.STALL_AFTER_SECONDS * 1000 },
    dispatchBackoffMs: env.DISPATCH_BACKOFF_MS,
    providerRequestTimeoutMs: env.PROVIDER_REQUEST_TIMEOUT_MS,
    webhookSignatures: {
      elevenlabs: { enabled: env.WEBHOOK_VALIDATION_ELEVENLABS_ENABLED, secret: env.WEBHOOK_SECRET_ELEVENLABS },
      nca: { enabled: env.WEBHOOK_VALIDATION_NCA_ENABLED, secret: env.WEBHOOK_SECRET_NCA },
      goapi: { enabled: env.WEBHOOK_VALIDATION_GOAPI_ENABLED, secret: env.WEBHOOK_SECRET_GOAPI },
    },
  };
}
