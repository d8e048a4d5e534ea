/**
 * @file amplify/functions/text-to-speech/config.ts
 * @description Environment configuration for the text-to-speech function, parsed once per process
 */

import { Engine, OutputFormat, VoiceId } from '@aws-sdk/client-polly';

export interface ConversionConfig {
  sourceBucket: string;
  destinationBucket: string;
  voiceId: VoiceId;
  engine: Engine;
  outputFormat: OutputFormat;
  audioContentType: string;
  /** When false, a synthesis response without audio is reported as a failure */
  allowEmptyAudio: boolean;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

const DEFAULT_VOICE_ID = 'Joanna';
const DEFAULT_ENGINE = 'standard';

function isVoiceId(value: string): value is VoiceId {
  return Object.values<string>(VoiceId).includes(value);
}

function isEngine(value: string): value is Engine {
  return Object.values<string>(Engine).includes(value);
}

function requireVar(env: NodeJS.ProcessEnv, name: string): string {
  const value = env[name]?.trim();
  if (!value) {
    throw new ConfigError(`Missing required environment variable: ${name}`);
  }
  return value;
}

function parseBoolean(value: string | undefined, name: string, fallback: boolean): boolean {
  if (value === undefined || value.trim() === '') {
    return fallback;
  }
  const normalized = value.trim().toLowerCase();
  if (normalized === 'true') return true;
  if (normalized === 'false') return false;
  throw new ConfigError(`${name} must be "true" or "false", got "${value}"`);
}

/**
 * Build the function configuration from environment variables.
 *
 * Throws {@link ConfigError} when a bucket name is missing or the voice/engine
 * is not one Polly knows about.
 */
export function loadConfig(env: NodeJS.ProcessEnv): ConversionConfig {
  const voiceId = env.VOICE_ID?.trim() || DEFAULT_VOICE_ID;
  if (!isVoiceId(voiceId)) {
    throw new ConfigError(`Unsupported Polly voice: ${voiceId}`);
  }

  const engine = env.POLLY_ENGINE?.trim() || DEFAULT_ENGINE;
  if (!isEngine(engine)) {
    throw new ConfigError(`Unsupported Polly engine: ${engine}`);
  }

  return {
    sourceBucket: requireVar(env, 'SOURCE_BUCKET'),
    destinationBucket: requireVar(env, 'DESTINATION_BUCKET'),
    voiceId,
    engine,
    outputFormat: OutputFormat.MP3,
    audioContentType: 'audio/mpeg',
    allowEmptyAudio: parseBoolean(env.ALLOW_EMPTY_AUDIO, 'ALLOW_EMPTY_AUDIO', true),
  };
}
