/**
 * @file amplify/functions/text-to-speech/converter.ts
 * @description Read -> synthesize -> write pipeline for a single uploaded text file
 *
 * Every step is wrapped so that a failure comes back as a tagged outcome instead of
 * an exception. Nothing is retried.
 */

import type { ConversionConfig } from './config';
import { deriveAudioKey } from './keys';
import type { SpeechSynthesizer } from './polly-client';
import { decodeUtf8, type AudioStore, type SourceStore } from './storage-client';

export interface ConversionRequest {
  /** Decoded object key of the uploaded text file */
  textKey: string;
}

export interface ConversionDeps {
  config: ConversionConfig;
  source: SourceStore;
  synthesizer: SpeechSynthesizer;
  destination: AudioStore;
}

export type FailureKind =
  | 'InvalidKey'
  | 'SourceReadError'
  | 'DecodeError'
  | 'SynthesisError'
  | 'DestinationWriteError';

export interface ConversionFailure {
  kind: FailureKind;
  message: string;
  cause?: unknown;
}

export interface ConversionSuccess {
  kind: 'Success';
  audioKey: string;
  /** False when Polly returned no audio and empty audio is allowed */
  audioWritten: boolean;
  bytesWritten: number;
}

export type ConversionOutcome = ConversionSuccess | ConversionFailure;

export interface ConversionResponse {
  statusCode: 200 | 500;
  message: string;
}

export const SUCCESS_MESSAGE = 'Text file converted to speech successfully';
export const FAILURE_MESSAGE = 'Error converting text file to speech';

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function failure(kind: FailureKind, error: unknown): ConversionFailure {
  return { kind, message: errorMessage(error), cause: error };
}

export async function convertTextFile(
  request: ConversionRequest,
  deps: ConversionDeps
): Promise<ConversionOutcome> {
  const { config, source, synthesizer, destination } = deps;
  const { textKey } = request;

  const derived = deriveAudioKey(textKey);
  if (!derived.ok) {
    return { kind: 'InvalidKey', message: derived.reason };
  }
  const audioKey = derived.key;

  let bytes: Uint8Array;
  try {
    bytes = await source.getObject(config.sourceBucket, textKey);
  } catch (error) {
    return failure('SourceReadError', error);
  }

  let text: string;
  try {
    text = decodeUtf8(bytes);
  } catch (error) {
    return failure('DecodeError', error);
  }

  let audio: Uint8Array | undefined;
  try {
    audio = await synthesizer.synthesize({
      text,
      outputFormat: config.outputFormat,
      voiceId: config.voiceId,
      engine: config.engine,
    });
  } catch (error) {
    return failure('SynthesisError', error);
  }

  if (!audio) {
    if (!config.allowEmptyAudio) {
      return { kind: 'SynthesisError', message: 'Polly returned no audio stream' };
    }
    console.warn(`No audio produced for ${textKey}, nothing written to ${config.destinationBucket}`);
    return { kind: 'Success', audioKey, audioWritten: false, bytesWritten: 0 };
  }

  try {
    await destination.putObject(config.destinationBucket, audioKey, audio, config.audioContentType);
  } catch (error) {
    return failure('DestinationWriteError', error);
  }

  return { kind: 'Success', audioKey, audioWritten: true, bytesWritten: audio.length };
}

/**
 * Collapse an outcome into the response returned to the Lambda runtime.
 * Failure detail stays in the logs; the caller only sees a generic message.
 */
export function toResponse(outcome: ConversionOutcome): ConversionResponse {
  if (outcome.kind === 'Success') {
    return { statusCode: 200, message: SUCCESS_MESSAGE };
  }
  return { statusCode: 500, message: FAILURE_MESSAGE };
}
