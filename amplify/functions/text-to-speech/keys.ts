/**
 * @file amplify/functions/text-to-speech/keys.ts
 * @description Object key helpers: S3 event key decoding and text -> audio key derivation
 */

export const TEXT_SUFFIX = '.txt';
export const AUDIO_SUFFIX = '.mp3';

export type KeyDerivation = { ok: true; key: string } | { ok: false; reason: string };

/**
 * Replace a trailing `from` suffix with `to`. Keys without the suffix come back unchanged.
 */
export function replaceSuffix(key: string, from: string, to: string): string {
  if (!key.endsWith(from)) {
    return key;
  }
  return key.slice(0, key.length - from.length) + to;
}

/**
 * Derive the audio object key for a text object key.
 * Only a trailing `.txt` is replaced: `a.txt.txt` -> `a.txt.mp3`.
 */
export function deriveAudioKey(textKey: string): KeyDerivation {
  if (!textKey.endsWith(TEXT_SUFFIX)) {
    return { ok: false, reason: `Key "${textKey}" does not name a ${TEXT_SUFFIX} file` };
  }
  return { ok: true, key: replaceSuffix(textKey, TEXT_SUFFIX, AUDIO_SUFFIX) };
}

/**
 * S3 event notifications URL-encode object keys, with `+` standing for a space.
 */
export function decodeS3Key(rawKey: string): string {
  return decodeURIComponent(rawKey.replace(/\+/g, ' '));
}
