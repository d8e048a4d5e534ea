/**
 * Smoke test against a deployed stack: upload a .txt file and wait for the .mp3
 * Run with: TEXT_BUCKET=... AUDIO_BUCKET=... npx tsx scripts/test-polly.ts
 */

import { GetObjectCommand, PutObjectCommand, S3Client } from '@aws-sdk/client-s3';
import { deriveAudioKey } from '../amplify/functions/text-to-speech/keys';

const TEXT_BUCKET = process.env.TEXT_BUCKET ?? '';
const AUDIO_BUCKET = process.env.AUDIO_BUCKET ?? '';
const KEY = `smoke-tests/${Date.now()}-hello.txt`;
const MAX_ATTEMPTS = 15;

const s3Client = new S3Client({});

async function main() {
  if (!TEXT_BUCKET || !AUDIO_BUCKET) {
    throw new Error('TEXT_BUCKET and AUDIO_BUCKET must be set');
  }

  const derived = deriveAudioKey(KEY);
  if (!derived.ok) {
    throw new Error(derived.reason);
  }

  console.log(`Uploading s3://${TEXT_BUCKET}/${KEY}`);
  await s3Client.send(
    new PutObjectCommand({
      Bucket: TEXT_BUCKET,
      Key: KEY,
      Body: 'Hello world. This is a text to speech smoke test.',
      ContentType: 'text/plain; charset=utf-8',
    })
  );

  console.log(`Waiting for s3://${AUDIO_BUCKET}/${derived.key}...`);

  for (let attempt = 1; attempt <= MAX_ATTEMPTS; attempt++) {
    await new Promise((resolve) => setTimeout(resolve, 2000));

    try {
      const response = await s3Client.send(
        new GetObjectCommand({
          Bucket: AUDIO_BUCKET,
          Key: derived.key,
        })
      );
      const bytes = await response.Body?.transformToByteArray();
      console.log(`\nAudio ready after ${attempt} attempt(s): ${bytes?.length ?? 0} bytes, ${response.ContentType}`);
      return;
    } catch (error) {
      if (error instanceof Error && error.name === 'NoSuchKey') {
        console.log(`Attempt ${attempt}: not there yet`);
        continue;
      }
      throw error;
    }
  }

  throw new Error(`No audio after ${MAX_ATTEMPTS} attempts`);
}

main().catch((error) => {
  console.error(error);
  process.exit(1);
});
