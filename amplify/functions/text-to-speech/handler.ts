/**
 * @file amplify/functions/text-to-speech/handler.ts
 * @description Lambda handler converting uploaded .txt files to MP3 audio with Amazon Polly
 *
 * Triggered by S3 object-created notifications on the text bucket. Always resolves with
 * { statusCode, message }; failure detail only goes to the logs.
 */

import { PollyClient } from '@aws-sdk/client-polly';
import { S3Client } from '@aws-sdk/client-s3';
import type { Handler, S3Event } from 'aws-lambda';
import { loadConfig } from './config';
import {
  convertTextFile,
  FAILURE_MESSAGE,
  toResponse,
  type ConversionDeps,
  type ConversionOutcome,
  type ConversionResponse,
} from './converter';
import { decodeS3Key } from './keys';
import { PollySpeechSynthesizer } from './polly-client';
import { S3ObjectStore } from './storage-client';

const failed: ConversionResponse = { statusCode: 500, message: FAILURE_MESSAGE };

/**
 * Build a handler around a dependency resolver. The resolver runs on the first
 * invocation and its result is reused for the life of the process.
 */
export function createHandler(resolveDeps: () => ConversionDeps) {
  let resolved: ConversionDeps | undefined;

  return async (event: S3Event): Promise<ConversionResponse> => {
    let deps: ConversionDeps;
    try {
      deps = resolved ??= resolveDeps();
    } catch (error) {
      console.error('Invalid text-to-speech configuration:', error);
      return failed;
    }

    const record = event.Records?.[0];
    if (!record) {
      console.error('S3 event contains no records');
      return failed;
    }
    if (event.Records.length > 1) {
      console.warn(`S3 event contains ${event.Records.length} records, only the first is processed`);
    }

    const eventBucket = record.s3.bucket.name;
    const rawKey = record.s3.object.key;
    const { sourceBucket } = deps.config;

    if (eventBucket !== sourceBucket) {
      console.warn(`Event bucket ${eventBucket} differs from configured source bucket ${sourceBucket}`);
    }

    let textKey: string;
    try {
      textKey = decodeS3Key(rawKey);
    } catch (error) {
      console.error(`Failed to decode object key "${rawKey}" from ${sourceBucket}:`, error);
      return failed;
    }

    console.log(`Converting s3://${sourceBucket}/${textKey} to speech`);

    let outcome: ConversionOutcome;
    try {
      outcome = await convertTextFile({ textKey }, deps);
    } catch (error) {
      console.error(`Unexpected error converting ${textKey} from ${sourceBucket}:`, error);
      return failed;
    }

    if (outcome.kind === 'Success') {
      if (outcome.audioWritten) {
        console.log(
          `Wrote ${outcome.bytesWritten} bytes to s3://${deps.config.destinationBucket}/${outcome.audioKey}`
        );
      }
    } else {
      const detail = `Failed to convert ${textKey} from ${sourceBucket} (${outcome.kind}): ${outcome.message}`;
      if (outcome.cause === undefined) {
        console.error(detail);
      } else {
        console.error(detail, outcome.cause);
      }
    }

    return toResponse(outcome);
  };
}

export const handler: Handler<S3Event, ConversionResponse> = createHandler(() => {
  const store = new S3ObjectStore(new S3Client({}));
  return {
    config: loadConfig(process.env),
    source: store,
    synthesizer: new PollySpeechSynthesizer(new PollyClient({})),
    destination: store,
  };
});
