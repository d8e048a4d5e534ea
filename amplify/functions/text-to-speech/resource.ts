/**
 * @file amplify/functions/text-to-speech/resource.ts
 * @description Lambda function definition for text-to-speech conversion (S3 -> Polly -> S3)
 */

import { defineFunction } from '@aws-amplify/backend';

export const textToSpeech = defineFunction({
  name: 'text-to-speech',
  entry: './handler.ts',
  timeoutSeconds: 60,
  memoryMB: 512,
  environment: {
    VOICE_ID: 'Joanna',
    POLLY_ENGINE: 'standard',
    ALLOW_EMPTY_AUDIO: 'true',
  },
  // Same stack as the buckets, otherwise the S3 notification creates a circular dependency
  resourceGroupName: 'storage',
});
