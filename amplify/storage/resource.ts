/**
 * @file amplify/storage/resource.ts
 * @description S3 buckets for uploaded text files and generated audio
 * NOTE: Function access and the upload notification are added via CDK in backend.ts
 */

import { defineStorage } from '@aws-amplify/backend';

export const textStorage = defineStorage({
  name: 'ttsTextUploads',
  isDefault: true,
});

export const audioStorage = defineStorage({
  name: 'ttsAudioOutput',
});
