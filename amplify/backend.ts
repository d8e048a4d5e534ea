/**
 * @file amplify/backend.ts
 * @description Main Amplify Gen2 backend definition for the text-to-speech converter
 */

import { defineBackend } from '@aws-amplify/backend';
import { CfnOutput } from 'aws-cdk-lib';
import type * as iam from 'aws-cdk-lib/aws-iam';
import type { IFunction } from 'aws-cdk-lib/aws-lambda';
import * as s3 from 'aws-cdk-lib/aws-s3';
import * as s3n from 'aws-cdk-lib/aws-s3-notifications';
import { TEXT_SUFFIX } from './functions/text-to-speech/keys';
import { textToSpeech } from './functions/text-to-speech/resource';
import { attachPollyPermissions } from './polly-permissions';
import { audioStorage, textStorage } from './storage/resource';

/**
 * Define backend resources
 */
const backend = defineBackend({
  textStorage,
  audioStorage,
  textToSpeech,
});

const backendStack = backend.textToSpeech.stack;
const textToSpeechLambda = backend.textToSpeech.resources.lambda;

/**
 * Helper to safely get Lambda role (throws if undefined)
 */
function getLambdaRole(lambda: IFunction, name: string): iam.IRole {
  const role = lambda.role;
  if (!role) {
    throw new Error(`Lambda ${name} does not have an IAM role`);
  }
  return role;
}

const textBucket = backend.textStorage.resources.bucket;
const audioBucket = backend.audioStorage.resources.bucket;

// ============================================================================
// Environment Variables
// ============================================================================

backend.textToSpeech.addEnvironment('SOURCE_BUCKET', textBucket.bucketName);
backend.textToSpeech.addEnvironment('DESTINATION_BUCKET', audioBucket.bucketName);

// ============================================================================
// IAM Permissions
// ============================================================================

textBucket.grantRead(textToSpeechLambda);
audioBucket.grantPut(textToSpeechLambda);
attachPollyPermissions(backendStack, getLambdaRole(textToSpeechLambda, 'textToSpeech'), 'TextToSpeech');

// ============================================================================
// S3 Upload Trigger
// ============================================================================

// Only .txt uploads reach the function
textBucket.addEventNotification(
  s3.EventType.OBJECT_CREATED,
  new s3n.LambdaDestination(textToSpeechLambda),
  { suffix: TEXT_SUFFIX }
);

// ============================================================================
// Stack Outputs
// ============================================================================

new CfnOutput(backendStack, 'TextToSpeechArn', {
  value: textToSpeechLambda.functionArn,
  description: 'Text-to-speech Lambda ARN',
});

new CfnOutput(backendStack, 'TextBucketName', {
  value: textBucket.bucketName,
  description: 'S3 bucket watched for .txt uploads',
});

new CfnOutput(backendStack, 'AudioBucketName', {
  value: audioBucket.bucketName,
  description: 'S3 bucket receiving synthesized .mp3 files',
});
