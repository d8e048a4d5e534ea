/**
 * @file amplify/polly-permissions.ts
 * @description IAM policies for Amazon Polly speech synthesis
 */

import type { Stack } from 'aws-cdk-lib';
import * as iam from 'aws-cdk-lib/aws-iam';

/**
 * Attach Polly synthesis permissions to a Lambda function role
 */
export function attachPollyPermissions(stack: Stack, lambdaRole: iam.IRole, identifier: string): void {
  lambdaRole.attachInlinePolicy(
    new iam.Policy(stack, `${identifier}-PollyPolicy`, {
      statements: [
        new iam.PolicyStatement({
          sid: 'AllowPollySynthesizeSpeech',
          effect: iam.Effect.ALLOW,
          actions: ['polly:SynthesizeSpeech'],
          // Polly voices have no resource ARNs to scope to
          resources: ['*'],
        }),
      ],
    })
  );
}
