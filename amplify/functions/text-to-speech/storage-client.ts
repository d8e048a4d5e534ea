/**
 * @file amplify/functions/text-to-speech/storage-client.ts
 * @description S3 access for reading uploaded text files and writing synthesized audio
 */

import { GetObjectCommand, PutObjectCommand, type S3Client } from '@aws-sdk/client-s3';

export interface SourceStore {
  getObject(bucket: string, key: string): Promise<Uint8Array>;
}

export interface AudioStore {
  putObject(bucket: string, key: string, body: Uint8Array, contentType: string): Promise<void>;
}

const utf8Decoder = new TextDecoder('utf-8', { fatal: true });

/**
 * Decode bytes as UTF-8, rejecting invalid sequences instead of substituting U+FFFD.
 */
export function decodeUtf8(bytes: Uint8Array): string {
  return utf8Decoder.decode(bytes);
}

export class S3ObjectStore implements SourceStore, AudioStore {
  constructor(private readonly client: S3Client) {}

  async getObject(bucket: string, key: string): Promise<Uint8Array> {
    const response = await this.client.send(
      new GetObjectCommand({
        Bucket: bucket,
        Key: key,
      })
    );

    const bytes = await response.Body?.transformToByteArray();
    if (!bytes) {
      throw new Error(`Empty body for s3://${bucket}/${key}`);
    }

    console.log(`Downloaded ${bytes.length} bytes from s3://${bucket}/${key}`);
    return bytes;
  }

  async putObject(bucket: string, key: string, body: Uint8Array, contentType: string): Promise<void> {
    await this.client.send(
      new PutObjectCommand({
        Bucket: bucket,
        Key: key,
        Body: body,
        ContentType: contentType,
      })
    );

    console.log(`Uploaded ${body.length} bytes to s3://${bucket}/${key}`);
  }
}
