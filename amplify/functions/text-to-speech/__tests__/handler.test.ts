/**
 * @file amplify/functions/text-to-speech/__tests__/handler.test.ts
 * @description Tests for the S3-triggered Lambda handler using in-memory S3 and Polly stand-ins
 */

import type { S3Event, S3EventRecord } from 'aws-lambda';
import { beforeEach, describe, expect, it, vi, type MockInstance } from 'vitest';
import { loadConfig } from '../config';
import type { ConversionDeps } from '../converter';
import { createHandler } from '../handler';
import { fakeSynthesizer, MemoryBucketStore, testConfig } from './fakes';

function s3Record(key: string, bucket = 'text-bucket'): S3EventRecord {
  return {
    eventVersion: '2.1',
    eventSource: 'aws:s3',
    awsRegion: 'eu-west-1',
    eventTime: '2024-05-01T12:00:00.000Z',
    eventName: 'ObjectCreated:Put',
    userIdentity: { principalId: 'test-principal' },
    requestParameters: { sourceIPAddress: '127.0.0.1' },
    responseElements: { 'x-amz-request-id': 'test-request', 'x-amz-id-2': 'test-id' },
    s3: {
      s3SchemaVersion: '1.0',
      configurationId: 'text-upload',
      bucket: {
        name: bucket,
        ownerIdentity: { principalId: 'test-owner' },
        arn: `arn:aws:s3:::${bucket}`,
      },
      object: { key, size: 11, eTag: 'test-etag', sequencer: '0001' },
    },
  };
}

function s3Event(...records: S3EventRecord[]): S3Event {
  return { Records: records };
}

describe('text-to-speech handler', () => {
  let store: MemoryBucketStore;
  let errorLog: MockInstance<typeof console.error>;
  let warnLog: MockInstance<typeof console.warn>;

  beforeEach(() => {
    store = new MemoryBucketStore();
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    warnLog = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    errorLog = vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  function handlerWith(overrides: Partial<ConversionDeps> = {}) {
    return createHandler(() => ({
      config: testConfig,
      source: store,
      synthesizer: fakeSynthesizer(),
      destination: store,
      ...overrides,
    }));
  }

  it('converts an uploaded text file and returns 200', async () => {
    store.seed('text-bucket', 'hello.txt', 'Hello world');

    const result = await handlerWith()(s3Event(s3Record('hello.txt')));

    expect(result).toEqual({ statusCode: 200, message: 'Text file converted to speech successfully' });
    expect(store.keys('audio-bucket')).toEqual(['hello.mp3']);
    expect(errorLog).not.toHaveBeenCalled();
    expect(warnLog).not.toHaveBeenCalled();
  });

  it('converts an upload named only .txt', async () => {
    store.seed('text-bucket', '.txt', 'Hello world');

    const result = await handlerWith()(s3Event(s3Record('.txt')));

    expect(result.statusCode).toBe(200);
    expect(store.keys('audio-bucket')).toEqual(['.mp3']);
  });

  it('decodes URL-encoded keys from the event', async () => {
    store.seed('text-bucket', 'my notes(1).txt', 'Hello world');

    const result = await handlerWith()(s3Event(s3Record('my+notes%281%29.txt')));

    expect(result.statusCode).toBe(200);
    expect(store.keys('audio-bucket')).toEqual(['my notes(1).mp3']);
  });

  it('returns 500 and logs the key and bucket when the source is missing', async () => {
    const result = await handlerWith()(s3Event(s3Record('missing.txt')));

    expect(result).toEqual({ statusCode: 500, message: 'Error converting text file to speech' });
    expect(store.putCount).toBe(0);
    expect(errorLog).toHaveBeenCalledWith(
      'Failed to convert missing.txt from text-bucket (SourceReadError): The specified key does not exist.',
      expect.any(Error)
    );
  });

  it('returns 500 for keys without a .txt suffix', async () => {
    store.seed('text-bucket', 'notes.md', '# Notes');

    const result = await handlerWith()(s3Event(s3Record('notes.md')));

    expect(result.statusCode).toBe(500);
    expect(store.keys('audio-bucket')).toEqual([]);
    expect(errorLog).toHaveBeenCalledTimes(1);
    expect(errorLog).toHaveBeenCalledWith(
      'Failed to convert notes.md from text-bucket (InvalidKey): Key "notes.md" does not name a .txt file'
    );
  });

  it('returns 500 for malformed key encoding', async () => {
    const result = await handlerWith()(s3Event(s3Record('bad%E0%A4%A.txt')));

    expect(result.statusCode).toBe(500);
    expect(store.putCount).toBe(0);
  });

  it('returns 500 for an event without records', async () => {
    const result = await handlerWith()(s3Event());

    expect(result.statusCode).toBe(500);
    expect(errorLog).toHaveBeenCalledWith('S3 event contains no records');
  });

  it('processes only the first record', async () => {
    store.seed('text-bucket', 'one.txt', 'One');
    store.seed('text-bucket', 'two.txt', 'Two');

    const result = await handlerWith()(s3Event(s3Record('one.txt'), s3Record('two.txt')));

    expect(result.statusCode).toBe(200);
    expect(store.keys('audio-bucket')).toEqual(['one.mp3']);
    expect(warnLog).toHaveBeenCalledWith('S3 event contains 2 records, only the first is processed');
  });

  it('reads from the configured source bucket even when the event names another', async () => {
    store.seed('text-bucket', 'hello.txt', 'Hello world');

    const result = await handlerWith()(s3Event(s3Record('hello.txt', 'other-bucket')));

    expect(result.statusCode).toBe(200);
    expect(warnLog).toHaveBeenCalledWith(
      'Event bucket other-bucket differs from configured source bucket text-bucket'
    );
  });

  it('returns 200 without writing when Polly returns no audio', async () => {
    store.seed('text-bucket', 'hello.txt', 'Hello world');

    const result = await handlerWith({ synthesizer: fakeSynthesizer(null) })(
      s3Event(s3Record('hello.txt'))
    );

    expect(result.statusCode).toBe(200);
    expect(store.putCount).toBe(0);
  });

  it('returns 500 when configuration is invalid', async () => {
    const handler = createHandler(() => ({
      config: loadConfig({}),
      source: store,
      synthesizer: fakeSynthesizer(),
      destination: store,
    }));

    const result = await handler(s3Event(s3Record('hello.txt')));

    expect(result).toEqual({ statusCode: 500, message: 'Error converting text file to speech' });
    expect(errorLog).toHaveBeenCalledWith('Invalid text-to-speech configuration:', expect.any(Error));
  });

  it('resolves dependencies once per process', async () => {
    store.seed('text-bucket', 'hello.txt', 'Hello world');
    const resolve = vi.fn(() => ({
      config: testConfig,
      source: store,
      synthesizer: fakeSynthesizer(),
      destination: store,
    }));
    const handler = createHandler(resolve);

    await handler(s3Event(s3Record('hello.txt')));
    await handler(s3Event(s3Record('hello.txt')));

    expect(resolve).toHaveBeenCalledTimes(1);
    expect(store.keys('audio-bucket')).toEqual(['hello.mp3']);
  });
});
