import test from 'node:test';
import assert from 'node:assert/strict';
import { IncomingMessage, type IncomingHttpHeaders } from 'node:http';
import { Socket } from 'node:net';
import { Readable } from 'node:stream';
import { Client } from 'minio';
import {
  MalformedObjectResponseError,
  ObjectNotFoundError,
  RangeNotSatisfiableError,
} from '../../../services/object-gateway/src/domain/objects/object-store.errors';
import {
  MinioObjectStoreAdapter,
  readMinioResponse,
  toMinioObjectStoreError,
} from '../../../services/object-gateway/src/infrastructure/storage/minio-object-store.adapter';

function createResponse(headers: IncomingHttpHeaders): IncomingMessage {
  const message = new IncomingMessage(new Socket());
  message.headers = headers;
  return message;
}

test('readMinioResponse lifts range headers from the raw HTTP response', () => {
  const message = createResponse({
    'content-length': '5',
    'content-range': 'bytes 7-11/12',
    'last-modified': 'Wed, 04 Mar 2026 09:15:00 GMT',
  });

  const response = readMinioResponse('greeting.txt', message);

  assert.equal(response.body, message);
  assert.equal(response.contentLength, 5);
  assert.equal(response.contentRange, 'bytes 7-11/12');
  assert.equal(response.lastModified.toISOString(), '2026-03-04T09:15:00.000Z');
});

test('readMinioResponse rejects responses without usable headers', () => {
  assert.throws(
    () => readMinioResponse('greeting.txt', createResponse({ 'content-length': '5' })),
    MalformedObjectResponseError,
  );
  assert.throws(
    () => readMinioResponse('greeting.txt', Readable.from(['plain'])),
    {
      name: 'MalformedObjectResponseError',
      message: 'Malformed response for object "greeting.txt": response headers are unavailable',
    },
  );
});

test('toMinioObjectStoreError maps not-found and invalid-range codes', () => {
  const range = { start: 0, end: 3 };

  assert.ok(toMinioObjectStoreError({ code: 'NoSuchKey' }, 'a.txt') instanceof ObjectNotFoundError);
  assert.ok(toMinioObjectStoreError({ code: 'NoSuchBucket' }, 'a.txt', range) instanceof ObjectNotFoundError);
  assert.ok(toMinioObjectStoreError({ code: 'InvalidRange' }, 'a.txt', range) instanceof RangeNotSatisfiableError);

  const denied = { code: 'AccessDenied' };
  assert.equal(toMinioObjectStoreError(denied, 'a.txt', range), denied);
  const unrangedInvalid = { code: 'InvalidRange' };
  assert.equal(toMinioObjectStoreError(unrangedInvalid, 'a.txt'), unrangedInvalid);
});

test('fetch honours an aborted signal before calling the server', async () => {
  const client = new Client({
    endPoint: '127.0.0.1',
    port: 9,
    useSSL: false,
    accessKey: 'test-access',
    secretKey: 'test-secret',
    region: 'us-east-1',
  });
  const store = new MinioObjectStoreAdapter(client, 'uploads');
  const controller = new AbortController();
  controller.abort();

  await assert.rejects(
    () => store.fetch('a.txt', { start: 0, end: 3 }, { signal: controller.signal }),
    { name: 'AbortError' },
  );
  assert.equal(store.withNamespace('archive').namespace, 'archive');
  assert.throws(() => store.withNamespace('  '), /requires a non-empty namespace/);
});
