import test from 'node:test';
import assert from 'node:assert/strict';
import { Readable } from 'node:stream';
import { BlobServiceClient, StorageSharedKeyCredential } from '@azure/storage-blob';
import {
  MalformedObjectResponseError,
  ObjectNotFoundError,
  RangeNotSatisfiableError,
  UnsupportedOperationError,
} from '../../../services/object-gateway/src/domain/objects/object-store.errors';
import {
  AzureBlobObjectStoreAdapter,
  readBlobDownloadResponse,
  toAzureBlobObjectStoreError,
} from '../../../services/object-gateway/src/infrastructure/storage/azure-blob-object-store.adapter';

const ENDPOINT = 'http://127.0.0.1:10000/devstoreaccount1';
const MODIFIED_AT = new Date('2026-03-05T16:45:00.000Z');

test('readBlobDownloadResponse keeps range metadata from the download', () => {
  const body = Readable.from([Buffer.from('world')]);

  const response = readBlobDownloadResponse('greeting.txt', {
    readableStreamBody: body,
    contentLength: 5,
    contentRange: 'bytes 7-11/12',
    lastModified: MODIFIED_AT,
  });

  assert.equal(response.body, body);
  assert.equal(response.contentLength, 5);
  assert.equal(response.contentRange, 'bytes 7-11/12');
  assert.equal(response.lastModified, MODIFIED_AT);
});

test('readBlobDownloadResponse rejects downloads without a body or metadata', () => {
  assert.throws(
    () => readBlobDownloadResponse('greeting.txt', {
      readableStreamBody: undefined,
      contentLength: 5,
      contentRange: undefined,
      lastModified: MODIFIED_AT,
    }),
    MalformedObjectResponseError,
  );
  assert.throws(
    () => readBlobDownloadResponse('greeting.txt', {
      readableStreamBody: Readable.from([Buffer.from('x')]),
      contentLength: 1,
      contentRange: undefined,
      lastModified: undefined,
    }),
    {
      name: 'MalformedObjectResponseError',
      message: 'Malformed response for object "greeting.txt": missing content-length or last-modified',
    },
  );
});

test('toAzureBlobObjectStoreError maps status codes and service error codes', () => {
  const range = { start: 0, end: 3 };

  assert.ok(toAzureBlobObjectStoreError({ statusCode: 404 }, 'a.txt') instanceof ObjectNotFoundError);
  assert.ok(toAzureBlobObjectStoreError({ code: 'ContainerNotFound' }, 'a.txt') instanceof ObjectNotFoundError);
  assert.ok(toAzureBlobObjectStoreError({ statusCode: 416 }, 'a.txt', range) instanceof RangeNotSatisfiableError);
  assert.ok(
    toAzureBlobObjectStoreError({ code: 'InvalidRange' }, 'a.txt', range) instanceof RangeNotSatisfiableError,
  );

  const throttled = { statusCode: 503, code: 'ServerBusy' };
  assert.equal(toAzureBlobObjectStoreError(throttled, 'a.txt', range), throttled);
});

test('presign needs a shared key credential', async () => {
  const anonymous = new AzureBlobObjectStoreAdapter(new BlobServiceClient(ENDPOINT), 'media');

  await assert.rejects(() => anonymous.presign('clips/intro.mp4', 'GET', 60), UnsupportedOperationError);
});

test('presign issues read and write SAS URLs for the blob', async () => {
  const credential = new StorageSharedKeyCredential(
    'devstoreaccount1',
    Buffer.from('test-secret').toString('base64'),
  );
  const store = new AzureBlobObjectStoreAdapter(new BlobServiceClient(ENDPOINT, credential), 'media');

  const readUrl = new URL(await store.presign('clips/intro.mp4', 'GET', 60));
  const writeUrl = new URL(await store.presign('clips/intro.mp4', 'PUT', 60));

  assert.equal(readUrl.pathname, '/devstoreaccount1/media/clips/intro.mp4');
  assert.equal(readUrl.searchParams.get('sp'), 'r');
  assert.equal(readUrl.searchParams.get('sr'), 'b');
  assert.equal(writeUrl.searchParams.get('sp'), 'cw');
  assert.ok(readUrl.searchParams.get('sig'));
});
