import test from 'node:test';
import assert from 'node:assert/strict';
import { mkdtemp, mkdir, readFile, rm, utimes, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { Readable } from 'node:stream';
import { readBody } from '../../../services/object-gateway/src/application/objects/object-body';
import { RemoteObjectReader } from '../../../services/object-gateway/src/application/objects/remote-object-reader';
import {
  InvalidObjectKeyError,
  ObjectNotFoundError,
  RangeNotSatisfiableError,
  UnsupportedOperationError,
} from '../../../services/object-gateway/src/domain/objects/object-store.errors';
import { LocalDirectoryObjectStoreAdapter } from '../../../services/object-gateway/src/infrastructure/storage/local-directory-object-store.adapter';

const MODIFIED_AT = new Date('2026-03-04T09:15:00.000Z');

async function withStore(run: (store: LocalDirectoryObjectStoreAdapter, root: string) => Promise<void>) {
  const root = await mkdtemp(path.join(os.tmpdir(), 'object-gateway-local-'));
  try {
    await mkdir(path.join(root, 'files', 'nested'), { recursive: true });
    const filePath = path.join(root, 'files', 'nested', 'greeting.txt');
    await writeFile(filePath, 'hello, world');
    await utimes(filePath, MODIFIED_AT, MODIFIED_AT);
    await run(new LocalDirectoryObjectStoreAdapter(root, 'files'), root);
  } finally {
    await rm(root, { recursive: true, force: true });
  }
}

test('ranged fetches read a slice and report the file mtime', async () => {
  await withStore(async (store) => {
    const response = await store.fetch('nested/greeting.txt', { start: 7, end: 20 });

    assert.equal(response.contentRange, 'bytes 7-11/12');
    assert.equal(response.contentLength, 5);
    assert.equal(response.lastModified.getTime(), MODIFIED_AT.getTime());
    assert.equal((await readBody(response.body)).toString('utf8'), 'world');
  });
});

test('a reader over the directory store fetches lazily', async () => {
  await withStore(async (store) => {
    const reader = await RemoteObjectReader.open(store, 'nested/greeting.txt', { chunkSize: 1 });
    reader.seek(7);

    assert.equal((await reader.readUpTo(5)).toString('utf8'), 'world');
    assert.equal(reader.downloadedBytes, 12);
  });
});

test('missing files, directories and empty-file ranges map to store errors', async () => {
  await withStore(async (store, root) => {
    await writeFile(path.join(root, 'files', 'empty.bin'), '');

    await assert.rejects(() => store.fetch('nested/missing.txt'), ObjectNotFoundError);
    await assert.rejects(() => store.fetch('nested'), ObjectNotFoundError);
    await assert.rejects(() => store.fetch('empty.bin', { start: 0, end: 3 }), RangeNotSatisfiableError);
    await assert.rejects(() => store.delete('nested/missing.txt'), ObjectNotFoundError);
  });
});

test('keys cannot escape the namespace directory', async () => {
  await withStore(async (store) => {
    await assert.rejects(() => store.fetch('../outside.txt'), InvalidObjectKeyError);
    await assert.rejects(() => store.put('../../etc/passwd', 'x'), InvalidObjectKeyError);
  });
});

test('put writes streams and buffers under the namespace directory', async () => {
  await withStore(async (store, root) => {
    await store.put('uploads/a.txt', Readable.from([Buffer.from('streamed')]));
    await store.put('uploads/b.txt', Buffer.from('buffered'));

    assert.equal(await readFile(path.join(root, 'files', 'uploads', 'a.txt'), 'utf8'), 'streamed');
    assert.equal(await readFile(path.join(root, 'files', 'uploads', 'b.txt'), 'utf8'), 'buffered');

    await store.delete('uploads/a.txt');
    await assert.rejects(() => store.fetch('uploads/a.txt'), ObjectNotFoundError);
    await assert.rejects(() => store.presign(), UnsupportedOperationError);
  });
});
