import test from 'node:test';
import assert from 'node:assert/strict';
import { EventEmitter } from 'node:events';
import { ObjectFileSystem } from '../../../services/object-gateway/src/application/objects/object-file-system';
import { ObjectsApplicationService } from '../../../services/object-gateway/src/application/objects/objects.application.service';
import type { ObjectGatewayConfigService } from '../../../services/object-gateway/src/infrastructure/config/object-gateway-config.service';
import { InMemoryObjectStoreAdapter } from '../../../services/object-gateway/src/infrastructure/storage/in-memory-object-store.adapter';
import {
  abortOnClientDisconnect,
  type HttpResponseLike,
} from '../../../services/object-gateway/src/presentation/http/common/client-disconnect';
import { ObjectsController } from '../../../services/object-gateway/src/presentation/http/objects/objects.controller';

const STORED_AT = new Date('2026-03-08T18:30:00.000Z');

class FakeResponse extends EventEmitter implements HttpResponseLike {
  writableFinished = false;
  readonly headers = new Map<string, string>();

  setHeader(name: string, value: string): void {
    this.headers.set(name, value);
  }
}

async function createController(): Promise<ObjectsController> {
  const store = new InMemoryObjectStoreAdapter({ namespace: 'objects', now: () => STORED_AT });
  await store.put('greeting.txt', 'hello, world');
  const config: Pick<ObjectGatewayConfigService, 'maxReadBytes' | 'presignExpiresSeconds'> = {
    maxReadBytes: 1024,
    presignExpiresSeconds: 900,
  };
  const service = new ObjectsApplicationService(
    new ObjectFileSystem(store, { chunkSize: 4 }),
    config as ObjectGatewayConfigService,
  );
  return new ObjectsController(service);
}

test('abortOnClientDisconnect aborts when the response closes unfinished', () => {
  const response = new FakeResponse();
  const signal = abortOnClientDisconnect(response);

  assert.equal(signal.aborted, false);
  response.emit('close');
  assert.equal(signal.aborted, true);
});

test('abortOnClientDisconnect ignores the close that follows a finished response', () => {
  const response = new FakeResponse();
  const signal = abortOnClientDisconnect(response);

  response.writableFinished = true;
  response.emit('close');
  assert.equal(signal.aborted, false);
});

test('ObjectsController serves a slice with object headers', async () => {
  const controller = await createController();
  const response = new FakeResponse();

  await controller.readObjectContent(response, 'greeting.txt', undefined, '7', '5');

  assert.equal(response.headers.get('x-object-size'), '12');
  assert.equal(response.headers.get('x-object-offset'), '7');
  assert.equal(response.headers.get('last-modified'), 'Sun, 08 Mar 2026 18:30:00 GMT');
});

test('ObjectsController stops a download when the client disconnects', async () => {
  const controller = await createController();
  const response = new FakeResponse();

  const pending = controller.downloadObject(response, 'greeting.txt');
  response.emit('close');

  await assert.rejects(pending, { name: 'AbortError' });
});
