import type { ObjectInfo } from '../../domain/objects/object-info';
import { InvalidObjectKeyError } from '../../domain/objects/object-store.errors';
import { RemoteObjectReader } from './remote-object-reader';
import type { FetchObjectOptions } from './ports/object-store-client.port';
import type {
  ObjectBody,
  ObjectStorePort,
  ObjectWriteOptions,
  PresignMethod,
} from './ports/object-store.port';

export interface ObjectFileSystemOptions {
  chunkSize: number;
}

/**
 * File-style access to one namespace of an object store: `open` hands out
 * lazy ranged readers, `readFile` downloads in one request.
 */
export class ObjectFileSystem {
  constructor(
    private readonly store: ObjectStorePort,
    private readonly options: ObjectFileSystemOptions,
  ) {}

  get namespace(): string {
    return this.store.namespace;
  }

  get driver(): string {
    return this.store.driver;
  }

  get chunkSize(): number {
    return this.options.chunkSize;
  }

  /** Same store and chunk size, different bucket, container or directory. */
  withNamespace(namespace: string): ObjectFileSystem {
    if (namespace === this.store.namespace) {
      return this;
    }
    return new ObjectFileSystem(this.store.withNamespace(namespace), this.options);
  }

  async open(key: string, options: FetchObjectOptions = {}): Promise<RemoteObjectReader> {
    return RemoteObjectReader.open(this.store, requireKey(key), {
      chunkSize: this.options.chunkSize,
      signal: options.signal,
    });
  }

  async readFile(key: string, options: FetchObjectOptions = {}): Promise<Buffer> {
    return RemoteObjectReader.download(this.store, requireKey(key), options);
  }

  async stat(key: string, options: FetchObjectOptions = {}): Promise<ObjectInfo> {
    const reader = await this.open(key, options);
    return reader.stat();
  }

  async put(key: string, body: ObjectBody, options: ObjectWriteOptions = {}): Promise<void> {
    await this.store.put(requireKey(key), body, options);
  }

  async delete(key: string, options: ObjectWriteOptions = {}): Promise<void> {
    await this.store.delete(requireKey(key), options);
  }

  async presign(key: string, method: PresignMethod, expiresSeconds: number): Promise<string> {
    return this.store.presign(requireKey(key), method, expiresSeconds);
  }
}

function requireKey(key: string): string {
  if (key.trim().length === 0) {
    throw new InvalidObjectKeyError(key, 'key must not be empty');
  }
  return key;
}
