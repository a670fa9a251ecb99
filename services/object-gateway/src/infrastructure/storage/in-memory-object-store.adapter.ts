import { Readable } from 'node:stream';
import { formatContentRange, type ByteRange } from '../../domain/objects/content-range';
import {
  ObjectNotFoundError,
  RangeNotSatisfiableError,
  UnsupportedOperationError,
} from '../../domain/objects/object-store.errors';
import { readObjectBody } from '../../application/objects/object-body';
import type {
  FetchObjectOptions,
  ObjectFetchResponse,
} from '../../application/objects/ports/object-store-client.port';
import type {
  ObjectBody,
  ObjectStorePort,
  ObjectWriteOptions,
} from '../../application/objects/ports/object-store.port';
import { requireNamespace } from './storage-namespace';

interface StoredObject {
  data: Buffer;
  lastModified: Date;
}

export interface InMemoryObjectStoreOptions {
  namespace?: string;
  now?: () => Date;
}

export class InMemoryObjectStoreAdapter implements ObjectStorePort {
  readonly driver = 'memory';
  readonly namespace: string;
  private readonly now: () => Date;

  constructor(
    options: InMemoryObjectStoreOptions = {},
    private readonly partitions = new Map<string, Map<string, StoredObject>>(),
  ) {
    this.namespace = requireNamespace(options.namespace ?? 'objects', this.driver);
    this.now = options.now ?? (() => new Date());
  }

  withNamespace(namespace: string): InMemoryObjectStoreAdapter {
    return new InMemoryObjectStoreAdapter({ namespace, now: this.now }, this.partitions);
  }

  async fetch(key: string, range?: ByteRange, options: FetchObjectOptions = {}): Promise<ObjectFetchResponse> {
    options.signal?.throwIfAborted();

    const stored = this.objects().get(key);
    if (!stored) {
      throw new ObjectNotFoundError(key);
    }

    const total = stored.data.length;
    if (!range) {
      return {
        body: Readable.from([stored.data]),
        contentLength: total,
        lastModified: stored.lastModified,
      };
    }

    if (range.start > range.end || range.start >= total) {
      throw new RangeNotSatisfiableError(key, range);
    }

    const end = Math.min(range.end, total - 1);
    const slice = stored.data.subarray(range.start, end + 1);
    return {
      body: Readable.from([slice]),
      contentLength: slice.length,
      contentRange: formatContentRange({ start: range.start, end, total }),
      lastModified: stored.lastModified,
    };
  }

  async put(key: string, body: ObjectBody, options: ObjectWriteOptions = {}): Promise<void> {
    const data = await readObjectBody(body, options.signal);
    this.objects().set(key, { data, lastModified: this.now() });
  }

  async delete(key: string, options: ObjectWriteOptions = {}): Promise<void> {
    options.signal?.throwIfAborted();
    this.objects().delete(key);
  }

  async presign(): Promise<string> {
    throw new UnsupportedOperationError('presign', this.driver);
  }

  private objects(): Map<string, StoredObject> {
    let objects = this.partitions.get(this.namespace);
    if (!objects) {
      objects = new Map();
      this.partitions.set(this.namespace, objects);
    }
    return objects;
  }
}
