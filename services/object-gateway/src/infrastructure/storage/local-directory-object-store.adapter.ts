import { createReadStream, createWriteStream, type Stats } from 'node:fs';
import { mkdir, rm, stat, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { Readable } from 'node:stream';
import { pipeline } from 'node:stream/promises';
import { formatContentRange, type ByteRange } from '../../domain/objects/content-range';
import {
  InvalidObjectKeyError,
  ObjectNotFoundError,
  RangeNotSatisfiableError,
  UnsupportedOperationError,
} from '../../domain/objects/object-store.errors';
import type {
  FetchObjectOptions,
  ObjectFetchResponse,
} from '../../application/objects/ports/object-store-client.port';
import type {
  ObjectBody,
  ObjectStorePort,
  ObjectWriteOptions,
} from '../../application/objects/ports/object-store.port';
import type { ObjectStoreSettings } from '../config/object-gateway-config.service';
import { readErrorCode, requireNamespace } from './storage-namespace';

const MISSING_FILE_CODES = new Set(['ENOENT', 'ENOTDIR']);

/**
 * Serves a directory tree as an object store. Each namespace is a
 * subdirectory of `root`; ranged reads are emulated with positioned file
 * streams and the file mtime stands in for last-modified.
 */
export class LocalDirectoryObjectStoreAdapter implements ObjectStorePort {
  readonly driver = 'local';
  readonly namespace: string;

  constructor(
    private readonly root: string,
    namespace: string,
  ) {
    this.namespace = requireNamespace(namespace, this.driver);
  }

  static fromConfig(config: ObjectStoreSettings): LocalDirectoryObjectStoreAdapter {
    return new LocalDirectoryObjectStoreAdapter(config.localStoreRoot, config.objectStoreNamespace);
  }

  withNamespace(namespace: string): LocalDirectoryObjectStoreAdapter {
    return new LocalDirectoryObjectStoreAdapter(this.root, namespace);
  }

  async fetch(key: string, range?: ByteRange, options: FetchObjectOptions = {}): Promise<ObjectFetchResponse> {
    options.signal?.throwIfAborted();

    const filePath = this.resolvePath(key);
    const stats = await this.statObject(key, filePath);

    if (!range) {
      return {
        body: createReadStream(filePath),
        contentLength: stats.size,
        lastModified: stats.mtime,
      };
    }

    if (range.start > range.end || range.start >= stats.size) {
      throw new RangeNotSatisfiableError(key, range);
    }

    const end = Math.min(range.end, stats.size - 1);
    return {
      body: createReadStream(filePath, { start: range.start, end }),
      contentLength: end - range.start + 1,
      contentRange: formatContentRange({ start: range.start, end, total: stats.size }),
      lastModified: stats.mtime,
    };
  }

  async put(key: string, body: ObjectBody, options: ObjectWriteOptions = {}): Promise<void> {
    const filePath = this.resolvePath(key);
    await mkdir(path.dirname(filePath), { recursive: true });

    if (body instanceof Readable) {
      await pipeline(body, createWriteStream(filePath), { signal: options.signal });
      return;
    }

    await writeFile(filePath, body, { signal: options.signal });
  }

  async delete(key: string, options: ObjectWriteOptions = {}): Promise<void> {
    options.signal?.throwIfAborted();

    const filePath = this.resolvePath(key);
    try {
      await rm(filePath);
    } catch (error) {
      if (MISSING_FILE_CODES.has(readErrorCode(error) ?? '')) {
        throw new ObjectNotFoundError(key, { cause: error });
      }
      throw error;
    }
  }

  async presign(): Promise<string> {
    throw new UnsupportedOperationError('presign', this.driver);
  }

  private resolvePath(key: string): string {
    const base = path.resolve(this.root, this.namespace);
    const resolved = path.resolve(base, key);
    if (!resolved.startsWith(`${base}${path.sep}`)) {
      throw new InvalidObjectKeyError(key, 'key resolves outside the namespace directory');
    }
    return resolved;
  }

  private async statObject(key: string, filePath: string): Promise<Stats> {
    let stats: Stats;
    try {
      stats = await stat(filePath);
    } catch (error) {
      if (MISSING_FILE_CODES.has(readErrorCode(error) ?? '')) {
        throw new ObjectNotFoundError(key, { cause: error });
      }
      throw error;
    }

    if (!stats.isFile()) {
      throw new ObjectNotFoundError(key);
    }
    return stats;
  }
}
