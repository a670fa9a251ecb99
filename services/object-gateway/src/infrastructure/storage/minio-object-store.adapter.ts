import { IncomingMessage } from 'node:http';
import type { Readable } from 'node:stream';
import { Client } from 'minio';
import { rangeLength, type ByteRange } from '../../domain/objects/content-range';
import {
  MalformedObjectResponseError,
  ObjectNotFoundError,
  RangeNotSatisfiableError,
} from '../../domain/objects/object-store.errors';
import type {
  FetchObjectOptions,
  ObjectFetchResponse,
} from '../../application/objects/ports/object-store-client.port';
import type {
  ObjectBody,
  ObjectStorePort,
  ObjectWriteOptions,
  PresignMethod,
} from '../../application/objects/ports/object-store.port';
import type { ObjectStoreSettings } from '../config/object-gateway-config.service';
import { readErrorCode, requireNamespace } from './storage-namespace';

const NOT_FOUND_CODES = new Set(['NoSuchKey', 'NotFound', 'NoSuchBucket']);

export class MinioObjectStoreAdapter implements ObjectStorePort {
  readonly driver = 's3';
  readonly namespace: string;

  constructor(
    private readonly client: Client,
    bucket: string,
  ) {
    this.namespace = requireNamespace(bucket, this.driver);
  }

  static fromConfig(config: ObjectStoreSettings): MinioObjectStoreAdapter {
    const client = new Client({
      endPoint: config.minioEndpoint,
      port: config.minioApiPort,
      useSSL: config.minioUseSsl,
      accessKey: config.minioRootUser,
      secretKey: config.minioRootPassword,
      region: config.s3Region,
    });
    return new MinioObjectStoreAdapter(client, config.objectStoreNamespace);
  }

  withNamespace(bucket: string): MinioObjectStoreAdapter {
    return new MinioObjectStoreAdapter(this.client, bucket);
  }

  async fetch(key: string, range?: ByteRange, options: FetchObjectOptions = {}): Promise<ObjectFetchResponse> {
    options.signal?.throwIfAborted();

    let stream: Readable;
    try {
      stream = range
        ? await this.client.getPartialObject(this.namespace, key, range.start, rangeLength(range))
        : await this.client.getObject(this.namespace, key);
    } catch (error) {
      throw toMinioObjectStoreError(error, key, range);
    }

    return readMinioResponse(key, stream);
  }

  async put(key: string, body: ObjectBody, options: ObjectWriteOptions = {}): Promise<void> {
    options.signal?.throwIfAborted();

    const payload = body instanceof Uint8Array ? Buffer.from(body) : body;
    try {
      await this.client.putObject(this.namespace, key, payload);
    } catch (error) {
      throw toMinioObjectStoreError(error, key);
    }
  }

  async delete(key: string, options: ObjectWriteOptions = {}): Promise<void> {
    options.signal?.throwIfAborted();

    try {
      await this.client.removeObject(this.namespace, key);
    } catch (error) {
      throw toMinioObjectStoreError(error, key);
    }
  }

  async presign(key: string, method: PresignMethod, expiresSeconds: number): Promise<string> {
    if (method === 'PUT') {
      return this.client.presignedPutObject(this.namespace, key, expiresSeconds);
    }
    return this.client.presignedGetObject(this.namespace, key, expiresSeconds);
  }
}

/**
 * The client resolves object reads with the raw HTTP response, which is the
 * only place the range and last-modified headers survive.
 */
export function readMinioResponse(key: string, stream: Readable): ObjectFetchResponse {
  if (!(stream instanceof IncomingMessage)) {
    stream.destroy();
    throw new MalformedObjectResponseError(key, 'response headers are unavailable');
  }

  const contentLength = Number.parseInt(stream.headers['content-length'] ?? '', 10);
  const lastModified = new Date(stream.headers['last-modified'] ?? '');
  if (!Number.isSafeInteger(contentLength) || Number.isNaN(lastModified.getTime())) {
    stream.destroy();
    throw new MalformedObjectResponseError(key, 'missing content-length or last-modified');
  }

  return {
    body: stream,
    contentLength,
    contentRange: stream.headers['content-range'],
    lastModified,
  };
}

export function toMinioObjectStoreError(error: unknown, key: string, range?: ByteRange): unknown {
  const code = readErrorCode(error);
  if (code !== undefined && NOT_FOUND_CODES.has(code)) {
    return new ObjectNotFoundError(key, { cause: error });
  }

  if (range && code === 'InvalidRange') {
    return new RangeNotSatisfiableError(key, range, { cause: error });
  }

  return error;
}
