import type { Readable } from 'node:stream';
import type { ObjectStoreDriver } from '@object-fs/shared';
import type { ObjectStoreClient } from './object-store-client.port';

export const OBJECT_STORE_PORT = Symbol('OBJECT_STORE_PORT');

export type ObjectBody = Readable | Uint8Array | string;

export type PresignMethod = 'GET' | 'PUT';

export interface ObjectWriteOptions {
  signal?: AbortSignal;
}

export interface ObjectStorePort extends ObjectStoreClient {
  readonly driver: ObjectStoreDriver;
  /** Bucket, container, directory or partition the keys resolve in. */
  readonly namespace: string;

  withNamespace(namespace: string): ObjectStorePort;
  put(key: string, body: ObjectBody, options?: ObjectWriteOptions): Promise<void>;
  delete(key: string, options?: ObjectWriteOptions): Promise<void>;
  presign(key: string, method: PresignMethod, expiresSeconds: number): Promise<string>;
}
