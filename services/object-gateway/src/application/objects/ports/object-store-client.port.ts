import type { Readable } from 'node:stream';
import type { ByteRange } from '../../../domain/objects/content-range';

export interface FetchObjectOptions {
  signal?: AbortSignal;
}

export interface ObjectFetchResponse {
  body: Readable;
  contentLength: number;
  /** `bytes <start>-<end>/<total>`, present only for ranged responses. */
  contentRange?: string;
  lastModified: Date;
}

/**
 * The one capability the ranged reader needs from a store.
 *
 * Omitting `range` fetches the whole object. Implementations throw
 * `ObjectNotFoundError` for missing keys and `RangeNotSatisfiableError` for
 * rejected ranges; any other failure propagates as raised by the transport.
 */
export interface ObjectStoreClient {
  fetch(key: string, range?: ByteRange, options?: FetchObjectOptions): Promise<ObjectFetchResponse>;
}
