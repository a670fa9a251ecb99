import {
  type ContentRange,
  formatContentRange,
  parseContentRange,
  rangeLength,
} from '../../domain/objects/content-range';
import { decideFetch } from '../../domain/objects/fetch-decision';
import type { ObjectInfo, SeekOrigin } from '../../domain/objects/object-info';
import {
  InvalidSeekError,
  MalformedObjectResponseError,
  ObjectChangedError,
  RangeNotSatisfiableError,
} from '../../domain/objects/object-store.errors';
import { readBody } from './object-body';
import type {
  FetchObjectOptions,
  ObjectFetchResponse,
  ObjectStoreClient,
} from './ports/object-store-client.port';

export interface RemoteObjectReaderOptions {
  /** Bytes requested per incremental fetch; 0 downloads the whole object on open. */
  chunkSize?: number;
  /** Honoured by every fetch the reader issues, including the one made by `open`. */
  signal?: AbortSignal;
}

/**
 * Seekable, re-readable view over a remote object that only supports ranged GET.
 *
 * Every downloaded byte is kept in one contiguous, append-only buffer starting
 * at offset 0, so backward seeks never refetch. All fetches of one reader must
 * observe the same last-modified instant; a mismatch fails with
 * {@link ObjectChangedError} and leaves the buffer untouched.
 *
 * Not safe for concurrent `read`/`seek` calls; open one reader per consumer.
 */
export class RemoteObjectReader {
  private bytes: Buffer = Buffer.alloc(0);
  private downloadOffset = 0;
  private readOffset = 0;
  private size: number | undefined;
  private lastModified: Date | undefined;
  private complete = false;

  private constructor(
    private readonly client: ObjectStoreClient,
    readonly name: string,
    private readonly chunkSize: number,
    private readonly signal: AbortSignal | undefined,
  ) {}

  static async open(
    client: ObjectStoreClient,
    name: string,
    options: RemoteObjectReaderOptions = {},
  ): Promise<RemoteObjectReader> {
    const reader = new RemoteObjectReader(client, name, normalizeChunkSize(options.chunkSize), options.signal);
    await reader.fillChunk(false);
    return reader;
  }

  /** Whole-object download in a single fetch, bypassing chunking. */
  static async download(
    client: ObjectStoreClient,
    name: string,
    options: FetchObjectOptions = {},
  ): Promise<Buffer> {
    const reader = new RemoteObjectReader(client, name, 0, options.signal);
    await reader.fetchWholeObject();
    return reader.bytes.subarray(0, reader.downloadOffset);
  }

  get position(): number {
    return this.readOffset;
  }

  get downloadedBytes(): number {
    return this.downloadOffset;
  }

  get isComplete(): boolean {
    return this.complete;
  }

  stat(): ObjectInfo {
    return {
      name: this.name,
      size: this.knownSize(),
      modifiedAt: this.knownLastModified(),
    };
  }

  /**
   * Copies up to `target.length` bytes from the read cursor into `target`.
   * Resolves to the number of bytes copied, or `null` at end of object.
   * Issues at most one fetch, so fewer bytes than requested may be returned.
   */
  async read(target: Uint8Array): Promise<number | null> {
    if (this.readOffset >= this.knownSize()) {
      return null;
    }

    const decision = decideFetch(
      {
        complete: this.complete,
        downloadOffset: this.downloadOffset,
        readOffset: this.readOffset,
      },
      target.length,
    );
    if (decision !== 'none') {
      await this.fillChunk(decision === 'remainder');
    }

    const available = Math.max(this.downloadOffset - this.readOffset, 0);
    const count = Math.min(available, target.length);
    target.set(this.bytes.subarray(this.readOffset, this.readOffset + count));
    this.readOffset += count;
    return count;
  }

  /** Reads until `maxBytes` have been collected or the object ends. */
  async readUpTo(maxBytes: number): Promise<Buffer> {
    const remaining = Math.max(this.knownSize() - this.readOffset, 0);
    const target = Buffer.alloc(Math.max(Math.min(maxBytes, remaining), 0));
    let filled = 0;

    while (filled < target.length) {
      const count = await this.read(target.subarray(filled));
      if (count === null || count === 0) {
        break;
      }
      filled += count;
    }

    return target.subarray(0, filled);
  }

  async readToEnd(): Promise<Buffer> {
    return this.readUpTo(Number.POSITIVE_INFINITY);
  }

  /**
   * Moves the read cursor without fetching. Positions past the end are legal
   * and make the next read report end of object.
   */
  seek(offset: number, origin: SeekOrigin = 'start'): number {
    if (!Number.isSafeInteger(offset)) {
      throw new InvalidSeekError(`Seek offset must be an integer, received ${offset}.`);
    }

    const target = this.resolveSeekTarget(offset, origin);
    if (target < 0) {
      throw new InvalidSeekError(`Seek would move to negative position ${target}.`);
    }

    this.readOffset = target;
    return target;
  }

  private resolveSeekTarget(offset: number, origin: SeekOrigin): number {
    switch (origin) {
      case 'start':
        return offset;
      case 'current':
        return this.readOffset + offset;
      case 'end':
        return this.knownSize() + offset;
      default:
        throw new InvalidSeekError(`Unknown seek origin "${String(origin)}".`);
    }
  }

  private async fillChunk(full: boolean): Promise<void> {
    if (this.downloadOffset === 0 && this.chunkSize === 0) {
      await this.fetchWholeObject();
      return;
    }

    const start = this.downloadOffset;
    const end = full || this.chunkSize === 0
      ? this.knownSize() - 1
      : this.clampToSize(start + this.chunkSize - 1);

    this.signal?.throwIfAborted();

    let response: ObjectFetchResponse;
    try {
      response = await this.client.fetch(this.name, { start, end }, { signal: this.signal });
    } catch (error) {
      // Zero-length objects reject every range, so the first fetch retries without one.
      if (error instanceof RangeNotSatisfiableError && start === 0) {
        await this.fetchWholeObject();
        return;
      }
      throw error;
    }

    const [range, body] = await this.drain(response, () => this.inspectRangedResponse(response, start));
    if (body.length !== rangeLength(range)) {
      throw new MalformedObjectResponseError(
        this.name,
        `expected ${rangeLength(range)} bytes for ${formatContentRange(range)}, received ${body.length}`,
      );
    }

    this.append(body);
    this.lastModified = response.lastModified;
    this.size = range.total;
    this.complete = range.end === range.total - 1;
  }

  private async fetchWholeObject(): Promise<void> {
    this.signal?.throwIfAborted();

    const response = await this.client.fetch(this.name, undefined, { signal: this.signal });
    const [, body] = await this.drain(response, () => this.assertUnchanged(response.lastModified));
    if (body.length !== response.contentLength) {
      throw new MalformedObjectResponseError(
        this.name,
        `expected ${response.contentLength} bytes, received ${body.length}`,
      );
    }

    this.append(body);
    this.lastModified = response.lastModified;
    this.size = body.length;
    this.complete = true;
  }

  private inspectRangedResponse(response: ObjectFetchResponse, expectedStart: number): ContentRange {
    const range = parseContentRange(response.contentRange);
    if (!range) {
      throw new MalformedObjectResponseError(
        this.name,
        response.contentRange === undefined
          ? 'missing content-range'
          : `unparseable content-range "${response.contentRange}"`,
      );
    }

    if (range.start !== expectedStart) {
      throw new MalformedObjectResponseError(
        this.name,
        `expected a range starting at byte ${expectedStart}, received ${formatContentRange(range)}`,
      );
    }

    this.assertUnchanged(response.lastModified, range.total);
    return range;
  }

  private assertUnchanged(lastModified: Date, total?: number): void {
    if (this.lastModified && this.lastModified.getTime() !== lastModified.getTime()) {
      throw new ObjectChangedError(
        this.name,
        `last-modified was ${this.lastModified.toISOString()}, now ${lastModified.toISOString()}`,
      );
    }

    if (total !== undefined && this.size !== undefined && total !== this.size) {
      throw new ObjectChangedError(this.name, `size was ${this.size}, now ${total}`);
    }
  }

  /** Runs `inspect` before draining; the body is released whether either step fails. */
  private async drain<T>(response: ObjectFetchResponse, inspect: () => T): Promise<[T, Buffer]> {
    try {
      const inspected = inspect();
      const body = await readBody(response.body, this.signal);
      return [inspected, body];
    } finally {
      response.body.destroy();
    }
  }

  private append(chunk: Buffer): void {
    const required = this.downloadOffset + chunk.length;
    if (required > this.bytes.length) {
      const grown = Buffer.allocUnsafe(Math.max(required, this.bytes.length * 2));
      this.bytes.copy(grown, 0, 0, this.downloadOffset);
      this.bytes = grown;
    }

    chunk.copy(this.bytes, this.downloadOffset);
    this.downloadOffset = required;
  }

  private clampToSize(end: number): number {
    return this.size === undefined ? end : Math.min(end, this.size - 1);
  }

  private knownSize(): number {
    if (this.size === undefined) {
      throw new Error(`Size of object "${this.name}" is unknown before the first fetch.`);
    }
    return this.size;
  }

  private knownLastModified(): Date {
    if (!this.lastModified) {
      throw new Error(`Last-modified of object "${this.name}" is unknown before the first fetch.`);
    }
    return this.lastModified;
  }
}

function normalizeChunkSize(chunkSize: number | undefined): number {
  if (chunkSize === undefined) {
    return 0;
  }

  if (!Number.isSafeInteger(chunkSize) || chunkSize < 0) {
    throw new RangeError(`chunkSize must be a non-negative integer, received ${chunkSize}.`);
  }

  return chunkSize;
}
