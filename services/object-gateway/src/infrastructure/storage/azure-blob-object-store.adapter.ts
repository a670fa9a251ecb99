import { Readable } from 'node:stream';
import {
  BlobSASPermissions,
  BlobServiceClient,
  StorageSharedKeyCredential,
  type BlobDownloadResponseParsed,
  type ContainerClient,
} from '@azure/storage-blob';
import { rangeLength, type ByteRange } from '../../domain/objects/content-range';
import {
  MalformedObjectResponseError,
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
  PresignMethod,
} from '../../application/objects/ports/object-store.port';
import type { ObjectStoreSettings } from '../config/object-gateway-config.service';
import { readErrorCode, readStatusCode, requireNamespace } from './storage-namespace';

const NOT_FOUND_CODES = new Set(['BlobNotFound', 'ContainerNotFound']);

export class AzureBlobObjectStoreAdapter implements ObjectStorePort {
  readonly driver = 'blob';
  readonly namespace: string;
  private readonly container: ContainerClient;

  constructor(
    private readonly service: BlobServiceClient,
    container: string,
  ) {
    this.namespace = requireNamespace(container, this.driver);
    this.container = service.getContainerClient(this.namespace);
  }

  /**
   * Uses a shared-key credential when account and key are configured; otherwise
   * the endpoint must carry its own SAS token or allow anonymous reads.
   */
  static fromConfig(config: ObjectStoreSettings): AzureBlobObjectStoreAdapter {
    const account = config.azureStorageAccount;
    const accountKey = config.azureStorageKey;
    const credential = account && accountKey ? new StorageSharedKeyCredential(account, accountKey) : undefined;
    const service = new BlobServiceClient(config.azureBlobEndpoint, credential);
    return new AzureBlobObjectStoreAdapter(service, config.objectStoreNamespace);
  }

  withNamespace(container: string): AzureBlobObjectStoreAdapter {
    return new AzureBlobObjectStoreAdapter(this.service, container);
  }

  async fetch(key: string, range?: ByteRange, options: FetchObjectOptions = {}): Promise<ObjectFetchResponse> {
    const blob = this.container.getBlobClient(key);

    let response: BlobDownloadResponseParsed;
    try {
      response = range
        ? await blob.download(range.start, rangeLength(range), { abortSignal: options.signal })
        : await blob.download(0, undefined, { abortSignal: options.signal });
    } catch (error) {
      throw toAzureBlobObjectStoreError(error, key, range);
    }

    return readBlobDownloadResponse(key, response);
  }

  async put(key: string, body: ObjectBody, options: ObjectWriteOptions = {}): Promise<void> {
    const blockBlob = this.container.getBlockBlobClient(key);

    try {
      if (body instanceof Readable) {
        await blockBlob.uploadStream(body, undefined, undefined, { abortSignal: options.signal });
        return;
      }
      await blockBlob.uploadData(typeof body === 'string' ? Buffer.from(body) : body, {
        abortSignal: options.signal,
      });
    } catch (error) {
      throw toAzureBlobObjectStoreError(error, key);
    }
  }

  async delete(key: string, options: ObjectWriteOptions = {}): Promise<void> {
    try {
      await this.container.getBlobClient(key).delete({ abortSignal: options.signal });
    } catch (error) {
      throw toAzureBlobObjectStoreError(error, key);
    }
  }

  async presign(key: string, method: PresignMethod, expiresSeconds: number): Promise<string> {
    const blob = this.container.getBlobClient(key);
    if (!(blob.credential instanceof StorageSharedKeyCredential)) {
      throw new UnsupportedOperationError('presign', this.driver);
    }

    return blob.generateSasUrl({
      permissions: BlobSASPermissions.parse(method === 'PUT' ? 'cw' : 'r'),
      expiresOn: new Date(Date.now() + expiresSeconds * 1000),
    });
  }
}

export function readBlobDownloadResponse(
  key: string,
  response: Pick<BlobDownloadResponseParsed, 'readableStreamBody' | 'contentLength' | 'contentRange' | 'lastModified'>,
): ObjectFetchResponse {
  const stream = response.readableStreamBody;
  if (!stream) {
    throw new MalformedObjectResponseError(key, 'response has no body stream');
  }

  const body = stream instanceof Readable ? stream : new Readable().wrap(stream);
  if (response.contentLength === undefined || !response.lastModified) {
    body.destroy();
    throw new MalformedObjectResponseError(key, 'missing content-length or last-modified');
  }

  return {
    body,
    contentLength: response.contentLength,
    contentRange: response.contentRange,
    lastModified: response.lastModified,
  };
}

export function toAzureBlobObjectStoreError(error: unknown, key: string, range?: ByteRange): unknown {
  const code = readErrorCode(error);
  const statusCode = readStatusCode(error);

  if (statusCode === 404 || (code !== undefined && NOT_FOUND_CODES.has(code))) {
    return new ObjectNotFoundError(key, { cause: error });
  }

  if (range && (statusCode === 416 || code === 'InvalidRange')) {
    return new RangeNotSatisfiableError(key, range, { cause: error });
  }

  return error;
}
