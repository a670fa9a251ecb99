import {
  BadRequestException,
  Inject,
  Injectable,
  Logger,
} from '@nestjs/common';
import type { Readable } from 'node:stream';
import { createJsonLogEntry, ensureCorrelationId } from '@object-fs/shared';
import { toObjectInfoView, type ObjectInfo, type ObjectInfoView } from '../../domain/objects/object-info';
import { ObjectGatewayConfigService } from '../../infrastructure/config/object-gateway-config.service';
import { ObjectFileSystem } from './object-file-system';
import type { PresignMethod } from './ports/object-store.port';

const SERVICE_NAME = 'object-gateway';

interface ObjectLocatorInput {
  key?: string;
  namespace?: string;
  correlationId?: string;
  signal?: AbortSignal;
}

interface ReadObjectRangeInput extends ObjectLocatorInput {
  offset?: string;
  length?: string;
}

interface PutObjectInput extends ObjectLocatorInput {
  body: Readable;
}

interface PresignObjectInput extends ObjectLocatorInput {
  method?: string;
  expiresSeconds?: string;
}

export interface ReadObjectRangeResult {
  info: ObjectInfo;
  offset: number;
  data: Buffer;
}

export interface PresignObjectResult {
  namespace: string;
  key: string;
  method: PresignMethod;
  url: string;
  expiresAt: string;
}

@Injectable()
export class ObjectsApplicationService {
  private readonly logger = new Logger(ObjectsApplicationService.name);

  constructor(
    @Inject(ObjectFileSystem)
    private readonly fileSystem: ObjectFileSystem,
    @Inject(ObjectGatewayConfigService)
    private readonly config: ObjectGatewayConfigService,
  ) {}

  async statObject(input: ObjectLocatorInput): Promise<ObjectInfoView> {
    const key = normalizeRequiredString(input.key, 'key');
    const fileSystem = this.resolveFileSystem(input.namespace);

    const info = await fileSystem.stat(key, { signal: input.signal });
    return toObjectInfoView(info);
  }

  /**
   * Opens a lazy reader, seeks to `offset` and returns at most `length` bytes
   * (capped by `maxReadBytes`).
   *
   * The cap bounds the response, not the download: with a chunk size of 0, or
   * once the offset lies past the first chunk, the reader buffers the rest of
   * the object.
   */
  async readObjectRange(input: ReadObjectRangeInput): Promise<ReadObjectRangeResult> {
    const key = normalizeRequiredString(input.key, 'key');
    const offset = parseOptionalNonNegativeInt(input.offset, 'offset') ?? 0;
    const requestedLength = parseOptionalNonNegativeInt(input.length, 'length');
    const length = Math.min(requestedLength ?? this.config.maxReadBytes, this.config.maxReadBytes);
    const fileSystem = this.resolveFileSystem(input.namespace);
    const correlationId = ensureCorrelationId(input.correlationId);

    const reader = await fileSystem.open(key, { signal: input.signal });
    reader.seek(offset, 'start');
    const data = await reader.readUpTo(length);

    this.logger.log(JSON.stringify(createJsonLogEntry({
      level: 'info',
      service: SERVICE_NAME,
      message: 'Served object range.',
      correlationId,
      namespace: fileSystem.namespace,
      objectKey: key,
      metadata: {
        offset,
        requestedLength: requestedLength ?? null,
        servedBytes: data.length,
        downloadedBytes: reader.downloadedBytes,
        chunkSize: fileSystem.chunkSize,
      },
    })));

    return { info: reader.stat(), offset, data };
  }

  async downloadObject(input: ObjectLocatorInput): Promise<Buffer> {
    const key = normalizeRequiredString(input.key, 'key');
    const fileSystem = this.resolveFileSystem(input.namespace);

    const data = await fileSystem.readFile(key, { signal: input.signal });

    this.logger.log(JSON.stringify(createJsonLogEntry({
      level: 'info',
      service: SERVICE_NAME,
      message: 'Downloaded whole object.',
      correlationId: ensureCorrelationId(input.correlationId),
      namespace: fileSystem.namespace,
      objectKey: key,
      metadata: { sizeBytes: data.length },
    })));

    return data;
  }

  async putObject(input: PutObjectInput): Promise<{ namespace: string; key: string; stored: true }> {
    const key = normalizeRequiredString(input.key, 'key');
    const fileSystem = this.resolveFileSystem(input.namespace);

    await fileSystem.put(key, input.body, { signal: input.signal });

    this.logger.log(JSON.stringify(createJsonLogEntry({
      level: 'info',
      service: SERVICE_NAME,
      message: 'Stored object.',
      correlationId: ensureCorrelationId(input.correlationId),
      namespace: fileSystem.namespace,
      objectKey: key,
    })));

    return { namespace: fileSystem.namespace, key, stored: true };
  }

  async deleteObject(input: ObjectLocatorInput): Promise<{ namespace: string; key: string; deleted: true }> {
    const key = normalizeRequiredString(input.key, 'key');
    const fileSystem = this.resolveFileSystem(input.namespace);

    await fileSystem.delete(key, { signal: input.signal });

    this.logger.log(JSON.stringify(createJsonLogEntry({
      level: 'info',
      service: SERVICE_NAME,
      message: 'Deleted object.',
      correlationId: ensureCorrelationId(input.correlationId),
      namespace: fileSystem.namespace,
      objectKey: key,
    })));

    return { namespace: fileSystem.namespace, key, deleted: true };
  }

  async presignObject(input: PresignObjectInput): Promise<PresignObjectResult> {
    const key = normalizeRequiredString(input.key, 'key');
    const method = parsePresignMethod(input.method);
    const expiresSeconds = parseOptionalNonNegativeInt(input.expiresSeconds, 'expiresSeconds')
      ?? this.config.presignExpiresSeconds;
    if (expiresSeconds === 0) {
      throw new BadRequestException('expiresSeconds must be greater than zero.');
    }
    const fileSystem = this.resolveFileSystem(input.namespace);

    const url = await fileSystem.presign(key, method, expiresSeconds);

    return {
      namespace: fileSystem.namespace,
      key,
      method,
      url,
      expiresAt: new Date(Date.now() + expiresSeconds * 1000).toISOString(),
    };
  }

  private resolveFileSystem(namespace?: string): ObjectFileSystem {
    const normalized = normalizeOptionalString(namespace);
    return normalized ? this.fileSystem.withNamespace(normalized) : this.fileSystem;
  }
}

function normalizeRequiredString(value: unknown, field: string): string {
  const normalized = normalizeOptionalString(value);
  if (!normalized) {
    throw new BadRequestException(`${field} is required.`);
  }
  return normalized;
}

function normalizeOptionalString(value: unknown): string | undefined {
  if (typeof value !== 'string') {
    return undefined;
  }
  const normalized = value.trim();
  return normalized.length > 0 ? normalized : undefined;
}

function parseOptionalNonNegativeInt(value: unknown, field: string): number | undefined {
  const normalized = normalizeOptionalString(value);
  if (normalized === undefined) {
    return undefined;
  }

  if (!/^\d+$/.test(normalized) || !Number.isSafeInteger(Number(normalized))) {
    throw new BadRequestException(`${field} must be a non-negative integer.`);
  }
  return Number(normalized);
}

function parsePresignMethod(value: unknown): PresignMethod {
  const normalized = normalizeOptionalString(value)?.toUpperCase() ?? 'GET';
  if (normalized !== 'GET' && normalized !== 'PUT') {
    throw new BadRequestException('method must be GET or PUT.');
  }
  return normalized;
}
