import { Inject, Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { OBJECT_STORE_DRIVERS, type ObjectStoreDriver } from '@object-fs/shared';

const DEFAULTS = {
  port: 3010,
  objectStoreDriver: 's3',
  objectStoreNamespace: 'objects',
  readerChunkSize: 0,
  maxReadBytes: 8 * 1024 * 1024,
  presignExpiresSeconds: 900,
  minioEndpoint: 'localhost',
  minioApiPort: 9000,
  minioUseSsl: false,
  minioRootUser: 'minioadmin',
  minioRootPassword: 'minioadmin',
  s3Region: 'us-east-1',
  localStoreRoot: './data',
} as const;

export const OBJECT_GATEWAY_ENV_FILE_PATHS = [
  '.env.local',
  '.env',
  '../../.env.local',
  '../../.env',
];

@Injectable()
export class ObjectGatewayConfigService {
  constructor(@Inject(ConfigService) private readonly config: ConfigService) {}

  get port(): number {
    return this.config.get<number>('OBJECT_GATEWAY_PORT', DEFAULTS.port);
  }

  get objectStoreDriver(): ObjectStoreDriver {
    return this.config.get<ObjectStoreDriver>('OBJECT_STORE_DRIVER', DEFAULTS.objectStoreDriver);
  }

  get objectStoreNamespace(): string {
    return this.config.get<string>('OBJECT_STORE_NAMESPACE', DEFAULTS.objectStoreNamespace);
  }

  get readerChunkSize(): number {
    return this.config.get<number>('OBJECT_READER_CHUNK_SIZE', DEFAULTS.readerChunkSize);
  }

  get maxReadBytes(): number {
    return this.config.get<number>('OBJECT_GATEWAY_MAX_READ_BYTES', DEFAULTS.maxReadBytes);
  }

  get presignExpiresSeconds(): number {
    return this.config.get<number>(
      'OBJECT_GATEWAY_PRESIGN_EXPIRES_SECONDS',
      DEFAULTS.presignExpiresSeconds,
    );
  }

  get minioEndpoint(): string {
    return this.config.get<string>('MINIO_ENDPOINT', DEFAULTS.minioEndpoint);
  }

  get minioApiPort(): number {
    return this.config.get<number>('MINIO_API_PORT', DEFAULTS.minioApiPort);
  }

  get minioUseSsl(): boolean {
    return this.config.get<boolean>('MINIO_USE_SSL', DEFAULTS.minioUseSsl);
  }

  get minioRootUser(): string {
    return this.config.get<string>('MINIO_ROOT_USER', DEFAULTS.minioRootUser);
  }

  get minioRootPassword(): string {
    return this.config.get<string>('MINIO_ROOT_PASSWORD', DEFAULTS.minioRootPassword);
  }

  get s3Region(): string {
    return this.config.get<string>('S3_REGION', DEFAULTS.s3Region);
  }

  get azureBlobEndpoint(): string {
    return this.config.getOrThrow<string>('AZURE_BLOB_ENDPOINT');
  }

  get azureStorageAccount(): string | undefined {
    return this.config.get<string>('AZURE_STORAGE_ACCOUNT');
  }

  get azureStorageKey(): string | undefined {
    return this.config.get<string>('AZURE_STORAGE_KEY');
  }

  get localStoreRoot(): string {
    return this.config.get<string>('LOCAL_STORE_ROOT', DEFAULTS.localStoreRoot);
  }
}

export type ObjectStoreSettings = Pick<
  ObjectGatewayConfigService,
  | 'objectStoreDriver'
  | 'objectStoreNamespace'
  | 'minioEndpoint'
  | 'minioApiPort'
  | 'minioUseSsl'
  | 'minioRootUser'
  | 'minioRootPassword'
  | 's3Region'
  | 'azureBlobEndpoint'
  | 'azureStorageAccount'
  | 'azureStorageKey'
  | 'localStoreRoot'
>;

export function validateObjectGatewayEnvironment(
  raw: Record<string, unknown>,
): Record<string, unknown> {
  const env = { ...raw };

  env.OBJECT_GATEWAY_PORT = toPositiveInt(raw.OBJECT_GATEWAY_PORT, DEFAULTS.port, 'OBJECT_GATEWAY_PORT');
  const driver = toDriver(raw.OBJECT_STORE_DRIVER);
  env.OBJECT_STORE_DRIVER = driver;
  env.OBJECT_STORE_NAMESPACE = optionalString(raw.OBJECT_STORE_NAMESPACE) ?? DEFAULTS.objectStoreNamespace;
  env.OBJECT_READER_CHUNK_SIZE = toNonNegativeInt(
    raw.OBJECT_READER_CHUNK_SIZE,
    DEFAULTS.readerChunkSize,
    'OBJECT_READER_CHUNK_SIZE',
  );
  env.OBJECT_GATEWAY_MAX_READ_BYTES = toPositiveInt(
    raw.OBJECT_GATEWAY_MAX_READ_BYTES,
    DEFAULTS.maxReadBytes,
    'OBJECT_GATEWAY_MAX_READ_BYTES',
  );
  env.OBJECT_GATEWAY_PRESIGN_EXPIRES_SECONDS = toPositiveInt(
    raw.OBJECT_GATEWAY_PRESIGN_EXPIRES_SECONDS,
    DEFAULTS.presignExpiresSeconds,
    'OBJECT_GATEWAY_PRESIGN_EXPIRES_SECONDS',
  );

  env.MINIO_ENDPOINT = optionalString(raw.MINIO_ENDPOINT) ?? DEFAULTS.minioEndpoint;
  env.MINIO_API_PORT = toPositiveInt(raw.MINIO_API_PORT, DEFAULTS.minioApiPort, 'MINIO_API_PORT');
  env.MINIO_USE_SSL = toBoolean(raw.MINIO_USE_SSL, DEFAULTS.minioUseSsl, 'MINIO_USE_SSL');
  env.MINIO_ROOT_USER = optionalString(raw.MINIO_ROOT_USER) ?? DEFAULTS.minioRootUser;
  env.MINIO_ROOT_PASSWORD = optionalString(raw.MINIO_ROOT_PASSWORD) ?? DEFAULTS.minioRootPassword;
  env.S3_REGION = optionalString(raw.S3_REGION) ?? DEFAULTS.s3Region;

  env.AZURE_BLOB_ENDPOINT = driver === 'blob'
    ? requiredString(raw.AZURE_BLOB_ENDPOINT, 'AZURE_BLOB_ENDPOINT')
    : optionalString(raw.AZURE_BLOB_ENDPOINT);
  env.AZURE_STORAGE_ACCOUNT = optionalString(raw.AZURE_STORAGE_ACCOUNT);
  env.AZURE_STORAGE_KEY = optionalString(raw.AZURE_STORAGE_KEY);
  if (env.AZURE_STORAGE_KEY !== undefined && env.AZURE_STORAGE_ACCOUNT === undefined) {
    throw new Error('[object-gateway] AZURE_STORAGE_ACCOUNT is required when AZURE_STORAGE_KEY is set.');
  }

  env.LOCAL_STORE_ROOT = optionalString(raw.LOCAL_STORE_ROOT) ?? DEFAULTS.localStoreRoot;

  return env;
}

function toDriver(value: unknown): ObjectStoreDriver {
  const normalized = optionalString(value)?.toLowerCase();
  if (normalized === undefined) {
    return DEFAULTS.objectStoreDriver;
  }

  const driver = OBJECT_STORE_DRIVERS.find((candidate) => candidate === normalized);
  if (!driver) {
    throw new Error(
      `[object-gateway] OBJECT_STORE_DRIVER must be one of ${OBJECT_STORE_DRIVERS.join(', ')}.`,
    );
  }
  return driver;
}

function requiredString(value: unknown, name: string): string {
  const normalized = optionalString(value);
  if (!normalized) {
    throw new Error(`[object-gateway] ${name} is required.`);
  }
  return normalized;
}

function optionalString(value: unknown): string | undefined {
  if (typeof value !== 'string') {
    return undefined;
  }

  const normalized = value.trim();
  return normalized.length > 0 ? normalized : undefined;
}

function toPositiveInt(value: unknown, fallback: number, name: string): number {
  if (value === undefined || value === null || value === '') {
    return fallback;
  }

  const parsed = typeof value === 'number' ? value : Number.parseInt(String(value), 10);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new Error(`[object-gateway] ${name} must be a positive integer.`);
  }

  return Math.trunc(parsed);
}

function toNonNegativeInt(value: unknown, fallback: number, name: string): number {
  if (value === undefined || value === null || value === '') {
    return fallback;
  }

  const parsed = typeof value === 'number' ? value : Number(String(value).trim());
  if (!Number.isSafeInteger(parsed) || parsed < 0) {
    throw new Error(`[object-gateway] ${name} must be a non-negative integer.`);
  }

  return parsed;
}

function toBoolean(value: unknown, fallback: boolean, name: string): boolean {
  if (value === undefined || value === null || value === '') {
    return fallback;
  }

  if (typeof value === 'boolean') {
    return value;
  }

  const normalized = String(value).trim().toLowerCase();
  if (normalized === 'true') {
    return true;
  }
  if (normalized === 'false') {
    return false;
  }

  throw new Error(`[object-gateway] ${name} must be "true" or "false".`);
}
