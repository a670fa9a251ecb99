export const OBJECT_STORE_DRIVERS = ['s3', 'blob', 'local', 'memory'] as const;

export type ObjectStoreDriver = (typeof OBJECT_STORE_DRIVERS)[number];

export const HTTP_TRACE_HEADERS = {
  correlationId: 'x-correlation-id',
  objectSize: 'x-object-size',
  objectOffset: 'x-object-offset',
} as const;
