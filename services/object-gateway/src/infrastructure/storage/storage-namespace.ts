export function requireNamespace(namespace: string, driver: string): string {
  const normalized = namespace.trim();
  if (normalized.length === 0) {
    throw new Error(`[object-gateway] ${driver} object store requires a non-empty namespace.`);
  }
  return normalized;
}

export function readErrorCode(error: unknown): string | undefined {
  if (typeof error !== 'object' || error === null || !('code' in error)) {
    return undefined;
  }
  return typeof error.code === 'string' ? error.code : undefined;
}

export function readStatusCode(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null || !('statusCode' in error)) {
    return undefined;
  }
  return typeof error.statusCode === 'number' ? error.statusCode : undefined;
}
