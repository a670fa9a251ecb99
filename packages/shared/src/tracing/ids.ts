import { randomUUID } from 'node:crypto';

export function generateId(): string {
  return randomUUID();
}

export function generateCorrelationId(): string {
  return generateId();
}

export function ensureCorrelationId(correlationId?: string | string[]): string {
  const candidate = Array.isArray(correlationId) ? correlationId[0] : correlationId;
  return candidate && candidate.trim().length > 0 ? candidate.trim() : generateCorrelationId();
}
