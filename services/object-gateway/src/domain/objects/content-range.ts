/**
 * An inclusive byte interval as carried by HTTP `Content-Range`, plus the full
 * object length.
 */
export interface ContentRange {
  start: number;
  /** Last included byte index. */
  end: number;
  total: number;
}

/** Inclusive byte range requested from a store. */
export interface ByteRange {
  start: number;
  end: number;
}

const CONTENT_RANGE_PATTERN = /^bytes (\d+)-(\d+)\/(\d+)$/;

export function parseContentRange(value: string | undefined): ContentRange | undefined {
  if (value === undefined) {
    return undefined;
  }

  const match = CONTENT_RANGE_PATTERN.exec(value.trim());
  if (!match) {
    return undefined;
  }

  const start = toSafeInteger(match[1]);
  const end = toSafeInteger(match[2]);
  const total = toSafeInteger(match[3]);
  if (start === undefined || end === undefined || total === undefined) {
    return undefined;
  }

  if (start > end || end >= total) {
    return undefined;
  }

  return { start, end, total };
}

export function formatContentRange(range: ContentRange): string {
  return `bytes ${range.start}-${range.end}/${range.total}`;
}

export function rangeLength(range: ByteRange): number {
  return range.end - range.start + 1;
}

function toSafeInteger(raw: string | undefined): number | undefined {
  if (raw === undefined) {
    return undefined;
  }

  const parsed = Number(raw);
  return Number.isSafeInteger(parsed) ? parsed : undefined;
}
