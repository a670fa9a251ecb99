import { addAbortSignal, type Readable } from 'node:stream';
import type { ObjectBody } from './ports/object-store.port';

/**
 * Drains `body` into one buffer and always destroys the stream before
 * returning, so the underlying connection is released on every exit path.
 */
export async function readBody(body: Readable, signal?: AbortSignal): Promise<Buffer> {
  if (signal) {
    addAbortSignal(signal, body);
  }

  const chunks: Buffer[] = [];

  try {
    await new Promise<void>((resolve, reject) => {
      body.on('data', (chunk: Buffer | string) => {
        chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk));
      });
      body.on('end', () => resolve());
      body.on('error', (error: unknown) => reject(error));
      body.on('close', () => {
        if (!body.readableEnded) {
          reject(new Error('Object body closed before it was fully read.'));
        }
      });
    });
  } finally {
    body.destroy();
  }

  return Buffer.concat(chunks);
}

export async function readObjectBody(body: ObjectBody, signal?: AbortSignal): Promise<Buffer> {
  if (typeof body === 'string') {
    return Buffer.from(body);
  }

  if (body instanceof Uint8Array) {
    return Buffer.from(body);
  }

  return readBody(body, signal);
}
