/** The slice of the platform response the object endpoints touch. */
export interface HttpResponseLike {
  readonly writableFinished: boolean;
  setHeader(name: string, value: string): void;
  once(event: 'close', listener: () => void): unknown;
}

/**
 * Aborts when the response closes before it finished, i.e. the client went
 * away while the object was still being fetched.
 */
export function abortOnClientDisconnect(response: HttpResponseLike): AbortSignal {
  const controller = new AbortController();
  response.once('close', () => {
    if (!response.writableFinished) {
      controller.abort();
    }
  });
  return controller.signal;
}
