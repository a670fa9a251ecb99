export type FetchDecision = 'none' | 'next-chunk' | 'remainder';

export interface ReaderCursorState {
  complete: boolean;
  downloadOffset: number;
  readOffset: number;
}

/**
 * Decides which fetch, if any, a read of `requestedBytes` needs before it can
 * copy from the buffer.
 *
 * A cursor sought past the downloaded prefix cannot be represented in a
 * contiguous buffer, so it closes the gap with one fetch through the end of the
 * object.
 */
export function decideFetch(state: ReaderCursorState, requestedBytes: number): FetchDecision {
  if (state.complete) {
    return 'none';
  }

  if (state.readOffset > state.downloadOffset) {
    return 'remainder';
  }

  if (state.downloadOffset - state.readOffset < requestedBytes) {
    return 'next-chunk';
  }

  return 'none';
}
