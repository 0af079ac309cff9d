/**
 * Shared helpers for MCP tool handlers
 */

import type { CompletionReceiver } from '../queue/completion.ts';
import { ChannelClosedError } from '../utils/errors.ts';

type TextResult = { content: Array<{ type: 'text'; text: string }> };

export function jsonResult(value: unknown): TextResult {
  return { content: [{ type: 'text', text: JSON.stringify(value, null, 2) }] };
}

/**
 * Wraps an error into a standard MCP tool error result.
 */
export function errorResult(error: unknown): TextResult & { isError: true } {
  const message = error instanceof Error ? error.message : typeof error === 'string' ? error : String(error);
  return {
    content: [{ type: 'text', text: `Error: ${message}` }],
    isError: true,
  };
}

/**
 * Waits for a task result. When the request is cancelled first, the receiver is abandoned
 * (the worker drops the result) and this rejects with ChannelClosedError.
 */
export function awaitCompletion<T>(receiver: CompletionReceiver<T>, signal: AbortSignal): Promise<T> {
  if (signal.aborted) {
    receiver.abandon();
    return Promise.reject(new ChannelClosedError('request cancelled'));
  }

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => {
      receiver.abandon();
      reject(new ChannelClosedError('request cancelled'));
    };
    signal.addEventListener('abort', onAbort, { once: true });

    receiver.result.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      },
    );
  });
}
