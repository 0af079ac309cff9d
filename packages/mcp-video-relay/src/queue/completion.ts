/**
 * One-shot completion channel.
 *
 * The sender belongs to the worker, the receiver to whoever submitted the task. At most one
 * value is ever delivered. When the receiver has been abandoned, send() reports false and the
 * value is dropped; when the sender is closed without a value, a waiting receiver rejects
 * with ChannelClosedError.
 */

import { ChannelClosedError } from '../utils/errors.ts';

export interface CompletionSender<T> {
  /** Delivers the value. Returns false if the receiver is gone or the channel was already used. */
  send(value: T): boolean;
  /** Ends the channel without a value. */
  close(reason?: string): void;
  readonly isClosed: boolean;
}

export interface CompletionReceiver<T> {
  readonly result: Promise<T>;
  /** Marks the consumer as gone; a later send() is dropped. */
  abandon(): void;
}

type ChannelState = 'open' | 'delivered' | 'closed' | 'abandoned';

export function createCompletion<T>(): { sender: CompletionSender<T>; receiver: CompletionReceiver<T> } {
  let state: ChannelState = 'open';
  let resolveResult: (value: T) => void = () => {};
  let rejectResult: (error: Error) => void = () => {};

  const result = new Promise<T>((resolve, reject) => {
    resolveResult = resolve;
    rejectResult = reject;
  });
  // A closed channel nobody awaits is not an unhandled rejection.
  result.catch(() => undefined);

  const sender: CompletionSender<T> = {
    send(value: T): boolean {
      if (state !== 'open') return false;
      state = 'delivered';
      resolveResult(value);
      return true;
    },
    close(reason = 'channel closed'): void {
      if (state !== 'open') return;
      state = 'closed';
      rejectResult(new ChannelClosedError(reason));
    },
    get isClosed(): boolean {
      return state !== 'open';
    },
  };

  const receiver: CompletionReceiver<T> = {
    result,
    abandon(): void {
      if (state === 'open') state = 'abandoned';
    },
  };

  return { sender, receiver };
}
