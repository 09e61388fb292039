import { DispatchClosedError } from '../errors';

interface Waiter<T> {
  resolve(value: T): void;
  reject(reason: unknown): void;
}

function abortReason(signal: AbortSignal): unknown {
  return signal.reason ?? new Error('aborted');
}

/**
 * Wires an abort signal to a pending waiter. Returns the detach function the
 * waiter must call once it settles some other way.
 */
function onAbort(signal: AbortSignal | undefined, handler: (reason: unknown) => void): () => void {
  if (!signal) return () => undefined;
  const listener = () => handler(abortReason(signal));
  signal.addEventListener('abort', listener, { once: true });
  return () => signal.removeEventListener('abort', listener);
}

/**
 * Unbuffered hand-off: `put` settles only once a consumer has taken the item,
 * so producers feel backpressure instead of piling requests up in memory.
 */
export class RequestQueue<T> {
  private readonly puts: Array<Waiter<void> & { item: T }> = [];
  private readonly takers: Array<(item: T | undefined) => void> = [];
  private closed = false;

  get isClosed(): boolean {
    return this.closed;
  }

  /** Producers currently blocked waiting for a consumer. */
  get waiting(): number {
    return this.puts.length;
  }

  put(item: T, signal?: AbortSignal): Promise<void> {
    if (this.closed) return Promise.reject(new DispatchClosedError());
    if (signal?.aborted) return Promise.reject(abortReason(signal));

    const taker = this.takers.shift();
    if (taker) {
      taker(item);
      return Promise.resolve();
    }

    return new Promise<void>((resolve, reject) => {
      const entry = {
        item,
        resolve: () => {
          detach();
          resolve();
        },
        reject: (reason: unknown) => {
          detach();
          reject(reason);
        },
      };
      const detach = onAbort(signal, (reason) => {
        const index = this.puts.indexOf(entry);
        if (index !== -1) this.puts.splice(index, 1);
        entry.reject(reason);
      });
      this.puts.push(entry);
    });
  }

  /** Next item in put order, or `undefined` once the queue is closed. */
  take(): Promise<T | undefined> {
    const entry = this.puts.shift();
    if (entry) {
      entry.resolve();
      return Promise.resolve(entry.item);
    }
    if (this.closed) return Promise.resolve(undefined);
    return new Promise((resolve) => this.takers.push(resolve));
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    for (const entry of this.puts.splice(0)) {
      entry.reject(new DispatchClosedError());
    }
    for (const taker of this.takers.splice(0)) {
      taker(undefined);
    }
  }
}

/**
 * Private per-request reply path. Writes never block, so a caller that has
 * given up cannot stall the worker; reads come back in write order.
 */
export class ReplyChannel<T> {
  private readonly buffered: T[] = [];
  private readonly readers: Array<Waiter<T>> = [];
  private count = 0;

  get written(): number {
    return this.count;
  }

  write(value: T): void {
    this.count += 1;
    const reader = this.readers.shift();
    if (reader) {
      reader.resolve(value);
      return;
    }
    this.buffered.push(value);
  }

  receive(signal?: AbortSignal): Promise<T> {
    if (this.buffered.length > 0) {
      const [value] = this.buffered.splice(0, 1);
      return Promise.resolve(value);
    }
    if (signal?.aborted) return Promise.reject(abortReason(signal));

    return new Promise<T>((resolve, reject) => {
      const reader: Waiter<T> = {
        resolve: (value) => {
          detach();
          resolve(value);
        },
        reject: (reason) => {
          detach();
          reject(reason);
        },
      };
      const detach = onAbort(signal, (reason) => {
        const index = this.readers.indexOf(reader);
        if (index !== -1) this.readers.splice(index, 1);
        reader.reject(reason);
      });
      this.readers.push(reader);
    });
  }
}
