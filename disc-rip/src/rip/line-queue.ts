import type { Readable } from 'node:stream';
import { createInterface } from 'node:readline';
import type { StreamName } from '../progress/types.js';

/**
 * One line read from a process stream; line is null once the stream has ended
 */
export interface StreamLine {
  stream: StreamName;
  line: string | null;
}

/**
 * Unbounded FIFO shared by several producers and one consumer.
 * The consumer waits a bounded time for each item.
 */
export class LineQueue<T = StreamLine> {
  private items: T[] = [];
  private waiter: ((item: T | undefined) => void) | null = null;

  get size(): number {
    return this.items.length;
  }

  push(item: T): void {
    if (this.waiter) {
      const resolve = this.waiter;
      this.waiter = null;
      resolve(item);
      return;
    }
    this.items.push(item);
  }

  /**
   * Take the next item, or resolve undefined after timeoutMs with nothing queued
   */
  take(timeoutMs: number): Promise<T | undefined> {
    if (this.items.length > 0) {
      return Promise.resolve(this.items.shift());
    }
    if (this.waiter) {
      throw new Error('LineQueue supports a single consumer');
    }

    return new Promise<T | undefined>(resolve => {
      const timer = setTimeout(() => {
        this.waiter = null;
        resolve(undefined);
      }, timeoutMs);

      this.waiter = (item) => {
        clearTimeout(timer);
        resolve(item);
      };
    });
  }
}

/**
 * Push every line of a stream into the queue, then an end-of-stream marker.
 * Resolves once the marker is queued.
 */
export async function pumpLines(
  input: Readable,
  stream: StreamName,
  queue: LineQueue<StreamLine>
): Promise<void> {
  const lines = createInterface({ input, crlfDelay: Infinity });
  try {
    for await (const line of lines) {
      queue.push({ stream, line });
    }
  } finally {
    lines.close();
    queue.push({ stream, line: null });
  }
}
