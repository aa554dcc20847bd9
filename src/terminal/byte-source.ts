/**
 * Byte Sources
 *
 * The read primitives the key decoder is built on: a blocking read for
 * the first byte of a key and a read-with-deadline for continuation bytes.
 */

import type { Readable } from 'stream';

// ============================================
// Types
// ============================================

/**
 * Outcome of a single read.
 * - a number is the byte read
 * - 'timeout': the deadline passed first (readWithin only)
 * - 'eof': the input closed
 * - 'interrupted': a signal woke the blocking read
 */
export type ReadOutcome = number | 'timeout' | 'eof' | 'interrupted';

export interface ByteSource {
  /** Wait for the next byte with no deadline. */
  read(): Promise<ReadOutcome>;
  /** Wait at most `timeoutMs` for the next byte. */
  readWithin(timeoutMs: number): Promise<ReadOutcome>;
}

interface PendingRead {
  resolve: (outcome: ReadOutcome) => void;
  timer: ReturnType<typeof setTimeout> | null;
  interruptible: boolean;
}

// ============================================
// Queue-backed source
// ============================================

/**
 * Byte source fed by pushing chunks. Only one read is ever outstanding,
 * since the event loop decodes one key at a time.
 */
export class QueuedByteSource implements ByteSource {
  private queue: number[] = [];
  private head = 0;
  private pending: PendingRead | null = null;
  private closed = false;

  push(chunk: Uint8Array | string): void {
    const bytes = typeof chunk === 'string' ? Buffer.from(chunk, 'utf8') : chunk;
    for (const byte of bytes) {
      this.queue.push(byte);
    }
    this.deliver();
  }

  /**
   * Mark the input as closed. Bytes already queued are still delivered.
   */
  close(): void {
    this.closed = true;
    this.deliver();
  }

  /**
   * Wake a blocking read() so the caller can look at pending signals.
   * Deadline reads are left alone; they finish on their own shortly.
   */
  interrupt(): void {
    const pending = this.pending;
    if (!pending || !pending.interruptible) return;
    this.settle('interrupted');
  }

  read(): Promise<ReadOutcome> {
    return this.wait(null, true);
  }

  readWithin(timeoutMs: number): Promise<ReadOutcome> {
    return this.wait(timeoutMs, false);
  }

  private wait(timeoutMs: number | null, interruptible: boolean): Promise<ReadOutcome> {
    const ready = this.take();
    if (ready !== null) return Promise.resolve(ready);
    if (this.pending) {
      return Promise.reject(new Error('QueuedByteSource: concurrent reads are not supported'));
    }

    return new Promise<ReadOutcome>((resolve) => {
      const pending: PendingRead = { resolve, timer: null, interruptible };
      if (timeoutMs !== null) {
        pending.timer = setTimeout(() => this.settle('timeout'), Math.max(0, timeoutMs));
      }
      this.pending = pending;
    });
  }

  private take(): ReadOutcome | null {
    if (this.head < this.queue.length) {
      const byte = this.queue[this.head++] ?? 0;
      if (this.head > 4096 && this.head * 2 > this.queue.length) {
        this.queue = this.queue.slice(this.head);
        this.head = 0;
      }
      return byte;
    }
    return this.closed ? 'eof' : null;
  }

  private deliver(): void {
    if (!this.pending) return;
    const ready = this.take();
    if (ready !== null) {
      this.settle(ready);
    }
  }

  private settle(outcome: ReadOutcome): void {
    const pending = this.pending;
    if (!pending) return;
    this.pending = null;
    if (pending.timer) {
      clearTimeout(pending.timer);
    }
    pending.resolve(outcome);
  }
}

/**
 * Attach a queued source to a readable stream such as process.stdin.
 * Returns the source and a function that detaches the listeners.
 */
export function createStreamByteSource(stream: Readable): {
  source: QueuedByteSource;
  detach: () => void;
} {
  const source = new QueuedByteSource();
  const onData = (chunk: Buffer | string) => source.push(chunk);
  const onEnd = () => source.close();

  stream.on('data', onData);
  stream.on('end', onEnd);
  stream.on('close', onEnd);

  return {
    source,
    detach: () => {
      stream.off('data', onData);
      stream.off('end', onEnd);
      stream.off('close', onEnd);
    },
  };
}
