import type { LogEntry, Sink } from './logger.js';

export interface BufferedSinkOptions {
  /** Entries held before the oldest are dropped. Defaults to 1000. */
  maxBuffer?: number | undefined;
}

/**
 * Sink base that batches entries and writes them on the next macrotask, so
 * logging inside a hot call chain (retry loops, rate-limit waits) stays cheap.
 *
 * Subclasses implement `writeEntry`.
 */
export abstract class BufferedSink implements Sink {
  private pending: LogEntry[] = [];
  private droppedCount = 0;
  private drainScheduled = false;
  private readonly maxBuffer: number;

  constructor(options?: BufferedSinkOptions) {
    this.maxBuffer = Math.max(1, options?.maxBuffer ?? 1000);
  }

  protected abstract writeEntry(entry: LogEntry): void;

  write(entry: LogEntry): void {
    if (this.pending.length >= this.maxBuffer) {
      this.pending.shift();
      this.droppedCount++;
    }
    this.pending.push(entry);
    this.scheduleDrain();
  }

  /** Write everything buffered right now. Call before process exit. */
  flush(): void {
    this.drain();
  }

  private scheduleDrain(): void {
    if (this.drainScheduled) return;
    this.drainScheduled = true;
    setImmediate(() => this.drain());
  }

  private drain(): void {
    const batch = this.pending;
    const dropped = this.droppedCount;
    this.pending = [];
    this.droppedCount = 0;
    this.drainScheduled = false;

    if (dropped > 0) {
      this.writeEntry({
        level: 'warn',
        category: 'logger',
        timestamp: new Date(),
        msg: `Dropped ${String(dropped)} log entries (buffer overflow)`,
      });
    }

    for (const entry of batch) {
      this.writeEntry(entry);
    }
  }
}
