import type { LogEntry, Sink } from './logger.js';

export interface BufferedSinkOptions {
  maxBuffer?: number | undefined;
}

/**
 * Sink that queues entries and writes them on the next macrotask, so store
 * operations never wait on console or file output.
 *
 * Subclasses implement `writeEntry(entry)`, and may override `writeBatch`
 * to emit a whole drain at once.
 */
export abstract class BufferedSink implements Sink {
  private buffer: LogEntry[] = [];
  private scheduled = false;
  private dropped = 0;
  private readonly maxBuffer: number;

  constructor(options?: BufferedSinkOptions) {
    this.maxBuffer = options?.maxBuffer ?? 1000;
  }

  protected abstract writeEntry(entry: LogEntry): void;

  protected writeBatch(entries: readonly LogEntry[]): void {
    for (const entry of entries) {
      this.writeEntry(entry);
    }
  }

  write(entry: LogEntry): void {
    if (this.buffer.length >= this.maxBuffer) {
      this.dropped++;
      this.buffer.shift();
    }
    this.buffer.push(entry);

    if (!this.scheduled) {
      this.scheduled = true;
      setImmediate(() => this.drain());
    }
  }

  /** Drain synchronously. Call before process exit. */
  flush(): void {
    this.drain();
  }

  private drain(): void {
    const entries = this.buffer;
    const dropped = this.dropped;
    this.buffer = [];
    this.scheduled = false;
    this.dropped = 0;

    if (dropped > 0) {
      entries.unshift({
        level: 'warn',
        category: 'logger',
        timestamp: new Date(),
        msg: `Dropped ${String(dropped)} log entries (buffer overflow)`,
      });
    }

    if (entries.length > 0) {
      this.writeBatch(entries);
    }
  }
}
