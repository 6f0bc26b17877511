import { appendFileSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';

import { BufferedSink, type BufferedSinkOptions } from '../buffered-sink.js';
import type { LogEntry } from '../logger.js';

export interface FileSinkOptions extends BufferedSinkOptions {
  /** Created with its parent directories on first write */
  path: string;
}

/**
 * JSON-lines log file. Each line carries the writing process id, since
 * several CLI runs may append to the same file.
 */
export class FileSink extends BufferedSink {
  private readonly path: string;
  private directoryReady = false;

  constructor(options: FileSinkOptions) {
    super(options);
    this.path = options.path;
  }

  protected writeEntry(entry: LogEntry): void {
    this.append(this.toLine(entry));
  }

  protected override writeBatch(entries: readonly LogEntry[]): void {
    this.append(entries.map((entry) => this.toLine(entry)).join(''));
  }

  private toLine(entry: LogEntry): string {
    return `${JSON.stringify({
      timestamp: entry.timestamp.toISOString(),
      pid: process.pid,
      level: entry.level,
      category: entry.category,
      msg: entry.msg,
      ...(entry.context ? { context: entry.context } : {}),
    })}\n`;
  }

  private append(text: string): void {
    if (!this.directoryReady) {
      mkdirSync(dirname(this.path), { recursive: true });
      this.directoryReady = true;
    }
    appendFileSync(this.path, text, 'utf8');
  }
}
