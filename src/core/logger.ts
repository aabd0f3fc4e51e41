import { createWriteStream, mkdirSync, type WriteStream } from 'node:fs';
import { homedir } from 'node:os';
import { dirname, join } from 'node:path';
import { format } from 'node:util';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export function expandHome(path: string): string {
  if (path === '~') return homedir();
  if (path.startsWith('~/')) return join(homedir(), path.slice(2));
  return path;
}

export function formatLogLine(level: LogLevel, args: unknown[], now: Date = new Date()): string {
  return `[${now.toISOString()}] ${level.toUpperCase()}: ${format(...args)}`;
}

export type LoggerOptions = {
  filePath?: string;
};

/**
 * Leveled console logger. When a file path is given, every emitted line is
 * also appended to that file.
 */
export class Logger {
  private readonly threshold: number;
  private stream: WriteStream | null = null;

  constructor(
    readonly level: LogLevel = 'info',
    options: LoggerOptions = {}
  ) {
    this.threshold = LEVEL_RANK[level];
    if (options.filePath) {
      const filePath = expandHome(options.filePath);
      mkdirSync(dirname(filePath), { recursive: true });
      this.stream = createWriteStream(filePath, { flags: 'a' });
    }
  }

  isEnabled(level: LogLevel): boolean {
    return LEVEL_RANK[level] >= this.threshold;
  }

  debug(...args: unknown[]): void {
    this.emit('debug', args);
  }

  info(...args: unknown[]): void {
    this.emit('info', args);
  }

  warn(...args: unknown[]): void {
    this.emit('warn', args);
  }

  error(...args: unknown[]): void {
    this.emit('error', args);
  }

  /** Flushes and detaches the file mirror, if any. */
  close(): Promise<void> {
    const stream = this.stream;
    this.stream = null;
    if (!stream) return Promise.resolve();
    return new Promise((resolve, reject) => {
      stream.once('error', reject);
      stream.end(() => resolve());
    });
  }

  private emit(level: LogLevel, args: unknown[]): void {
    if (!this.isEnabled(level)) return;
    const line = formatLogLine(level, args);
    this.stream?.write(`${line}\n`);
    if (level === 'error') {
      console.error(line);
    } else if (level === 'warn') {
      console.warn(line);
    } else {
      console.log(line);
    }
  }
}
