import { createWriteStream, type WriteStream } from 'node:fs';

export enum LogLevel {
  DEBUG = 'DEBUG',
  INFO = 'INFO',
  WARN = 'WARN',
  ERROR = 'ERROR',
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 10,
  [LogLevel.INFO]: 20,
  [LogLevel.WARN]: 30,
  [LogLevel.ERROR]: 40,
};

export type LogAttrs = Record<string, unknown>;

export interface Logger {
  debug(message: string, attrs?: LogAttrs): void;
  info(message: string, attrs?: LogAttrs): void;
  warn(message: string, attrs?: LogAttrs): void;
  error(message: string, attrs?: LogAttrs): void;
  child(attrs: LogAttrs): Logger;
}

export interface LoggerOptions {
  level?: LogLevel;
  /** Also append every line to this file. */
  file?: string;
  console?: boolean;
}

function formatValue(value: unknown): string {
  if (value instanceof Error) {
    return JSON.stringify(value.message);
  }
  if (typeof value === 'string') {
    return /[\s"=]/.test(value) || value === '' ? JSON.stringify(value) : value;
  }
  if (typeof value === 'number' || typeof value === 'boolean' || value === null || value === undefined) {
    return String(value);
  }
  return JSON.stringify(value);
}

export function formatLine(time: Date, level: LogLevel, message: string, attrs: LogAttrs = {}): string {
  const pairs = Object.entries(attrs).map(([key, value]) => `${key}=${formatValue(value)}`);
  return [`[${time.toISOString()}]`, level, message, ...pairs].join(' ');
}

interface Sink {
  minimum: number;
  console: boolean;
  file: WriteStream | null;
}

export class ProjectLogger implements Logger {
  private constructor(
    private readonly sink: Sink,
    private readonly attrs: LogAttrs,
  ) {}

  static create(options: LoggerOptions = {}): ProjectLogger {
    const file = options.file ? createWriteStream(options.file, { flags: 'a' }) : null;
    return new ProjectLogger(
      {
        minimum: LEVEL_ORDER[options.level ?? LogLevel.INFO],
        console: options.console ?? true,
        file,
      },
      {},
    );
  }

  debug(message: string, attrs?: LogAttrs): void {
    this.write(LogLevel.DEBUG, message, attrs);
  }

  info(message: string, attrs?: LogAttrs): void {
    this.write(LogLevel.INFO, message, attrs);
  }

  warn(message: string, attrs?: LogAttrs): void {
    this.write(LogLevel.WARN, message, attrs);
  }

  error(message: string, attrs?: LogAttrs): void {
    this.write(LogLevel.ERROR, message, attrs);
  }

  child(attrs: LogAttrs): Logger {
    return new ProjectLogger(this.sink, { ...this.attrs, ...attrs });
  }

  /** Flushes and closes the log file, if any. */
  close(): Promise<void> {
    const file = this.sink.file;
    if (!file) {
      return Promise.resolve();
    }
    this.sink.file = null;
    return new Promise((resolve) => file.end(() => resolve()));
  }

  private write(level: LogLevel, message: string, attrs?: LogAttrs): void {
    if (LEVEL_ORDER[level] < this.sink.minimum) {
      return;
    }
    const line = formatLine(new Date(), level, message, { ...this.attrs, ...attrs });
    if (this.sink.console) {
      if (LEVEL_ORDER[level] >= LEVEL_ORDER[LogLevel.WARN]) {
        console.error(line);
      } else {
        console.log(line);
      }
    }
    this.sink.file?.write(line + '\n');
  }
}

export function createLogger(options?: LoggerOptions): ProjectLogger {
  return ProjectLogger.create(options);
}
