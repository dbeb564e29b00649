import { appendFileSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LoggerOptions {
  level?: LogLevel;
  json?: boolean;
  /** Every entry, debug included, is also appended here. */
  filePath?: string;
  /** Console sink; defaults to process.stderr. */
  sink?: (line: string) => void;
}

const levelRank: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

export class Logger {
  private fileReady = false;

  constructor(private opts: LoggerOptions = {}) {}

  debug(message: string, data?: unknown) {
    this.log('debug', message, data);
  }
  info(message: string, data?: unknown) {
    this.log('info', message, data);
  }
  warn(message: string, data?: unknown) {
    this.log('warn', message, data);
  }
  error(message: string, data?: unknown) {
    this.log('error', message, data);
  }

  private log(level: LogLevel, message: string, data?: unknown) {
    const timestamp = new Date().toISOString();
    const line = this.opts.json
      ? JSON.stringify({ timestamp, level, message, data })
      : data === undefined
        ? `${timestamp} ${level.toUpperCase().padEnd(5)} ${message}`
        : `${timestamp} ${level.toUpperCase().padEnd(5)} ${message} ${safeJson(data)}`;

    if (this.opts.filePath) this.writeFile(line);

    const configured = this.opts.level ?? 'info';
    if (levelRank[level] < levelRank[configured]) return;

    if (this.opts.sink) {
      this.opts.sink(line);
      return;
    }
    process.stderr.write(`${line}\n`);
  }

  private writeFile(line: string) {
    const path = this.opts.filePath;
    if (!path) return;
    if (!this.fileReady) {
      mkdirSync(dirname(path), { recursive: true });
      this.fileReady = true;
    }
    appendFileSync(path, `${line}\n`, 'utf8');
  }
}

function safeJson(v: unknown): string {
  try {
    return JSON.stringify(v);
  } catch {
    return '"[unserializable]"';
  }
}

let _logger: Logger = new Logger();

export function getLogger(): Logger {
  return _logger;
}

/**
 * Replace the process-wide logger (CLI flags, tests).
 */
export function setLogger(logger: Logger): void {
  _logger = logger;
}
