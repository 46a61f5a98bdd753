/**
 * Structured logger for standup-report.
 *
 * Keeps every entry in memory, hands each one to an optional sink (the
 * CLI uses it to echo to stderr) and, when a log directory is set,
 * appends it to a per-run log file.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';

// ─── Types ──────────────────────────────────────────────────────────

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  category: string;
  message: string;
  data?: Record<string, unknown>;
}

export interface LoggerOptions {
  /** Directory for `standup-<timestamp>.log`; no file is written without it */
  logDir?: string;
  /** Invoked on every log entry */
  onLog?: (entry: LogEntry) => void;
}

// ─── Log level ordering ─────────────────────────────────────────────

export const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

// ─── Logger ─────────────────────────────────────────────────────────

export class Logger {
  private logFilePath: string | null = null;
  private onLog?: (entry: LogEntry) => void;
  private entries: LogEntry[] = [];
  private fileStream: fs.WriteStream | null = null;

  constructor(opts: LoggerOptions = {}) {
    this.onLog = opts.onLog;

    if (opts.logDir) {
      fs.mkdirSync(opts.logDir, { recursive: true });
      const timestamp = new Date()
        .toISOString()
        .replace(/[:.]/g, '-')
        .replace('T', '_')
        .slice(0, 19);
      this.logFilePath = path.join(opts.logDir, `standup-${timestamp}.log`);
      this.fileStream = fs.createWriteStream(this.logFilePath, { flags: 'a' });
      this.debug('logger', 'Log session started', { logFile: this.logFilePath });
    }
  }

  /** Path to the current log file, or null when logging to memory only */
  get filePath(): string | null {
    return this.logFilePath;
  }

  /** All entries captured this session */
  get allEntries(): readonly LogEntry[] {
    return this.entries;
  }

  debug(category: string, message: string, data?: Record<string, unknown>): void {
    this.log('debug', category, message, data);
  }

  info(category: string, message: string, data?: Record<string, unknown>): void {
    this.log('info', category, message, data);
  }

  warn(category: string, message: string, data?: Record<string, unknown>): void {
    this.log('warn', category, message, data);
  }

  error(category: string, message: string, data?: Record<string, unknown>): void {
    this.log('error', category, message, data);
  }

  /** Log an outgoing API request */
  request(service: string, method: string, url: string): void {
    this.debug(service, `${method} ${url}`);
  }

  /** Flush and close the log file */
  close(): Promise<void> {
    const stream = this.fileStream;
    if (!stream) return Promise.resolve();

    this.debug('logger', 'Log session ended', { totalEntries: this.entries.length });
    this.fileStream = null;
    return new Promise((resolve, reject) => {
      stream.once('error', reject);
      stream.end(() => resolve());
    });
  }

  // ── Core write ────────────────────────────────────────────────────

  private log(
    level: LogLevel,
    category: string,
    message: string,
    data?: Record<string, unknown>
  ): void {
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      category,
      message,
      ...(data ? { data } : {}),
    };

    this.entries.push(entry);
    this.onLog?.(entry);
    this.fileStream?.write(formatLogLine(entry) + '\n');
  }
}

/** `<timestamp> LEVEL [category] message {data}` */
export function formatLogLine(entry: LogEntry): string {
  const lvl = entry.level.toUpperCase().padEnd(5);
  const cat = `[${entry.category}]`.padEnd(10);
  let line = `${entry.timestamp} ${lvl} ${cat} ${entry.message}`;
  if (entry.data) {
    line += ' ' + JSON.stringify(entry.data);
  }
  return line;
}

// ─── Global instance (set once per CLI run) ─────────────────────────

let globalLogger: Logger | null = null;

/** Initialise the global logger. Call once at CLI startup. */
export async function initLogger(opts: LoggerOptions): Promise<Logger> {
  if (globalLogger) {
    await globalLogger.close();
  }
  globalLogger = new Logger(opts);
  return globalLogger;
}

/**
 * Get the current global logger.
 * Library code called outside the CLI gets a sink-less logger that
 * only keeps entries in memory.
 */
export function getLogger(): Logger {
  if (!globalLogger) {
    globalLogger = new Logger();
  }
  return globalLogger;
}
