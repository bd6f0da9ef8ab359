/** Structured operation logging: JSONL for machine consumption, .log for humans, console for devs. */

import fs from 'node:fs';
import path from 'node:path';
import { stringify } from './encoding.js';
import { errorMessage } from './errors.js';

export type LogLevel = 'info' | 'warn' | 'error' | 'debug';

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  event: string;
  data?: Record<string, unknown>;
}

export interface OperationLoggerOptions {
  /** Directory for `operations.jsonl` and `operations.log`. Console-only when omitted. */
  logDir?: string;
  /** Emit debug entries to the console as well. Files always receive them. */
  verbose?: boolean;
  /** Discard every entry. */
  silent?: boolean;
}

export class OperationLogger {
  private jsonlPath: string | null = null;
  private textPath: string | null = null;
  private verbose: boolean;
  private silent: boolean;
  private fileFailureReported = false;

  constructor(options: OperationLoggerOptions = {}) {
    if (options.logDir) {
      fs.mkdirSync(options.logDir, { recursive: true });
      this.jsonlPath = path.join(options.logDir, 'operations.jsonl');
      this.textPath = path.join(options.logDir, 'operations.log');
    }
    this.verbose = options.verbose ?? false;
    this.silent = options.silent ?? false;
  }

  /** Write a structured log entry. */
  log(level: LogLevel, event: string, data?: Record<string, unknown>): void {
    if (this.silent) return;
    const timestamp = new Date().toISOString();
    const entry: LogEntry = { timestamp, level, event, ...(data !== undefined ? { data } : {}) };
    const dataStr = data ? ' ' + this.formatData(data) : '';

    if (this.jsonlPath && this.textPath) {
      try {
        fs.appendFileSync(this.jsonlPath, stringify(entry) + '\n');
        fs.appendFileSync(this.textPath, `[${timestamp}] [${level.toUpperCase()}] ${event}${dataStr}\n`);
      } catch (err) {
        // Only the first failure is reported.
        if (!this.fileFailureReported) {
          this.fileFailureReported = true;
          console.warn('[cgraph] log file write failed:', errorMessage(err));
        }
      }
    }

    const consoleMsg = `[cgraph] ${event}${dataStr}`;
    if (level === 'error') {
      console.error(consoleMsg);
    } else if (level === 'warn') {
      console.warn(consoleMsg);
    } else if (level === 'info' || this.verbose) {
      console.log(consoleMsg);
    }
  }

  debug(event: string, data?: Record<string, unknown>): void {
    this.log('debug', event, data);
  }

  info(event: string, data?: Record<string, unknown>): void {
    this.log('info', event, data);
  }

  warn(event: string, data?: Record<string, unknown>): void {
    this.log('warn', event, data);
  }

  error(event: string, data?: Record<string, unknown>): void {
    this.log('error', event, data);
  }

  /** Log an operation start. Returns a function to call on commit that logs elapsed time. */
  operationStart(operation: string, data: Record<string, unknown>): () => void {
    const start = Date.now();
    this.debug(`Operation started: ${operation}`, data);
    return () => {
      this.info(`Operation committed: ${operation}`, { ...data, elapsedMs: Date.now() - start });
    };
  }

  /** Log an operation that was refused before or during commit. */
  operationRejected(operation: string, kind: string, message: string): void {
    this.warn(`Operation rejected: ${operation}`, { kind, message });
  }

  /** Format data object for human-readable log line. */
  private formatData(data: Record<string, unknown>): string {
    const parts: string[] = [];
    for (const [key, value] of Object.entries(data)) {
      if (value !== null && typeof value === 'object') {
        parts.push(`${key}=${stringify(value)}`);
      } else {
        parts.push(`${key}=${String(value)}`);
      }
    }
    return parts.join(', ');
  }
}
