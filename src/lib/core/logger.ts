/**
 * Visual Sequencer - Logger
 *
 * ファイル＋コンソール出力のロガー。Lines are `ISO-timestamp [LEVEL] [scope] message`;
 * a daily file `<prefix>-YYYYMMDD.log` is appended when a directory is given.
 */

import * as fs from 'fs';
import * as path from 'path';

// ─── 型定義 ──────────────────────────────────────────

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  scope?: string;
  message: string;
}

export interface LoggerConfig {
  level?: LogLevel;
  dir?: string | null;
  prefix?: string;
  console?: boolean;
  /** Receives every entry that passes the level filter. */
  onEntry?: (entry: LogEntry) => void;
}

const LOG_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

// ─── Logger クラス ───────────────────────────────────

export class Logger {
  private level: LogLevel;
  private logDir?: string;
  private prefix: string;
  private enableConsole: boolean;
  private logStream?: fs.WriteStream;
  private onEntry?: (entry: LogEntry) => void;
  private scope?: string;

  constructor(config: LoggerConfig = {}) {
    this.level = config.level || 'info';
    this.prefix = config.prefix || 'vseq';
    this.enableConsole = config.console !== false;
    this.onEntry = config.onEntry;

    if (config.dir) {
      this.logDir = path.resolve(config.dir);
      if (!fs.existsSync(this.logDir)) {
        fs.mkdirSync(this.logDir, { recursive: true });
      }
      const logFile = path.join(this.logDir, `${this.prefix}-${this.dateStamp()}.log`);
      this.logStream = fs.createWriteStream(logFile, { flags: 'a' });
    }
  }

  // ─── 公開メソッド ──────────────────────────────

  debug(message: string): void { this.write('debug', message); }
  info(message: string): void { this.write('info', message); }
  warn(message: string): void { this.write('warn', message); }
  error(message: string): void { this.write('error', message); }

  log(level: LogLevel, message: string): void { this.write(level, message); }

  /**
   * Same sinks and level, with a `[scope]` tag on every line.
   */
  child(scope: string): Logger {
    const child = new Logger({
      level: this.level,
      prefix: this.prefix,
      console: this.enableConsole,
      onEntry: this.onEntry,
    });
    child.logDir = this.logDir;
    child.logStream = this.logStream;
    child.scope = this.scope ? `${this.scope}:${scope}` : scope;
    return child;
  }

  isEnabled(level: LogLevel): boolean {
    return LOG_PRIORITY[level] >= LOG_PRIORITY[this.level];
  }

  close(): void {
    if (this.logStream) { this.logStream.end(); this.logStream = undefined; }
  }

  // ─── 内部メソッド ──────────────────────────────

  private write(level: LogLevel, message: string): void {
    if (!this.isEnabled(level)) return;

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      scope: this.scope,
      message,
    };
    const line = formatEntry(entry);

    if (this.enableConsole) {
      switch (level) {
        case 'error': console.error(line); break;
        case 'warn': console.warn(line); break;
        case 'debug': console.debug(line); break;
        default: console.log(line);
      }
    }

    if (this.logStream) { this.logStream.write(line + '\n'); }
    this.onEntry?.(entry);
  }

  private dateStamp(): string {
    const d = new Date();
    return `${d.getFullYear()}${String(d.getMonth() + 1).padStart(2, '0')}${String(d.getDate()).padStart(2, '0')}`;
  }
}

export function formatEntry(entry: LogEntry): string {
  const tag = entry.level.toUpperCase().padEnd(5);
  const scope = entry.scope ? ` [${entry.scope}]` : '';
  return `${entry.timestamp} [${tag}]${scope} ${entry.message}`;
}

/** Logger that drops everything; the default for library callers. */
export function silentLogger(): Logger {
  return new Logger({ console: false, level: 'error' });
}
