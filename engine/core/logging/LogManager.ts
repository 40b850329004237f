/**
 * Structured logger for the editor engine.
 *
 * Console output is gated by a level; every accepted entry is also kept in a
 * bounded in-memory buffer so a session can be exported for bug reports.
 */

export type LogCategory = 'Filter' | 'Sync' | 'Weights' | 'Session';
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  t: number; // Timestamp (ms)
  c: LogCategory;
  l: LogLevel;
  m: string;
  d?: string; // Stringified metadata
}

export interface LogManagerOptions {
  level?: LogLevel;
  maxEntries?: number;
  /** Disable console output while still recording entries. */
  silent?: boolean;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const MAX_META_LENGTH = 500;

export class LogManager {
  private entries: LogEntry[] = [];
  private startTime = Date.now();
  private maxEntries: number;
  private level: LogLevel;
  private silent: boolean;

  public enabled = true;

  constructor(options: LogManagerOptions = {}) {
    this.level = options.level ?? 'info';
    this.maxEntries = options.maxEntries ?? 1000;
    this.silent = options.silent ?? false;
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  setSilent(silent: boolean): void {
    this.silent = silent;
  }

  debug(category: LogCategory, message: string, meta?: unknown): void {
    this.add('debug', category, message, meta);
  }

  info(category: LogCategory, message: string, meta?: unknown): void {
    this.add('info', category, message, meta);
  }

  warn(category: LogCategory, message: string, meta?: unknown): void {
    this.add('warn', category, message, meta);
  }

  error(category: LogCategory, message: string, meta?: unknown): void {
    this.add('error', category, message, meta);
  }

  /**
   * Recorded entries, oldest first.
   */
  getEntries(): readonly LogEntry[] {
    return this.entries;
  }

  clear(): void {
    this.entries = [];
    this.startTime = Date.now();
  }

  /**
   * Dense text report, one line per entry:
   * `[TimeDelta] [Category] LEVEL Message | Data`
   */
  exportText(): string {
    let output = `--- EDITOR LOG (Start: ${new Date(this.startTime).toISOString()}) ---\n`;
    let lastTime = this.startTime;

    for (const entry of this.entries) {
      const delta = entry.t - lastTime;
      const timeStr = (delta > 0 ? `+${delta}ms` : '0ms').padEnd(7);
      const catStr = `[${entry.c}]`.padEnd(10);

      let line = `${timeStr} ${catStr} ${entry.l.toUpperCase()} ${entry.m}`;
      if (entry.d) {
        line += ` | ${entry.d}`;
      }

      output += line + '\n';
      lastTime = entry.t;
    }

    return output;
  }

  private add(level: LogLevel, category: LogCategory, message: string, meta?: unknown): void {
    if (!this.enabled) return;
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.level]) return;

    if (!this.silent) {
      this.printConsole(level, category, message, meta);
    }

    this.entries.push({
      t: Date.now(),
      c: category,
      l: level,
      m: message,
      d: meta === undefined ? undefined : stringifyMeta(meta),
    });

    if (this.entries.length > this.maxEntries) {
      this.entries.shift();
    }
  }

  private printConsole(level: LogLevel, category: LogCategory, message: string, meta?: unknown): void {
    const line = `[${category}] ${message}`;
    const args = meta === undefined ? [line] : [line, meta];

    switch (level) {
      case 'error':
        console.error(...args);
        break;
      case 'warn':
        console.warn(...args);
        break;
      case 'info':
        console.info(...args);
        break;
      default:
        console.debug(...args);
    }
  }
}

function stringifyMeta(meta: unknown): string {
  if (meta instanceof Error) {
    return `${meta.name}: ${meta.message}`;
  }

  let text: string;
  try {
    text = JSON.stringify(meta, (_key, value: unknown) => {
      if (value instanceof Map) return Object.fromEntries(value);
      if (value instanceof Set) return Array.from(value);
      return value;
    }) ?? String(meta);
  } catch {
    return '[Circular/Unserializable]';
  }

  if (text.length > MAX_META_LENGTH) {
    text = text.substring(0, MAX_META_LENGTH) + '...[TRUNCATED]';
  }
  return text;
}

/** Shared default logger. */
export const logger = new LogManager();
