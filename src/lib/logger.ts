const COLORS = {
  reset: "\x1b[0m",
  dim: "\x1b[2m",
  red: "\x1b[31m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
  blue: "\x1b[34m",
  magenta: "\x1b[35m",
};

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

const MAX_ENTRIES = 1000;

export interface LogEntry {
  id: number;
  timestamp: string;
  level: LogLevel;
  tag: string;
  message: string;
  args?: unknown[];
}

export interface LogFilter {
  level?: LogLevel;
  tags?: string[];
  search?: string;
  limit?: number;
}

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && Object.prototype.hasOwnProperty.call(LOG_LEVEL_PRIORITY, value);
}

class Logger {
  private currentLogLevel: LogLevel = 'info';
  private entries: LogEntry[] = [];
  private nextId = 1;
  private onLogCallbacks: Set<(entry: LogEntry) => void> = new Set();

  constructor() {
    const envLevel = process.env.LOG_LEVEL;
    if (isLogLevel(envLevel)) {
      this.currentLogLevel = envLevel;
    }
  }

  onLog(callback: (entry: LogEntry) => void) {
    this.onLogCallbacks.add(callback);
    return () => this.onLogCallbacks.delete(callback);
  }

  setLogLevel(level: LogLevel): void {
    this.currentLogLevel = level;
    process.env.LOG_LEVEL = level;
  }

  getLogLevel(): LogLevel {
    return this.currentLogLevel;
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[this.currentLogLevel];
  }

  private getTimestamp() {
    return new Date().toISOString().replace('T', ' ').replace('Z', '');
  }

  private record(level: LogLevel, tag: string, message: string, args: unknown[]): LogEntry {
    const entry: LogEntry = {
      id: this.nextId++,
      timestamp: this.getTimestamp(),
      level,
      tag,
      message,
      args: args.length > 0 ? args : undefined
    };

    this.entries.push(entry);
    if (this.entries.length > MAX_ENTRIES) {
      this.entries.splice(0, this.entries.length - MAX_ENTRIES);
    }
    this.onLogCallbacks.forEach(cb => cb(entry));
    return entry;
  }

  private formatConsole(entry: LogEntry): [string, ...unknown[]] {
    const timestamp = `${COLORS.dim}${entry.timestamp}${COLORS.reset}`;
    let levelColor = COLORS.reset;

    switch (entry.level) {
      case 'debug': levelColor = COLORS.blue; break;
      case 'info': levelColor = COLORS.green; break;
      case 'warn': levelColor = COLORS.yellow; break;
      case 'error': levelColor = COLORS.red; break;
    }

    const coloredLevel = `${levelColor}${entry.level.toUpperCase().padEnd(5)}${COLORS.reset}`;
    const coloredTag = `${COLORS.magenta}[${entry.tag}]${COLORS.reset}`;

    return [`${timestamp} ${coloredLevel} ${coloredTag} ${entry.message}`, ...(entry.args || [])];
  }

  debug(tag: string, message: string, ...args: unknown[]) {
    if (!this.shouldLog('debug')) return;
    console.debug(...this.formatConsole(this.record('debug', tag, message, args)));
  }

  info(tag: string, message: string, ...args: unknown[]) {
    if (!this.shouldLog('info')) return;
    console.info(...this.formatConsole(this.record('info', tag, message, args)));
  }

  warn(tag: string, message: string, ...args: unknown[]) {
    if (!this.shouldLog('warn')) return;
    console.warn(...this.formatConsole(this.record('warn', tag, message, args)));
  }

  error(tag: string, message: string, ...args: unknown[]) {
    // Always log errors
    console.error(...this.formatConsole(this.record('error', tag, message, args)));
  }

  /**
   * Recent entries, newest first. `level` keeps that level and everything above it.
   */
  queryLogs(filter: LogFilter = {}): LogEntry[] {
    const minPriority = filter.level ? LOG_LEVEL_PRIORITY[filter.level] : 0;
    const search = filter.search?.toLowerCase();

    const matches = this.entries
      .filter(e => LOG_LEVEL_PRIORITY[e.level] >= minPriority)
      .filter(e => !filter.tags || filter.tags.length === 0 || filter.tags.some(t => e.tag.includes(t)))
      .filter(e => !search || e.message.toLowerCase().includes(search) || e.tag.toLowerCase().includes(search))
      .reverse();

    return filter.limit ? matches.slice(0, filter.limit) : matches;
  }

  clear(): void {
    this.entries = [];
  }
}

export const logger = new Logger();
