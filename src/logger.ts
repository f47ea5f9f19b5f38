/**
 * Structured in-process logging.
 * Console output is filtered by level; every accepted entry is also kept in a bounded
 * buffer of compact records so a session can be replayed from `exportText()`.
 */

export type LogCategory = 'Data' | 'State' | 'Engine' | 'Session' | 'Cli';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

export type LogLevel = typeof LOG_LEVELS[number];

export interface CompactLog {
  t: number; // Timestamp (ms)
  c: LogCategory;
  l: LogLevel;
  m: string;
  d?: string; // Stringified metadata
}

const MAX_META_LENGTH = 500;

function metaReplacer(_key: string, value: unknown): unknown {
  if (value instanceof Set) return [...value];
  if (value instanceof Map) return Object.fromEntries(value);
  return value;
}

function stringifyMeta(meta: unknown): string {
  try {
    const text = JSON.stringify(meta, metaReplacer) ?? String(meta);
    return text.length > MAX_META_LENGTH ? `${text.substring(0, MAX_META_LENGTH)}...[TRUNCATED]` : text;
  } catch {
    return '[Unserializable]';
  }
}

class LogManager {
  private logs: CompactLog[] = [];
  private startTime = Date.now();
  private maxLogs = 1000;

  public enabled = true;
  private consoleLevel: LogLevel = 'info';

  private levelMap: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3
  };

  setConsoleLevel(level: LogLevel) {
    this.consoleLevel = level;
  }

  getConsoleLevel(): LogLevel {
    return this.consoleLevel;
  }

  private add(level: LogLevel, category: LogCategory, message: string, meta?: unknown) {
    if (!this.enabled) return;

    if (this.levelMap[level] >= this.levelMap[this.consoleLevel]) {
      this.printConsole(level, category, message, meta);
    }

    this.logs.push({
      t: Date.now(),
      c: category,
      l: level,
      m: message,
      d: meta === undefined ? undefined : stringifyMeta(meta)
    });

    if (this.logs.length > this.maxLogs) {
      this.logs.shift();
    }
  }

  getLogs(): readonly CompactLog[] {
    return this.logs;
  }

  clear() {
    this.logs = [];
    this.startTime = Date.now();
  }

  /**
   * Dense text report: one line per entry, `[TimeDelta] [Category] Message | Data`.
   */
  exportText(): string {
    let output = `--- HEALTH EXPLORER LOG (Start: ${new Date(this.startTime).toISOString()}) ---\n`;
    let lastTime = this.startTime;

    for (const log of this.logs) {
      const delta = log.t - lastTime;
      const timeStr = delta > 0 ? `+${delta}ms`.padEnd(7) : '0ms'.padEnd(7);
      const catStr = `[${log.c}]`.padEnd(10);

      let line = `${timeStr} ${catStr} ${log.l.toUpperCase()} ${log.m}`;
      if (log.d) {
        line += ` | ${log.d}`;
      }

      output += line + '\n';
      lastTime = log.t;
    }

    return output;
  }

  info(cat: LogCategory, msg: string, meta?: unknown) {
    this.add('info', cat, msg, meta);
  }
  debug(cat: LogCategory, msg: string, meta?: unknown) {
    this.add('debug', cat, msg, meta);
  }
  warn(cat: LogCategory, msg: string, meta?: unknown) {
    this.add('warn', cat, msg, meta);
  }
  error(cat: LogCategory, msg: string, meta?: unknown) {
    this.add('error', cat, msg, meta);
  }

  private printConsole(level: LogLevel, category: LogCategory, message: string, meta?: unknown) {
    const line = `[${category}] ${message}`;
    const args = meta === undefined ? [line] : [line, meta];

    if (level === 'error') {
      console.error(...args);
    } else if (level === 'warn') {
      console.warn(...args);
    } else if (level === 'debug') {
      console.debug(...args);
    } else {
      console.log(...args);
    }
  }
}

export const logger = new LogManager();
