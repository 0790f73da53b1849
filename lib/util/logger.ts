/**
 * Levelled, scoped logging for the engine.
 *
 * Environment:
 *   LOG_LEVEL=error|warn|info|debug|trace  (default: info)
 *   LOG_SCOPES=graph,illusion,dynamics,runner  (default: all scopes)
 *   LOG_FORMAT=pretty|json  (default: pretty)
 *
 * Engine code logs at debug; trial failures go out at warn.
 */

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error';
export type LogScope = 'graph' | 'illusion' | 'dynamics' | 'runner' | 'config' | string;
export type LogFormat = 'pretty' | 'json';

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  scope?: string;
  message: string;
  data?: unknown;
}

export type LogSink = (level: LogLevel, line: string) => void;

const LOG_LEVELS: Record<LogLevel, number> = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
};

const LEVEL_ABBR: Record<LogLevel, string> = {
  trace: 'TRC',
  debug: 'DBG',
  info: 'INF',
  warn: 'WRN',
  error: 'ERR',
};

function parseLevel(raw: string | undefined): LogLevel {
  const v = (raw ?? 'info').toLowerCase();
  switch (v) {
    case 'trace':
    case 'debug':
    case 'info':
    case 'warn':
    case 'error':
      return v;
    default:
      return 'info';
  }
}

function parseFormat(raw: string | undefined): LogFormat {
  return raw === 'json' ? 'json' : 'pretty';
}

const consoleSink: LogSink = (level, line) => {
  switch (level) {
    case 'error':
      console.error(line);
      break;
    case 'warn':
      console.warn(line);
      break;
    case 'trace':
      console.debug(line);
      break;
    default:
      console.log(line);
  }
};

export class Logger {
  private level: number;
  private scopes: Set<string>;
  private format: LogFormat;
  private sink: LogSink = consoleSink;

  constructor(env: Record<string, string | undefined> = process.env) {
    this.level = LOG_LEVELS[parseLevel(env.LOG_LEVEL)];
    this.scopes = new Set(
      (env.LOG_SCOPES ?? '')
        .split(',')
        .map(s => s.trim())
        .filter(s => s)
    );
    this.format = parseFormat(env.LOG_FORMAT);
  }

  setLevel(level: LogLevel): void {
    this.level = LOG_LEVELS[level];
  }

  /** Redirects output; returns the previous sink so callers can restore it. */
  setSink(sink: LogSink): LogSink {
    const prev = this.sink;
    this.sink = sink;
    return prev;
  }

  private shouldLog(level: LogLevel, scope?: string): boolean {
    if (LOG_LEVELS[level] < this.level) return false;
    if (this.scopes.size > 0 && scope && !this.scopes.has(scope)) return false;
    return true;
  }

  private formatOutput(entry: LogEntry): string {
    if (this.format === 'json') {
      return JSON.stringify(entry);
    }
    const time = entry.timestamp.slice(11, 19); // HH:MM:SS
    const scopeStr = entry.scope ? ` │ ${entry.scope}` : '';
    const dataStr = entry.data !== undefined ? ` │ ${JSON.stringify(entry.data)}` : '';
    return `${time} [${LEVEL_ABBR[entry.level]}]${scopeStr} ${entry.message}${dataStr}`;
  }

  log(level: LogLevel, message: string, scope?: LogScope, data?: unknown): void {
    if (!this.shouldLog(level, scope)) return;
    const entry: LogEntry = { timestamp: new Date().toISOString(), level, scope, message, data };
    this.sink(level, this.formatOutput(entry));
  }

  trace(message: string, scope?: LogScope, data?: unknown): void {
    this.log('trace', message, scope, data);
  }

  debug(message: string, scope?: LogScope, data?: unknown): void {
    this.log('debug', message, scope, data);
  }

  info(message: string, scope?: LogScope, data?: unknown): void {
    this.log('info', message, scope, data);
  }

  warn(message: string, scope?: LogScope, data?: unknown): void {
    this.log('warn', message, scope, data);
  }

  error(message: string, scope?: LogScope, data?: unknown): void {
    this.log('error', message, scope, data);
  }

  /**
   * Logger bound to one scope:
   *   const runnerLog = log.withScope('runner');
   *   runnerLog.info('batch done');
   */
  withScope(scope: LogScope): ScopedLogger {
    return new ScopedLogger(this, scope);
  }
}

export class ScopedLogger {
  constructor(
    private logger: Logger,
    private scope: LogScope
  ) {}

  trace(message: string, data?: unknown): void {
    this.logger.trace(message, this.scope, data);
  }

  debug(message: string, data?: unknown): void {
    this.logger.debug(message, this.scope, data);
  }

  info(message: string, data?: unknown): void {
    this.logger.info(message, this.scope, data);
  }

  warn(message: string, data?: unknown): void {
    this.logger.warn(message, this.scope, data);
  }

  error(message: string, data?: unknown): void {
    this.logger.error(message, this.scope, data);
  }
}

export const log = new Logger();
