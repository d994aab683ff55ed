/**
 * Structured logging for the configuration lifecycle engine.
 */

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';

export type LogFormat = 'json' | 'text';

const LEVELS: Record<LogLevel, number> = {
  trace: 0,
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  fatal: 50,
};

const REDACTED = '***REDACTED***';

export interface WritableOutput {
  write(s: string): void;
}

export interface LoggerOptions {
  name?: string;
  format?: LogFormat;
  level?: LogLevel;
  redactSensitive?: boolean;
  output?: WritableOutput;
}

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && Object.hasOwn(LEVELS, value);
}

export function isLogFormat(value: unknown): value is LogFormat {
  return value === 'json' || value === 'text';
}

export class Logger {
  private _name: string;
  private _format: LogFormat;
  private _level: LogLevel;
  private _redactSensitive: boolean;
  private _output: WritableOutput;
  private _bindings: Record<string, unknown>;

  constructor(options?: LoggerOptions, bindings: Record<string, unknown> = {}) {
    this._name = options?.name ?? 'structconf';
    this._format = options?.format ?? 'json';
    this._level = options?.level ?? 'warn';
    this._redactSensitive = options?.redactSensitive ?? true;
    this._output = options?.output ?? { write: (s: string) => console.error(s) };
    this._bindings = bindings;
  }

  get name(): string {
    return this._name;
  }

  get level(): LogLevel {
    return this._level;
  }

  get format(): LogFormat {
    return this._format;
  }

  isLevelEnabled(level: LogLevel): boolean {
    return LEVELS[level] >= LEVELS[this._level];
  }

  /** A logger sharing this one's settings, with extra fields attached to every entry. */
  child(bindings: Record<string, unknown>): Logger {
    return new Logger(
      {
        name: this._name,
        format: this._format,
        level: this._level,
        redactSensitive: this._redactSensitive,
        output: this._output,
      },
      { ...this._bindings, ...bindings },
    );
  }

  private _emit(level: LogLevel, message: string, extra?: Record<string, unknown> | null): void {
    if (!this.isLevelEnabled(level)) return;

    const merged = { ...this._bindings, ...(extra ?? {}) };
    let fields: Record<string, unknown> | null = Object.keys(merged).length > 0 ? merged : null;
    if (fields !== null && this._redactSensitive) {
      const redacted: Record<string, unknown> = {};
      for (const [k, v] of Object.entries(fields)) {
        redacted[k] = k.startsWith('_secret_') ? REDACTED : v;
      }
      fields = redacted;
    }

    const now = new Date();
    if (this._format === 'json') {
      const entry: Record<string, unknown> = {
        timestamp: now.toISOString(),
        level,
        message,
        logger: this._name,
        extra: fields,
      };
      this._output.write(JSON.stringify(entry) + '\n');
    } else {
      const ts = now.toISOString().replace('T', ' ').replace(/\.\d+Z$/, '');
      let extrasStr = '';
      if (fields) {
        extrasStr = ' ' + Object.entries(fields).map(([k, v]) => `${k}=${v}`).join(' ');
      }
      this._output.write(`${ts} [${level.toUpperCase()}] [${this._name}] ${message}${extrasStr}\n`);
    }
  }

  trace(message: string, extra?: Record<string, unknown>): void {
    this._emit('trace', message, extra);
  }

  debug(message: string, extra?: Record<string, unknown>): void {
    this._emit('debug', message, extra);
  }

  info(message: string, extra?: Record<string, unknown>): void {
    this._emit('info', message, extra);
  }

  warn(message: string, extra?: Record<string, unknown>): void {
    this._emit('warn', message, extra);
  }

  error(message: string, extra?: Record<string, unknown>): void {
    this._emit('error', message, extra);
  }

  fatal(message: string, extra?: Record<string, unknown>): void {
    this._emit('fatal', message, extra);
  }
}
