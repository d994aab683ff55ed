/**
 * Library settings with dot-path key support.
 */

import { Logger, isLogFormat, isLogLevel } from './observability/logger.js';
import type { WritableOutput } from './observability/logger.js';

export const ENV_LOG_LEVEL = 'STRUCTCONF_LOG_LEVEL';
export const ENV_LOG_FORMAT = 'STRUCTCONF_LOG_FORMAT';

export class Settings {
  private _data: Record<string, unknown>;

  constructor(data?: Record<string, unknown>) {
    this._data = data ?? {};
  }

  /**
   * Reads logging settings from environment variables. Unset variables are
   * left out so that `get` falls back to its default.
   */
  static fromEnv(env: Record<string, string | undefined> = process.env): Settings {
    const logging: Record<string, unknown> = {};
    const level = env[ENV_LOG_LEVEL];
    if (level !== undefined && level !== '') logging['level'] = level.toLowerCase();
    const format = env[ENV_LOG_FORMAT];
    if (format !== undefined && format !== '') logging['format'] = format.toLowerCase();
    return new Settings({ logging });
  }

  /** Looks up a dot-separated key, returning `defaultValue` when any segment is missing. */
  get(key: string, defaultValue?: unknown): unknown {
    let node: unknown = this._data;
    for (const segment of key.split('.')) {
      if (!isRecord(node) || !Object.hasOwn(node, segment)) return defaultValue;
      node = node[segment];
    }
    return node;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Builds a logger from `logging.level` and `logging.format`. Values that
 * aren't a known level or format are ignored.
 */
export function createLogger(settings: Settings, output?: WritableOutput): Logger {
  const level = settings.get('logging.level');
  const format = settings.get('logging.format');
  return new Logger({
    name: 'structconf',
    level: isLogLevel(level) ? level : 'warn',
    format: isLogFormat(format) ? format : 'json',
    output,
  });
}

let _defaultLogger: Logger | null = null;

/**
 * The logger the lifecycle engine writes to. Unless one has been installed
 * with {@link setLogger}, it is built from the environment on first use.
 */
export function getLogger(): Logger {
  if (_defaultLogger === null) _defaultLogger = createLogger(Settings.fromEnv());
  return _defaultLogger;
}

/** Installs `logger` as the default and returns the one it replaces. */
export function setLogger(logger: Logger): Logger {
  const previous = getLogger();
  _defaultLogger = logger;
  return previous;
}

/** Drops the default logger so the next {@link getLogger} rebuilds it from the environment. */
export function resetLogger(): void {
  _defaultLogger = null;
}
