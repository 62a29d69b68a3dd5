/**
 * Logger configuration using Pino
 * Structured logging with configurable levels and a compact one-line console format
 */
import { pino, stdSerializers, type Logger, type LoggerOptions as PinoOptions } from 'pino';
import { PinoPretty } from 'pino-pretty';
import { logLevelSchema, type LogLevel } from '../config/schema.js';

export type { LogLevel };

interface LoggerOptions {
  level: LogLevel;
  pretty: boolean;
}

const levelSymbols: Record<string, string> = {
  fatal: '💀',
  error: '❌',
  warn: '⚠️',
  info: 'ℹ️',
  debug: '🔍',
  trace: '📝',
};

export const symbols = {
  success: '✅',
  error: '❌',
  warning: '⚠️',
  dns: '🌐',
  ip: '📡',
  sync: '🔄',
  startup: '🚀',
  shutdown: '🛑',
};

function resolveDefaultOptions(): LoggerOptions {
  const level = logLevelSchema.safeParse(process.env['LOG_LEVEL']?.toLowerCase());
  return {
    level: level.success ? level.data : 'info',
    pretty: process.env['LOG_PRETTY'] !== 'false',
  };
}

/**
 * Format a value for inline display
 */
function formatValue(value: unknown, maxLen: number = 40): string {
  if (value === undefined || value === null) return '';
  if (typeof value === 'string') {
    return value.length > maxLen ? value.substring(0, maxLen) + '...' : value;
  }
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);

  if (Array.isArray(value)) {
    if (value.length === 0) return '[]';
    if (value.length <= 3) {
      return value.map((v) => formatValue(v, 30)).join(', ');
    }
    return `${value.length} items`;
  }

  if (typeof value === 'object') {
    const keys = Object.keys(value);
    return keys.length === 0 ? '{}' : `{${keys.length} fields}`;
  }

  return String(value);
}

const ID_KEYS = new Set(['passId']);

/**
 * Render the most useful context fields as ` (key=value, ...)`
 */
export function formatContext(log: Record<string, unknown>, excludeKeys: string[]): string {
  const priorityKeys = ['hostname', 'hostnames', 'username', 'provider', 'address', 'status', 'source'];

  const sortedKeys = Object.keys(log)
    .filter((k) => !excludeKeys.includes(k))
    .sort((a, b) => {
      const aIdx = priorityKeys.indexOf(a);
      const bIdx = priorityKeys.indexOf(b);
      if (aIdx >= 0 && bIdx >= 0) return aIdx - bIdx;
      if (aIdx >= 0) return -1;
      if (bIdx >= 0) return 1;
      return 0;
    });

  const contextParts: string[] = [];
  for (const key of sortedKeys.slice(0, 5)) {
    const formatted = formatValue(log[key], ID_KEYS.has(key) ? 8 : 40);
    if (formatted) {
      contextParts.push(`${key}=${formatted}`);
    }
  }

  return contextParts.length > 0 ? ` (${contextParts.join(', ')})` : '';
}

function createPrettyStream() {
  return PinoPretty({
    colorize: true,
    translateTime: 'HH:MM:ss',
    ignore: 'app',
    hideObject: true,
    messageFormat: (log, messageKey) => {
      const level = String(log['level']);
      const service = log['service'];
      const symbol = levelSymbols[level] ?? 'ℹ️';

      let output = typeof service === 'string' ? `[${service}] ` : '';
      output += String(log[messageKey]);

      const excludeKeys = ['level', 'time', 'pid', 'app', 'service', messageKey, 'err', 'error', 'stack'];
      output += formatContext(log, excludeKeys);

      return `${symbol} ${output}`;
    },
    customPrettifiers: {
      level: () => '',
    },
  });
}

function createLogger(options: LoggerOptions = resolveDefaultOptions()): Logger {
  const baseConfig: PinoOptions = {
    level: options.level,
    base: {
      app: 'ddns-sync',
      pid: undefined,
      hostname: undefined, // machine hostname; `hostname` is a DNS name in our context fields
    },
    formatters: {
      level: (label: string) => ({ level: label }),
    },
    serializers: {
      err: stdSerializers.err,
      error: stdSerializers.err,
    },
  };

  if (options.pretty && options.level !== 'silent') {
    return pino(baseConfig, createPrettyStream());
  }

  return pino(baseConfig);
}

export const logger = createLogger();

/**
 * Set the log level at runtime
 */
export function setLogLevel(level: LogLevel): void {
  logger.level = level;
}

/**
 * Create a child logger with additional context
 */
export function createChildLogger(bindings: Record<string, unknown>): Logger {
  return logger.child(bindings);
}

export default logger;
