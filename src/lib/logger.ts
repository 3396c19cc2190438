// Structured JSON logger with optional file output for long-running processes

import { appendFileSync, mkdirSync, existsSync } from 'fs';
import { join } from 'path';
import type { LogLevel, LogEntry } from '../types';

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

// Keys whose values never reach a log line (XTS sends `appKey`/`secretKey`, Fyers `access_token`)
const SENSITIVE_KEYS = ['secret', 'password', 'token', 'apikey', 'api_key', 'appkey', 'authorization'];

// Telegram puts the bot token in the request path: `/bot123456:AA.../sendMessage`
const TELEGRAM_TOKEN_IN_URL = /\/bot\d+:[\w-]+/g;

function isSensitiveKey(key: string): boolean {
  const lower = key.toLowerCase();
  return SENSITIVE_KEYS.some((k) => lower.includes(k));
}

function redactSensitive(data: Record<string, unknown>): Record<string, unknown> {
  const redacted: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(data)) {
    if (isSensitiveKey(key)) {
      redacted[key] = '[REDACTED]';
    } else if (typeof value === 'string') {
      redacted[key] = value.replace(TELEGRAM_TOKEN_IN_URL, '/bot[REDACTED]');
    } else if (isPlainObject(value)) {
      redacted[key] = redactSensitive(value);
    } else {
      redacted[key] = value;
    }
  }
  return redacted;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return !!value && typeof value === 'object' && !Array.isArray(value) && !(value instanceof Date);
}

function createLogEntry(level: LogLevel, message: string, data?: Record<string, unknown>): LogEntry {
  return {
    timestamp: new Date().toISOString(),
    level,
    message,
    ...(data && { data: redactSensitive(data) }),
  };
}

function isLogLevel(value: string): value is LogLevel {
  return value in LOG_LEVELS;
}

function shouldLog(level: LogLevel): boolean {
  const configured = process.env.LOG_LEVEL?.trim().toLowerCase() ?? 'info';
  const currentLevel: LogLevel = isLogLevel(configured) ? configured : 'info';
  return LOG_LEVELS[level] >= LOG_LEVELS[currentLevel];
}

// ─── File logging ────────────────────────────────────────────────────────────

let logFilePath: string | null = null;

/** Enable file logging. Creates a timestamped log file in the given directory. */
export function enableFileLogging(dir = 'logs'): string {
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }
  const ts = new Date().toISOString().replace(/[:.]/g, '-').replace('T', '_').slice(0, 19);
  logFilePath = join(dir, `router-${ts}.log`);
  return logFilePath;
}

function writeToFile(output: string): void {
  if (!logFilePath) return;
  try {
    appendFileSync(logFilePath, output + '\n');
  } catch (err) {
    // Stop file output rather than failing every subsequent log call
    const failedPath = logFilePath;
    logFilePath = null;
    console.error(
      JSON.stringify(
        createLogEntry('error', 'File logging disabled', {
          path: failedPath,
          error: err instanceof Error ? err.message : 'Unknown error',
        })
      )
    );
  }
}

function log(level: LogLevel, message: string, data?: Record<string, unknown>): void {
  if (!shouldLog(level)) return;

  const entry = createLogEntry(level, message, data);
  const output = JSON.stringify(entry);

  writeToFile(output);

  switch (level) {
    case 'error':
      console.error(output);
      break;
    case 'warn':
      console.warn(output);
      break;
    default:
      // eslint-disable-next-line no-console
      console.log(output);
  }
}

export interface Logger {
  debug: (message: string, data?: Record<string, unknown>) => void;
  info: (message: string, data?: Record<string, unknown>) => void;
  warn: (message: string, data?: Record<string, unknown>) => void;
  error: (message: string, data?: Record<string, unknown>) => void;
}

export const logger: Logger = {
  debug: (message, data) => log('debug', message, data),
  info: (message, data) => log('info', message, data),
  warn: (message, data) => log('warn', message, data),
  error: (message, data) => log('error', message, data),
};

/** Message text of an unknown thrown value */
export function errorMessage(error: unknown, fallback = 'Unknown error'): string {
  return error instanceof Error ? error.message : fallback;
}

export { redactSensitive, createLogEntry, shouldLog };
