import chalk from 'chalk';
import { ENV_LOG_LEVEL } from '../constants.js';
import { LogLevelSchema, type LogLevel } from '../models/config.js';

export interface Logger {
  debug(msg: string, fields?: Record<string, unknown>): void;
  info(msg: string, fields?: Record<string, unknown>): void;
  warn(msg: string, fields?: Record<string, unknown>): void;
  error(msg: string, fields?: Record<string, unknown>): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const LEVEL_COLOR: Record<LogLevel, (text: string) => string> = {
  debug: (text) => chalk.gray(text),
  info: (text) => chalk.blue(text),
  warn: (text) => chalk.yellow(text),
  error: (text) => chalk.red(text),
};

let minLevel: LogLevel = parseLogLevel(process.env[ENV_LOG_LEVEL]) ?? 'warn';
let levelPinned = parseLogLevel(process.env[ENV_LOG_LEVEL]) !== null;

function parseLogLevel(value: string | undefined): LogLevel | null {
  if (!value) return null;
  const result = LogLevelSchema.safeParse(value.toLowerCase());
  return result.success ? result.data : null;
}

/**
 * Set the process-wide minimum level. A level set through NOVA_LOG_LEVEL wins
 * over one coming from config unless `force` is passed.
 */
export function setLogLevel(level: LogLevel, options: { force?: boolean } = {}): void {
  if (levelPinned && !options.force) return;
  minLevel = level;
  if (options.force) levelPinned = true;
}

export function getLogLevel(): LogLevel {
  return minLevel;
}

function formatFields(fields: Record<string, unknown> | undefined): string {
  if (!fields) return '';
  const parts = Object.entries(fields).map(([k, v]) => `${k}=${typeof v === 'string' ? v : JSON.stringify(v)}`);
  return parts.length > 0 ? ` ${chalk.dim(parts.join(' '))}` : '';
}

/**
 * Create a logger that writes levelled lines to stderr, keeping stdout free
 * for command output (and --json envelopes).
 */
export function createLogger(scope: string): Logger {
  const write = (level: LogLevel, msg: string, fields?: Record<string, unknown>): void => {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[minLevel]) return;
    console.error(`${LEVEL_COLOR[level](level)} ${chalk.dim(`[${scope}]`)} ${msg}${formatFields(fields)}`);
  };

  return {
    debug: (msg, fields) => write('debug', msg, fields),
    info: (msg, fields) => write('info', msg, fields),
    warn: (msg, fields) => write('warn', msg, fields),
    error: (msg, fields) => write('error', msg, fields),
  };
}

/**
 * Logger that drops everything (tests, library callers that want silence)
 */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
