/**
 * msgate — Logger
 *
 * Lightweight structured logger writing to stderr.
 * Respects NO_COLOR env var and non-TTY environments.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogFields = Record<string, unknown>;

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const LEVEL_COLORS: Record<LogLevel, string> = {
  debug: '\x1b[90m',  // gray
  info: '\x1b[36m',   // cyan
  warn: '\x1b[33m',   // yellow
  error: '\x1b[31m',  // red
};

const RESET = '\x1b[0m';
const DIM = '\x1b[90m';

let globalLevel: LogLevel = 'info';

export function setLogLevel(level: LogLevel): void {
  globalLevel = level;
}

export function getLogLevel(): LogLevel {
  return globalLevel;
}

function isColorless(): boolean {
  if (process.env.NO_COLOR !== undefined && process.env.NO_COLOR !== '') return true;
  if (process.env.TERM === 'dumb') return true;
  if (!process.stderr.isTTY) return true;
  return false;
}

export interface Logger {
  debug(message: string, data?: LogFields): void;
  info(message: string, data?: LogFields): void;
  warn(message: string, data?: LogFields): void;
  error(message: string, data?: LogFields | Error): void;
  /** A logger for the same scope that prefixes every line with `fields`. */
  child(fields: LogFields): Logger;
}

function formatFields(fields: LogFields): string {
  return Object.entries(fields)
    .filter(([, v]) => v !== undefined)
    .map(([k, v]) => `${k}=${typeof v === 'string' ? v : JSON.stringify(v)}`)
    .join(' ');
}

export function createLogger(scope: string, bound: LogFields = {}): Logger {
  const log = (level: LogLevel, message: string, data?: LogFields | Error) => {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[globalLevel]) return;

    const timestamp = new Date().toISOString().slice(11, 23);
    const levelTag = level.toUpperCase().padEnd(5);
    const noColor = isColorless();

    let line: string;

    if (noColor) {
      line = `${timestamp} ${levelTag} [${scope}] ${message}`;
    } else {
      const color = LEVEL_COLORS[level];
      line = `${RESET}${DIM}${timestamp}${RESET} ${color}${levelTag}${RESET} ${DIM}[${scope}]${RESET} ${message}`;
    }

    if (data instanceof Error) {
      line += noColor ? ` ${data.message}` : ` ${LEVEL_COLORS.error}${data.message}${RESET}`;
      if (data.stack && globalLevel === 'debug') {
        line += `\n${data.stack}`;
      }
      data = undefined;
    }

    const formatted = formatFields({ ...bound, ...data });
    if (formatted.length > 0) {
      line += noColor ? ` ${formatted}` : ` ${DIM}${formatted}${RESET}`;
    }

    // stdout stays reserved for command output
    process.stderr.write(line + '\n');
  };

  return {
    debug: (msg, data) => log('debug', msg, data),
    info: (msg, data) => log('info', msg, data),
    warn: (msg, data) => log('warn', msg, data),
    error: (msg, data) => log('error', msg, data),
    child: (fields) => createLogger(scope, { ...bound, ...fields }),
  };
}
