/* eslint-disable no-console */
/**
 * Namespaced console logger with levels and colors.
 *
 * Level resolution: `METAFORGE_LOG_LEVEL` if set, otherwise `debug` when
 * `DEBUG` is set, otherwise `info`.
 */

export type TLogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export type TLogSink = (level: Exclude<TLogLevel, 'silent'>, line: string) => void;

const LEVEL_ORDER: Record<TLogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

// ANSI color support - respects NO_COLOR env var and non-TTY
const USE_COLOR = !process.env.NO_COLOR && process.stdout.isTTY === true;

const RESET = USE_COLOR ? '\x1b[0m' : '';
const RED = USE_COLOR ? '\x1b[31m' : '';
const YELLOW = USE_COLOR ? '\x1b[33m' : '';
const BLUE = USE_COLOR ? '\x1b[34m' : '';
const DIM = USE_COLOR ? '\x1b[2m' : '';

function isLogLevel(value: string): value is TLogLevel {
  return value in LEVEL_ORDER;
}

function levelFromEnv(): TLogLevel {
  const configured = process.env.METAFORGE_LOG_LEVEL?.toLowerCase();
  if (configured && isLogLevel(configured)) {
    return configured;
  }
  return process.env.DEBUG ? 'debug' : 'info';
}

const consoleSink: TLogSink = (level, line) => {
  switch (level) {
    case 'error':
      console.error(`${RED}✗ ${line}${RESET}`);
      break;
    case 'warn':
      console.warn(`${YELLOW}⚠ ${line}${RESET}`);
      break;
    case 'info':
      console.log(`${BLUE}ℹ ${line}${RESET}`);
      break;
    case 'debug':
      console.log(`${DIM}🔍 ${line}${RESET}`);
      break;
  }
};

let currentLevel: TLogLevel = levelFromEnv();
let currentSink: TLogSink = consoleSink;

export function setLogLevel(level: TLogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): TLogLevel {
  return currentLevel;
}

/**
 * Redirect log output. Returns the previous sink so callers can restore it.
 */
export function setLogSink(sink: TLogSink | undefined): TLogSink {
  const previous = currentSink;
  currentSink = sink ?? consoleSink;
  return previous;
}

export interface Logger {
  readonly namespace: string;
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  isEnabled(level: TLogLevel): boolean;
}

export function createLogger(namespace: string): Logger {
  const emit = (level: Exclude<TLogLevel, 'silent'>, message: string): void => {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[currentLevel]) return;
    currentSink(level, `[${namespace}] ${message}`);
  };

  return {
    namespace,
    debug: (message) => emit('debug', message),
    info: (message) => emit('info', message),
    warn: (message) => emit('warn', message),
    error: (message) => emit('error', message),
    isEnabled: (level) => level !== 'silent' && LEVEL_ORDER[level] >= LEVEL_ORDER[currentLevel],
  };
}
