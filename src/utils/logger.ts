// Leveled logger for diagnostics; user-facing scan output goes through ScanReporter
import { ENV_KEYS } from '../constants';

const isDev = typeof process !== 'undefined' && process.env.NODE_ENV === 'development';

type Primitive = string | number | boolean | undefined | null | bigint | symbol;
type SerializableObject = Record<string, unknown>;
type LogValue = Primitive | Error | SerializableObject | Array<Primitive | SerializableObject>;
type LogArg = LogValue;

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

function resolveLevel(): LogLevel {
  const fromEnv = process.env[ENV_KEYS.LOG_LEVEL]?.toLowerCase();
  if (isLogLevel(fromEnv)) return fromEnv;
  return isDev ? 'debug' : 'warn';
}

let threshold: LogLevel = resolveLevel();

// Everything goes to stderr so stdout stays free for the interactive prompt
function emit(level: Exclude<LogLevel, 'silent'>, args: LogArg[]): void {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[threshold]) return;
  console.error(`[mv-people][${level}]`, ...args);
}

export const logger = {
  debug: (...args: LogArg[]) => emit('debug', args),
  info: (...args: LogArg[]) => emit('info', args),
  warn: (...args: LogArg[]) => emit('warn', args),
  error: (...args: LogArg[]) => emit('error', args),
  setLevel(level: LogLevel): void {
    threshold = level;
  },
  getLevel(): LogLevel {
    return threshold;
  },
};
